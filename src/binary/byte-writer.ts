/**
 * wasi-stub — Byte writer
 *
 * A growable byte buffer for building WASM binaries.
 */

const INITIAL_CAPACITY = 1024;

const utf8 = new TextEncoder();

export class ByteWriter {
  #view: Uint8Array;
  #length = 0;

  constructor(initialCapacity = INITIAL_CAPACITY) {
    this.#view = new Uint8Array(Math.max(initialCapacity, 16));
  }

  get length(): number {
    return this.#length;
  }

  #ensureCapacity(needed: number): void {
    if (needed <= this.#view.byteLength) return;
    let newSize = this.#view.byteLength;
    while (newSize < needed) newSize *= 2;
    const next = new Uint8Array(newSize);
    next.set(this.#view.subarray(0, this.#length));
    this.#view = next;
  }

  writeByte(byte: number): this {
    this.#ensureCapacity(this.#length + 1);
    this.#view[this.#length++] = byte & 0xff;
    return this;
  }

  writeBytes(bytes: Uint8Array | readonly number[]): this {
    this.#ensureCapacity(this.#length + bytes.length);
    if (bytes instanceof Uint8Array) {
      this.#view.set(bytes, this.#length);
    } else {
      for (let i = 0; i < bytes.length; i++) {
        this.#view[this.#length + i] = (bytes[i] ?? 0) & 0xff;
      }
    }
    this.#length += bytes.length;
    return this;
  }

  /** Write an unsigned 32-bit LEB128 integer. */
  writeU32(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff_ffff) {
      throw new RangeError(`Value out of u32 range: ${String(value)}`);
    }
    let remaining = value;
    do {
      let byte = remaining & 0x7f;
      remaining = Math.floor(remaining / 128);
      if (remaining !== 0) {
        byte |= 0x80;
      }
      this.writeByte(byte);
    } while (remaining !== 0);
    return this;
  }

  /** Write a signed 32-bit LEB128 integer. */
  writeI32(value: number): this {
    if (!Number.isInteger(value) || value < -0x8000_0000 || value > 0x7fff_ffff) {
      throw new RangeError(`Value out of i32 range: ${String(value)}`);
    }
    let remaining = value | 0;
    for (;;) {
      const byte = remaining & 0x7f;
      remaining >>= 7;
      const signBitSet = (byte & 0x40) !== 0;
      if ((remaining === 0 && !signBitSet) || (remaining === -1 && signBitSet)) {
        this.writeByte(byte);
        return this;
      }
      this.writeByte(byte | 0x80);
    }
  }

  /** Write a length-prefixed UTF-8 name. */
  writeName(name: string): this {
    const bytes = utf8.encode(name);
    this.writeU32(bytes.byteLength);
    return this.writeBytes(bytes);
  }

  /** Write a size-prefixed byte run (section payloads, function bodies). */
  writeSized(bytes: Uint8Array): this {
    this.writeU32(bytes.byteLength);
    return this.writeBytes(bytes);
  }

  toUint8Array(): Uint8Array {
    return this.#view.slice(0, this.#length);
  }
}
