/**
 * wasi-stub — Byte reader
 *
 * Cursor over a WASM binary. Reads bytes, LEB128 integers and names.
 * Every failure throws a `BinaryReadError` carrying the absolute offset;
 * the decoder turns it into a DECODE_ERROR.
 */

/** Maximum encoded length of an unsigned 32-bit LEB128 value. */
const MAX_U32_LEB_BYTES = 5;

/** Maximum encoded length of any LEB128 value this reader skips (64-bit). */
const MAX_U64_LEB_BYTES = 10;

/** Thrown when the input does not hold what the reader was asked for. */
export class BinaryReadError extends Error {
  readonly offset: number;

  constructor(offset: number, message: string) {
    super(message);
    this.name = 'BinaryReadError';
    this.offset = offset;
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

export class ByteReader {
  readonly #bytes: Uint8Array;
  /** Absolute offset of `#bytes[0]` within the module. */
  readonly #base: number;
  #position = 0;

  constructor(bytes: Uint8Array, base = 0) {
    this.#bytes = bytes;
    this.#base = base;
  }

  /** Absolute offset of the next unread byte. */
  get offset(): number {
    return this.#base + this.#position;
  }

  get remaining(): number {
    return this.#bytes.byteLength - this.#position;
  }

  get atEnd(): boolean {
    return this.#position >= this.#bytes.byteLength;
  }

  readByte(): number {
    const byte = this.#bytes[this.#position];
    if (byte === undefined) {
      throw new BinaryReadError(this.offset, 'unexpected end of input');
    }
    this.#position += 1;
    return byte;
  }

  /** Read `length` bytes as a view into the underlying buffer. */
  readBytes(length: number): Uint8Array {
    if (length > this.remaining) {
      throw new BinaryReadError(
        this.offset,
        `expected ${String(length)} bytes but only ${String(this.remaining)} remain`,
      );
    }
    const start = this.#position;
    this.#position += length;
    return this.#bytes.subarray(start, this.#position);
  }

  /** Read an unsigned 32-bit LEB128 integer. */
  readU32(): number {
    const start = this.offset;
    let result = 0;
    let multiplier = 1;
    for (let i = 0; i < MAX_U32_LEB_BYTES; i++) {
      const byte = this.readByte();
      result += (byte & 0x7f) * multiplier;
      if ((byte & 0x80) === 0) {
        if (result > 0xffff_ffff) {
          throw new BinaryReadError(start, 'integer too large for u32');
        }
        return result;
      }
      multiplier *= 128;
    }
    throw new BinaryReadError(start, 'integer representation too long');
  }

  /** Skip over one LEB128 integer of up to 64 bits, signed or unsigned. */
  skipLeb(): void {
    const start = this.offset;
    for (let i = 0; i < MAX_U64_LEB_BYTES; i++) {
      if ((this.readByte() & 0x80) === 0) {
        return;
      }
    }
    throw new BinaryReadError(start, 'integer representation too long');
  }

  /** Read a length-prefixed UTF-8 name. */
  readName(): string {
    const length = this.readU32();
    const start = this.offset;
    const bytes = this.readBytes(length);
    try {
      return utf8.decode(bytes);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : 'malformed UTF-8';
      throw new BinaryReadError(start, `invalid UTF-8 name: ${message}`);
    }
  }

  /** Bytes consumed since `fromOffset` (an absolute offset). */
  sliceFrom(fromOffset: number): Uint8Array {
    return this.#bytes.subarray(fromOffset - this.#base, this.#position);
  }
}
