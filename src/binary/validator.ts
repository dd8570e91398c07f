/**
 * wasi-stub — Structural validation.
 *
 * Checks the WASM header, then defers to the runtime's validator, which
 * checks the full grammar and typing rules without compiling.
 */

import type { Result } from '../types.js';
import { WASM_HEADER_SIZE, WASM_MAGIC } from './constants.js';

/** Validate that the bytes start with the WASM magic number. */
function hasValidMagic(bytes: Uint8Array): boolean {
  if (bytes.length < WASM_MAGIC.length) {
    return false;
  }
  for (let i = 0; i < WASM_MAGIC.length; i++) {
    if (bytes[i] !== WASM_MAGIC[i]) {
      return false;
    }
  }
  return true;
}

/** Recover the engine's message for a module `WebAssembly.validate` rejected. */
function describeRejection(buffer: ArrayBuffer): string {
  try {
    new WebAssembly.Module(buffer);
  } catch (err: unknown) {
    if (err instanceof Error) {
      return `WASM validation failed: ${err.message}`;
    }
  }
  return 'WASM validation failed';
}

/**
 * Validate a WASM binary.
 *
 * Returns the reason as the error value when the bytes are not a
 * well-formed, well-typed module.
 */
export function validateModule(bytes: Uint8Array): Result<void, string> {
  if (bytes.length === 0) {
    return { ok: false, error: 'Empty WASM bytes — module must not be empty' };
  }

  if (bytes.length < WASM_HEADER_SIZE) {
    return {
      ok: false,
      error: `WASM module too small: ${String(bytes.length)} bytes (minimum ${String(WASM_HEADER_SIZE)})`,
    };
  }

  if (!hasValidMagic(bytes)) {
    return { ok: false, error: 'Invalid WASM magic bytes — expected \\0asm header' };
  }

  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  if (!WebAssembly.validate(buffer)) {
    return { ok: false, error: describeRejection(buffer) };
  }

  return { ok: true, value: undefined };
}
