/**
 * wasi-stub — Stub body synthesis.
 *
 * A stub keeps the import's signature and does nothing: one unused local
 * per parameter, then either `end` (no results) or `i32.const 76; end`
 * (a single i32 result). No other signature has a stub.
 */

import type { FuncType, Result, StubBody, StubCandidate } from '../types.js';
import { STUB_SENTINEL_VALUE } from '../types.js';
import type { StubError } from '../errors.js';
import { unsupportedSignature } from '../errors.js';
import { ByteWriter } from '../binary/byte-writer.js';
import { Opcode, VALUE_TYPE_BYTES } from '../binary/constants.js';
import { qualifiedImportName } from './import-partitioner.js';

/** Build the body for a stub of `funcType`. */
export function synthesizeStubBody(
  funcType: FuncType,
  importName: string,
): Result<StubBody, StubError> {
  const { params, results } = funcType;
  const instructions = new ByteWriter(8);

  if (results.length === 1 && results[0] === 'i32') {
    instructions.writeByte(Opcode.I32Const).writeI32(STUB_SENTINEL_VALUE);
  } else if (results.length !== 0) {
    return { ok: false, error: unsupportedSignature(importName, params, results) };
  }
  instructions.writeByte(Opcode.End);

  return {
    ok: true,
    value: { locals: [...params], instructions: instructions.toUint8Array() },
  };
}

/** Encode a stub body (locals vector, then instructions), without size prefix. */
export function encodeStubBody(body: StubBody): Uint8Array {
  const writer = new ByteWriter();
  writer.writeU32(body.locals.length);
  for (const local of body.locals) {
    writer.writeU32(1).writeByte(VALUE_TYPE_BYTES[local]);
  }
  writer.writeBytes(body.instructions);
  return writer.toUint8Array();
}

/** Synthesize and encode the bodies for every candidate, in order. */
export function synthesizeStubBodies(
  candidates: readonly StubCandidate[],
): Result<Uint8Array[], StubError> {
  const bodies: Uint8Array[] = [];
  for (const candidate of candidates) {
    const body = synthesizeStubBody(candidate.funcType, qualifiedImportName(candidate.import));
    if (!body.ok) {
      return body;
    }
    bodies.push(encodeStubBody(body.value));
  }
  return { ok: true, value: bodies };
}
