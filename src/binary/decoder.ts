/**
 * wasi-stub — Module decoder
 *
 * Splits a WASM binary into its sections and decodes the four section kinds
 * the transformation interprets (type, import, function, code). Every other
 * section is kept as an opaque payload.
 */

import type {
  FuncType,
  ImportDescriptor,
  OpaqueExternKind,
  Result,
  Section,
  WasmImport,
  WasmValueType,
} from '../types.js';
import type { StubError } from '../errors.js';
import { decodeError } from '../errors.js';
import { BinaryReadError, ByteReader } from './byte-reader.js';
import {
  ExternKind,
  FUNC_TYPE_FORM,
  SectionId,
  WASM_MAGIC,
  WASM_VERSION,
  sectionName,
  valueTypeFromByte,
} from './constants.js';

/** Reference type prefixes followed by a heap type (`ref null ht`, `ref ht`). */
const REF_NULL_PREFIX = 0x63;
const REF_PREFIX = 0x64;

/** Abstract heap type shorthands that may appear as a value type byte. */
const ABSTRACT_REF_SHORTHANDS = new Set([
  0x69, 0x6a, 0x6b, 0x6c, 0x6d, 0x6e, 0x6f, 0x70, 0x71, 0x72, 0x73, 0x74,
]);

/** Highest limits flag value (has-max | shared | 64-bit). */
const MAX_LIMITS_FLAGS = 0x07;

// ---------------------------------------------------------------------------
// Typed views
// ---------------------------------------------------------------------------

function readValueType(reader: ByteReader): WasmValueType {
  const offset = reader.offset;
  const byte = reader.readByte();
  const valueType = valueTypeFromByte(byte);
  if (valueType === undefined) {
    throw new BinaryReadError(offset, `unsupported value type 0x${byte.toString(16)}`);
  }
  return valueType;
}

function readValueTypes(reader: ByteReader): WasmValueType[] {
  const count = reader.readU32();
  const types: WasmValueType[] = [];
  for (let i = 0; i < count; i++) {
    types.push(readValueType(reader));
  }
  return types;
}

/** Skip a value type inside an opaque descriptor, including typed references. */
function skipOpaqueValueType(reader: ByteReader): void {
  const offset = reader.offset;
  const byte = reader.readByte();
  if (byte === REF_NULL_PREFIX || byte === REF_PREFIX) {
    reader.skipLeb();
    return;
  }
  if (valueTypeFromByte(byte) === undefined && !ABSTRACT_REF_SHORTHANDS.has(byte)) {
    throw new BinaryReadError(offset, `unsupported value type 0x${byte.toString(16)}`);
  }
}

function skipLimits(reader: ByteReader): void {
  const offset = reader.offset;
  const flags = reader.readByte();
  if (flags > MAX_LIMITS_FLAGS) {
    throw new BinaryReadError(offset, `invalid limits flags 0x${flags.toString(16)}`);
  }
  reader.skipLeb();
  if ((flags & 0x01) !== 0) {
    reader.skipLeb();
  }
}

/** Decode the entries of a type section. Only function types are supported. */
export function decodeTypeEntries(reader: ByteReader): FuncType[] {
  const count = reader.readU32();
  const types: FuncType[] = [];
  for (let i = 0; i < count; i++) {
    const offset = reader.offset;
    const form = reader.readByte();
    if (form !== FUNC_TYPE_FORM) {
      throw new BinaryReadError(offset, `unsupported type form 0x${form.toString(16)}`);
    }
    const params = readValueTypes(reader);
    const results = readValueTypes(reader);
    types.push({ params, results });
  }
  return types;
}

function readImportDescriptor(reader: ByteReader): ImportDescriptor {
  const start = reader.offset;
  const kindByte = reader.readByte();
  const opaque = (externKind: OpaqueExternKind): ImportDescriptor => ({
    kind: 'other',
    externKind,
    bytes: reader.sliceFrom(start),
  });

  switch (kindByte) {
    case ExternKind.Function:
      return { kind: 'function', typeIndex: reader.readU32() };
    case ExternKind.Table:
      skipOpaqueValueType(reader);
      skipLimits(reader);
      return opaque('table');
    case ExternKind.Memory:
      skipLimits(reader);
      return opaque('memory');
    case ExternKind.Global:
      skipOpaqueValueType(reader);
      // mutability
      reader.readByte();
      return opaque('global');
    case ExternKind.Tag:
      // attribute, then the tag's type index
      reader.readByte();
      reader.readU32();
      return opaque('tag');
    default:
      throw new BinaryReadError(start, `unknown import kind 0x${kindByte.toString(16)}`);
  }
}

/** Decode the entries of an import section. */
export function decodeImportEntries(reader: ByteReader): WasmImport[] {
  const count = reader.readU32();
  const imports: WasmImport[] = [];
  for (let i = 0; i < count; i++) {
    const module = reader.readName();
    const name = reader.readName();
    const descriptor = readImportDescriptor(reader);
    imports.push({ module, name, descriptor });
  }
  return imports;
}

/** Decode the type indices of a function section. */
export function decodeFunctionEntries(reader: ByteReader): number[] {
  const count = reader.readU32();
  const typeIndices: number[] = [];
  for (let i = 0; i < count; i++) {
    typeIndices.push(reader.readU32());
  }
  return typeIndices;
}

/** Split a code section into raw bodies (size prefixes removed). */
export function decodeCodeEntries(reader: ByteReader): Uint8Array[] {
  const count = reader.readU32();
  const bodies: Uint8Array[] = [];
  for (let i = 0; i < count; i++) {
    const size = reader.readU32();
    bodies.push(reader.readBytes(size));
  }
  return bodies;
}

// ---------------------------------------------------------------------------
// Module
// ---------------------------------------------------------------------------

function expectConsumed(reader: ByteReader): void {
  if (!reader.atEnd) {
    throw new BinaryReadError(
      reader.offset,
      `section has ${String(reader.remaining)} trailing bytes`,
    );
  }
}

function decodeSection(id: number, payload: Uint8Array, payloadOffset: number): Section {
  const reader = new ByteReader(payload, payloadOffset);
  let section: Section;

  switch (id) {
    case SectionId.Type:
      section = { kind: 'type', payload, types: decodeTypeEntries(reader) };
      break;
    case SectionId.Import:
      section = { kind: 'import', imports: decodeImportEntries(reader) };
      break;
    case SectionId.Function:
      section = { kind: 'function', typeIndices: decodeFunctionEntries(reader) };
      break;
    case SectionId.Code:
      section = { kind: 'code', bodies: decodeCodeEntries(reader) };
      break;
    default:
      return { kind: 'opaque', id, payload };
  }

  expectConsumed(reader);
  return section;
}

function readHeader(reader: ByteReader): void {
  const magic = reader.readBytes(WASM_MAGIC.byteLength);
  if (!magic.every((byte, i) => byte === WASM_MAGIC[i])) {
    throw new BinaryReadError(0, 'invalid magic bytes, expected \\0asm');
  }
  const version = reader.readBytes(WASM_VERSION.byteLength);
  if (!version.every((byte, i) => byte === WASM_VERSION[i])) {
    throw new BinaryReadError(WASM_MAGIC.byteLength, 'unsupported binary version');
  }
}

/**
 * Decode a WASM binary into its ordered sections.
 *
 * Payloads of opaque sections, the type section payload and code bodies are
 * views into `bytes`; they are not copied.
 */
export function decodeModule(bytes: Uint8Array): Result<readonly Section[], StubError> {
  const reader = new ByteReader(bytes);
  const sections: Section[] = [];
  let current = 'header';

  try {
    readHeader(reader);

    while (!reader.atEnd) {
      current = 'section header';
      const id = reader.readByte();
      current = sectionName(id);
      const size = reader.readU32();
      const payloadOffset = reader.offset;
      const payload = reader.readBytes(size);
      sections.push(decodeSection(id, payload, payloadOffset));
    }
  } catch (err: unknown) {
    if (err instanceof BinaryReadError) {
      return { ok: false, error: decodeError(current, err.offset, err.message) };
    }
    throw err;
  }

  return { ok: true, value: sections };
}
