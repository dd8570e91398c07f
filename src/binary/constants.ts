/**
 * wasi-stub — WASM binary format constants.
 */

import type { WasmValueType } from '../types.js';

/** WASM magic bytes: `\0asm` */
export const WASM_MAGIC = new Uint8Array([0x00, 0x61, 0x73, 0x6d]);

/** Binary format version 1, little endian. */
export const WASM_VERSION = new Uint8Array([0x01, 0x00, 0x00, 0x00]);

/** Magic + version. */
export const WASM_HEADER_SIZE = 8;

/** Section identifiers. */
export const SectionId = {
  Custom: 0,
  Type: 1,
  Import: 2,
  Function: 3,
  Table: 4,
  Memory: 5,
  Global: 6,
  Export: 7,
  Start: 8,
  Element: 9,
  Code: 10,
  Data: 11,
  DataCount: 12,
  Tag: 13,
} as const;

/** Leading byte of a function type entry. */
export const FUNC_TYPE_FORM = 0x60;

/** Import descriptor kind bytes. */
export const ExternKind = {
  Function: 0x00,
  Table: 0x01,
  Memory: 0x02,
  Global: 0x03,
  Tag: 0x04,
} as const;

/** Value type encodings. */
export const VALUE_TYPE_BYTES: Readonly<Record<WasmValueType, number>> = {
  i32: 0x7f,
  i64: 0x7e,
  f32: 0x7d,
  f64: 0x7c,
  v128: 0x7b,
  funcref: 0x70,
  externref: 0x6f,
};

const VALUE_TYPES_BY_BYTE: ReadonlyMap<number, WasmValueType> = new Map<number, WasmValueType>([
  [0x7f, 'i32'],
  [0x7e, 'i64'],
  [0x7d, 'f32'],
  [0x7c, 'f64'],
  [0x7b, 'v128'],
  [0x70, 'funcref'],
  [0x6f, 'externref'],
]);

/** Look up the value type for an encoding byte. */
export function valueTypeFromByte(byte: number): WasmValueType | undefined {
  return VALUE_TYPES_BY_BYTE.get(byte);
}

/** Instruction opcodes used by synthesized bodies. */
export const Opcode = {
  End: 0x0b,
  I32Const: 0x41,
} as const;

/** Human-readable section name for diagnostics. */
export function sectionName(id: number): string {
  switch (id) {
    case SectionId.Custom:
      return 'custom';
    case SectionId.Type:
      return 'type';
    case SectionId.Import:
      return 'import';
    case SectionId.Function:
      return 'function';
    case SectionId.Table:
      return 'table';
    case SectionId.Memory:
      return 'memory';
    case SectionId.Global:
      return 'global';
    case SectionId.Export:
      return 'export';
    case SectionId.Start:
      return 'start';
    case SectionId.Element:
      return 'element';
    case SectionId.Code:
      return 'code';
    case SectionId.Data:
      return 'data';
    case SectionId.DataCount:
      return 'data count';
    case SectionId.Tag:
      return 'tag';
    default:
      return `unknown (${String(id)})`;
  }
}
