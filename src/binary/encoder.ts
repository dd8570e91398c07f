/**
 * wasi-stub — Module encoder
 *
 * Serializes a section sequence back into a WASM binary. Typed sections are
 * re-encoded from their entries; the type section and opaque sections are
 * written from their stored payloads.
 */

import type { Section, WasmImport } from '../types.js';
import { ByteWriter } from './byte-writer.js';
import { ExternKind, SectionId, WASM_MAGIC, WASM_VERSION } from './constants.js';

function encodeImportEntries(imports: readonly WasmImport[]): Uint8Array {
  const writer = new ByteWriter();
  writer.writeU32(imports.length);
  for (const entry of imports) {
    writer.writeName(entry.module).writeName(entry.name);
    const descriptor = entry.descriptor;
    if (descriptor.kind === 'function') {
      writer.writeByte(ExternKind.Function).writeU32(descriptor.typeIndex);
    } else {
      writer.writeBytes(descriptor.bytes);
    }
  }
  return writer.toUint8Array();
}

function encodeFunctionEntries(typeIndices: readonly number[]): Uint8Array {
  const writer = new ByteWriter();
  writer.writeU32(typeIndices.length);
  for (const typeIndex of typeIndices) {
    writer.writeU32(typeIndex);
  }
  return writer.toUint8Array();
}

function encodeCodeEntries(bodies: readonly Uint8Array[]): Uint8Array {
  const writer = new ByteWriter();
  writer.writeU32(bodies.length);
  for (const body of bodies) {
    writer.writeSized(body);
  }
  return writer.toUint8Array();
}

/** Binary section id of a section. */
export function sectionIdOf(section: Section): number {
  switch (section.kind) {
    case 'type':
      return SectionId.Type;
    case 'import':
      return SectionId.Import;
    case 'function':
      return SectionId.Function;
    case 'code':
      return SectionId.Code;
    case 'opaque':
      return section.id;
  }
}

/** Section id and payload bytes for one section. */
export function encodeSection(section: Section): { readonly id: number; readonly payload: Uint8Array } {
  switch (section.kind) {
    case 'type':
      return { id: SectionId.Type, payload: section.payload };
    case 'import':
      return { id: SectionId.Import, payload: encodeImportEntries(section.imports) };
    case 'function':
      return { id: SectionId.Function, payload: encodeFunctionEntries(section.typeIndices) };
    case 'code':
      return { id: SectionId.Code, payload: encodeCodeEntries(section.bodies) };
    case 'opaque':
      return { id: section.id, payload: section.payload };
  }
}

/** Encode an ordered section sequence as a complete WASM binary. */
export function encodeModule(sections: readonly Section[]): Uint8Array {
  const writer = new ByteWriter();
  writer.writeBytes(WASM_MAGIC).writeBytes(WASM_VERSION);
  for (const section of sections) {
    const { id, payload } = encodeSection(section);
    writer.writeByte(id).writeSized(payload);
  }
  return writer.toUint8Array();
}
