/**
 * wasi-stub — Function index space rebuilding.
 *
 * The output index space is: remaining imported functions, then one stub
 * per removed import (original order), then the module's own functions
 * (original order). Stub declarations and bodies therefore go first in the
 * function and code sections. Original bodies are copied byte for byte, so
 * no call site is renumbered.
 */

import type { CodeSection, FunctionSection, Section, StubCandidate } from '../types.js';
import { SectionId } from '../binary/constants.js';
import { sectionIdOf } from '../binary/encoder.js';

/** Function section with stub declarations ahead of the original ones. */
export function rebuildFunctionSection(
  candidates: readonly StubCandidate[],
  original: FunctionSection | null,
): FunctionSection {
  return {
    kind: 'function',
    typeIndices: [
      ...candidates.map((candidate) => candidate.typeIndex),
      ...(original?.typeIndices ?? []),
    ],
  };
}

/** Code section with stub bodies ahead of the untouched original bodies. */
export function rebuildCodeSection(
  stubBodies: readonly Uint8Array[],
  original: CodeSection | null,
): CodeSection {
  return {
    kind: 'code',
    bodies: [...stubBodies, ...(original?.bodies ?? [])],
  };
}

// ---------------------------------------------------------------------------
// Section ordering
// ---------------------------------------------------------------------------

/** Required relative order of the non-custom sections. */
const SECTION_ORDER: readonly number[] = [
  SectionId.Type,
  SectionId.Import,
  SectionId.Function,
  SectionId.Table,
  SectionId.Memory,
  SectionId.Tag,
  SectionId.Global,
  SectionId.Export,
  SectionId.Start,
  SectionId.Element,
  SectionId.DataCount,
  SectionId.Code,
  SectionId.Data,
];

function sectionRank(id: number): number {
  return SECTION_ORDER.indexOf(id);
}

/**
 * Insert `section` right after the last non-custom section that must
 * precede it. Used when the input has no function or code section at all.
 */
export function insertInSectionOrder(
  sections: readonly Section[],
  section: Section,
): Section[] {
  const rank = sectionRank(sectionIdOf(section));
  let insertAt = 0;
  sections.forEach((existing, index) => {
    const id = sectionIdOf(existing);
    if (id !== SectionId.Custom && sectionRank(id) < rank) {
      insertAt = index + 1;
    }
  });
  return [...sections.slice(0, insertAt), section, ...sections.slice(insertAt)];
}
