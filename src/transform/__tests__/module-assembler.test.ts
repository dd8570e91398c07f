/**
 * wasi-stub — Module assembler unit tests
 */

import { describe, it, expect } from 'vitest';
import { collectLayout, rewriteSections, stubModule } from '../module-assembler.js';
import { decodeModule } from '../../binary/decoder.js';
import { encodeModule } from '../../binary/encoder.js';
import { validateModule } from '../../binary/validator.js';
import { createRecordingLogger, silentLogger } from '../../logger.js';
import type { Section, StubOutput } from '../../types.js';
import {
  CUSTOM_SECTION_DATA,
  RUN_BODY,
  WASI,
  addWasmModule,
  funcExport,
  i64ResultModule,
  importOnlyModule,
  mixedImportsModule,
  name,
  opaqueImportsModule,
  vec,
  wasiBeforeEnvModule,
  wasiOnlyModule,
} from '../../binary/__tests__/wasm-fixtures.js';

function stubOrThrow(bytes: Uint8Array): StubOutput {
  const result = stubModule(bytes, { logger: silentLogger });
  if (!result.ok) {
    throw new Error(`stubModule failed: ${JSON.stringify(result.error)}`);
  }
  return result.value;
}

function decodeOrThrow(bytes: Uint8Array): readonly Section[] {
  const result = decodeModule(bytes);
  if (!result.ok) {
    throw new Error(`decode failed: ${JSON.stringify(result.error)}`);
  }
  return result.value;
}

function describeSection(section: Section): string {
  return section.kind === 'opaque' ? `opaque:${String(section.id)}` : section.kind;
}

/** fd_write stub: 4 i32 locals, i32.const 76, end. */
const FD_WRITE_STUB = [0x04, 0x01, 0x7f, 0x01, 0x7f, 0x01, 0x7f, 0x01, 0x7f, 0x41, 0xcc, 0x00, 0x0b];

/** proc_exit stub: 1 i32 local, end. */
const PROC_EXIT_STUB = [0x01, 0x01, 0x7f, 0x0b];

// ---------------------------------------------------------------------------
// Successful rewrites
// ---------------------------------------------------------------------------

describe('stubModule', () => {
  it('replaces a trailing WASI import with a local stub', () => {
    const output = stubOrThrow(mixedImportsModule());
    const sections = decodeOrThrow(output.bytes);

    expect(sections.map(describeSection)).toEqual([
      'type',
      'import',
      'function',
      'opaque:7',
      'code',
      'opaque:0',
    ]);
    expect(sections[1]).toEqual({
      kind: 'import',
      imports: [{ module: 'env', name: 'log', descriptor: { kind: 'function', typeIndex: 0 } }],
    });
    expect(sections[2]).toEqual({ kind: 'function', typeIndices: [1, 2] });

    const code = sections[4];
    expect(code?.kind).toBe('code');
    if (code?.kind === 'code') {
      expect(code.bodies.map((b) => Array.from(b))).toEqual([FD_WRITE_STUB, RUN_BODY]);
    }
  });

  it('describes the stubbed imports and the resulting index space', () => {
    const output = stubOrThrow(mixedImportsModule());
    expect(output.stubbed).toEqual([
      {
        module: WASI,
        name: 'fd_write',
        functionIndex: 1,
        params: ['i32', 'i32', 'i32', 'i32'],
        results: ['i32'],
      },
    ]);
    expect(output.passthroughFunctionCount).toBe(1);
    expect(output.localFunctionCount).toBe(1);
  });

  it('copies the type, export and custom sections unchanged', () => {
    const input = decodeOrThrow(mixedImportsModule());
    const output = decodeOrThrow(stubOrThrow(mixedImportsModule()).bytes);

    expect(output[0]).toEqual(input[0]);
    const exportSection = output[3];
    const customSection = output[5];
    expect(exportSection?.kind === 'opaque' ? Array.from(exportSection.payload) : null).toEqual(
      vec([funcExport('run', 2), funcExport('fd_write', 1)]),
    );
    expect(customSection?.kind === 'opaque' ? Array.from(customSection.payload) : null).toEqual([
      ...name('meta'),
      ...CUSTOM_SECTION_DATA,
    ]);
  });

  it('stubs every import of a WASI-only module', () => {
    const output = stubOrThrow(wasiOnlyModule());
    const sections = decodeOrThrow(output.bytes);

    expect(sections[1]).toEqual({ kind: 'import', imports: [] });
    expect(sections[2]).toEqual({ kind: 'function', typeIndices: [1, 0, 2, 3] });
    expect(output.stubbed.map((s) => [s.name, s.functionIndex])).toEqual([
      ['fd_write', 0],
      ['proc_exit', 1],
    ]);
    const code = sections.find((s) => s.kind === 'code');
    if (code?.kind === 'code') {
      expect(code.bodies.slice(0, 2).map((b) => Array.from(b))).toEqual([FD_WRITE_STUB, PROC_EXIT_STUB]);
    }
  });

  it('returns an equivalent module when nothing targets the namespace', () => {
    const input = addWasmModule();
    const output = stubOrThrow(input);
    expect(Array.from(output.bytes)).toEqual(Array.from(input));
    expect(output.stubbed).toEqual([]);
    expect(output.localFunctionCount).toBe(1);
  });

  it('adds function and code sections to an import-only module', () => {
    const output = stubOrThrow(importOnlyModule());
    const sections = decodeOrThrow(output.bytes);

    expect(sections.map(describeSection)).toEqual(['type', 'import', 'function', 'opaque:7', 'code']);
    expect(sections[2]).toEqual({ kind: 'function', typeIndices: [0] });
    const code = sections[4];
    if (code?.kind === 'code') {
      expect(code.bodies.map((b) => Array.from(b))).toEqual([PROC_EXIT_STUB]);
    }
    expect(output.localFunctionCount).toBe(0);
  });

  it('keeps non-function imports in place and numbers stubs after function imports only', () => {
    const output = stubOrThrow(opaqueImportsModule());
    const importSection = decodeOrThrow(output.bytes)[1];

    expect(importSection?.kind).toBe('import');
    if (importSection?.kind === 'import') {
      expect(importSection.imports.map((i) => `${i.module}::${i.name}`)).toEqual([
        'env::log',
        'env::base',
        `${WASI}::memory`,
      ]);
    }
    expect(output.passthroughFunctionCount).toBe(1);
    expect(output.stubbed.map((s) => s.functionIndex)).toEqual([1]);
  });

  it('reports each candidate through the logger', () => {
    const logger = createRecordingLogger();
    const result = stubModule(wasiOnlyModule(), { logger });
    expect(result.ok).toBe(true);
    expect(logger.lines).toEqual([
      'found wasi_snapshot_preview1::fd_write: stubbing...',
      'found wasi_snapshot_preview1::proc_exit: stubbing...',
    ]);
  });

  it('produces output that passes validation', () => {
    for (const input of [mixedImportsModule(), wasiOnlyModule(), importOnlyModule(), opaqueImportsModule()]) {
      expect(validateModule(stubOrThrow(input).bytes).ok).toBe(true);
    }
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe('stubModule errors', () => {
  it('fails with INPUT_NOT_VALID before doing any work', () => {
    const logger = createRecordingLogger();
    const result = stubModule(new Uint8Array([0xde, 0xad, 0xbe, 0xef, 0x01, 0x00, 0x00, 0x00]), { logger });
    expect(result).toEqual({
      ok: false,
      error: { code: 'INPUT_NOT_VALID', reason: 'Invalid WASM magic bytes — expected \\0asm header' },
    });
    expect(logger.lines).toEqual([]);
  });

  it('fails with UNSUPPORTED_IMPORT_LAYOUT when an ordinary import follows a WASI import', () => {
    expect(stubModule(wasiBeforeEnvModule(), { logger: silentLogger })).toEqual({
      ok: false,
      error: {
        code: 'UNSUPPORTED_IMPORT_LAYOUT',
        namespace: WASI,
        offendingImport: 'env::log',
        ordinaryImportsAfterTarget: 1,
      },
    });
  });

  it('applies the layout rule to a custom namespace', () => {
    const result = stubModule(mixedImportsModule(), { targetNamespace: 'env', logger: silentLogger });
    expect(result.ok).toBe(false);
    if (!result.ok && result.error.code === 'UNSUPPORTED_IMPORT_LAYOUT') {
      expect(result.error.offendingImport).toBe(`${WASI}::fd_write`);
    }
  });

  it('fails with UNSUPPORTED_SIGNATURE for a non-i32 result', () => {
    expect(stubModule(i64ResultModule(), { logger: silentLogger })).toEqual({
      ok: false,
      error: {
        code: 'UNSUPPORTED_SIGNATURE',
        importName: `${WASI}::clock_now`,
        params: ['i32'],
        results: ['i64'],
      },
    });
  });
});

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

describe('collectLayout', () => {
  it('picks out the type table, imports and function and code sections', () => {
    const layout = collectLayout(decodeOrThrow(mixedImportsModule()));
    expect(layout.types).toHaveLength(3);
    expect(layout.imports.map((i) => i.name)).toEqual(['log', 'fd_write']);
    expect(layout.functionSection).toEqual({ kind: 'function', typeIndices: [2] });
    expect(layout.codeSection?.bodies).toHaveLength(1);
  });

  it('reports missing sections as null', () => {
    const layout = collectLayout([]);
    expect(layout).toEqual({
      sections: [],
      types: [],
      imports: [],
      functionSection: null,
      codeSection: null,
    });
  });
});

describe('rewriteSections', () => {
  it('produces a module the validator rejects when a stub body does not match its type', () => {
    const layout = collectLayout(decodeOrThrow(importOnlyModule()));
    const [candidateImport] = layout.imports.slice(1);
    if (candidateImport === undefined) {
      throw new Error('fixture has no WASI import');
    }
    // (i32) -> () given a body that leaves an i32 on the stack
    const mismatched = new Uint8Array([0x00, 0x41, 0x01, 0x0b]);
    const sections = rewriteSections({
      layout,
      partition: {
        candidates: [{ import: candidateImport, typeIndex: 0, funcType: { params: ['i32'], results: [] } }],
        passthrough: layout.imports.slice(0, 1),
      },
      stubBodies: [mismatched],
    });
    expect(validateModule(encodeModule(sections)).ok).toBe(false);
  });
});
