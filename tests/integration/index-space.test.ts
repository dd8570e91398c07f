/**
 * wasi-stub — Index space and layout integration tests.
 *
 * Builds modules with m ordinary imports, k WASI imports and n local
 * functions, rewrites them, and checks that every call in the module still
 * reaches the function it reached before.
 */

import { describe, it, expect } from 'vitest';
import { stubModule } from '../../src/transform/module-assembler.js';
import { decodeModule } from '../../src/binary/decoder.js';
import { silentLogger } from '../../src/logger.js';
import type { Section } from '../../src/types.js';
import {
  WASI,
  codeEntry,
  customSection,
  funcExport,
  funcImport,
  funcType,
  section,
  uleb,
  vec,
  wasmModule,
} from '../../src/binary/__tests__/wasm-fixtures.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Shape {
  readonly ordinary: number;
  readonly target: number;
  readonly locals: number;
}

const TRAILER = [0x01, 0x02, 0x03];

/** Local function `i` calls import `i % (ordinary + target)`, or nothing. */
function localBody(index: number, importCount: number): number[] {
  if (importCount === 0) {
    return [0x00, 0x0b];
  }
  return [0x00, 0x10, ...uleb(index % importCount), 0x0b];
}

function layeredModule({ ordinary, target, locals }: Shape): Uint8Array {
  const importCount = ordinary + target;
  const imports = [
    ...Array.from({ length: ordinary }, (_, i) => funcImport('env', `e${String(i)}`, 0)),
    ...Array.from({ length: target }, (_, i) => funcImport(WASI, `w${String(i)}`, 0)),
  ];
  const localIndices = Array.from({ length: locals }, (_, i) => i);

  const sections: number[][] = [section(1, vec([funcType([], [])]))];
  if (importCount > 0) {
    sections.push(section(2, vec(imports)));
  }
  if (locals > 0) {
    sections.push(section(3, vec(localIndices.map(() => [0x00]))));
    sections.push(
      section(7, vec(localIndices.map((i) => funcExport(`f${String(i)}`, importCount + i)))),
    );
    sections.push(section(10, vec(localIndices.map((i) => codeEntry(localBody(i, importCount))))));
  }
  sections.push(customSection('trailer', TRAILER));
  return wasmModule(...sections);
}

function decodeOrThrow(bytes: Uint8Array): readonly Section[] {
  const result = decodeModule(bytes);
  if (!result.ok) {
    throw new Error(`decode failed: ${JSON.stringify(result.error)}`);
  }
  return result.value;
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

const SHAPES: readonly Shape[] = [
  { ordinary: 0, target: 1, locals: 1 },
  { ordinary: 1, target: 1, locals: 1 },
  { ordinary: 2, target: 3, locals: 6 },
  { ordinary: 3, target: 0, locals: 4 },
  { ordinary: 0, target: 3, locals: 0 },
  { ordinary: 1, target: 2, locals: 5 },
];

// ---------------------------------------------------------------------------
// Index space
// ---------------------------------------------------------------------------

describe('function index space preservation', () => {
  for (const shape of SHAPES) {
    const label = `m=${String(shape.ordinary)} k=${String(shape.target)} n=${String(shape.locals)}`;

    it(`keeps m imports then k + n local functions (${label})`, () => {
      const input = layeredModule(shape);
      const result = stubModule(input, { logger: silentLogger });
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      const output = result.value;
      expect(output.passthroughFunctionCount).toBe(shape.ordinary);
      expect(output.stubbed).toHaveLength(shape.target);
      expect(output.localFunctionCount).toBe(shape.locals);

      const sections = decodeOrThrow(output.bytes);
      const imports = sections.find((s) => s.kind === 'import');
      const functions = sections.find((s) => s.kind === 'function');
      const code = sections.find((s) => s.kind === 'code');

      expect(imports?.kind === 'import' ? imports.imports.length : 0).toBe(shape.ordinary);
      expect(functions?.kind === 'function' ? functions.typeIndices.length : 0).toBe(
        shape.target + shape.locals,
      );

      const originalBodies = Array.from({ length: shape.locals }, (_, i) =>
        localBody(i, shape.ordinary + shape.target),
      );
      const bodies = code?.kind === 'code' ? code.bodies.map((b) => Array.from(b)) : [];
      expect(bodies.slice(shape.target)).toEqual(originalBodies);
    });

    it(`copies the trailing custom section unchanged (${label})`, () => {
      const result = stubModule(layeredModule(shape), { logger: silentLogger });
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const sections = decodeOrThrow(result.value.bytes);
      const last = sections[sections.length - 1];
      expect(last?.kind === 'opaque' ? Array.from(last.payload) : null).toEqual(
        customSection('trailer', TRAILER).slice(2),
      );
    });

    it(`routes every call to the same host function as before (${label})`, async () => {
      const result = stubModule(layeredModule(shape), { logger: silentLogger });
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      const calls = new Array<number>(shape.ordinary).fill(0);
      const env: WebAssembly.ModuleImports = {};
      for (let i = 0; i < shape.ordinary; i++) {
        env[`e${String(i)}`] = (): void => {
          calls[i] = (calls[i] ?? 0) + 1;
        };
      }
      const { instance } = await WebAssembly.instantiate(toArrayBuffer(result.value.bytes), { env });

      const expected = new Array<number>(shape.ordinary).fill(0);
      for (let i = 0; i < shape.locals; i++) {
        const fn = instance.exports[`f${String(i)}`];
        expect(typeof fn).toBe('function');
        if (typeof fn === 'function') {
          (fn as () => void)();
        }
        const callee = i % (shape.ordinary + shape.target);
        if (callee < shape.ordinary) {
          expected[callee] = (expected[callee] ?? 0) + 1;
        }
      }
      expect(calls).toEqual(expected);
    });
  }
});

// ---------------------------------------------------------------------------
// Layout precondition
// ---------------------------------------------------------------------------

type Origin = 'env' | 'wasi';

function allOrderings(length: number): Origin[][] {
  if (length === 0) return [[]];
  return allOrderings(length - 1).flatMap((prefix) => [
    [...prefix, 'env' as const],
    [...prefix, 'wasi' as const],
  ]);
}

function hasOrdinaryAfterTarget(order: readonly Origin[]): boolean {
  const firstTarget = order.indexOf('wasi');
  return firstTarget !== -1 && order.slice(firstTarget + 1).includes('env');
}

describe('import layout precondition', () => {
  const orderings = [1, 2, 3, 4].flatMap(allOrderings);

  it('accepts exactly the orderings where WASI imports form a suffix', () => {
    for (const order of orderings) {
      const imports = order.map((origin, i) =>
        funcImport(origin === 'env' ? 'env' : WASI, `i${String(i)}`, 0),
      );
      const bytes = wasmModule(section(1, vec([funcType([], [])])), section(2, vec(imports)));
      const result = stubModule(bytes, { logger: silentLogger });

      if (hasOrdinaryAfterTarget(order)) {
        expect(result.ok, order.join(',')).toBe(false);
        if (!result.ok) {
          expect(result.error.code).toBe('UNSUPPORTED_IMPORT_LAYOUT');
        }
      } else {
        expect(result.ok, order.join(',')).toBe(true);
      }
    }
  });
});
