/**
 * wasi-stub — Module assembler
 *
 * Staged pipeline: validate input → decode → collect layout → partition
 * imports → synthesize stubs → rewrite sections → encode → validate output.
 * Each stage receives the typed output of the previous one; nothing depends
 * on the order sections happen to be visited in.
 */

import type {
  CodeSection,
  FuncType,
  FunctionSection,
  ImportPartition,
  Result,
  Section,
  StubOptions,
  StubOutput,
  StubbedImport,
  WasmImport,
} from '../types.js';
import type { StubError } from '../errors.js';
import { inputNotValid, outputNotValid } from '../errors.js';
import { resolveStubOptions } from '../options.js';
import { decodeModule } from '../binary/decoder.js';
import { encodeModule } from '../binary/encoder.js';
import { validateModule } from '../binary/validator.js';
import { partitionImports } from './import-partitioner.js';
import { synthesizeStubBodies } from './stub-synthesizer.js';
import {
  insertInSectionOrder,
  rebuildCodeSection,
  rebuildFunctionSection,
} from './function-index-space.js';

// ---------------------------------------------------------------------------
// Intermediate state
// ---------------------------------------------------------------------------

/** The parts of a decoded module the rewrite depends on. */
export interface ModuleLayout {
  readonly sections: readonly Section[];
  readonly types: readonly FuncType[];
  readonly imports: readonly WasmImport[];
  readonly functionSection: FunctionSection | null;
  readonly codeSection: CodeSection | null;
}

/** Everything needed to produce the output sections. */
export interface RewritePlan {
  readonly layout: ModuleLayout;
  readonly partition: ImportPartition;
  /** Encoded stub bodies, one per candidate, in candidate order. */
  readonly stubBodies: readonly Uint8Array[];
}

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

/** Pick out the type table, the imports and the function and code sections. */
export function collectLayout(sections: readonly Section[]): ModuleLayout {
  let types: readonly FuncType[] = [];
  let imports: readonly WasmImport[] = [];
  let functionSection: FunctionSection | null = null;
  let codeSection: CodeSection | null = null;

  for (const section of sections) {
    switch (section.kind) {
      case 'type':
        types = section.types;
        break;
      case 'import':
        imports = section.imports;
        break;
      case 'function':
        functionSection = section;
        break;
      case 'code':
        codeSection = section;
        break;
      case 'opaque':
        break;
    }
  }

  return { sections, types, imports, functionSection, codeSection };
}

/** Produce the output section list from a plan. */
export function rewriteSections(plan: RewritePlan): Section[] {
  const { layout, partition, stubBodies } = plan;
  const functionSection = rebuildFunctionSection(partition.candidates, layout.functionSection);
  const codeSection = rebuildCodeSection(stubBodies, layout.codeSection);

  let output = layout.sections.map((section): Section => {
    switch (section.kind) {
      case 'import':
        return { kind: 'import', imports: partition.passthrough };
      case 'function':
        return functionSection;
      case 'code':
        return codeSection;
      case 'type':
      case 'opaque':
        return section;
    }
  });

  if (partition.candidates.length > 0) {
    if (layout.functionSection === null) {
      output = insertInSectionOrder(output, functionSection);
    }
    if (layout.codeSection === null) {
      output = insertInSectionOrder(output, codeSection);
    }
  }

  return output;
}

function describeStubs(plan: RewritePlan): {
  readonly stubbed: StubbedImport[];
  readonly passthroughFunctionCount: number;
} {
  const passthroughFunctionCount = plan.partition.passthrough.filter(
    (entry) => entry.descriptor.kind === 'function',
  ).length;
  const stubbed = plan.partition.candidates.map((candidate, i) => ({
    module: candidate.import.module,
    name: candidate.import.name,
    functionIndex: passthroughFunctionCount + i,
    params: candidate.funcType.params,
    results: candidate.funcType.results,
  }));
  return { stubbed, passthroughFunctionCount };
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Replace every function import from the target namespace with a local stub.
 *
 * Returns the rewritten module only when it passes structural validation;
 * no partial output is ever produced.
 *
 * @param bytes   - The input WASM binary.
 * @param options - Target namespace, logger and candidate observer.
 */
export function stubModule(
  bytes: Uint8Array,
  options?: StubOptions,
): Result<StubOutput, StubError> {
  const resolved = resolveStubOptions(options);

  const inputCheck = validateModule(bytes);
  if (!inputCheck.ok) {
    return { ok: false, error: inputNotValid(inputCheck.error) };
  }

  const decoded = decodeModule(bytes);
  if (!decoded.ok) {
    return decoded;
  }
  const layout = collectLayout(decoded.value);

  const partition = partitionImports(layout.imports, layout.types, resolved);
  if (!partition.ok) {
    return partition;
  }

  const stubBodies = synthesizeStubBodies(partition.value.candidates);
  if (!stubBodies.ok) {
    return stubBodies;
  }

  const plan: RewritePlan = { layout, partition: partition.value, stubBodies: stubBodies.value };
  const output = encodeModule(rewriteSections(plan));

  const outputCheck = validateModule(output);
  if (!outputCheck.ok) {
    return { ok: false, error: outputNotValid(outputCheck.error) };
  }

  const { stubbed, passthroughFunctionCount } = describeStubs(plan);
  return {
    ok: true,
    value: {
      bytes: output,
      stubbed,
      passthroughFunctionCount,
      localFunctionCount: layout.functionSection?.typeIndices.length ?? 0,
    },
  };
}
