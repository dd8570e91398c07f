/**
 * wasi-stub — Replace a wasm module's WASI function imports with local stubs.
 *
 * @packageDocumentation
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type {
  Result,
  ResultOk,
  ResultErr,
  WasmValueType,
  FuncType,
  OpaqueExternKind,
  FunctionImportDescriptor,
  OpaqueImportDescriptor,
  ImportDescriptor,
  WasmImport,
  StubCandidate,
  ImportPartition,
  TypeSection,
  ImportSection,
  FunctionSection,
  CodeSection,
  OpaqueSection,
  Section,
  StubBody,
  Logger,
  StubOptions,
  ResolvedStubOptions,
  StubbedImport,
  StubOutput,
  StubError,
  StubErrorCode,
} from './types.js';

export { DEFAULT_TARGET_NAMESPACE, STUB_SENTINEL_VALUE } from './types.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export {
  inputNotValid,
  decodeError,
  unsupportedImportLayout,
  unsupportedSignature,
  outputNotValid,
  ioError,
  formatStubError,
} from './errors.js';

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export { stubModule, collectLayout, rewriteSections } from './transform/module-assembler.js';
export type { ModuleLayout, RewritePlan } from './transform/module-assembler.js';
export { partitionImports } from './transform/import-partitioner.js';
export { synthesizeStubBody, encodeStubBody } from './transform/stub-synthesizer.js';
export { rebuildFunctionSection, rebuildCodeSection } from './transform/function-index-space.js';
export { resolveStubOptions } from './options.js';
export { consoleLogger, silentLogger, createRecordingLogger } from './logger.js';
export type { RecordingLogger } from './logger.js';

// ---------------------------------------------------------------------------
// Section codec
// ---------------------------------------------------------------------------

export { decodeModule } from './binary/decoder.js';
export { encodeModule } from './binary/encoder.js';
export { validateModule } from './binary/validator.js';
