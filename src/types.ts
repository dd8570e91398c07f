/**
 * wasi-stub — Core type definitions
 *
 * Public types for the section model, the import partition and the
 * transformation result.
 */

// ---------------------------------------------------------------------------
// Result Type
// ---------------------------------------------------------------------------

/** Success branch of a Result. */
export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

/** Failure branch of a Result. */
export interface ResultErr<E> {
  readonly ok: false;
  readonly error: E;
}

/** Discriminated union for fallible operations. */
export type Result<T, E> = ResultOk<T> | ResultErr<E>;

// ---------------------------------------------------------------------------
// WASM Value and Function Types
// ---------------------------------------------------------------------------

/** Value types understood by the typed section views. */
export type WasmValueType = 'i32' | 'i64' | 'f32' | 'f64' | 'v128' | 'funcref' | 'externref';

/** A function signature from the type section. */
export interface FuncType {
  readonly params: readonly WasmValueType[];
  readonly results: readonly WasmValueType[];
}

// ---------------------------------------------------------------------------
// Imports
// ---------------------------------------------------------------------------

/** External kinds other than function, kept opaque. */
export type OpaqueExternKind = 'table' | 'memory' | 'global' | 'tag';

/** Descriptor of a function import. */
export interface FunctionImportDescriptor {
  readonly kind: 'function';
  readonly typeIndex: number;
}

/** Descriptor of any non-function import, re-emitted byte for byte. */
export interface OpaqueImportDescriptor {
  readonly kind: 'other';
  readonly externKind: OpaqueExternKind;
  /** Raw descriptor bytes, kind byte included. */
  readonly bytes: Uint8Array;
}

export type ImportDescriptor = FunctionImportDescriptor | OpaqueImportDescriptor;

/** One entry of the import section. */
export interface WasmImport {
  /** Module namespace, e.g. `"env"` or `"wasi_snapshot_preview1"`. */
  readonly module: string;
  readonly name: string;
  readonly descriptor: ImportDescriptor;
}

/** A function import from the target namespace, selected for stubbing. */
export interface StubCandidate {
  readonly import: WasmImport;
  readonly typeIndex: number;
  readonly funcType: FuncType;
}

/** Result of partitioning an import list. */
export interface ImportPartition {
  /** Imports selected for stubbing, in original order. */
  readonly candidates: readonly StubCandidate[];
  /** Imports kept in the output import section, in original order. */
  readonly passthrough: readonly WasmImport[];
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

/** Type section: raw payload (re-emitted verbatim) plus the decoded table. */
export interface TypeSection {
  readonly kind: 'type';
  readonly payload: Uint8Array;
  readonly types: readonly FuncType[];
}

export interface ImportSection {
  readonly kind: 'import';
  readonly imports: readonly WasmImport[];
}

export interface FunctionSection {
  readonly kind: 'function';
  readonly typeIndices: readonly number[];
}

/** Code section. Each body is raw bytes without its size prefix. */
export interface CodeSection {
  readonly kind: 'code';
  readonly bodies: readonly Uint8Array[];
}

/** Any section the transformation does not interpret. */
export interface OpaqueSection {
  readonly kind: 'opaque';
  readonly id: number;
  readonly payload: Uint8Array;
}

/** Closed union of every section the codec produces. */
export type Section = TypeSection | ImportSection | FunctionSection | CodeSection | OpaqueSection;

// ---------------------------------------------------------------------------
// Stub Bodies
// ---------------------------------------------------------------------------

/** A synthesized function body before encoding. */
export interface StubBody {
  /** One local per parameter, in parameter order. */
  readonly locals: readonly WasmValueType[];
  /** Instruction bytes, terminated by `end`. */
  readonly instructions: Uint8Array;
}

// ---------------------------------------------------------------------------
// Logging and Options
// ---------------------------------------------------------------------------

/** Minimal logging sink used by the engine and the CLI. */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

/** Namespace whose function imports are stubbed by default. */
export const DEFAULT_TARGET_NAMESPACE = 'wasi_snapshot_preview1';

/** Constant returned by stubs that declare a single `i32` result. */
export const STUB_SENTINEL_VALUE = 76;

/** Options for `stubModule`. Every field is optional. */
export interface StubOptions {
  /** Import namespace to stub. Default: `wasi_snapshot_preview1`. */
  readonly targetNamespace?: string;
  /** Where stub candidates are reported. Default: console. */
  readonly logger?: Logger;
  /** Called once per stub candidate, at the moment it is selected. */
  readonly onStubCandidate?: (candidate: StubCandidate) => void;
}

/** `StubOptions` with defaults applied. */
export interface ResolvedStubOptions {
  readonly targetNamespace: string;
  readonly logger: Logger;
  readonly onStubCandidate: ((candidate: StubCandidate) => void) | null;
}

// ---------------------------------------------------------------------------
// Transformation Output
// ---------------------------------------------------------------------------

/** An import that was replaced by a local stub. */
export interface StubbedImport {
  readonly module: string;
  readonly name: string;
  /** Index of the stub in the output module's function index space. */
  readonly functionIndex: number;
  readonly params: readonly WasmValueType[];
  readonly results: readonly WasmValueType[];
}

/** Successful result of `stubModule`. */
export interface StubOutput {
  /** The rewritten, validated module. */
  readonly bytes: Uint8Array;
  readonly stubbed: readonly StubbedImport[];
  /** Number of function imports left in the output. */
  readonly passthroughFunctionCount: number;
  /** Number of functions defined by the input module itself. */
  readonly localFunctionCount: number;
}

// ---------------------------------------------------------------------------
// Re-export StubError from errors module (type-only)
// ---------------------------------------------------------------------------

export type { StubError, StubErrorCode } from './errors.js';
