/**
 * wasi-stub — Error types
 *
 * Discriminated union of all error types the stubber can produce,
 * plus factory functions for constructing each variant.
 */

import type { WasmValueType } from './types.js';

// ---------------------------------------------------------------------------
// Error Codes
// ---------------------------------------------------------------------------

/** All possible error codes produced by the stubber. */
export type StubErrorCode =
  | 'INPUT_NOT_VALID'
  | 'DECODE_ERROR'
  | 'UNSUPPORTED_IMPORT_LAYOUT'
  | 'UNSUPPORTED_SIGNATURE'
  | 'OUTPUT_NOT_VALID'
  | 'IO_ERROR';

// ---------------------------------------------------------------------------
// Error Union
// ---------------------------------------------------------------------------

/** Discriminated union of all stubber errors. */
export type StubError =
  | {
      readonly code: 'INPUT_NOT_VALID';
      readonly reason: string;
    }
  | {
      readonly code: 'DECODE_ERROR';
      /** Section the failure was found in, e.g. `"import"`. */
      readonly section: string;
      /** Byte offset within the module, when the failure has one. */
      readonly offset: number | null;
      readonly reason: string;
    }
  | {
      readonly code: 'UNSUPPORTED_IMPORT_LAYOUT';
      readonly namespace: string;
      /** `module::name` of the first ordinary import after a target import. */
      readonly offendingImport: string;
      readonly ordinaryImportsAfterTarget: number;
    }
  | {
      readonly code: 'UNSUPPORTED_SIGNATURE';
      readonly importName: string;
      readonly params: readonly WasmValueType[];
      readonly results: readonly WasmValueType[];
    }
  | {
      readonly code: 'OUTPUT_NOT_VALID';
      readonly reason: string;
    }
  | {
      readonly code: 'IO_ERROR';
      readonly path: string;
      readonly reason: string;
    };

// ---------------------------------------------------------------------------
// Error Constructors
// ---------------------------------------------------------------------------

/** Create an INPUT_NOT_VALID error. */
export function inputNotValid(reason: string): StubError {
  return { code: 'INPUT_NOT_VALID', reason } as const;
}

/** Create a DECODE_ERROR error. */
export function decodeError(section: string, offset: number | null, reason: string): StubError {
  return { code: 'DECODE_ERROR', section, offset, reason } as const;
}

/** Create an UNSUPPORTED_IMPORT_LAYOUT error. */
export function unsupportedImportLayout(
  namespace: string,
  offendingImport: string,
  ordinaryImportsAfterTarget: number,
): StubError {
  return {
    code: 'UNSUPPORTED_IMPORT_LAYOUT',
    namespace,
    offendingImport,
    ordinaryImportsAfterTarget,
  } as const;
}

/** Create an UNSUPPORTED_SIGNATURE error. */
export function unsupportedSignature(
  importName: string,
  params: readonly WasmValueType[],
  results: readonly WasmValueType[],
): StubError {
  return { code: 'UNSUPPORTED_SIGNATURE', importName, params, results } as const;
}

/** Create an OUTPUT_NOT_VALID error. */
export function outputNotValid(reason: string): StubError {
  return { code: 'OUTPUT_NOT_VALID', reason } as const;
}

/** Create an IO_ERROR error. */
export function ioError(path: string, reason: string): StubError {
  return { code: 'IO_ERROR', path, reason } as const;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function formatSignature(
  params: readonly WasmValueType[],
  results: readonly WasmValueType[],
): string {
  return `(${params.join(', ')}) -> (${results.join(', ')})`;
}

/** Render a stubber error as a single human-readable line. */
export function formatStubError(error: StubError): string {
  switch (error.code) {
    case 'INPUT_NOT_VALID':
      return `the given wasm binary is invalid: ${error.reason}`;
    case 'DECODE_ERROR':
      return error.offset === null
        ? `failed to decode ${error.section} section: ${error.reason}`
        : `failed to decode ${error.section} section at offset ${String(error.offset)}: ${error.reason}`;
    case 'UNSUPPORTED_IMPORT_LAYOUT':
      return (
        `cannot handle '${error.namespace}' imports that are followed by other imports ` +
        `(first: ${error.offendingImport}, ${String(error.ordinaryImportsAfterTarget)} in total)`
      );
    case 'UNSUPPORTED_SIGNATURE':
      return `cannot synthesize a stub for ${error.importName} ${formatSignature(error.params, error.results)}`;
    case 'OUTPUT_NOT_VALID':
      return `the rewritten module failed validation: ${error.reason}`;
    case 'IO_ERROR':
      return `${error.path}: ${error.reason}`;
  }
}
