/**
 * wasi-stub — Import partitioner
 *
 * Splits the import list into imports that stay and function imports from
 * the target namespace that become local stubs.
 *
 * The function index space numbers imported functions first, in import
 * order. Removing imports is only index-preserving when the removed run is
 * a suffix of the import list: the stubs then take exactly the indices the
 * imports had, right before the module's own functions. Any ordinary import
 * after a target import makes the layout unsupported.
 */

import type {
  FuncType,
  ImportPartition,
  ResolvedStubOptions,
  Result,
  StubCandidate,
  WasmImport,
} from '../types.js';
import type { StubError } from '../errors.js';
import { decodeError, unsupportedImportLayout } from '../errors.js';

/** Ordering state while scanning the import list. */
type OrderingState =
  | { readonly phase: 'before-target' }
  | {
      readonly phase: 'target-run';
      /** Ordinary imports seen after the first target import. */
      readonly ordinaryAfterTarget: number;
      readonly firstOffender: WasmImport | null;
    };

/** `module::name`, as imports are reported. */
export function qualifiedImportName(entry: WasmImport): string {
  return `${entry.module}::${entry.name}`;
}

function advance(state: OrderingState, entry: WasmImport, isTarget: boolean): OrderingState {
  if (isTarget) {
    return state.phase === 'before-target'
      ? { phase: 'target-run', ordinaryAfterTarget: 0, firstOffender: null }
      : state;
  }
  if (state.phase === 'before-target') {
    return state;
  }
  return {
    phase: 'target-run',
    ordinaryAfterTarget: state.ordinaryAfterTarget + 1,
    firstOffender: state.firstOffender ?? entry,
  };
}

/**
 * Partition `imports` for the configured target namespace.
 *
 * Fails with UNSUPPORTED_IMPORT_LAYOUT when an ordinary import follows a
 * target import, and with DECODE_ERROR when a candidate's type index does
 * not resolve. Candidates are reported to the logger and the
 * `onStubCandidate` observer only once the partition is known to be valid.
 */
export function partitionImports(
  imports: readonly WasmImport[],
  types: readonly FuncType[],
  options: ResolvedStubOptions,
): Result<ImportPartition, StubError> {
  const { targetNamespace } = options;
  const candidates: StubCandidate[] = [];
  const passthrough: WasmImport[] = [];
  let state: OrderingState = { phase: 'before-target' };

  for (const entry of imports) {
    const isTarget = entry.module === targetNamespace;
    state = advance(state, entry, isTarget);

    const descriptor = entry.descriptor;
    if (!isTarget || descriptor.kind !== 'function') {
      passthrough.push(entry);
      continue;
    }

    const funcType = types[descriptor.typeIndex];
    if (funcType === undefined) {
      return {
        ok: false,
        error: decodeError(
          'import',
          null,
          `${qualifiedImportName(entry)} references type index ${String(descriptor.typeIndex)}, ` +
            `but the module declares ${String(types.length)} types`,
        ),
      };
    }
    candidates.push({ import: entry, typeIndex: descriptor.typeIndex, funcType });
  }

  if (state.phase === 'target-run' && state.firstOffender !== null) {
    return {
      ok: false,
      error: unsupportedImportLayout(
        targetNamespace,
        qualifiedImportName(state.firstOffender),
        state.ordinaryAfterTarget,
      ),
    };
  }

  for (const candidate of candidates) {
    options.logger.info(`found ${qualifiedImportName(candidate.import)}: stubbing...`);
    options.onStubCandidate?.(candidate);
  }

  return { ok: true, value: { candidates, passthrough } };
}
