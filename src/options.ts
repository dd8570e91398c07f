/**
 * wasi-stub — Option resolution.
 */

import type { ResolvedStubOptions, StubOptions } from './types.js';
import { DEFAULT_TARGET_NAMESPACE } from './types.js';
import { consoleLogger } from './logger.js';

/** Apply defaults to caller-supplied options. */
export function resolveStubOptions(options: StubOptions = {}): ResolvedStubOptions {
  return {
    targetNamespace: options.targetNamespace ?? DEFAULT_TARGET_NAMESPACE,
    logger: options.logger ?? consoleLogger,
    onStubCandidate: options.onStubCandidate ?? null,
  };
}
