/**
 * wasi-stub — Logging sinks.
 */

import type { Logger } from './types.js';

/** Writes `info` to stdout and `warn` to stderr. */
export const consoleLogger: Logger = {
  info(message: string): void {
    console.log(message);
  },
  warn(message: string): void {
    console.error(message);
  },
};

/** Discards every message. */
export const silentLogger: Logger = {
  info(): void {
    // discarded
  },
  warn(): void {
    // discarded
  },
};

/** A logger that records messages in memory (used by tests and `--list`). */
export interface RecordingLogger extends Logger {
  readonly lines: readonly string[];
}

export function createRecordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    info(message: string): void {
      lines.push(message);
    },
    warn(message: string): void {
      lines.push(`warn: ${message}`);
    },
  };
}
