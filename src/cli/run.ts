/**
 * wasi-stub — Command line driver.
 *
 * Reads the input module, runs the stubber, and writes the result beside the
 * input (or to `--output`) with the input's permission bits.
 */

import { chmod, readFile, stat, writeFile } from 'node:fs/promises';
import type { Logger, Result, StubOutput } from '../types.js';
import type { StubError } from '../errors.js';
import { formatStubError, ioError } from '../errors.js';
import { consoleLogger } from '../logger.js';
import { stubModule } from '../transform/module-assembler.js';
import type { CliConfig } from './arg-parser.js';
import { parseCliArgs } from './arg-parser.js';
import type { PathExists } from './output-path.js';
import { deriveOutputPath, pathExists } from './output-path.js';

/** Printed instead of writing anything in `--list` mode. */
export const LIST_MODE_NOTE =
  "NOTE: no output produced because the '--list' option was specified";

/** Collaborators the driver uses; tests substitute the logger. */
export interface CliDeps {
  readonly logger: Logger;
  readonly exists: PathExists;
}

const defaultDeps: CliDeps = { logger: consoleLogger, exists: pathExists };

function describeIoFailure(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown I/O error';
}

async function readInput(path: string): Promise<Result<Uint8Array, StubError>> {
  try {
    return { ok: true, value: new Uint8Array(await readFile(path)) };
  } catch (err: unknown) {
    return { ok: false, error: ioError(path, describeIoFailure(err)) };
  }
}

/** Write `output` and give it the permission bits of `inputPath`. */
async function writeOutput(
  inputPath: string,
  outputPath: string,
  output: StubOutput,
): Promise<Result<void, StubError>> {
  try {
    await writeFile(outputPath, output.bytes);
  } catch (err: unknown) {
    return { ok: false, error: ioError(outputPath, describeIoFailure(err)) };
  }

  try {
    const { mode } = await stat(inputPath);
    await chmod(outputPath, mode & 0o7777);
  } catch (err: unknown) {
    return {
      ok: false,
      error: ioError(outputPath, `copying permissions from ${inputPath}: ${describeIoFailure(err)}`),
    };
  }
  return { ok: true, value: undefined };
}

/** Run the stubber for an already-parsed configuration. */
export async function runWithConfig(
  config: CliConfig,
  deps: CliDeps = defaultDeps,
): Promise<Result<string | null, StubError>> {
  const input = await readInput(config.input);
  if (!input.ok) {
    return input;
  }

  const stubbed = stubModule(input.value, {
    targetNamespace: config.namespace,
    logger: deps.logger,
  });
  if (!stubbed.ok) {
    return stubbed;
  }

  if (config.list) {
    deps.logger.info(LIST_MODE_NOTE);
    return { ok: true, value: null };
  }

  const outputPath = config.output ?? (await deriveOutputPath(config.input, deps.exists));
  const written = await writeOutput(config.input, outputPath, stubbed.value);
  if (!written.ok) {
    return written;
  }

  deps.logger.info(
    `wrote ${outputPath} (${String(stubbed.value.stubbed.length)} imports stubbed)`,
  );
  return { ok: true, value: outputPath };
}

/**
 * Entry point for `wasi-stub`. Resolves to the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDeps = defaultDeps,
): Promise<number> {
  const config = parseCliArgs(argv);
  const result = await runWithConfig(config, deps);
  if (!result.ok) {
    deps.logger.warn(`Error: ${formatStubError(result.error)}`);
    return 1;
  }
  return 0;
}
