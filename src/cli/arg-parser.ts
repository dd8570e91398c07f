import { Command } from 'commander';
import { createRequire } from 'node:module';
import { DEFAULT_TARGET_NAMESPACE } from '../types.js';

const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

/** Parsed command line. */
export interface CliConfig {
  /** Path of the module to rewrite. */
  readonly input: string;
  /** Explicit output path; derived from `input` when absent. */
  readonly output: string | null;
  /** Report stub candidates without writing anything. */
  readonly list: boolean;
  readonly namespace: string;
}

const createProgram = (): Command =>
  new Command()
    .name('wasi-stub')
    .description('Replace WASI function imports of a wasm module with local stubs')
    .version(version, '-v, --version', 'display the current version')
    .helpOption('-h, --help', 'display help for command')
    .argument('<input>', 'wasm module to rewrite')
    .option('-o, --output <path>', 'output file (default: "<input> - stubbed.wasm")')
    .option('-l, --list', 'only list the imports that would be stubbed')
    .option(
      '-n, --namespace <name>',
      'import namespace to stub',
      DEFAULT_TARGET_NAMESPACE,
    );

/** Parse user arguments (without the node executable and script path). */
export const parseCliArgs = (argv: readonly string[]): CliConfig => {
  const program = createProgram();
  program.parse([...argv], { from: 'user' });

  const opts = program.opts<{ output?: string; list?: boolean; namespace: string }>();
  const [input] = program.args;
  if (input === undefined) {
    // commander exits on a missing required argument before reaching here
    throw new Error('missing required argument: input');
  }

  return {
    input,
    output: opts.output ?? null,
    list: opts.list === true,
    namespace: opts.namespace,
  };
};
