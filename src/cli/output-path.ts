import { access } from 'node:fs/promises';
import { join, parse } from 'node:path';

/** Resolves to true when something already exists at `path`. */
export type PathExists = (path: string) => Promise<boolean>;

export const pathExists: PathExists = async (path) => {
  try {
    await access(path);
    return true;
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return false;
    }
    throw err;
  }
};

/** Candidate output name for attempt `attempt` (0 = first choice). */
export const stubbedFileName = (stem: string, attempt: number): string =>
  attempt === 0 ? `${stem} - stubbed.wasm` : `${stem} - stubbed (${String(attempt)}).wasm`;

/**
 * Find an unused output path beside `inputPath`:
 * `<stem> - stubbed.wasm`, then `<stem> - stubbed (1).wasm`, `(2)`, ...
 */
export const deriveOutputPath = async (
  inputPath: string,
  exists: PathExists = pathExists,
): Promise<string> => {
  const { dir, name } = parse(inputPath);
  for (let attempt = 0; ; attempt++) {
    const candidate = join(dir, stubbedFileName(name, attempt));
    if (!(await exists(candidate))) {
      return candidate;
    }
  }
};
