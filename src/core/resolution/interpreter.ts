/**
 * Interpreter search-path provider.
 *
 * Asks the configured Python interpreter for `sys.path` with a fixed one-line
 * query. The interpreter is started with execFile, never through a shell.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { ErrorCodes, ResolutionError, errorMessage } from '../../utils/errors.js';
import { runFile } from '../../utils/process.js';
import type { RunFileOptions, RunFileResult } from '../../utils/process.js';

export const SEARCH_PATH_QUERY = 'import sys, json; print(json.dumps(sys.path))';

export const DEFAULT_QUERY_TIMEOUT_MS = 10_000;

const SearchPathOutputSchema = z.array(z.string());

export type FileRunner = (file: string, args: readonly string[], options: RunFileOptions) => Promise<RunFileResult>;

export interface SearchPathQueryOptions {
  cwd?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  run?: FileRunner;
}

export type SearchPathQuery = (interpreter: string, options: SearchPathQueryOptions) => Promise<string[]>;

/**
 * Runs the interpreter and returns its absolute, non-empty search path
 * entries in order.
 *
 * @throws {ResolutionError} when the process fails, times out, is aborted,
 * or prints something other than a JSON list of strings.
 */
export const querySearchPath: SearchPathQuery = async (interpreter, options) => {
  const run = options.run ?? runFile;
  let stdout: string;
  try {
    const result = await run(interpreter, ['-c', SEARCH_PATH_QUERY], {
      cwd: options.cwd,
      timeoutMs: options.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS,
      signal: options.signal,
    });
    stdout = result.stdout;
  } catch (error) {
    if (options.signal?.aborted) {
      throw new ResolutionError(ErrorCodes.INTERPRETER_ABORTED, `Interpreter query for '${interpreter}' was aborted`, {
        interpreter,
      });
    }
    throw new ResolutionError(
      ErrorCodes.INTERPRETER_FAILED,
      `Interpreter '${interpreter}' failed: ${errorMessage(error)}`,
      { interpreter }
    );
  }

  return parseSearchPathOutput(interpreter, stdout);
};

/**
 * Reads the last non-empty output line as the JSON path list.
 */
export function parseSearchPathOutput(interpreter: string, stdout: string): string[] {
  const lines = stdout.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const last = lines[lines.length - 1] ?? '';

  let decoded: unknown;
  try {
    decoded = JSON.parse(last);
  } catch (error) {
    throw new ResolutionError(
      ErrorCodes.INTERPRETER_OUTPUT_INVALID,
      `Interpreter '${interpreter}' printed no search path list: ${errorMessage(error)}`,
      { interpreter, output: stdout.slice(0, 200) }
    );
  }

  const parsed = SearchPathOutputSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ResolutionError(
      ErrorCodes.INTERPRETER_OUTPUT_INVALID,
      `Interpreter '${interpreter}' printed an unexpected search path value`,
      { interpreter, output: stdout.slice(0, 200) }
    );
  }

  return parsed.data.filter((entry) => entry.length > 0 && path.isAbsolute(entry));
}
