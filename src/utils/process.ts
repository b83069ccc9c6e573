/**
 * Child process helpers.
 * Commands are started with execFile, never through a shell.
 */
import { execFile } from 'node:child_process';

export interface RunFileOptions {
  cwd?: string;
  /** Kill the process after this many milliseconds (0 disables the limit) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface RunFileResult {
  stdout: string;
  stderr: string;
}

/**
 * Run an executable with arguments and collect its output.
 * Rejects when the process cannot be started, exits non-zero, times out or
 * is aborted.
 */
export function runFile(
  file: string,
  args: readonly string[],
  options: RunFileOptions = {}
): Promise<RunFileResult> {
  return new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      {
        cwd: options.cwd,
        timeout: options.timeoutMs ?? 0,
        signal: options.signal,
        encoding: 'utf-8',
        windowsHide: true,
        maxBuffer: 4 * 1024 * 1024,
      },
      (error, stdout, stderr) => {
        if (error) {
          reject(error);
          return;
        }
        resolve({ stdout, stderr });
      }
    );
  });
}
