/**
 * Tests for the interpreter search-path query.
 */
import { describe, it, expect, vi } from 'vitest';
import {
  SEARCH_PATH_QUERY,
  parseSearchPathOutput,
  querySearchPath,
} from '../../../../src/core/resolution/interpreter.js';
import type { FileRunner } from '../../../../src/core/resolution/interpreter.js';
import { ErrorCodes, ResolutionError } from '../../../../src/utils/errors.js';

function runnerPrinting(stdout: string): FileRunner {
  return vi.fn(async () => ({ stdout, stderr: '' }));
}

describe('querySearchPath', () => {
  it('should run the interpreter with the fixed query', async () => {
    const run = runnerPrinting('["/usr/lib/python3.11", "/venv/site-packages"]\n');

    const paths = await querySearchPath('python3', { cwd: '/ws', timeoutMs: 500, run });

    expect(paths).toEqual(['/usr/lib/python3.11', '/venv/site-packages']);
    expect(run).toHaveBeenCalledWith('python3', ['-c', SEARCH_PATH_QUERY], {
      cwd: '/ws',
      timeoutMs: 500,
      signal: undefined,
    });
  });

  it('should default the timeout to ten seconds', async () => {
    const run = runnerPrinting('[]');

    await querySearchPath('python3', { run });

    expect(run).toHaveBeenCalledWith('python3', ['-c', SEARCH_PATH_QUERY], expect.objectContaining({ timeoutMs: 10_000 }));
  });

  it('should wrap a failed process in a ResolutionError', async () => {
    const run: FileRunner = async () => {
      throw new Error('spawn python9 ENOENT');
    };

    const failure = await querySearchPath('python9', { run }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ResolutionError);
    expect(failure).toMatchObject({
      code: ErrorCodes.INTERPRETER_FAILED,
      message: "Interpreter 'python9' failed: spawn python9 ENOENT",
    });
  });

  it('should report an aborted query separately', async () => {
    const controller = new AbortController();
    controller.abort();
    const run: FileRunner = async () => {
      throw new Error('The operation was aborted');
    };

    const failure = await querySearchPath('python3', { run, signal: controller.signal }).catch((error: unknown) => error);

    expect(failure).toMatchObject({ code: ErrorCodes.INTERPRETER_ABORTED });
  });
});

describe('parseSearchPathOutput', () => {
  it('should read the last non-empty line', () => {
    const stdout = 'warning: something\n["/a", "/b"]\n\n';

    expect(parseSearchPathOutput('py', stdout)).toEqual(['/a', '/b']);
  });

  it('should drop empty and relative entries', () => {
    expect(parseSearchPathOutput('py', '["", "lib", "/abs"]')).toEqual(['/abs']);
  });

  it('should reject output that is not JSON', () => {
    expect(() => parseSearchPathOutput('py', 'Python 3.11.4')).toThrow(ResolutionError);
  });

  it('should reject JSON that is not a list of strings', () => {
    let failure: unknown;
    try {
      parseSearchPathOutput('py', '{"path": ["/a"]}');
    } catch (error) {
      failure = error;
    }

    expect(failure).toMatchObject({
      code: ErrorCodes.INTERPRETER_OUTPUT_INVALID,
      message: "Interpreter 'py' printed an unexpected search path value",
    });
  });
});
