/**
 * Resolution environments.
 *
 * An environment fixes everything module lookup depends on: workspace root,
 * extra search directories and interpreter. It owns the interpreter's
 * search-path query and the resolution cache for that identity. Changing any
 * of them builds a new environment and swaps it in with one assignment, so a
 * validation pass that captured the old one keeps a consistent view.
 */
import { FingerprintCache } from '../cache/fingerprint-cache.js';
import { querySearchPath } from '../resolution/interpreter.js';
import type { SearchPathQuery } from '../resolution/interpreter.js';
import type { ResolvedModule } from '../resolution/types.js';
import { computeListChecksum } from '../../utils/checksum.js';
import { ErrorCodes, ResolutionError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface EnvironmentSettings {
  readonly workspaceRoot: string;
  /** Absolute directories searched after the workspace root. */
  readonly extraPaths: readonly string[];
  readonly interpreter: string | null;
  readonly queryTimeoutMs: number;
}

export interface SearchPathSnapshot {
  readonly interpreter: string | null;
  readonly paths: readonly string[];
  /** Set when the interpreter query failed; `paths` is then empty. */
  readonly error: ResolutionError | null;
}

const log = logger.child('environment');

export class Environment {
  /** Successful lookups only; misses are probed again on every pass. */
  readonly resolutions = new FingerprintCache<string, ResolvedModule>();
  private snapshot: Promise<SearchPathSnapshot> | null = null;
  private readonly controller = new AbortController();

  constructor(
    readonly generation: number,
    readonly settings: EnvironmentSettings,
    private readonly query: SearchPathQuery = querySearchPath
  ) {}

  /**
   * Starts the interpreter query if it has not started yet. Every caller
   * shares the one result; the promise never rejects.
   */
  searchPaths(): Promise<SearchPathSnapshot> {
    this.snapshot ??= this.runQuery();
    return this.snapshot;
  }

  /** Starts the query now instead of on first use. */
  prefetch(): void {
    this.snapshot ??= this.runQuery();
  }

  /** Cache key component for a module under this environment's inputs. */
  fingerprint(modulePath: string, snapshot: SearchPathSnapshot): string {
    return computeListChecksum([
      modulePath,
      this.settings.workspaceRoot,
      snapshot.interpreter ?? '',
      ...snapshot.paths,
      '|',
      ...this.settings.extraPaths,
    ]);
  }

  get disposed(): boolean {
    return this.controller.signal.aborted;
  }

  /** Aborts a running interpreter query and drops cached resolutions. */
  dispose(): void {
    this.controller.abort();
    this.resolutions.clear();
  }

  private async runQuery(): Promise<SearchPathSnapshot> {
    const interpreter = this.settings.interpreter;
    if (!interpreter) {
      return { interpreter: null, paths: [], error: null };
    }

    try {
      const paths = await this.query(interpreter, {
        cwd: this.settings.workspaceRoot,
        timeoutMs: this.settings.queryTimeoutMs,
        signal: this.controller.signal,
      });
      log.info(`Interpreter '${interpreter}' reported ${paths.length} search path entries`);
      return { interpreter, paths, error: null };
    } catch (error) {
      const failure =
        error instanceof ResolutionError
          ? error
          : new ResolutionError(ErrorCodes.INTERPRETER_FAILED, errorMessage(error), { interpreter });
      if (!this.disposed) {
        log.warn(`${failure.message}; resolving from the workspace and extra paths only`);
      }
      return { interpreter, paths: [], error: failure };
    }
  }
}

/**
 * Holds the current environment and replaces it on reconfiguration.
 */
export class EnvironmentManager {
  private current: Environment;
  private generation = 0;

  constructor(settings: EnvironmentSettings, private readonly query: SearchPathQuery = querySearchPath) {
    this.current = this.create(settings);
  }

  /** The environment a new pass should capture. */
  get(): Environment {
    return this.current;
  }

  reconfigure(settings: EnvironmentSettings): Environment {
    const previous = this.current;
    this.current = this.create(settings);
    previous.dispose();
    log.debug(`Environment generation ${this.current.generation}`, {
      workspaceRoot: settings.workspaceRoot,
      interpreter: settings.interpreter,
      extraPaths: [...settings.extraPaths],
    });
    return this.current;
  }

  reconfigureInterpreter(interpreter: string | null): Environment {
    return this.reconfigure({ ...this.current.settings, interpreter });
  }

  /** Forgets cached lookups, for when Python files appear or disappear. */
  invalidateResolutions(): void {
    this.current.resolutions.clear();
  }

  private create(settings: EnvironmentSettings): Environment {
    const environment = new Environment(++this.generation, settings, this.query);
    if (settings.interpreter) {
      environment.prefetch();
    }
    return environment;
  }
}
