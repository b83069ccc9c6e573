/**
 * Module Resolver
 *
 * Maps a dotted module path to the file that defines it. Roots are tried in
 * order (workspace, extra directories, interpreter search path) and within a
 * root a package beats a module, a stub beats a source file.
 */
import * as path from 'node:path';
import type { Environment, SearchPathSnapshot } from '../environment/environment.js';
import { isFile } from '../../utils/file-system.js';
import type { FileProbe, ResolvedModule, SearchRoot } from './types.js';

/**
 * Files that can define `modulePath` under `root`, in priority order.
 */
export function candidateFiles(root: string, modulePath: string): string[] {
  const base = path.join(root, ...modulePath.split('.'));
  return [
    path.join(base, '__init__.pyi'),
    path.join(base, '__init__.py'),
    `${base}.pyi`,
    `${base}.py`,
  ];
}

/**
 * Ordered, de-duplicated search roots. Interpreter entries that are empty or
 * relative are skipped.
 */
export function buildSearchRoots(
  workspaceRoot: string,
  extraPaths: readonly string[],
  interpreterPaths: readonly string[]
): SearchRoot[] {
  const roots: SearchRoot[] = [];
  const seen = new Set<string>();

  const add = (directory: string, layer: SearchRoot['layer']): void => {
    if (directory.length === 0 || !path.isAbsolute(directory)) return;
    const normalized = path.resolve(directory);
    if (seen.has(normalized)) return;
    seen.add(normalized);
    roots.push({ directory: normalized, layer });
  };

  add(workspaceRoot, 'workspace');
  for (const directory of extraPaths) add(directory, 'extra-path');
  for (const directory of interpreterPaths) add(directory, 'interpreter');
  return roots;
}

export class ModuleResolver {
  constructor(private readonly probe: FileProbe = isFile) {}

  /**
   * Resolves within an environment, using and filling its cache.
   */
  async resolve(modulePath: string, environment: Environment): Promise<ResolvedModule> {
    const snapshot = await environment.searchPaths();
    const fingerprint = environment.fingerprint(modulePath, snapshot);

    const cached = environment.resolutions.get(modulePath, fingerprint);
    if (cached) {
      return cached;
    }

    const module = await this.locate(modulePath, this.rootsFor(environment, snapshot));
    if (module.layer !== 'unresolved') {
      environment.resolutions.set(modulePath, fingerprint, module);
    }
    return module;
  }

  /**
   * First candidate file that exists, root by root.
   */
  async locate(modulePath: string, roots: readonly SearchRoot[]): Promise<ResolvedModule> {
    for (const root of roots) {
      for (const filePath of candidateFiles(root.directory, modulePath)) {
        if (await this.probe(filePath)) {
          return {
            modulePath,
            filePath,
            layer: root.layer,
            isPackage: /__init__\.pyi?$/.test(filePath),
          };
        }
      }
    }
    return { modulePath, layer: 'unresolved', searched: roots.map((root) => root.directory) };
  }

  private rootsFor(environment: Environment, snapshot: SearchPathSnapshot): SearchRoot[] {
    return buildSearchRoots(environment.settings.workspaceRoot, environment.settings.extraPaths, snapshot.paths);
  }
}
