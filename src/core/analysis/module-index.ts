/**
 * Dotted module names available under a set of source roots, for
 * completion of `_target_` values.
 */
import * as path from 'node:path';
import { globFiles } from '../../utils/file-system.js';

const IGNORED_DIRECTORIES = [
  '**/node_modules/**',
  '**/.git/**',
  '**/__pycache__/**',
  '**/.venv/**',
  '**/venv/**',
  '**/site-packages/**',
  '**/.tox/**',
  '**/build/**',
  '**/dist/**',
];

const MODULE_SEGMENT = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Converts a root-relative file path (`pkg/models.py`, `pkg/__init__.py`) to
 * a module path, or null when a segment is not importable.
 */
export function moduleNameFromFile(relativePath: string): string | null {
  const segments = relativePath.split(/[\\/]/);
  const last = segments.pop();
  if (last === undefined) return null;

  const stem = last.replace(/\.pyi?$/, '');
  if (stem !== '__init__') {
    segments.push(stem);
  }
  if (segments.length === 0 || !segments.every((segment) => MODULE_SEGMENT.test(segment))) {
    return null;
  }
  return segments.join('.');
}

/**
 * Lists modules under each root, sorted and de-duplicated.
 */
export async function listModules(roots: readonly string[], deep = 8): Promise<string[]> {
  const names = new Set<string>();
  for (const root of roots) {
    const files = await globFiles(['**/*.py', '**/*.pyi'], {
      cwd: root,
      ignore: IGNORED_DIRECTORIES,
      absolute: false,
      deep,
    });
    for (const file of files) {
      const name = moduleNameFromFile(path.normalize(file));
      if (name) names.add(name);
    }
  }
  return [...names].sort();
}
