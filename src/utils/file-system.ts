/**
 * File system operations - reading, stat and globbing.
 */
import * as fs from 'node:fs';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  return fs.promises.access(filePath, fs.constants.F_OK).then(
    () => true,
    () => false
  );
}

/**
 * Check if a path is a regular file.
 */
export async function isFile(filePath: string): Promise<boolean> {
  return fs.promises.stat(filePath).then(
    (stat) => stat.isFile(),
    () => false
  );
}

/**
 * Get file stats.
 */
export async function getStats(filePath: string): Promise<fs.Stats> {
  return fs.promises.stat(filePath);
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
    deep?: number;
  } = {}
): Promise<string[]> {
  return fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**', '**/dist/**'],
    absolute: options.absolute ?? true,
    deep: options.deep,
    onlyFiles: true,
  });
}
