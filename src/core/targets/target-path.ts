/**
 * Validation of dotted target paths.
 */
import type { TargetPath } from './types.js';

const IDENTIFIER = /^[\p{L}_][\p{L}\p{N}_]*$/u;

/**
 * Splits `pkg.module.Symbol` into module path and symbol name.
 * A path needs at least two segments, each a valid identifier.
 */
export function parseTargetPath(path: string): TargetPath {
  if (path.trim().length === 0) {
    return { ok: false, reason: 'path is empty' };
  }

  const segments = path.split('.');
  if (segments.some((segment) => segment.length === 0)) {
    return { ok: false, reason: 'path contains an empty segment' };
  }

  const invalid = segments.find((segment) => !IDENTIFIER.test(segment));
  if (invalid !== undefined) {
    return { ok: false, reason: `'${invalid}' is not a valid identifier` };
  }

  if (segments.length < 2) {
    return { ok: false, reason: 'path names no module' };
  }

  return {
    ok: true,
    modulePath: segments.slice(0, -1).join('.'),
    symbol: segments[segments.length - 1],
    segments,
  };
}
