/**
 * Cursor-oriented lookups over extracted targets and raw configuration text.
 */
import { rangeContains } from '../text/range.js';
import type { Position, TextRange } from '../text/range.js';
import { TARGET_KEY } from './types.js';
import type { CompletionContext, TargetParameter, TargetReference } from './types.js';

export interface TargetAtPosition {
  readonly reference: TargetReference;
  /** Set when the position is on one of the reference's parameter keys. */
  readonly parameter: TargetParameter | null;
}

/**
 * Finds the reference under the cursor: first one whose `_target_` line holds
 * the position, otherwise the innermost one with a parameter key there.
 */
export function findTargetAt(
  targets: readonly TargetReference[],
  position: Position
): TargetAtPosition | null {
  for (const reference of targets) {
    if (reference.keyRange.start.line === position.line || rangeContains(reference.targetRange, position)) {
      return { reference, parameter: null };
    }
  }

  let found: TargetAtPosition | null = null;
  for (const reference of targets) {
    for (const parameter of reference.parameters.values()) {
      if (rangeContains(parameter.keyRange, position)) {
        found = { reference, parameter };
      }
    }
  }
  return found;
}

interface LineShape {
  /** Column where the key (or item content) begins. */
  readonly column: number;
  readonly key: string | null;
  /** Line starts a sequence item (`- key: ...`). */
  readonly dashed: boolean;
  readonly value: string;
}

const TARGET_VALUE_PREFIX = /^(\s*(?:-\s+)?_target_\s*:\s*)(["']?)([^"'#\s]*)$/;
const KEY_PREFIX = /^(\s*)(-\s+)?([\w.]*)$/;
const KEY_LINE = /^(\s*)(-\s+)?([^\s:#'"][^:#]*?)\s*:(?:\s+(.*))?$/;
const CONTENT_LINE = /^(\s*)(-\s+)?\S/;

/**
 * Decides what kind of completion fits at `position`, looking only at the
 * text so it keeps working while the document does not parse.
 */
export function completionContextAt(text: string, position: Position): CompletionContext {
  const lines = text.split('\n');
  const line = lines[position.line] ?? '';
  const prefix = line.slice(0, position.character);

  const valueMatch = TARGET_VALUE_PREFIX.exec(prefix);
  if (valueMatch) {
    const startCharacter = valueMatch[1].length + valueMatch[2].length;
    return {
      kind: 'target-value',
      partial: valueMatch[3],
      replaceRange: wordRange(line, position.line, startCharacter),
    };
  }

  const keyMatch = KEY_PREFIX.exec(prefix);
  if (keyMatch) {
    const dashed = keyMatch[2] !== undefined;
    const column = keyMatch[1].length + (keyMatch[2]?.length ?? 0);
    const owner = findTargetSibling(lines, position.line, column, dashed);
    if (owner) {
      return {
        kind: 'parameter-key',
        targetPath: owner.path,
        targetLine: owner.line,
        partial: keyMatch[3],
        replaceRange: wordRange(line, position.line, column),
      };
    }
  }

  return { kind: 'unknown', position };
}

/**
 * Scans the lines of the mapping around `lineNumber` (same key column) for a
 * `_target_` key.
 */
function findTargetSibling(
  lines: readonly string[],
  lineNumber: number,
  column: number,
  dashed: boolean
): { line: number; path: string } | null {
  if (!dashed) {
    for (let i = lineNumber - 1; i >= 0; i--) {
      const shape = lineShape(lines[i]);
      if (!shape || shape.column > column) continue;
      if (shape.column < column) break;
      if (shape.key === TARGET_KEY) return { line: i, path: unquote(shape.value) };
      if (shape.dashed) break;
    }
  }

  for (let i = lineNumber + 1; i < lines.length; i++) {
    const shape = lineShape(lines[i]);
    if (!shape || shape.column > column) continue;
    if (shape.column < column || shape.dashed) break;
    if (shape.key === TARGET_KEY) return { line: i, path: unquote(shape.value) };
  }

  return null;
}

function lineShape(line: string): LineShape | null {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith('#')) {
    return null;
  }

  const keyLine = KEY_LINE.exec(line);
  if (keyLine) {
    return {
      column: keyLine[1].length + (keyLine[2]?.length ?? 0),
      key: keyLine[3],
      dashed: keyLine[2] !== undefined,
      value: keyLine[4] ?? '',
    };
  }

  const content = CONTENT_LINE.exec(line);
  return {
    column: content ? content[1].length + (content[2]?.length ?? 0) : 0,
    key: null,
    dashed: content?.[2] !== undefined,
    value: '',
  };
}

function unquote(value: string): string {
  const withoutComment = value.replace(/\s+#.*$/, '').trim();
  const quoted = /^(["'])(.*)\1$/.exec(withoutComment);
  return quoted ? quoted[2] : withoutComment;
}

/** From `startCharacter` to the end of the word the cursor is in. */
function wordRange(line: string, lineNumber: number, startCharacter: number): TextRange {
  const rest = /^[\w.]*/.exec(line.slice(startCharacter));
  const length = rest ? rest[0].length : 0;
  return {
    start: { line: lineNumber, character: startCharacter },
    end: { line: lineNumber, character: startCharacter + length },
  };
}
