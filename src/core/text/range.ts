/**
 * Editor positions and ranges.
 *
 * Lines and characters are 0-based; characters count UTF-16 code units, which
 * is what JavaScript string indices already are.
 */

export interface Position {
  readonly line: number;
  readonly character: number;
}

export interface TextRange {
  readonly start: Position;
  readonly end: Position;
}

export const DOCUMENT_START: TextRange = Object.freeze({
  start: Object.freeze({ line: 0, character: 0 }),
  end: Object.freeze({ line: 0, character: 0 }),
});

export function comparePositions(a: Position, b: Position): number {
  return a.line === b.line ? a.character - b.character : a.line - b.line;
}

/**
 * True when `position` lies inside `range`, both ends inclusive so a cursor
 * sitting right after the last character still counts.
 */
export function rangeContains(range: TextRange, position: Position): boolean {
  return comparePositions(range.start, position) <= 0 && comparePositions(position, range.end) <= 0;
}

export function compareRanges(a: TextRange, b: TextRange): number {
  return comparePositions(a.start, b.start) || comparePositions(a.end, b.end);
}
