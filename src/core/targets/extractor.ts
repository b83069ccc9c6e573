/**
 * Target Extractor
 *
 * Walks every YAML document in a configuration file and collects each mapping
 * that carries a `_target_` key, together with its sibling parameters and
 * their source ranges.
 */
import { LineCounter, isMap, isNode, isScalar, isSeq, parseAllDocuments } from 'yaml';
import type { Node as YamlNode, Pair, YAMLMap } from 'yaml';
import type { TargetDiagnostic } from '../diagnostics/types.js';
import type { TextRange } from '../text/range.js';
import { RESERVED_KEYS, TARGET_KEY } from './types.js';
import type { ExtractionResult, TargetParameter, TargetReference } from './types.js';

/** How far from the top a marker comment may sit. */
const MARKER_SCAN_LINES = 10;
const MARKER_PATTERN = /^#\s*(?:@hydra\b|hydra:)/;

interface WalkContext {
  readonly text: string;
  readonly documentId: string;
  readonly lineCounter: LineCounter;
  readonly targets: TargetReference[];
}

/**
 * Extracts target references from configuration text.
 *
 * Syntax errors do not stop extraction: whatever the parser recovered is
 * still walked, and each error becomes a `parse-error` diagnostic.
 */
export function extractTargets(text: string, documentId = ''): ExtractionResult {
  const lineCounter = new LineCounter();
  const documents = parseAllDocuments(text, { lineCounter });
  const ctx: WalkContext = { text, documentId, lineCounter, targets: [] };
  const diagnostics: TargetDiagnostic[] = [];

  for (const doc of documents) {
    for (const error of doc.errors) {
      diagnostics.push({
        kind: 'parse-error',
        severity: 'error',
        message: firstLine(error.message),
        range: toRange(ctx, error.pos[0], error.pos[1]),
      });
    }
    walk(doc.contents, ctx);
  }

  return {
    targets: ctx.targets,
    recognized: ctx.targets.length > 0 || hasMarkerComment(text),
    diagnostics,
  };
}

/**
 * True when one of the first lines is a `# @hydra` or `# hydra:` comment.
 */
export function hasMarkerComment(text: string): boolean {
  return text
    .split('\n', MARKER_SCAN_LINES)
    .some((line) => MARKER_PATTERN.test(line.trim()));
}

function walk(node: unknown, ctx: WalkContext): void {
  if (isMap(node)) {
    const reference = readReference(node, ctx);
    if (reference) {
      ctx.targets.push(reference);
    }
    for (const pair of node.items) {
      walk(pair.value, ctx);
    }
  } else if (isSeq(node)) {
    for (const item of node.items) {
      walk(item, ctx);
    }
  }
}

function readReference(map: YAMLMap<unknown, unknown>, ctx: WalkContext): TargetReference | null {
  const targetPair = map.items.find((pair) => keyName(pair) === TARGET_KEY);
  if (!targetPair || !isNode(targetPair.key)) {
    return null;
  }

  const parameters = new Map<string, TargetParameter>();
  let positionalArgs = 0;
  let partial = false;

  for (const pair of map.items) {
    const name = keyName(pair);
    if (name === null || !isNode(pair.key)) continue;

    if (name === '_args_') {
      positionalArgs = isSeq(pair.value) ? pair.value.items.length : 0;
    } else if (name === '_partial_') {
      partial = isScalar(pair.value) && pair.value.value === true;
    }
    if (RESERVED_KEYS.has(name) || parameters.has(name)) continue;

    const keyRange = nodeRange(pair.key, ctx);
    const value = valueSpan(pair, ctx);
    parameters.set(name, {
      name,
      rawValue: value.text,
      keyRange,
      valueRange: value.range,
    });
  }

  return Object.freeze({
    documentId: ctx.documentId,
    targetPath: targetText(targetPair.value),
    targetRange: targetValueRange(targetPair, ctx),
    keyRange: nodeRange(targetPair.key, ctx),
    parameters,
    positionalArgs,
    partial,
  });
}

function keyName(pair: Pair<unknown, unknown>): string | null {
  if (!isScalar(pair.key)) return null;
  const value = pair.key.value;
  return value === null || value === undefined ? null : String(value);
}

function targetText(value: unknown): string {
  if (isScalar(value)) {
    return value.value === null || value.value === undefined ? '' : String(value.value).trim();
  }
  return '';
}

/**
 * Range of the path itself, inside the quotes when the scalar is quoted.
 */
function targetValueRange(pair: Pair<unknown, unknown>, ctx: WalkContext): TextRange {
  const value = pair.value;
  if (isScalar(value) && value.range) {
    const [start, end] = value.range;
    const quoted = value.type === 'QUOTE_DOUBLE' || value.type === 'QUOTE_SINGLE';
    return quoted && end - start >= 2 ? toRange(ctx, start + 1, end - 1) : toRange(ctx, start, end);
  }
  if (isNode(value) && value.range) {
    return toRange(ctx, value.range[0], value.range[1]);
  }
  return afterKey(pair, ctx);
}

function valueSpan(pair: Pair<unknown, unknown>, ctx: WalkContext): { text: string; range: TextRange } {
  const value = pair.value;
  if (isNode(value) && value.range) {
    const [start, end] = value.range;
    const text = ctx.text.slice(start, end).trimEnd();
    return { text, range: toRange(ctx, start, start + text.length) };
  }
  return { text: '', range: afterKey(pair, ctx) };
}

function afterKey(pair: Pair<unknown, unknown>, ctx: WalkContext): TextRange {
  const key = pair.key;
  const offset = isNode(key) && key.range ? key.range[1] : 0;
  return toRange(ctx, offset, offset);
}

function nodeRange(node: YamlNode, ctx: WalkContext): TextRange {
  if (!node.range) {
    return toRange(ctx, 0, 0);
  }
  return toRange(ctx, node.range[0], node.range[1]);
}

function toRange(ctx: WalkContext, startOffset: number, endOffset: number): TextRange {
  const start = ctx.lineCounter.linePos(startOffset);
  const end = ctx.lineCounter.linePos(endOffset);
  return {
    start: { line: start.line - 1, character: start.col - 1 },
    end: { line: end.line - 1, character: end.col - 1 },
  };
}

/** Drops the code frame and trailing location the YAML parser appends. */
function firstLine(message: string): string {
  const newline = message.indexOf('\n');
  const line = newline === -1 ? message : message.slice(0, newline);
  return line.replace(/ at line \d+, column \d+:?$/, '');
}
