/**
 * Shared tree-sitter helpers: parsing context, node text and ranges, and
 * syntax error lookup.
 */
import Parser from 'tree-sitter';
import type { TextRange } from '../text/range.js';

/**
 * Context for tree-sitter parsing operations.
 */
export interface TreeSitterContext {
  /** The parsed syntax tree */
  tree: Parser.Tree;
  /** The source code being parsed */
  sourceCode: string;
}

/**
 * Creates a tree-sitter parsing context.
 *
 * The binding copies string input through a fixed-size buffer (32 KiB by
 * default) and rejects longer text, so the buffer is sized to the source.
 */
export function createContext(parser: Parser, sourceCode: string): TreeSitterContext {
  return {
    tree: parser.parse(sourceCode, undefined, { bufferSize: sourceCode.length * 2 + 1 }),
    sourceCode,
  };
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(node: Parser.SyntaxNode, sourceCode: string): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Converts a node's span to an editor range (both are 0-based).
 */
export function getNodeRange(node: Parser.SyntaxNode): TextRange {
  return {
    start: { line: node.startPosition.row, character: node.startPosition.column },
    end: { line: node.endPosition.row, character: node.endPosition.column },
  };
}

/**
 * Walks the AST depth-first, stopping at the first node the callback accepts.
 */
export function findNode(
  node: Parser.SyntaxNode,
  predicate: (node: Parser.SyntaxNode) => boolean
): Parser.SyntaxNode | null {
  if (predicate(node)) {
    return node;
  }
  for (const child of node.children) {
    const found = findNode(child, predicate);
    if (found) return found;
  }
  return null;
}

export interface SyntaxErrorInfo {
  message: string;
  range: TextRange | null;
}

/**
 * Returns the first syntax error of a tree, or null for a clean parse.
 *
 * `hasError` covers both error nodes and tokens the parser inserted.
 * Inserted tokens are zero-width leaves, which is how they are located.
 */
export function findSyntaxError(tree: Parser.Tree): SyntaxErrorInfo | null {
  const root = tree.rootNode;
  if (!root.hasError) {
    return null;
  }

  const node = findNode(
    root,
    (candidate) =>
      candidate !== root &&
      (candidate.type === 'ERROR' || (candidate.childCount === 0 && candidate.startIndex === candidate.endIndex))
  );
  if (!node) {
    return { message: 'Syntax error', range: null };
  }

  const line = node.startPosition.row + 1;
  const message =
    node.type === 'ERROR' ? `Syntax error at line ${line}` : `Missing '${node.type}' at line ${line}`;
  return { message, range: getNodeRange(node) };
}
