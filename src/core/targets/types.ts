/**
 * Target reference types produced from configuration documents.
 */
import type { Position, TextRange } from '../text/range.js';
import type { TargetDiagnostic } from '../diagnostics/types.js';

/** The key that names the callable to instantiate. */
export const TARGET_KEY = '_target_';

/**
 * Sibling keys the instantiation framework consumes itself. They never count
 * as parameters of the target.
 */
export const RESERVED_KEYS: ReadonlySet<string> = new Set([
  '_target_',
  '_args_',
  '_recursive_',
  '_convert_',
  '_partial_',
]);

export interface TargetParameter {
  readonly name: string;
  /** Source text of the value exactly as written; empty when the key has no value. */
  readonly rawValue: string;
  readonly keyRange: TextRange;
  readonly valueRange: TextRange;
}

export interface TargetReference {
  readonly documentId: string;
  /** Dotted path as written, quotes removed. */
  readonly targetPath: string;
  readonly targetRange: TextRange;
  readonly keyRange: TextRange;
  /** Supplied keyword parameters in source order. */
  readonly parameters: ReadonlyMap<string, TargetParameter>;
  /** Number of items under `_args_`. */
  readonly positionalArgs: number;
  /** `_partial_: true` defers missing arguments to call time. */
  readonly partial: boolean;
}

export interface ExtractionResult {
  readonly targets: readonly TargetReference[];
  /** Whether the document looks like a target-bearing configuration at all. */
  readonly recognized: boolean;
  /** Syntax problems found while parsing the document. */
  readonly diagnostics: readonly TargetDiagnostic[];
}

export type TargetPath =
  | { readonly ok: true; readonly modulePath: string; readonly symbol: string; readonly segments: readonly string[] }
  | { readonly ok: false; readonly reason: string };

export type CompletionContext =
  | {
      readonly kind: 'target-value';
      /** Text typed so far after `_target_:`. */
      readonly partial: string;
      /** Range the completed value replaces. */
      readonly replaceRange: TextRange;
    }
  | {
      readonly kind: 'parameter-key';
      readonly targetPath: string;
      /** Line of the `_target_` key of the enclosing mapping. */
      readonly targetLine: number;
      readonly partial: string;
      readonly replaceRange: TextRange;
    }
  | { readonly kind: 'unknown'; readonly position: Position };
