/**
 * Findings reported against configuration documents.
 */
import type { SearchLayer } from '../resolution/types.js';
import type { Signature } from '../signatures/types.js';
import type { TextRange } from '../text/range.js';

export type DiagnosticKind =
  | 'unknown-parameter'
  | 'missing-required-parameter'
  | 'malformed-target-path'
  | 'module-not-found'
  | 'symbol-not-found'
  | 'parse-error'
  | 'variadic-keyword-parameter'
  | 'resolution-infra-error';

export type DiagnosticSeverity = 'error' | 'warning' | 'information' | 'hint';

export interface TargetDiagnostic {
  readonly kind: DiagnosticKind;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly range: TextRange;
  /** The `_target_` path the finding concerns, when there is one. */
  readonly target?: string;
  /** The parameter name for parameter findings. */
  readonly parameter?: string;
}

export interface DiagnosticOptions {
  /** Report names absorbed by `**kwargs` as hints. */
  readonly kwargsHints: boolean;
}

export const DEFAULT_DIAGNOSTIC_OPTIONS: DiagnosticOptions = Object.freeze({
  kwargsHints: true,
});

/**
 * What became of one target path on its way to a signature.
 */
export type TargetOutcome =
  | { readonly kind: 'malformed'; readonly reason: string }
  | { readonly kind: 'module-not-found'; readonly modulePath: string; readonly searched: readonly string[] }
  | { readonly kind: 'parse-error'; readonly modulePath: string; readonly filePath: string; readonly message: string }
  | {
      readonly kind: 'symbol-not-found';
      readonly modulePath: string;
      readonly symbol: string;
      readonly filePath: string;
    }
  | {
      /** The name may come from an import that could not be followed; nothing is reported. */
      readonly kind: 'unverifiable';
      readonly modulePath: string;
      readonly symbol: string;
      readonly filePath: string;
    }
  | {
      /** Checking the target threw before any of the above could be decided. */
      readonly kind: 'failed';
      readonly message: string;
    }
  | {
      readonly kind: 'resolved';
      readonly signature: Signature;
      readonly layer: SearchLayer;
    };
