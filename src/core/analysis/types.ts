/**
 * Analysis service result types.
 */
import type { TargetDiagnostic, TargetOutcome } from '../diagnostics/types.js';
import type { Signature } from '../signatures/types.js';
import type { TargetParameter, TargetReference } from '../targets/types.js';
import type { TextRange } from '../text/range.js';

export interface HoverInfo {
  readonly reference: TargetReference;
  /** The parameter key under the cursor, if any. */
  readonly parameter: TargetParameter | null;
  readonly outcome: TargetOutcome;
  readonly signature: Signature | null;
}

export interface DefinitionLocation {
  readonly filePath: string;
  readonly range: TextRange;
}

export interface SignatureHelpInfo {
  readonly signature: Signature;
  /** Index into `signature.parameters` of the parameter being edited. */
  readonly activeParameter: number | null;
}

export type CompletionKind = 'module' | 'class' | 'function' | 'parameter';

export interface CompletionEntry {
  readonly label: string;
  readonly kind: CompletionKind;
  readonly detail?: string;
  readonly documentation?: string;
  readonly insertText: string;
  readonly range: TextRange;
}

export type FileChangeType = 'created' | 'changed' | 'deleted';

export interface FileChange {
  readonly filePath: string;
  readonly type: FileChangeType;
}

/** Receives each pass's findings once the pass is known to be current. */
export type DiagnosticsPublisher = (
  documentId: string,
  version: number,
  diagnostics: readonly TargetDiagnostic[]
) => void;
