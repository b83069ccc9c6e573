/**
 * Maps findings to LSP diagnostics.
 */
import { DiagnosticSeverity } from 'vscode-languageserver/node.js';
import type { Diagnostic } from 'vscode-languageserver/node.js';
import type { DiagnosticSeverity as FindingSeverity, TargetDiagnostic } from '../core/diagnostics/types.js';

export const DIAGNOSTIC_SOURCE = 'target-sense';

/**
 * Extra data attached to each diagnostic for clients and code actions.
 */
export interface TargetDiagnosticData {
  target?: string;
  parameter?: string;
}

const SEVERITIES: Record<FindingSeverity, DiagnosticSeverity> = {
  error: DiagnosticSeverity.Error,
  warning: DiagnosticSeverity.Warning,
  information: DiagnosticSeverity.Information,
  hint: DiagnosticSeverity.Hint,
};

export function toLspDiagnostic(finding: TargetDiagnostic): Diagnostic {
  const data: TargetDiagnosticData = {};
  if (finding.target !== undefined) data.target = finding.target;
  if (finding.parameter !== undefined) data.parameter = finding.parameter;

  return {
    severity: SEVERITIES[finding.severity],
    range: {
      start: { line: finding.range.start.line, character: finding.range.start.character },
      end: { line: finding.range.end.line, character: finding.range.end.character },
    },
    message: finding.message,
    source: DIAGNOSTIC_SOURCE,
    code: finding.kind,
    data,
  };
}

export function toLspDiagnostics(findings: readonly TargetDiagnostic[]): Diagnostic[] {
  return findings.map(toLspDiagnostic);
}
