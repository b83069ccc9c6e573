import type { TargetDiagnostic } from '../../core/diagnostics/types.js';
import type { FileReport, IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption. Positions stay 0-based,
 * as in the language server protocol.
 */
export class JsonFormatter implements IFormatter {
  formatReports(reports: readonly FileReport[]): string {
    const all = reports.flatMap((report) => report.diagnostics);
    return JSON.stringify(
      {
        files: reports.map((report) => ({
          file: report.file,
          recognized: report.recognized,
          diagnostics: report.diagnostics.map((diagnostic) => this.transformDiagnostic(diagnostic)),
        })),
        summary: {
          files: reports.length,
          errors: all.filter((diagnostic) => diagnostic.severity === 'error').length,
          warnings: all.filter((diagnostic) => diagnostic.severity === 'warning').length,
        },
      },
      null,
      2
    );
  }

  private transformDiagnostic(diagnostic: TargetDiagnostic): Record<string, unknown> {
    const result: Record<string, unknown> = {
      kind: diagnostic.kind,
      severity: diagnostic.severity,
      message: diagnostic.message,
      range: diagnostic.range,
    };
    if (diagnostic.target !== undefined) {
      result.target = diagnostic.target;
    }
    if (diagnostic.parameter !== undefined) {
      result.parameter = diagnostic.parameter;
    }
    return result;
  }
}
