import chalk from 'chalk';
import type { DiagnosticSeverity, TargetDiagnostic } from '../../core/diagnostics/types.js';
import type { FileReport, FormatOptions, IFormatter } from './types.js';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      showPassing: options.showPassing ?? false,
    };
  }

  formatReports(reports: readonly FileReport[]): string {
    const lines: string[] = [];

    for (const report of reports) {
      if (report.diagnostics.length === 0) {
        if (this.options.showPassing) {
          const note = report.recognized ? '' : ` ${this.colorize('(no targets)', 'dim')}`;
          lines.push(`${this.colorize('✓', 'green')} ${report.file}${note}`);
        }
        continue;
      }

      lines.push(this.colorize(report.file, 'bold'));
      for (const diagnostic of report.diagnostics) {
        lines.push(this.formatDiagnostic(diagnostic));
      }
      lines.push('');
    }

    lines.push(this.formatSummary(reports));
    return lines.join('\n');
  }

  /**
   * `  line:col  severity  message  [kind]`, 1-based like most editors.
   */
  formatDiagnostic(diagnostic: TargetDiagnostic): string {
    const location = `${diagnostic.range.start.line + 1}:${diagnostic.range.start.character + 1}`;
    const severity = this.colorize(diagnostic.severity.padEnd(7), diagnostic.severity);
    return `  ${location.padEnd(8)} ${severity} ${diagnostic.message}  ${this.colorize(diagnostic.kind, 'dim')}`;
  }

  private formatSummary(reports: readonly FileReport[]): string {
    const all = reports.flatMap((report) => report.diagnostics);
    const errors = all.filter((diagnostic) => diagnostic.severity === 'error').length;
    const warnings = all.filter((diagnostic) => diagnostic.severity === 'warning').length;
    const files = `${reports.length} file${reports.length === 1 ? '' : 's'} checked`;

    if (errors === 0 && warnings === 0) {
      return `${this.colorize('✓', 'green')} ${files}, no problems`;
    }
    const counts = `${errors} error${errors === 1 ? '' : 's'}, ${warnings} warning${warnings === 1 ? '' : 's'}`;
    return `${this.colorize('✗', errors > 0 ? 'error' : 'warning')} ${files}: ${counts}`;
  }

  private colorize(text: string, color: DiagnosticSeverity | 'green' | 'dim' | 'bold'): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'error':
        return chalk.red(text);
      case 'warning':
        return chalk.yellow(text);
      case 'information':
        return chalk.blue(text);
      case 'hint':
        return chalk.cyan(text);
      case 'green':
        return chalk.green(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
