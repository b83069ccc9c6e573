/**
 * Formatter type definitions.
 */
import type { TargetDiagnostic } from '../../core/diagnostics/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json'];

/**
 * Findings for one checked file.
 */
export interface FileReport {
  /** Path relative to the workspace root */
  file: string;
  /** Whether the file looked like a target configuration */
  recognized: boolean;
  diagnostics: readonly TargetDiagnostic[];
}

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Also list files without findings */
  showPassing: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  /**
   * Format the findings of every checked file, with a summary.
   */
  formatReports(reports: readonly FileReport[]): string;
}
