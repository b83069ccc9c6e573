export {
  diagnoseReference,
  diagnoseDocument,
  checkParameters,
  infraDiagnostic,
  sortDiagnostics,
} from './engine.js';
export type { ReferenceOutcome } from './engine.js';
export { DEFAULT_DIAGNOSTIC_OPTIONS } from './types.js';
export type {
  DiagnosticKind,
  DiagnosticSeverity,
  TargetDiagnostic,
  DiagnosticOptions,
  TargetOutcome,
} from './types.js';
