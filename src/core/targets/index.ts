export { extractTargets, hasMarkerComment } from './extractor.js';
export { findTargetAt, completionContextAt } from './context.js';
export type { TargetAtPosition } from './context.js';
export { parseTargetPath } from './target-path.js';
export { TARGET_KEY, RESERVED_KEYS } from './types.js';
export type {
  TargetParameter,
  TargetReference,
  ExtractionResult,
  TargetPath,
  CompletionContext,
} from './types.js';
