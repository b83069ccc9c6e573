export { TargetAnalysisService } from './service.js';
export type { AnalysisServiceOptions } from './service.js';
export { TargetResolver, absoluteModule } from './target-resolver.js';
export { listModules, moduleNameFromFile } from './module-index.js';
export type {
  HoverInfo,
  DefinitionLocation,
  SignatureHelpInfo,
  CompletionEntry,
  CompletionKind,
  FileChange,
  FileChangeType,
  DiagnosticsPublisher,
} from './types.js';
