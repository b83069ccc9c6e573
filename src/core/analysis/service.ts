/**
 * TargetAnalysisService - the core facade.
 *
 * Owns the document store, the resolution environment and the signature
 * cache, and runs validation passes. Every public operation tolerates
 * failure: passes turn errors into findings, lookups return empty results.
 */
import { DocumentStore } from '../documents/store.js';
import { EnvironmentManager } from '../environment/environment.js';
import type { Environment, EnvironmentSettings } from '../environment/environment.js';
import { ModuleResolver } from '../resolution/resolver.js';
import type { SearchPathQuery } from '../resolution/interpreter.js';
import type { FileProbe } from '../resolution/types.js';
import { SignatureProvider } from '../signatures/provider.js';
import { formatParameter, formatSignature, toSignature } from '../signatures/signature.js';
import type { CacheStats } from '../cache/types.js';
import { diagnoseDocument } from '../diagnostics/engine.js';
import { DEFAULT_DIAGNOSTIC_OPTIONS } from '../diagnostics/types.js';
import type { DiagnosticOptions, TargetDiagnostic, TargetOutcome } from '../diagnostics/types.js';
import { completionContextAt, findTargetAt } from '../targets/context.js';
import { extractTargets } from '../targets/extractor.js';
import type { ExtractionResult, TargetReference } from '../targets/types.js';
import { DOCUMENT_START } from '../text/range.js';
import type { Position, TextRange } from '../text/range.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { listModules } from './module-index.js';
import { TargetResolver } from './target-resolver.js';
import type {
  CompletionEntry,
  DefinitionLocation,
  DiagnosticsPublisher,
  FileChange,
  HoverInfo,
  SignatureHelpInfo,
} from './types.js';

export interface AnalysisServiceOptions {
  settings: EnvironmentSettings;
  diagnostics?: DiagnosticOptions;
  publisher?: DiagnosticsPublisher;
  /** Replaces the interpreter query, for tests. */
  query?: SearchPathQuery;
  /** Replaces the file existence check used by module lookup. */
  probe?: FileProbe;
}

const PYTHON_FILE = /\.pyi?$/;
const MAX_COMPLETIONS = 200;

const log = logger.child('analysis');

export class TargetAnalysisService {
  readonly documents = new DocumentStore();
  private readonly environments: EnvironmentManager;
  private readonly modules: ModuleResolver;
  private readonly signatures: SignatureProvider;
  private readonly targets: TargetResolver;
  private diagnosticOptions: DiagnosticOptions;
  private publisher: DiagnosticsPublisher | null;
  /** Newest pass token per document; older passes do not publish. */
  private readonly latestPass = new Map<string, number>();
  private passCounter = 0;

  constructor(options: AnalysisServiceOptions) {
    this.environments = new EnvironmentManager(options.settings, options.query);
    this.modules = new ModuleResolver(options.probe);
    this.signatures = new SignatureProvider((filePath) => this.documents.findByPath(filePath)?.text);
    this.targets = new TargetResolver(this.modules, this.signatures);
    this.diagnosticOptions = options.diagnostics ?? DEFAULT_DIAGNOSTIC_OPTIONS;
    this.publisher = options.publisher ?? null;
  }

  get environment(): Environment {
    return this.environments.get();
  }

  onDiagnostics(publisher: DiagnosticsPublisher | null): void {
    this.publisher = publisher;
  }

  extractTargets(text: string, documentId?: string): ExtractionResult {
    return extractTargets(text, documentId);
  }

  /** Records editor text without validating it. */
  updateDocument(documentId: string, version: number, text: string): boolean {
    return this.documents.setText(documentId, version, text);
  }

  closeDocument(documentId: string): void {
    this.documents.remove(documentId);
    this.latestPass.delete(documentId);
  }

  /**
   * Validates one version of a document and publishes the findings.
   *
   * Returns null, publishing nothing, when the result is stale by the time
   * it is ready: the store holds a newer version, or a later pass for the
   * same document has started. A pass whose environment is replaced while it
   * runs is repeated against the new one. Findings already published stay in
   * place when the pass itself fails.
   */
  async resolveAndValidate(
    documentId: string,
    text: string,
    version: number
  ): Promise<TargetDiagnostic[] | null> {
    this.documents.setText(documentId, version, text);
    if (this.documents.getVersion(documentId) !== version) {
      return null;
    }

    const token = ++this.passCounter;
    this.latestPass.set(documentId, token);
    const isCurrent = (): boolean =>
      this.latestPass.get(documentId) === token && this.documents.getVersion(documentId) === version;

    let environment = this.environments.get();
    let diagnostics: TargetDiagnostic[];
    try {
      diagnostics = await this.runPass(documentId, text, environment);
      while (environment.disposed && isCurrent()) {
        environment = this.environments.get();
        log.debug(`Environment replaced during validation of ${documentId}, repeating on generation ${environment.generation}`);
        diagnostics = await this.runPass(documentId, text, environment);
      }
    } catch (error) {
      log.error(`Validation of ${documentId} failed`, error instanceof Error ? error : undefined);
      return null;
    }

    if (!isCurrent()) {
      log.debug(`Dropping stale results for ${documentId} v${version}`);
      return null;
    }

    this.publisher?.(documentId, version, diagnostics);
    return diagnostics;
  }

  /**
   * Re-runs validation for every open configuration document.
   */
  async revalidateOpenDocuments(): Promise<void> {
    const passes = this.documents
      .ids()
      .filter((id) => !PYTHON_FILE.test(id))
      .map((id) => {
        const state = this.documents.get(id);
        return state ? this.resolveAndValidate(id, state.text, state.version) : Promise.resolve(null);
      });
    await Promise.all(passes);
  }

  async hoverInfo(documentId: string, position: Position): Promise<HoverInfo | null> {
    const text = this.documents.getText(documentId);
    if (text === undefined) return null;

    const found = findTargetAt(extractTargets(text, documentId).targets, position);
    if (!found) return null;

    try {
      const outcome = await this.targets.resolve(found.reference.targetPath, this.environments.get());
      return {
        reference: found.reference,
        parameter: found.parameter,
        outcome,
        signature: outcome.kind === 'resolved' ? outcome.signature : null,
      };
    } catch (error) {
      log.warn(`Hover failed for ${documentId}: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Where the target under the cursor is defined: the definition's name, or
   * the start of its module when the symbol cannot be pinned down there.
   */
  async definitionLocation(documentId: string, position: Position): Promise<DefinitionLocation | null> {
    const hover = await this.hoverInfo(documentId, position);
    if (!hover) return null;

    const outcome = hover.outcome;
    switch (outcome.kind) {
      case 'resolved':
        return { filePath: outcome.signature.filePath, range: outcome.signature.nameRange };
      case 'symbol-not-found':
      case 'unverifiable':
      case 'parse-error':
        return { filePath: outcome.filePath, range: DOCUMENT_START };
      case 'malformed':
      case 'module-not-found':
      case 'failed':
        return null;
    }
  }

  async signatureHelp(documentId: string, position: Position): Promise<SignatureHelpInfo | null> {
    const text = this.documents.getText(documentId);
    if (text === undefined) return null;

    const { targets } = extractTargets(text, documentId);
    const reference = this.referenceForCursor(text, targets, position);
    if (!reference) return null;

    try {
      const outcome = await this.targets.resolve(reference.targetPath, this.environments.get());
      if (outcome.kind !== 'resolved') return null;

      const key = activeKey(text, position);
      const index = key === null ? -1 : outcome.signature.parameters.findIndex((parameter) => parameter.name === key);
      return { signature: outcome.signature, activeParameter: index === -1 ? null : index };
    } catch (error) {
      log.warn(`Signature help failed for ${documentId}: ${errorMessage(error)}`);
      return null;
    }
  }

  async complete(documentId: string, position: Position): Promise<CompletionEntry[]> {
    const text = this.documents.getText(documentId);
    if (text === undefined) return [];

    const context = completionContextAt(text, position);
    try {
      switch (context.kind) {
        case 'target-value':
          return await this.completeTargetPath(context.partial, context.replaceRange);
        case 'parameter-key': {
          const { targets } = extractTargets(text, documentId);
          const reference = targets.find((candidate) => candidate.keyRange.start.line === context.targetLine) ?? null;
          return await this.completeParameters(context.targetPath, reference, position, context.replaceRange);
        }
        case 'unknown':
          return [];
      }
    } catch (error) {
      log.warn(`Completion failed for ${documentId}: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Swaps in a new environment. Open documents are revalidated by the
   * caller once it has applied all of its settings.
   */
  reconfigure(settings: EnvironmentSettings, diagnostics?: DiagnosticOptions): void {
    if (diagnostics) {
      this.diagnosticOptions = diagnostics;
    }
    this.environments.reconfigure(settings);
  }

  reconfigureInterpreter(interpreter: string | null): void {
    this.environments.reconfigureInterpreter(interpreter);
  }

  /**
   * Drops cached signatures of changed files. Created or deleted Python
   * files can change which file a module resolves to, so they also clear
   * the resolution cache.
   */
  notifyFilesChanged(changes: readonly FileChange[]): void {
    let structural = false;
    for (const change of changes) {
      this.signatures.invalidate(change.filePath);
      if (change.type !== 'changed' && PYTHON_FILE.test(change.filePath)) {
        structural = true;
      }
    }
    if (structural) {
      this.environments.invalidateResolutions();
    }
  }

  getCacheStats(): { signatures: CacheStats; resolutions: CacheStats } {
    return {
      signatures: this.signatures.getStats(),
      resolutions: this.environments.get().resolutions.getStats(),
    };
  }

  private async runPass(documentId: string, text: string, environment: Environment): Promise<TargetDiagnostic[]> {
    const extraction = extractTargets(text, documentId);
    if (!extraction.recognized) {
      return [];
    }

    const snapshot = await environment.searchPaths();
    const outcomes = await Promise.all(
      extraction.targets.map(async (reference) => ({
        reference,
        outcome: await this.checkTarget(reference, environment),
      }))
    );

    return diagnoseDocument(outcomes, this.diagnosticOptions, extraction.diagnostics, snapshot.error);
  }

  private async checkTarget(reference: TargetReference, environment: Environment): Promise<TargetOutcome> {
    try {
      return await this.targets.resolve(reference.targetPath, environment);
    } catch (error) {
      log.error(`Checking ${reference.targetPath} failed`, error instanceof Error ? error : undefined);
      return { kind: 'failed', message: errorMessage(error) };
    }
  }

  private referenceForCursor(
    text: string,
    targets: readonly TargetReference[],
    position: Position
  ): TargetReference | null {
    const found = findTargetAt(targets, position);
    if (found) return found.reference;

    const context = completionContextAt(text, position);
    if (context.kind !== 'parameter-key') return null;
    return targets.find((candidate) => candidate.keyRange.start.line === context.targetLine) ?? null;
  }

  private async completeTargetPath(partial: string, range: TextRange): Promise<CompletionEntry[]> {
    const environment = this.environments.get();
    const entries: CompletionEntry[] = [];

    const roots = [environment.settings.workspaceRoot, ...environment.settings.extraPaths];
    for (const name of await listModules(roots)) {
      if (name.startsWith(partial)) {
        entries.push({ label: name, kind: 'module', insertText: name, range });
      }
    }

    const dot = partial.lastIndexOf('.');
    if (dot > 0) {
      const modulePath = partial.slice(0, dot);
      const prefix = partial.slice(dot + 1);
      const module = await this.modules.resolve(modulePath, environment);
      if (module.layer !== 'unresolved') {
        const parsed = await this.signatures.load(module.filePath);
        if (parsed.status === 'parsed') {
          for (const definition of parsed.definitions.values()) {
            if (!definition.name.startsWith(prefix)) continue;
            const label = `${modulePath}.${definition.name}`;
            const signature = toSignature(definition, module.filePath);
            entries.push({
              label,
              kind: definition.kind,
              detail: formatSignature(signature),
              documentation: signature.docstring ?? undefined,
              insertText: label,
              range,
            });
          }
        }
      }
    }

    return entries.slice(0, MAX_COMPLETIONS);
  }

  private async completeParameters(
    targetPath: string,
    reference: TargetReference | null,
    position: Position,
    range: TextRange
  ): Promise<CompletionEntry[]> {
    const outcome = await this.targets.resolve(targetPath, this.environments.get());
    if (outcome.kind !== 'resolved' || outcome.signature.implicit) {
      return [];
    }

    const supplied = new Set<string>();
    for (const parameter of reference?.parameters.values() ?? []) {
      if (parameter.keyRange.start.line !== position.line) {
        supplied.add(parameter.name);
      }
    }

    return outcome.signature.parameters
      .filter((parameter) => parameter.kind === 'positional-or-keyword' || parameter.kind === 'keyword-only')
      .filter((parameter) => !supplied.has(parameter.name))
      .map((parameter) => ({
        label: parameter.name,
        kind: 'parameter' as const,
        detail: formatParameter(parameter),
        insertText: `${parameter.name}: `,
        range,
      }));
  }
}

/** Key being typed or sitting on the cursor's line, if any. */
function activeKey(text: string, position: Position): string | null {
  const line = text.split('\n')[position.line] ?? '';
  const match = /^\s*(?:-\s+)?([\w.]+)\s*(?::|$)/.exec(line);
  return match ? match[1] : null;
}
