/**
 * target-sense language server
 *
 * Wires the analysis service to an LSP connection: keeps the document store
 * in step with the editor, validates configuration documents after a short
 * debounce and answers hover, definition, signature help and completion.
 */
import { fileURLToPath, pathToFileURL } from 'node:url';
import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  TextDocumentSyncKind,
  DidChangeConfigurationNotification,
  DidChangeWatchedFilesNotification,
  FileChangeType,
} from 'vscode-languageserver/node.js';
import type { Connection, InitializeParams, InitializeResult, Location, MessageActionItem } from 'vscode-languageserver/node.js';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { TargetAnalysisService } from '../core/analysis/service.js';
import type { FileChange } from '../core/analysis/types.js';
import { CONFIG_FILE_NAME, getDefaultConfig, loadConfig, mergeConfig, toEnvironmentSettings } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { toLspDiagnostics } from './diagnostics.js';
import { renderCompletions, renderHover, renderSignatureHelp } from './render.js';

export interface ServerOptions {
  /** Config file relative to the workspace root. */
  configPath?: string;
}

/** Editor settings section read through `workspace/configuration`. */
export const SETTINGS_SECTION = 'targetSense';

const PYTHON_FILE = /\.pyi?$/;
const PYTHON_CHANGES_KEY = '<python>';

const log = logger.child('server');

export function startServer(options: ServerOptions = {}): Connection {
  const connection = createConnection(ProposedFeatures.all);
  const documents = new TextDocuments<TextDocument>(TextDocument);

  // Debounce timers per document
  const debounceTimers = new Map<string, ReturnType<typeof setTimeout>>();

  let service: TargetAnalysisService | null = null;
  let config: Config = getDefaultConfig();
  let workspaceRoot = process.cwd();
  let initializationOptions: unknown = null;
  let hasConfigurationCapability = false;
  let hasWatchedFilesRegistration = false;

  logger.setSink((level, line) => {
    if (level === 'error') connection.console.error(line);
    else if (level === 'warn') connection.console.warn(line);
    else connection.console.log(line);
  });

  function settle(task: Promise<unknown>, what: string): void {
    task.catch((error: unknown) => {
      log.error(`${what} failed`, error instanceof Error ? error : undefined);
    });
  }

  connection.onInitialize((params: InitializeParams): InitializeResult => {
    const capabilities = params.capabilities;
    hasConfigurationCapability = !!capabilities.workspace?.configuration;
    hasWatchedFilesRegistration = !!capabilities.workspace?.didChangeWatchedFiles?.dynamicRegistration;
    initializationOptions = params.initializationOptions ?? null;

    const rootUri = params.workspaceFolders?.[0]?.uri ?? params.rootUri;
    if (rootUri?.startsWith('file:')) {
      workspaceRoot = fileURLToPath(rootUri);
    }

    return {
      capabilities: {
        textDocumentSync: TextDocumentSyncKind.Incremental,
        hoverProvider: true,
        definitionProvider: true,
        signatureHelpProvider: { triggerCharacters: [':', ' '] },
        completionProvider: { triggerCharacters: ['.', ':', ' '] },
      },
    };
  });

  connection.onInitialized(() => {
    if (hasConfigurationCapability) {
      settle(connection.client.register(DidChangeConfigurationNotification.type, undefined), 'Configuration registration');
    }
    if (hasWatchedFilesRegistration) {
      settle(
        connection.client.register(DidChangeWatchedFilesNotification.type, {
          watchers: [{ globPattern: '**/*.py' }, { globPattern: '**/*.pyi' }, { globPattern: `**/${CONFIG_FILE_NAME}` }],
        }),
        'File watcher registration'
      );
    }
    settle(
      applySettings().then(() => log.info(`Serving ${workspaceRoot}`)),
      'Initialization'
    );
  });

  /**
   * Rebuilds the configuration from file, initialization options and editor
   * settings, then swaps the environment and revalidates.
   */
  async function applySettings(): Promise<void> {
    let next = getDefaultConfig();
    try {
      next = await loadConfig(workspaceRoot, options.configPath);
      next = mergeConfig(next, initializationOptions);
      if (hasConfigurationCapability) {
        next = mergeConfig(next, await connection.workspace.getConfiguration({ section: SETTINGS_SECTION }));
      }
    } catch (error) {
      log.error(`Using default settings: ${errorMessage(error)}`);
      settle(connection.window.showErrorMessage<MessageActionItem>(`target-sense: ${errorMessage(error)}`), 'Error notification');
    }

    config = next;
    logger.setLevel(config.logLevel);
    const settings = toEnvironmentSettings(config, workspaceRoot);
    const diagnosticOptions = { kwargsHints: config.diagnostics.kwargsHints };

    if (!service) {
      service = new TargetAnalysisService({
        settings,
        diagnostics: diagnosticOptions,
        publisher: (uri, version, findings) => {
          settle(connection.sendDiagnostics({ uri, version, diagnostics: toLspDiagnostics(findings) }), 'Publishing diagnostics');
        },
      });
      for (const document of documents.all()) {
        service.updateDocument(document.uri, document.version, document.getText());
      }
    } else {
      service.reconfigure(settings, diagnosticOptions);
    }

    await revalidateAll();
  }

  async function revalidateAll(): Promise<void> {
    if (!service) return;
    if (!config.diagnostics.enable) {
      for (const document of documents.all()) {
        if (!PYTHON_FILE.test(document.uri)) clearDiagnostics(document.uri);
      }
      return;
    }
    await service.revalidateOpenDocuments();
  }

  async function validateDocument(uri: string): Promise<void> {
    const document = documents.get(uri);
    if (!service || !document) return;

    if (!config.diagnostics.enable) {
      clearDiagnostics(uri);
      return;
    }
    await service.resolveAndValidate(uri, document.getText(), document.version);
  }

  function schedule(key: string, task: () => Promise<void>): void {
    const existingTimer = debounceTimers.get(key);
    if (existingTimer) {
      clearTimeout(existingTimer);
    }

    const timer = setTimeout(() => {
      debounceTimers.delete(key);
      settle(task(), `Validation of ${key}`);
    }, config.diagnostics.debounceMs);
    debounceTimers.set(key, timer);
  }

  function clearDiagnostics(uri: string): void {
    settle(connection.sendDiagnostics({ uri, diagnostics: [] }), 'Clearing diagnostics');
  }

  // Fired on open as well as on every edit.
  documents.onDidChangeContent((event) => {
    const document = event.document;
    if (!service) return;

    service.updateDocument(document.uri, document.version, document.getText());
    if (PYTHON_FILE.test(document.uri)) {
      // Open Python buffers feed signatures, so configurations may change meaning.
      schedule(PYTHON_CHANGES_KEY, revalidateAll);
    } else {
      schedule(document.uri, () => validateDocument(document.uri));
    }
  });

  documents.onDidClose((event) => {
    const uri = event.document.uri;

    const timer = debounceTimers.get(uri);
    if (timer) {
      clearTimeout(timer);
      debounceTimers.delete(uri);
    }

    service?.closeDocument(uri);
    if (PYTHON_FILE.test(uri)) {
      schedule(PYTHON_CHANGES_KEY, revalidateAll);
    } else {
      clearDiagnostics(uri);
    }
  });

  connection.onDidChangeWatchedFiles((params) => {
    if (!service) return;

    const changes: FileChange[] = [];
    let configChanged = false;
    for (const change of params.changes) {
      if (!change.uri.startsWith('file:')) continue;
      const filePath = fileURLToPath(change.uri);
      if (filePath.endsWith(CONFIG_FILE_NAME)) {
        configChanged = true;
        continue;
      }
      changes.push({
        filePath,
        type:
          change.type === FileChangeType.Created
            ? 'created'
            : change.type === FileChangeType.Deleted
              ? 'deleted'
              : 'changed',
      });
    }

    service.notifyFilesChanged(changes);
    if (configChanged) {
      log.info(`${CONFIG_FILE_NAME} changed, reloading settings`);
      settle(applySettings(), 'Reloading settings');
    } else if (changes.length > 0) {
      schedule(PYTHON_CHANGES_KEY, revalidateAll);
    }
  });

  connection.onDidChangeConfiguration(() => {
    settle(applySettings(), 'Applying settings');
  });

  connection.onHover(async (params) => {
    const info = await service?.hoverInfo(params.textDocument.uri, params.position);
    return info ? renderHover(info) : null;
  });

  connection.onDefinition(async (params): Promise<Location | null> => {
    const location = await service?.definitionLocation(params.textDocument.uri, params.position);
    if (!location) return null;
    return { uri: pathToFileURL(location.filePath).href, range: location.range };
  });

  connection.onSignatureHelp(async (params) => {
    const info = await service?.signatureHelp(params.textDocument.uri, params.position);
    return info ? renderSignatureHelp(info) : null;
  });

  connection.onCompletion(async (params) => {
    const entries = await service?.complete(params.textDocument.uri, params.position);
    return renderCompletions(entries ?? []);
  });

  connection.onShutdown(() => {
    for (const timer of debounceTimers.values()) {
      clearTimeout(timer);
    }
    debounceTimers.clear();
  });

  // Make the text document manager listen on the connection
  documents.listen(connection);

  // Start the connection
  connection.listen();
  return connection;
}
