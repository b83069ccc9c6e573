/**
 * `target-sense check`: validate configuration files once and print the
 * findings.
 */
import { Command, Option } from 'commander';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { TargetAnalysisService } from '../../core/analysis/service.js';
import { loadConfig, mergeConfig, toEnvironmentSettings } from '../../core/config/loader.js';
import { createFormatter, OUTPUT_FORMATS } from '../formatters/index.js';
import type { FileReport, OutputFormat } from '../formatters/index.js';
import { globFiles, readFile } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface CheckOptions {
  /** Workspace root; defaults to the current directory */
  root?: string;
  /** Python interpreter for the search path */
  python?: string;
  extraPath?: string[];
  config?: string;
  /** Hide `**kwargs` hints */
  kwargsHints?: boolean;
}

export interface CheckResult {
  reports: FileReport[];
  errorCount: number;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Validate _target_ references in configuration files')
    .argument('<files...>', 'Configuration files or glob patterns')
    .option('--root <dir>', 'Workspace root used for module resolution')
    .option('--python <interpreter>', 'Python interpreter whose sys.path is searched')
    .option('--extra-path <dirs...>', 'Additional module search directories')
    .option('--config <path>', 'Path to config file')
    .option('--no-kwargs-hints', 'Do not report names absorbed by **kwargs')
    .addOption(new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('human'))
    .option('--show-all', 'List files without findings too')
    .action(async (patterns: string[], options: CheckOptions & { format: OutputFormat; showAll?: boolean }) => {
      try {
        const result = await runCheck(patterns, options);
        const formatter = createFormatter(options.format, {
          colors: process.stdout.isTTY ?? false,
          showPassing: options.showAll ?? false,
        });
        console.log(formatter.formatReports(result.reports));
        process.exitCode = result.errorCount > 0 ? 1 : 0;
      } catch (error) {
        logger.error(`Check failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}

/**
 * Validates every file matching `patterns` under one analysis service.
 */
export async function runCheck(patterns: readonly string[], options: CheckOptions = {}): Promise<CheckResult> {
  const root = path.resolve(options.root ?? process.cwd());

  let config = await loadConfig(root, options.config);
  config = mergeConfig(config, {
    python: { interpreter: options.python, extraPaths: options.extraPath },
    diagnostics: { kwargsHints: options.kwargsHints === false ? false : undefined },
  });
  logger.setLevel(config.logLevel);

  const service = new TargetAnalysisService({
    settings: toEnvironmentSettings(config, root),
    diagnostics: { kwargsHints: config.diagnostics.kwargsHints },
  });

  const files = (await globFiles([...patterns], { cwd: root, absolute: true })).sort();
  if (files.length === 0) {
    logger.warn(`No files match ${patterns.join(' ')}`);
  }

  const reports: FileReport[] = [];
  for (const file of files) {
    const text = await readFile(file);
    const documentId = pathToFileURL(file).href;
    const diagnostics = (await service.resolveAndValidate(documentId, text, 1)) ?? [];
    reports.push({
      file: path.relative(root, file),
      recognized: service.extractTargets(text).recognized,
      diagnostics,
    });
  }

  const errorCount = reports
    .flatMap((report) => report.diagnostics)
    .filter((diagnostic) => diagnostic.severity === 'error').length;
  return { reports, errorCount };
}
