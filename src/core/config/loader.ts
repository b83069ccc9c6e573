/**
 * Configuration loading and layering.
 *
 * Layers, lowest first: defaults, `.target-sense.yaml` in the workspace
 * root, then overrides (editor settings, CLI flags).
 */
import * as path from 'node:path';
import { ConfigSchema } from './schema.js';
import type { Config } from './schema.js';
import type { EnvironmentSettings } from '../environment/environment.js';
import { fileExists } from '../../utils/file-system.js';
import { formatZodError, loadYamlWithSchema } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const CONFIG_FILE_NAME = '.target-sense.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration for a workspace.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(workspaceRoot: string, configPath?: string): Promise<Config> {
  const fullPath = path.resolve(workspaceRoot, configPath ?? CONFIG_FILE_NAME);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Apply an override layer. Null and undefined values in the override leave
 * the base value in place; arrays replace rather than concatenate.
 */
export function mergeConfig(base: Config, override: unknown): Config {
  const result = ConfigSchema.safeParse(deepMerge(base, override));
  if (!result.success) {
    throw new ConfigError(ErrorCodes.CONFIG_INVALID, `Invalid settings: ${formatZodError(result.error)}`, {
      errors: result.error.issues,
    });
  }
  return result.data;
}

/**
 * Environment inputs for module resolution. Relative extra paths and
 * interpreter paths containing a separator resolve against the workspace
 * root; a bare interpreter name is looked up on PATH by the OS. An empty
 * interpreter setting means none.
 */
export function toEnvironmentSettings(config: Config, workspaceRoot: string): EnvironmentSettings {
  const root = path.resolve(workspaceRoot);
  const interpreter = config.python.interpreter?.trim() || undefined;
  return {
    workspaceRoot: root,
    extraPaths: config.python.extraPaths.map((entry) => path.resolve(root, entry)),
    interpreter:
      interpreter === undefined
        ? null
        : interpreter.includes('/') || interpreter.includes('\\')
          ? path.resolve(root, interpreter)
          : interpreter,
    queryTimeoutMs: config.python.queryTimeoutMs,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: unknown, override: unknown): unknown {
  if (override === undefined || override === null) {
    return base;
  }
  if (!isRecord(base) || !isRecord(override)) {
    return override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = deepMerge(base[key], value);
  }
  return merged;
}
