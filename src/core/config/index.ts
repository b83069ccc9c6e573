export { ConfigSchema, LogLevelSchema, PythonSettingsSchema, DiagnosticsSettingsSchema } from './schema.js';
export type { Config, PythonSettings, DiagnosticsSettings } from './schema.js';
export { loadConfig, mergeConfig, getDefaultConfig, toEnvironmentSettings, CONFIG_FILE_NAME } from './loader.js';
