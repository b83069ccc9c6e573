/**
 * Configuration schema: `.target-sense.yaml`, editor settings and CLI flags
 * all validate against this shape.
 */
import { z } from 'zod';

/**
 * Helper to create a schema that defaults to an empty object.
 * Nested defaults then apply when the section is omitted.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Python environment used for module resolution. */
export const PythonSettingsSchema = z.object({
  /** Interpreter whose `sys.path` extends the search roots. */
  interpreter: z.string().optional(),
  /** Searched after the workspace root, before the interpreter's paths. */
  extraPaths: z.array(z.string()).default([]),
  queryTimeoutMs: z.number().int().positive().default(10_000),
});

export const DiagnosticsSettingsSchema = z.object({
  enable: z.boolean().default(true),
  /** Hint when a name is absorbed by `**kwargs`. */
  kwargsHints: z.boolean().default(true),
  debounceMs: z.number().int().min(0).default(200),
});

export const ConfigSchema = z.object({
  python: withDefaults(PythonSettingsSchema),
  diagnostics: withDefaults(DiagnosticsSettingsSchema),
  logLevel: LogLevelSchema.default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type PythonSettings = z.infer<typeof PythonSettingsSchema>;
export type DiagnosticsSettings = z.infer<typeof DiagnosticsSettingsSchema>;
