/**
 * Tests for config schema Zod validation.
 */
import { describe, it, expect } from 'vitest';
import {
  ConfigSchema,
  DiagnosticsSettingsSchema,
  LogLevelSchema,
  PythonSettingsSchema,
} from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should fill missing sections with defaults', () => {
    expect(ConfigSchema.parse({ python: null })).toEqual({
      python: { extraPaths: [], queryTimeoutMs: 10_000 },
      diagnostics: { enable: true, kwargsHints: true, debounceMs: 200 },
      logLevel: 'info',
    });
  });

  it('should drop unknown keys', () => {
    expect(ConfigSchema.parse({ other: 1, diagnostics: { enable: false } }).diagnostics.enable).toBe(false);
    expect('other' in ConfigSchema.parse({ other: 1 })).toBe(false);
  });
});

describe('PythonSettingsSchema', () => {
  it('should reject a non-positive timeout', () => {
    expect(PythonSettingsSchema.safeParse({ queryTimeoutMs: 0 }).success).toBe(false);
  });

  it('should require extra paths to be strings', () => {
    expect(PythonSettingsSchema.safeParse({ extraPaths: ['src', 3] }).success).toBe(false);
  });
});

describe('DiagnosticsSettingsSchema', () => {
  it('should accept a zero debounce', () => {
    expect(DiagnosticsSettingsSchema.parse({ debounceMs: 0 }).debounceMs).toBe(0);
  });
});

describe('LogLevelSchema', () => {
  it('should accept known levels only', () => {
    expect(LogLevelSchema.options).toEqual(['debug', 'info', 'warn', 'error', 'silent']);
    expect(LogLevelSchema.safeParse('trace').success).toBe(false);
  });
});
