/**
 * Tests for configuration loading and layering.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  CONFIG_FILE_NAME,
  getDefaultConfig,
  loadConfig,
  mergeConfig,
  toEnvironmentSettings,
} from '../../../../src/core/config/loader.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('getDefaultConfig', () => {
  it('should fill every section', () => {
    expect(getDefaultConfig()).toEqual({
      python: { extraPaths: [], queryTimeoutMs: 10_000 },
      diagnostics: { enable: true, kwargsHints: true, debounceMs: 200 },
      logLevel: 'info',
    });
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'target-sense-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should return defaults without a config file', async () => {
    expect(await loadConfig(tempDir)).toEqual(getDefaultConfig());
  });

  it('should read the workspace config file and apply defaults to the rest', async () => {
    await fs.writeFile(
      path.join(tempDir, CONFIG_FILE_NAME),
      ['python:', '  interpreter: .venv/bin/python', '  extraPaths: [src]', 'logLevel: debug', ''].join('\n')
    );

    const config = await loadConfig(tempDir);

    expect(config.python).toEqual({ interpreter: '.venv/bin/python', extraPaths: ['src'], queryTimeoutMs: 10_000 });
    expect(config.diagnostics.debounceMs).toBe(200);
    expect(config.logLevel).toBe('debug');
  });

  it('should accept an explicit config path', async () => {
    await fs.writeFile(path.join(tempDir, 'custom.yaml'), 'diagnostics:\n  kwargsHints: false\n');

    const config = await loadConfig(tempDir, 'custom.yaml');

    expect(config.diagnostics.kwargsHints).toBe(false);
  });

  it('should reject an invalid file with a ConfigError', async () => {
    await fs.writeFile(path.join(tempDir, CONFIG_FILE_NAME), 'python:\n  queryTimeoutMs: soon\n');

    const failure = await loadConfig(tempDir).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ConfigError);
    expect(failure).toMatchObject({ code: ErrorCodes.CONFIG_LOAD_ERROR });
  });
});

describe('mergeConfig', () => {
  it('should override nested values and keep the rest', () => {
    const merged = mergeConfig(getDefaultConfig(), {
      python: { interpreter: 'python3', extraPaths: undefined },
      diagnostics: { debounceMs: 50 },
    });

    expect(merged.python).toEqual({ interpreter: 'python3', extraPaths: [], queryTimeoutMs: 10_000 });
    expect(merged.diagnostics).toEqual({ enable: true, kwargsHints: true, debounceMs: 50 });
  });

  it('should replace arrays', () => {
    const base = mergeConfig(getDefaultConfig(), { python: { extraPaths: ['a', 'b'] } });

    expect(mergeConfig(base, { python: { extraPaths: ['c'] } }).python.extraPaths).toEqual(['c']);
  });

  it('should ignore a null layer', () => {
    expect(mergeConfig(getDefaultConfig(), null)).toEqual(getDefaultConfig());
  });

  it('should reject values of the wrong type', () => {
    expect(() => mergeConfig(getDefaultConfig(), { logLevel: 'loud' })).toThrow(ConfigError);
  });
});

describe('toEnvironmentSettings', () => {
  const root = path.resolve('/ws');

  it('should resolve extra paths and interpreter paths against the root', () => {
    const config = mergeConfig(getDefaultConfig(), {
      python: { interpreter: '.venv/bin/python', extraPaths: ['src', '/opt/lib'] },
    });

    expect(toEnvironmentSettings(config, root)).toEqual({
      workspaceRoot: root,
      extraPaths: [path.join(root, 'src'), path.resolve('/opt/lib')],
      interpreter: path.join(root, '.venv', 'bin', 'python'),
      queryTimeoutMs: 10_000,
    });
  });

  it('should leave a bare interpreter name for PATH lookup', () => {
    const config = mergeConfig(getDefaultConfig(), { python: { interpreter: 'python3' } });

    expect(toEnvironmentSettings(config, root).interpreter).toBe('python3');
  });

  it('should treat an empty interpreter as none', () => {
    const config = mergeConfig(getDefaultConfig(), { python: { interpreter: '  ' } });

    expect(toEnvironmentSettings(config, root).interpreter).toBeNull();
  });
});
