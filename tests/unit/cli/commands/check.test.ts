/**
 * Tests for the check command.
 */
import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createCheckCommand, runCheck } from '../../../../src/cli/commands/check.js';

const WORKSPACE = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../fixtures/workspace');

describe('createCheckCommand', () => {
  it('should declare its flags', () => {
    const command = createCheckCommand();

    expect(command.name()).toBe('check');
    expect(command.options.map((option) => option.long)).toEqual([
      '--root',
      '--python',
      '--extra-path',
      '--config',
      '--no-kwargs-hints',
      '--format',
      '--show-all',
    ]);
  });
});

describe('runCheck', () => {
  it('should report nothing for a valid configuration', async () => {
    const result = await runCheck(['configs/model.yaml'], { root: WORKSPACE });

    expect(result.errorCount).toBe(0);
    expect(result.reports).toEqual([{ file: path.join('configs', 'model.yaml'), recognized: true, diagnostics: [] }]);
  });

  it('should count error findings across files', async () => {
    const result = await runCheck(['configs/*.yaml'], { root: WORKSPACE });

    expect(result.reports.map((report) => report.file)).toEqual([
      path.join('configs', 'invalid.yaml'),
      path.join('configs', 'model.yaml'),
      path.join('configs', 'plain.yaml'),
    ]);
    expect(result.reports[0].diagnostics.map((d) => d.kind)).toEqual([
      'missing-required-parameter',
      'unknown-parameter',
      'module-not-found',
      'malformed-target-path',
    ]);
    expect(result.reports[2]).toEqual({ file: path.join('configs', 'plain.yaml'), recognized: false, diagnostics: [] });
    expect(result.errorCount).toBe(4);
  });

  it('should search extra paths given on the command line', async () => {
    const result = await runCheck(['model.yaml'], {
      root: path.join(WORKSPACE, 'configs'),
      extraPath: ['..'],
    });

    expect(result.reports.map((report) => [report.file, report.diagnostics.length])).toEqual([['model.yaml', 0]]);
  });
});
