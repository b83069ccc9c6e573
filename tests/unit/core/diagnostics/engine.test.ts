/**
 * Tests for the diagnostics engine.
 */
import { describe, it, expect } from 'vitest';
import {
  checkParameters,
  diagnoseDocument,
  diagnoseReference,
} from '../../../../src/core/diagnostics/engine.js';
import { extractTargets } from '../../../../src/core/targets/extractor.js';
import type { TargetReference } from '../../../../src/core/targets/types.js';
import type { ParameterKind, Signature, SignatureParameter } from '../../../../src/core/signatures/types.js';
import { ErrorCodes, ResolutionError } from '../../../../src/utils/errors.js';

function reference(yaml: string): TargetReference {
  const [first] = extractTargets(yaml).targets;
  return first;
}

function param(name: string, kind: ParameterKind = 'positional-or-keyword', defaultValue: string | null = null): SignatureParameter {
  return { name, kind, annotation: null, defaultValue, hasDefault: defaultValue !== null };
}

function signature(parameters: SignatureParameter[], implicit = false): Signature {
  return {
    name: 'Net',
    kind: 'class',
    parameters,
    returnType: null,
    docstring: null,
    filePath: '/ws/pkg/models.py',
    nameRange: { start: { line: 0, character: 6 }, end: { line: 0, character: 9 } },
    implicit,
  };
}

const NET = signature([param('hidden'), param('dropout', 'positional-or-keyword', '0.1')]);

describe('diagnoseReference', () => {
  it('should report a malformed path at the target range', () => {
    const ref = reference('_target_: ..bad');

    const [finding, ...rest] = diagnoseReference(ref, { kind: 'malformed', reason: 'path contains an empty segment' });

    expect(rest).toEqual([]);
    expect(finding).toEqual({
      kind: 'malformed-target-path',
      severity: 'error',
      message: "Invalid _target_ '..bad': path contains an empty segment. Expected 'module.path.SymbolName'",
      range: ref.targetRange,
      target: '..bad',
    });
  });

  it('should report a missing module once', () => {
    const ref = reference('_target_: does.not.exist\nx: 1\n');

    const findings = diagnoseReference(ref, { kind: 'module-not-found', modulePath: 'does.not', searched: ['/ws'] });

    expect(findings.map((f) => [f.kind, f.message])).toEqual([['module-not-found', "Cannot resolve module 'does.not'"]]);
  });

  it('should report a missing symbol and a module parse failure', () => {
    const ref = reference('_target_: pkg.models.Nope');

    const missing = diagnoseReference(ref, {
      kind: 'symbol-not-found',
      modulePath: 'pkg.models',
      symbol: 'Nope',
      filePath: '/ws/pkg/models.py',
    });
    const broken = diagnoseReference(ref, {
      kind: 'parse-error',
      modulePath: 'pkg.models',
      filePath: '/ws/pkg/models.py',
      message: 'Syntax error at line 4',
    });

    expect(missing[0].message).toBe("Symbol 'Nope' not found in module 'pkg.models'");
    expect(broken[0]).toMatchObject({
      kind: 'parse-error',
      severity: 'warning',
      message: 'Cannot read signatures from /ws/pkg/models.py: Syntax error at line 4',
    });
  });

  it('should turn a failed check into one warning at the target range', () => {
    const ref = reference('_target_: pkg.models.Net\nextra: 1\n');

    expect(diagnoseReference(ref, { kind: 'failed', message: 'EACCES' })).toEqual([
      {
        kind: 'parse-error',
        severity: 'warning',
        message: "Cannot check target 'pkg.models.Net': EACCES",
        range: ref.targetRange,
        target: 'pkg.models.Net',
      },
    ]);
  });

  it('should stay silent for a name that cannot be verified', () => {
    const ref = reference('_target_: pkg.factory\nanything: 1\n');

    expect(
      diagnoseReference(ref, { kind: 'unverifiable', modulePath: 'pkg', symbol: 'factory', filePath: '/ws/pkg/__init__.py' })
    ).toEqual([]);
  });
});

describe('checkParameters', () => {
  it('should accept a call that supplies every required parameter', () => {
    expect(checkParameters(reference('_target_: pkg.models.Net\nhidden: 128\n'), NET)).toEqual([]);
  });

  it('should report unknown names at the key and missing names at the target', () => {
    const ref = reference('_target_: pkg.models.Net\nextra: 5\n');

    const findings = checkParameters(ref, NET);

    expect(findings).toEqual([
      {
        kind: 'unknown-parameter',
        severity: 'error',
        message: "Unknown parameter 'extra' for 'Net'",
        range: { start: { line: 1, character: 0 }, end: { line: 1, character: 5 } },
        target: 'pkg.models.Net',
        parameter: 'extra',
      },
      {
        kind: 'missing-required-parameter',
        severity: 'error',
        message: "Missing required parameter 'hidden' for 'Net'",
        range: ref.targetRange,
        target: 'pkg.models.Net',
        parameter: 'hidden',
      },
    ]);
  });

  it('should match names case-sensitively', () => {
    const findings = checkParameters(reference('_target_: pkg.models.Net\nHidden: 1\n'), NET);

    expect(findings.map((f) => f.kind)).toEqual(['unknown-parameter', 'missing-required-parameter']);
  });

  it('should hint at names absorbed by **kwargs', () => {
    const sig = signature([param('name'), param('overrides', 'variadic-keyword')]);
    const ref = reference('_target_: pkg.build\nname: x\ncolor: red\n');

    expect(checkParameters(ref, sig, { kwargsHints: true })).toEqual([
      {
        kind: 'variadic-keyword-parameter',
        severity: 'hint',
        message: "Parameter 'color' will be passed via **overrides",
        range: { start: { line: 2, character: 0 }, end: { line: 2, character: 5 } },
        target: 'pkg.build',
        parameter: 'color',
      },
    ]);
    expect(checkParameters(ref, sig, { kwargsHints: false })).toEqual([]);
  });

  it('should reject positional-only names passed by keyword', () => {
    const sig = signature([param('name', 'positional-only')]);

    const findings = checkParameters(reference('_target_: pkg.build\nname: x\n'), sig);

    expect(findings.map((f) => f.message)).toEqual([
      "Parameter 'name' of 'Net' is positional-only",
      "Missing required parameter 'name' for 'Net'",
    ]);
  });

  it('should never require variadic parameters', () => {
    const sig = signature([param('items', 'variadic-positional'), param('pad', 'keyword-only'), param('kw', 'variadic-keyword')]);

    const findings = checkParameters(reference('_target_: pkg.collate\n'), sig);

    expect(findings.map((f) => f.parameter)).toEqual(['pad']);
  });

  it('should count _args_ items against leading positional parameters', () => {
    const sig = signature([param('a', 'positional-only'), param('b'), param('c', 'keyword-only')]);

    const findings = checkParameters(reference('_target_: pkg.f\n_args_: [1, 2]\n'), sig);

    expect(findings.map((f) => f.parameter)).toEqual(['c']);
  });

  it('should skip missing parameters for partial targets', () => {
    const ref = reference('_target_: pkg.models.Net\n_partial_: true\nextra: 1\n');

    expect(checkParameters(ref, NET).map((f) => f.kind)).toEqual(['unknown-parameter']);
  });

  it('should produce nothing against an implicit signature', () => {
    const ref = reference('_target_: pkg.models.Plain\nanything: 1\n');

    expect(checkParameters(ref, signature([], true))).toEqual([]);
  });
});

describe('diagnoseDocument', () => {
  it('should merge syntax, target and infrastructure findings in position order', () => {
    const text = ['a:', '  _target_: x.Y', '  bad: 1', 'b:', '  _target_: nope'].join('\n');
    const [first, second] = extractTargets(text).targets;
    const infra = new ResolutionError(ErrorCodes.INTERPRETER_FAILED, "Interpreter 'py' failed: boom");

    const findings = diagnoseDocument(
      [
        { reference: second, outcome: { kind: 'malformed', reason: 'path names no module' } },
        { reference: first, outcome: { kind: 'resolved', signature: signature([]), layer: 'workspace' } },
      ],
      { kwargsHints: true },
      [],
      infra
    );

    expect(findings.map((f) => [f.kind, f.range.start.line])).toEqual([
      ['resolution-infra-error', 0],
      ['unknown-parameter', 2],
      ['malformed-target-path', 4],
    ]);
    expect(findings[0].message).toBe(
      "Interpreter 'py' failed: boom. Modules are resolved from the workspace and extra paths only."
    );
  });
});
