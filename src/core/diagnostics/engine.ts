/**
 * Diagnostics Engine
 *
 * Turns the outcome of resolving one target into findings, and a document's
 * worth of them into one sorted set.
 */
import { DOCUMENT_START, compareRanges } from '../text/range.js';
import type { TargetReference } from '../targets/types.js';
import type { Signature, SignatureParameter } from '../signatures/types.js';
import type { ResolutionError } from '../../utils/errors.js';
import { DEFAULT_DIAGNOSTIC_OPTIONS } from './types.js';
import type { DiagnosticOptions, TargetDiagnostic, TargetOutcome } from './types.js';

export interface ReferenceOutcome {
  readonly reference: TargetReference;
  readonly outcome: TargetOutcome;
}

export function diagnoseReference(
  reference: TargetReference,
  outcome: TargetOutcome,
  options: DiagnosticOptions = DEFAULT_DIAGNOSTIC_OPTIONS
): TargetDiagnostic[] {
  const target = reference.targetPath;
  const at = reference.targetRange;

  switch (outcome.kind) {
    case 'malformed':
      return [
        {
          kind: 'malformed-target-path',
          severity: 'error',
          message: `Invalid _target_ '${target}': ${outcome.reason}. Expected 'module.path.SymbolName'`,
          range: at,
          target,
        },
      ];
    case 'module-not-found':
      return [
        {
          kind: 'module-not-found',
          severity: 'error',
          message: `Cannot resolve module '${outcome.modulePath}'`,
          range: at,
          target,
        },
      ];
    case 'parse-error':
      return [
        {
          kind: 'parse-error',
          severity: 'warning',
          message: `Cannot read signatures from ${outcome.filePath}: ${outcome.message}`,
          range: at,
          target,
        },
      ];
    case 'symbol-not-found':
      return [
        {
          kind: 'symbol-not-found',
          severity: 'error',
          message: `Symbol '${outcome.symbol}' not found in module '${outcome.modulePath}'`,
          range: at,
          target,
        },
      ];
    case 'failed':
      return [
        {
          kind: 'parse-error',
          severity: 'warning',
          message: `Cannot check target '${target}': ${outcome.message}`,
          range: at,
          target,
        },
      ];
    case 'unverifiable':
      return [];
    case 'resolved':
      return checkParameters(reference, outcome.signature, options);
  }
}

/**
 * Compares supplied names against a signature. Implicit signatures accept
 * anything.
 */
export function checkParameters(
  reference: TargetReference,
  signature: Signature,
  options: DiagnosticOptions = DEFAULT_DIAGNOSTIC_OPTIONS
): TargetDiagnostic[] {
  if (signature.implicit) {
    return [];
  }

  const diagnostics: TargetDiagnostic[] = [];
  const target = reference.targetPath;
  const byKeyword = new Set(signature.parameters.filter(acceptsKeyword).map((parameter) => parameter.name));
  const positionalOnly = new Set(
    signature.parameters.filter((parameter) => parameter.kind === 'positional-only').map((parameter) => parameter.name)
  );
  const kwargs = signature.parameters.find((parameter) => parameter.kind === 'variadic-keyword');

  for (const supplied of reference.parameters.values()) {
    if (byKeyword.has(supplied.name)) continue;

    if (kwargs) {
      if (options.kwargsHints) {
        diagnostics.push({
          kind: 'variadic-keyword-parameter',
          severity: 'hint',
          message: `Parameter '${supplied.name}' will be passed via **${kwargs.name}`,
          range: supplied.keyRange,
          target,
          parameter: supplied.name,
        });
      }
      continue;
    }

    diagnostics.push({
      kind: 'unknown-parameter',
      severity: 'error',
      message: positionalOnly.has(supplied.name)
        ? `Parameter '${supplied.name}' of '${signature.name}' is positional-only`
        : `Unknown parameter '${supplied.name}' for '${signature.name}'`,
      range: supplied.keyRange,
      target,
      parameter: supplied.name,
    });
  }

  if (reference.partial) {
    return diagnostics;
  }

  const coveredByArgs = new Set(
    signature.parameters
      .filter((parameter) => parameter.kind === 'positional-only' || parameter.kind === 'positional-or-keyword')
      .slice(0, reference.positionalArgs)
      .map((parameter) => parameter.name)
  );

  for (const parameter of signature.parameters) {
    if (!isRequired(parameter) || coveredByArgs.has(parameter.name)) continue;
    if (acceptsKeyword(parameter) && reference.parameters.has(parameter.name)) continue;

    diagnostics.push({
      kind: 'missing-required-parameter',
      severity: 'error',
      message: `Missing required parameter '${parameter.name}' for '${signature.name}'`,
      range: reference.targetRange,
      target,
      parameter: parameter.name,
    });
  }

  return diagnostics;
}

/**
 * One document's findings: syntax problems, per-target findings and an
 * interpreter failure, sorted by position.
 */
export function diagnoseDocument(
  outcomes: readonly ReferenceOutcome[],
  options: DiagnosticOptions = DEFAULT_DIAGNOSTIC_OPTIONS,
  syntax: readonly TargetDiagnostic[] = [],
  infraError: ResolutionError | null = null
): TargetDiagnostic[] {
  const diagnostics: TargetDiagnostic[] = [...syntax];
  for (const { reference, outcome } of outcomes) {
    diagnostics.push(...diagnoseReference(reference, outcome, options));
  }
  if (infraError) {
    diagnostics.push(infraDiagnostic(infraError));
  }
  return sortDiagnostics(diagnostics);
}

export function infraDiagnostic(error: ResolutionError): TargetDiagnostic {
  return {
    kind: 'resolution-infra-error',
    severity: 'warning',
    message: `${error.message}. Modules are resolved from the workspace and extra paths only.`,
    range: DOCUMENT_START,
  };
}

export function sortDiagnostics(diagnostics: readonly TargetDiagnostic[]): TargetDiagnostic[] {
  return [...diagnostics].sort((a, b) => compareRanges(a.range, b.range));
}

function acceptsKeyword(parameter: SignatureParameter): boolean {
  return parameter.kind === 'positional-or-keyword' || parameter.kind === 'keyword-only';
}

function isRequired(parameter: SignatureParameter): boolean {
  return (
    !parameter.hasDefault &&
    parameter.kind !== 'variadic-positional' &&
    parameter.kind !== 'variadic-keyword'
  );
}
