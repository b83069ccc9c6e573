/**
 * Hover, signature help and completion payloads.
 */
import { CompletionItemKind, MarkupKind } from 'vscode-languageserver/node.js';
import type { CompletionItem, Hover, SignatureHelp } from 'vscode-languageserver/node.js';
import type { CompletionEntry, CompletionKind, HoverInfo, SignatureHelpInfo } from '../core/analysis/types.js';
import type { TargetOutcome } from '../core/diagnostics/types.js';
import { formatParameter, formatParameterList, formatSignature } from '../core/signatures/signature.js';

const COMPLETION_KINDS: Record<CompletionKind, CompletionItemKind> = {
  module: CompletionItemKind.Module,
  class: CompletionItemKind.Class,
  function: CompletionItemKind.Function,
  parameter: CompletionItemKind.Property,
};

/**
 * Markdown hover: the signature as a Python block, the docstring, and where
 * it was found. Unresolved targets show why.
 */
export function renderHover(info: HoverInfo): Hover {
  const sections: string[] = [];
  const signature = info.signature;

  if (signature) {
    sections.push(['```python', formatSignature(signature), '```'].join('\n'));
    if (info.parameter) {
      const match = signature.parameters.find((parameter) => parameter.name === info.parameter?.name);
      sections.push(
        match ? `Parameter \`${formatParameter(match)}\`` : `\`${info.parameter.name}\` is not a parameter of \`${signature.name}\``
      );
    }
    if (signature.implicit) {
      sections.push('_No `__init__` found; parameters are not checked._');
    }
    if (signature.docstring) {
      sections.push(signature.docstring);
    }
    sections.push(`Defined in \`${signature.filePath}\``);
  } else {
    sections.push(`\`${info.reference.targetPath}\``, describeOutcome(info.outcome));
  }

  return {
    contents: { kind: MarkupKind.Markdown, value: sections.join('\n\n') },
    range: info.reference.targetRange,
  };
}

function describeOutcome(outcome: TargetOutcome): string {
  switch (outcome.kind) {
    case 'malformed':
      return `Invalid target path: ${outcome.reason}`;
    case 'module-not-found':
      return `Cannot resolve module \`${outcome.modulePath}\``;
    case 'parse-error':
      return `Cannot parse \`${outcome.filePath}\`: ${outcome.message}`;
    case 'symbol-not-found':
      return `Symbol \`${outcome.symbol}\` not found in \`${outcome.filePath}\``;
    case 'unverifiable':
      return `\`${outcome.symbol}\` is imported into \`${outcome.modulePath}\` from a module that could not be followed`;
    case 'failed':
      return `Cannot check target: ${outcome.message}`;
    case 'resolved':
      return formatSignature(outcome.signature);
  }
}

export function renderSignatureHelp(info: SignatureHelpInfo): SignatureHelp {
  const signature = info.signature;
  const prefix = signature.kind === 'class' ? `class ${signature.name}(` : `def ${signature.name}(`;
  const parts = formatParameterList(signature.parameters);

  // Offsets of each real parameter inside the label; `/` and `*` markers are skipped.
  const offsets: [number, number][] = [];
  let label = prefix;
  parts.forEach((part, index) => {
    if (index > 0) label += ', ';
    if (part !== '/' && part !== '*') {
      offsets.push([label.length, label.length + part.length]);
    }
    label += part;
  });
  label += ')';
  if (signature.kind === 'function' && signature.returnType) {
    label += ` -> ${signature.returnType}`;
  }

  return {
    signatures: [
      {
        label,
        documentation: signature.docstring
          ? { kind: MarkupKind.Markdown, value: signature.docstring }
          : undefined,
        parameters: offsets.map((offset) => ({ label: offset })),
      },
    ],
    activeSignature: 0,
    activeParameter: info.activeParameter ?? undefined,
  };
}

export function renderCompletions(entries: readonly CompletionEntry[]): CompletionItem[] {
  return entries.map((entry, index) => ({
    label: entry.label,
    kind: COMPLETION_KINDS[entry.kind],
    detail: entry.detail,
    documentation: entry.documentation
      ? { kind: MarkupKind.Markdown, value: entry.documentation }
      : undefined,
    sortText: String(index).padStart(4, '0'),
    textEdit: { range: entry.range, newText: entry.insertText },
  }));
}
