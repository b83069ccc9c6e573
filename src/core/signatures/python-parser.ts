/**
 * Python source → top-level definitions, via tree-sitter.
 *
 * Only what a call site needs is kept: names, parameter lists, return
 * annotations, docstrings and import bindings. Nothing is evaluated.
 */
import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { createContext, findSyntaxError, getNodeRange, getNodeText } from './tree-sitter-utils.js';
import type { TreeSitterContext } from './tree-sitter-utils.js';
import type {
  ClassDefinition,
  FunctionDefinition,
  ImportBinding,
  ParameterKind,
  ParsedModule,
  PythonDefinition,
  SignatureParameter,
} from './types.js';

/**
 * Creates a Python parser instance.
 *
 * The `as unknown as Parser.Language` assertion is needed because the
 * grammar package's typings do not extend tree-sitter's Language type,
 * though the two are compatible at runtime.
 */
export function createPythonParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python as unknown as Parser.Language);
  return parser;
}

/** Statements whose bodies still run at import time. */
const TRANSPARENT_BLOCKS = new Set([
  'if_statement',
  'elif_clause',
  'else_clause',
  'try_statement',
  'except_clause',
  'except_group_clause',
  'finally_clause',
  'with_statement',
  'block',
]);

interface ModuleScope {
  readonly definitions: Map<string, PythonDefinition>;
  readonly imports: Map<string, ImportBinding>;
  readonly starImports: string[];
  readonly assignedNames: Set<string>;
}

export function parsePythonModule(parser: Parser, sourceCode: string, filePath: string): ParsedModule {
  const ctx = createContext(parser, sourceCode);
  const syntaxError = findSyntaxError(ctx.tree);
  if (syntaxError) {
    return { status: 'parse-error', filePath, message: syntaxError.message, range: syntaxError.range };
  }

  const scope: ModuleScope = { definitions: new Map(), imports: new Map(), starImports: [], assignedNames: new Set() };
  collectStatements(ctx.tree.rootNode, ctx, scope);

  return {
    status: 'parsed',
    filePath,
    definitions: scope.definitions,
    imports: scope.imports,
    starImports: scope.starImports,
    assignedNames: scope.assignedNames,
  };
}

function collectStatements(container: Parser.SyntaxNode, ctx: TreeSitterContext, scope: ModuleScope): void {
  for (const node of container.namedChildren) {
    switch (node.type) {
      case 'function_definition':
      case 'class_definition':
      case 'decorated_definition': {
        const definition = convertDefinition(node, ctx);
        if (definition) {
          // Later definitions rebind the name.
          scope.definitions.delete(definition.name);
          scope.definitions.set(definition.name, definition);
          scope.imports.delete(definition.name);
          scope.assignedNames.delete(definition.name);
        }
        break;
      }
      case 'expression_statement':
        collectAssignment(node, ctx, scope);
        break;
      case 'import_statement':
        collectImport(node, ctx, scope);
        break;
      case 'import_from_statement':
        collectFromImport(node, ctx, scope);
        break;
      default:
        if (TRANSPARENT_BLOCKS.has(node.type)) {
          collectStatements(node, ctx, scope);
        }
    }
  }
}

function convertDefinition(node: Parser.SyntaxNode, ctx: TreeSitterContext): PythonDefinition | null {
  const decorators: string[] = [];
  let definition: Parser.SyntaxNode | null = node;

  if (node.type === 'decorated_definition') {
    for (const child of node.namedChildren) {
      if (child.type === 'decorator') {
        decorators.push(getNodeText(child, ctx.sourceCode).replace(/^@\s*/, ''));
      }
    }
    definition = node.childForFieldName('definition');
  }

  if (definition?.type === 'function_definition') {
    return convertFunction(definition, ctx, decorators);
  }
  if (definition?.type === 'class_definition') {
    return convertClass(definition, ctx, decorators);
  }
  return null;
}

function convertFunction(
  node: Parser.SyntaxNode,
  ctx: TreeSitterContext,
  decorators: readonly string[]
): FunctionDefinition | null {
  const nameNode = node.childForFieldName('name');
  if (!nameNode) return null;

  const parametersNode = node.childForFieldName('parameters');
  const returnNode = node.childForFieldName('return_type');

  return {
    kind: 'function',
    name: getNodeText(nameNode, ctx.sourceCode),
    parameters: parametersNode ? convertParameters(parametersNode, ctx) : [],
    returnType: returnNode ? getNodeText(returnNode, ctx.sourceCode) : null,
    docstring: extractDocstring(node.childForFieldName('body'), ctx),
    nameRange: getNodeRange(nameNode),
    decorators,
    isAsync: node.children.some((child) => child.type === 'async'),
  };
}

function convertClass(
  node: Parser.SyntaxNode,
  ctx: TreeSitterContext,
  decorators: readonly string[]
): ClassDefinition | null {
  const nameNode = node.childForFieldName('name');
  if (!nameNode) return null;

  const body = node.childForFieldName('body');
  const superclasses = node.childForFieldName('superclasses');
  const bases = superclasses
    ? superclasses.namedChildren
        .filter((child) => child.type !== 'keyword_argument' && child.type !== 'comment')
        .map((child) => getNodeText(child, ctx.sourceCode))
    : [];

  const methods = new Map<string, FunctionDefinition>();
  const fields: SignatureParameter[] = [];
  if (body) {
    collectClassBody(body, ctx, methods, fields);
  }

  return {
    kind: 'class',
    name: getNodeText(nameNode, ctx.sourceCode),
    bases,
    docstring: extractDocstring(body, ctx),
    nameRange: getNodeRange(nameNode),
    decorators,
    methods,
    fields,
  };
}

function collectClassBody(
  block: Parser.SyntaxNode,
  ctx: TreeSitterContext,
  methods: Map<string, FunctionDefinition>,
  fields: SignatureParameter[]
): void {
  for (const node of block.namedChildren) {
    if (node.type === 'function_definition' || node.type === 'decorated_definition') {
      const definition = convertDefinition(node, ctx);
      if (definition?.kind === 'function') {
        methods.set(definition.name, definition);
      }
    } else if (node.type === 'expression_statement') {
      const field = convertField(node, ctx);
      if (field) {
        const existing = fields.findIndex((candidate) => candidate.name === field.name);
        if (existing !== -1) fields.splice(existing, 1);
        fields.push(field);
      }
    }
  }
}

/** `name: annotation [= default]` at class level. */
function convertField(statement: Parser.SyntaxNode, ctx: TreeSitterContext): SignatureParameter | null {
  const assignment = statement.namedChildren[0];
  if (assignment?.type !== 'assignment') return null;

  const left = assignment.childForFieldName('left');
  const type = assignment.childForFieldName('type');
  if (left?.type !== 'identifier' || !type) return null;

  const annotation = getNodeText(type, ctx.sourceCode);
  if (/^(?:typing\.)?ClassVar\b/.test(annotation)) return null;

  const right = assignment.childForFieldName('right');
  const defaultValue = right ? getNodeText(right, ctx.sourceCode) : null;
  return {
    name: getNodeText(left, ctx.sourceCode),
    kind: 'positional-or-keyword',
    annotation,
    defaultValue,
    hasDefault: defaultValue !== null && !isRequiredFieldCall(defaultValue),
  };
}

/** `field(...)` without `default` or `default_factory` leaves the field required. */
function isRequiredFieldCall(value: string): boolean {
  return /^(?:dataclasses\.)?field\(/.test(value) && !/\bdefault(?:_factory)?\s*=/.test(value);
}

type ParameterNodeType =
  | 'identifier'
  | 'typed_parameter'
  | 'default_parameter'
  | 'typed_default_parameter'
  | 'list_splat_pattern'
  | 'dictionary_splat_pattern'
  | 'keyword_separator'
  | 'positional_separator';

const PARAMETER_NODE_TYPES: ReadonlySet<string> = new Set<ParameterNodeType>([
  'identifier',
  'typed_parameter',
  'default_parameter',
  'typed_default_parameter',
  'list_splat_pattern',
  'dictionary_splat_pattern',
  'keyword_separator',
  'positional_separator',
]);

function isParameterNodeType(type: string): type is ParameterNodeType {
  return PARAMETER_NODE_TYPES.has(type);
}

/**
 * Converts a `parameters` node. `*` and `*args` switch later parameters to
 * keyword-only; `/` turns every earlier one positional-only.
 */
function convertParameters(node: Parser.SyntaxNode, ctx: TreeSitterContext): SignatureParameter[] {
  const parameters: SignatureParameter[] = [];
  let keywordOnly = false;

  for (const child of node.namedChildren) {
    const type = child.type;
    if (!isParameterNodeType(type)) continue;

    const regular: ParameterKind = keywordOnly ? 'keyword-only' : 'positional-or-keyword';
    switch (type) {
      case 'identifier':
        parameters.push(parameter(getNodeText(child, ctx.sourceCode), regular, null, null));
        break;
      case 'typed_parameter': {
        const inner = child.namedChildren[0];
        const annotationNode = child.childForFieldName('type');
        const annotation = annotationNode ? getNodeText(annotationNode, ctx.sourceCode) : null;
        if (!inner) break;
        if (inner.type === 'list_splat_pattern') {
          parameters.push(parameter(splatName(inner, ctx), 'variadic-positional', annotation, null));
          keywordOnly = true;
        } else if (inner.type === 'dictionary_splat_pattern') {
          parameters.push(parameter(splatName(inner, ctx), 'variadic-keyword', annotation, null));
        } else {
          parameters.push(parameter(getNodeText(inner, ctx.sourceCode), regular, annotation, null));
        }
        break;
      }
      case 'default_parameter':
      case 'typed_default_parameter': {
        const nameNode = child.childForFieldName('name');
        const annotationNode = child.childForFieldName('type');
        const valueNode = child.childForFieldName('value');
        if (!nameNode) break;
        parameters.push(
          parameter(
            getNodeText(nameNode, ctx.sourceCode),
            regular,
            annotationNode ? getNodeText(annotationNode, ctx.sourceCode) : null,
            valueNode ? getNodeText(valueNode, ctx.sourceCode) : ''
          )
        );
        break;
      }
      case 'list_splat_pattern':
        parameters.push(parameter(splatName(child, ctx), 'variadic-positional', null, null));
        keywordOnly = true;
        break;
      case 'dictionary_splat_pattern':
        parameters.push(parameter(splatName(child, ctx), 'variadic-keyword', null, null));
        break;
      case 'keyword_separator':
        keywordOnly = true;
        break;
      case 'positional_separator':
        for (let i = 0; i < parameters.length; i++) {
          if (parameters[i].kind === 'positional-or-keyword') {
            parameters[i] = { ...parameters[i], kind: 'positional-only' };
          }
        }
        break;
      default: {
        const unhandled: never = type;
        throw new Error(`Unhandled parameter node: ${String(unhandled)}`);
      }
    }
  }

  return parameters;
}

function parameter(
  name: string,
  kind: ParameterKind,
  annotation: string | null,
  defaultValue: string | null
): SignatureParameter {
  return { name, kind, annotation, defaultValue, hasDefault: defaultValue !== null };
}

function splatName(node: Parser.SyntaxNode, ctx: TreeSitterContext): string {
  return getNodeText(node, ctx.sourceCode).replace(/^\*+\s*/, '');
}

function extractDocstring(body: Parser.SyntaxNode | null, ctx: TreeSitterContext): string | null {
  const first = body?.namedChildren[0];
  if (first?.type !== 'expression_statement') return null;

  const literal = first.namedChildren[0];
  if (literal?.type !== 'string') return null;

  return cleanDocstring(getNodeText(literal, ctx.sourceCode));
}

/**
 * Strips the quotes and the indentation shared by continuation lines.
 */
export function cleanDocstring(literal: string): string | null {
  const match = /^[rRuU]?("""|'''|"|')([\s\S]*)\1$/.exec(literal);
  if (!match) return null;

  const lines = match[2].split('\n');
  const indents = lines
    .slice(1)
    .filter((line) => line.trim().length > 0)
    .map((line) => line.length - line.trimStart().length);
  const margin = indents.length > 0 ? Math.min(...indents) : 0;

  const cleaned = [lines[0].trim(), ...lines.slice(1).map((line) => line.slice(margin).trimEnd())];
  while (cleaned.length > 0 && cleaned[0] === '') cleaned.shift();
  while (cleaned.length > 0 && cleaned[cleaned.length - 1] === '') cleaned.pop();

  return cleaned.length > 0 ? cleaned.join('\n') : null;
}

function collectImport(node: Parser.SyntaxNode, ctx: TreeSitterContext, scope: ModuleScope): void {
  for (const child of node.namedChildren) {
    if (child.type === 'aliased_import') {
      const nameNode = child.childForFieldName('name');
      const aliasNode = child.childForFieldName('alias');
      if (nameNode && aliasNode) {
        bindImport(scope, getNodeText(aliasNode, ctx.sourceCode), {
          module: getNodeText(nameNode, ctx.sourceCode),
          name: null,
        });
      }
    } else if (child.type === 'dotted_name') {
      const head = getNodeText(child, ctx.sourceCode).split('.')[0];
      bindImport(scope, head, { module: head, name: null });
    }
  }
}

/**
 * from <module> import <names> | *
 */
function collectFromImport(node: Parser.SyntaxNode, ctx: TreeSitterContext, scope: ModuleScope): void {
  let moduleSpecifier = '';
  let foundImportKeyword = false;

  for (const child of node.children) {
    if (child.type === 'from') continue;
    if (child.type === 'import') {
      foundImportKeyword = true;
      continue;
    }

    if (!foundImportKeyword) {
      if (child.type === 'dotted_name' || child.type === 'relative_import') {
        moduleSpecifier = getNodeText(child, ctx.sourceCode);
      }
    } else if (child.type === 'wildcard_import') {
      scope.starImports.push(moduleSpecifier);
    } else if (child.type === 'dotted_name' || child.type === 'identifier') {
      const name = getNodeText(child, ctx.sourceCode);
      bindImport(scope, name, { module: moduleSpecifier, name });
    } else if (child.type === 'aliased_import') {
      const nameNode = child.childForFieldName('name');
      const aliasNode = child.childForFieldName('alias');
      if (nameNode && aliasNode) {
        bindImport(scope, getNodeText(aliasNode, ctx.sourceCode), {
          module: moduleSpecifier,
          name: getNodeText(nameNode, ctx.sourceCode),
        });
      }
    }
  }
}

function bindImport(scope: ModuleScope, localName: string, binding: ImportBinding): void {
  scope.definitions.delete(localName);
  scope.assignedNames.delete(localName);
  scope.imports.set(localName, binding);
}

/** `name = ...` and `a, b = ...` at module level. */
function collectAssignment(statement: Parser.SyntaxNode, ctx: TreeSitterContext, scope: ModuleScope): void {
  const assignment = statement.namedChildren[0];
  if (assignment?.type !== 'assignment') return;

  const left = assignment.childForFieldName('left');
  if (!left) return;

  const targets = left.type === 'identifier' ? [left] : left.namedChildren.filter((child) => child.type === 'identifier');
  for (const target of targets) {
    const name = getNodeText(target, ctx.sourceCode);
    scope.definitions.delete(name);
    scope.imports.delete(name);
    scope.assignedNames.add(name);
  }
}

