/**
 * Call signatures derived from definitions.
 */
import type {
  ClassDefinition,
  FunctionDefinition,
  PythonDefinition,
  Signature,
  SignatureParameter,
} from './types.js';

const DATACLASS_DECORATOR = /^(?:dataclasses\.)?dataclass\b/;
const FIELD_BASED_BASES = new Set(['BaseModel', 'pydantic.BaseModel', 'NamedTuple', 'typing.NamedTuple']);

export function toSignature(definition: PythonDefinition, filePath: string): Signature {
  if (definition.kind === 'function') {
    return {
      name: definition.name,
      kind: 'function',
      parameters: definition.parameters,
      returnType: definition.returnType,
      docstring: definition.docstring,
      filePath,
      nameRange: definition.nameRange,
      implicit: false,
    };
  }
  return classSignature(definition, filePath);
}

/**
 * A class is called through `__init__` without its `self` parameter. Without
 * `__init__`, dataclass-style classes take their annotated fields; any other
 * class gets an implicit signature.
 */
function classSignature(definition: ClassDefinition, filePath: string): Signature {
  const base = {
    name: definition.name,
    kind: 'class' as const,
    returnType: null,
    filePath,
    nameRange: definition.nameRange,
  };

  const init = definition.methods.get('__init__');
  if (init) {
    return {
      ...base,
      parameters: withoutBoundParameter(init.parameters),
      docstring: definition.docstring ?? init.docstring,
      implicit: false,
    };
  }

  if (isFieldBased(definition)) {
    return { ...base, parameters: definition.fields, docstring: definition.docstring, implicit: false };
  }

  return { ...base, parameters: [], docstring: definition.docstring, implicit: true };
}

/**
 * Signature of `Owner.method` as called through the class: static methods
 * take every parameter, others lose their first (`cls` or `self`).
 */
export function memberSignature(owner: ClassDefinition, method: FunctionDefinition, filePath: string): Signature {
  const isStatic = method.decorators.some((decorator) => decorator === 'staticmethod');
  return {
    name: `${owner.name}.${method.name}`,
    kind: 'function',
    parameters: isStatic ? method.parameters : withoutBoundParameter(method.parameters),
    returnType: method.returnType,
    docstring: method.docstring,
    filePath,
    nameRange: method.nameRange,
    implicit: false,
  };
}

function withoutBoundParameter(parameters: readonly SignatureParameter[]): readonly SignatureParameter[] {
  const first = parameters[0];
  if (first && (first.kind === 'positional-or-keyword' || first.kind === 'positional-only')) {
    return parameters.slice(1);
  }
  return parameters;
}

function isFieldBased(definition: ClassDefinition): boolean {
  return (
    definition.decorators.some((decorator) => DATACLASS_DECORATOR.test(decorator)) ||
    definition.bases.some((base) => FIELD_BASED_BASES.has(base))
  );
}

/**
 * Renders a parameter the way it appears in a `def` line.
 */
export function formatParameter(parameter: SignatureParameter): string {
  const prefix =
    parameter.kind === 'variadic-positional' ? '*' : parameter.kind === 'variadic-keyword' ? '**' : '';
  const annotation = parameter.annotation ? `: ${parameter.annotation}` : '';
  const defaultValue = parameter.hasDefault
    ? parameter.annotation
      ? ` = ${parameter.defaultValue ?? ''}`
      : `=${parameter.defaultValue ?? ''}`
    : '';
  return `${prefix}${parameter.name}${annotation}${defaultValue}`;
}

/**
 * Parameter list with `/` and `*` markers restored.
 */
export function formatParameterList(parameters: readonly SignatureParameter[]): string[] {
  const parts: string[] = [];
  const hasVariadic = parameters.some((parameter) => parameter.kind === 'variadic-positional');
  let keywordMarked = false;

  parameters.forEach((parameter, index) => {
    if (parameter.kind === 'keyword-only' && !hasVariadic && !keywordMarked) {
      parts.push('*');
      keywordMarked = true;
    }
    parts.push(formatParameter(parameter));
    const next = parameters[index + 1];
    if (parameter.kind === 'positional-only' && next?.kind !== 'positional-only') {
      parts.push('/');
    }
  });

  return parts;
}

/**
 * One-line rendering: `def name(a, b=1) -> int` or `class Name(a, b=1)`.
 */
export function formatSignature(signature: Signature): string {
  const params = formatParameterList(signature.parameters).join(', ');
  if (signature.kind === 'class') {
    return `class ${signature.name}(${params})`;
  }
  const returns = signature.returnType ? ` -> ${signature.returnType}` : '';
  return `def ${signature.name}(${params})${returns}`;
}
