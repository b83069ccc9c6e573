/**
 * Tests for signature derivation and formatting.
 */
import { describe, it, expect } from 'vitest';
import {
  formatParameter,
  formatParameterList,
  formatSignature,
  memberSignature,
  toSignature,
} from '../../../../src/core/signatures/signature.js';
import type {
  ClassDefinition,
  FunctionDefinition,
  ParameterKind,
  SignatureParameter,
} from '../../../../src/core/signatures/types.js';

const RANGE = { start: { line: 0, character: 0 }, end: { line: 0, character: 1 } };

function param(name: string, kind: ParameterKind = 'positional-or-keyword', defaultValue: string | null = null, annotation: string | null = null): SignatureParameter {
  return { name, kind, annotation, defaultValue, hasDefault: defaultValue !== null };
}

function fn(name: string, parameters: SignatureParameter[], extra: Partial<FunctionDefinition> = {}): FunctionDefinition {
  return {
    kind: 'function',
    name,
    parameters,
    returnType: null,
    docstring: null,
    nameRange: RANGE,
    decorators: [],
    isAsync: false,
    ...extra,
  };
}

function cls(name: string, extra: Partial<ClassDefinition> = {}): ClassDefinition {
  return {
    kind: 'class',
    name,
    bases: [],
    docstring: null,
    nameRange: RANGE,
    decorators: [],
    methods: new Map(),
    fields: [],
    ...extra,
  };
}

describe('toSignature', () => {
  it('should pass function parameters through', () => {
    const signature = toSignature(fn('build', [param('name')], { returnType: 'Net', docstring: 'Build.' }), '/ws/m.py');

    expect(signature).toEqual({
      name: 'build',
      kind: 'function',
      parameters: [param('name')],
      returnType: 'Net',
      docstring: 'Build.',
      filePath: '/ws/m.py',
      nameRange: RANGE,
      implicit: false,
    });
  });

  it('should use __init__ without self for a class', () => {
    const init = fn('__init__', [param('self'), param('hidden'), param('dropout', 'positional-or-keyword', '0.1')]);
    const signature = toSignature(cls('Net', { methods: new Map([['__init__', init]]) }), '/ws/m.py');

    expect(signature.kind).toBe('class');
    expect(signature.implicit).toBe(false);
    expect(signature.parameters.map((p) => p.name)).toEqual(['hidden', 'dropout']);
  });

  it('should fall back to the __init__ docstring', () => {
    const init = fn('__init__', [param('self')], { docstring: 'Init docs.' });
    const signature = toSignature(cls('Net', { methods: new Map([['__init__', init]]) }), '/ws/m.py');

    expect(signature.docstring).toBe('Init docs.');
  });

  it('should give a class without __init__ an implicit signature', () => {
    const signature = toSignature(cls('Plain', { fields: [param('ignored')] }), '/ws/m.py');

    expect(signature.implicit).toBe(true);
    expect(signature.parameters).toEqual([]);
  });

  it('should use fields of dataclasses and models', () => {
    const fields = [param('epochs'), param('lr', 'positional-or-keyword', '0.01')];

    expect(toSignature(cls('A', { decorators: ['dataclass(frozen=True)'], fields }), '/m.py').parameters).toEqual(fields);
    expect(toSignature(cls('B', { bases: ['BaseModel'], fields }), '/m.py').parameters).toEqual(fields);
    expect(toSignature(cls('C', { bases: ['typing.NamedTuple'], fields }), '/m.py').implicit).toBe(false);
  });
});

describe('memberSignature', () => {
  const owner = cls('Net');

  it('should drop cls from a class method', () => {
    const method = fn('from_size', [param('cls'), param('size')], { decorators: ['classmethod'] });

    const signature = memberSignature(owner, method, '/m.py');
    expect(signature.name).toBe('Net.from_size');
    expect(signature.parameters.map((p) => p.name)).toEqual(['size']);
  });

  it('should keep every parameter of a static method', () => {
    const method = fn('describe', [param('name')], { decorators: ['staticmethod'] });

    expect(memberSignature(owner, method, '/m.py').parameters.map((p) => p.name)).toEqual(['name']);
  });
});

describe('formatParameter', () => {
  it('should format defaults with and without annotations', () => {
    expect(formatParameter(param('x'))).toBe('x');
    expect(formatParameter(param('x', 'positional-or-keyword', '1'))).toBe('x=1');
    expect(formatParameter(param('x', 'positional-or-keyword', '1', 'int'))).toBe('x: int = 1');
    expect(formatParameter(param('args', 'variadic-positional'))).toBe('*args');
    expect(formatParameter(param('kw', 'variadic-keyword', null, 'Any'))).toBe('**kw: Any');
  });
});

describe('formatParameterList', () => {
  it('should restore slash and star markers', () => {
    const parts = formatParameterList([
      param('a', 'positional-only'),
      param('b'),
      param('c', 'keyword-only', 'None'),
    ]);

    expect(parts).toEqual(['a', '/', 'b', '*', 'c=None']);
  });

  it('should not add a star after *args', () => {
    const parts = formatParameterList([param('args', 'variadic-positional'), param('pad', 'keyword-only')]);

    expect(parts).toEqual(['*args', 'pad']);
  });
});

describe('formatSignature', () => {
  it('should render functions with their return type', () => {
    const signature = toSignature(fn('build', [param('name', 'positional-only')], { returnType: 'Net' }), '/m.py');

    expect(formatSignature(signature)).toBe('def build(name, /) -> Net');
  });

  it('should render classes without a return type', () => {
    const init = fn('__init__', [param('self'), param('hidden', 'positional-or-keyword', null, 'int')]);
    const signature = toSignature(cls('Net', { methods: new Map([['__init__', init]]) }), '/m.py');

    expect(formatSignature(signature)).toBe('class Net(hidden: int)');
  });
});
