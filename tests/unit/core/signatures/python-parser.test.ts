/**
 * Tests for the Python definition parser.
 */
import { describe, it, expect, beforeAll } from 'vitest';
import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type Parser from 'tree-sitter';
import {
  cleanDocstring,
  createPythonParser,
  parsePythonModule,
} from '../../../../src/core/signatures/python-parser.js';
import type { ParsedModule, PythonDefinition } from '../../../../src/core/signatures/types.js';

const PKG = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../fixtures/workspace/pkg');

let parser: Parser;

beforeAll(() => {
  parser = createPythonParser();
});

function parse(source: string, filePath = '/ws/mod.py'): ParsedModule {
  return parsePythonModule(parser, source, filePath);
}

function definitionOf(module: ParsedModule, name: string): PythonDefinition | undefined {
  return module.status === 'parsed' ? module.definitions.get(name) : undefined;
}

describe('parsePythonModule', () => {
  describe('functions', () => {
    it('should read parameter kinds, annotations and defaults', () => {
      const module = parse('def f(a, b: int, c=1, d: str = "x", *args, e, f=2, **kwargs) -> bool:\n    pass\n');
      const f = definitionOf(module, 'f');

      expect(f?.kind).toBe('function');
      if (f?.kind !== 'function') return;
      expect(f.parameters).toEqual([
        { name: 'a', kind: 'positional-or-keyword', annotation: null, defaultValue: null, hasDefault: false },
        { name: 'b', kind: 'positional-or-keyword', annotation: 'int', defaultValue: null, hasDefault: false },
        { name: 'c', kind: 'positional-or-keyword', annotation: null, defaultValue: '1', hasDefault: true },
        { name: 'd', kind: 'positional-or-keyword', annotation: 'str', defaultValue: '"x"', hasDefault: true },
        { name: 'args', kind: 'variadic-positional', annotation: null, defaultValue: null, hasDefault: false },
        { name: 'e', kind: 'keyword-only', annotation: null, defaultValue: null, hasDefault: false },
        { name: 'f', kind: 'keyword-only', annotation: null, defaultValue: '2', hasDefault: true },
        { name: 'kwargs', kind: 'variadic-keyword', annotation: null, defaultValue: null, hasDefault: false },
      ]);
      expect(f.returnType).toBe('bool');
    });

    it('should mark parameters before a slash positional-only', () => {
      const f = definitionOf(parse('def f(a, b, /, c, *, d):\n    pass\n'), 'f');

      if (f?.kind !== 'function') throw new Error('expected a function');
      expect(f.parameters.map((p) => [p.name, p.kind])).toEqual([
        ['a', 'positional-only'],
        ['b', 'positional-only'],
        ['c', 'positional-or-keyword'],
        ['d', 'keyword-only'],
      ]);
    });

    it('should keep default source text without evaluating it', () => {
      const f = definitionOf(parse('def f(x=os.environ["HOME"], y=[1, 2]):\n    pass\n'), 'f');

      if (f?.kind !== 'function') throw new Error('expected a function');
      expect(f.parameters.map((p) => p.defaultValue)).toEqual(['os.environ["HOME"]', '[1, 2]']);
    });

    it('should record decorators, async and the docstring', () => {
      const source = ['@cache', '@register("x")', 'async def load(path):', '    """Load it."""', '    pass', ''].join('\n');
      const load = definitionOf(parse(source), 'load');

      if (load?.kind !== 'function') throw new Error('expected a function');
      expect(load.decorators).toEqual(['cache', 'register("x")']);
      expect(load.isAsync).toBe(true);
      expect(load.docstring).toBe('Load it.');
    });

    it('should record the range of the name', () => {
      const f = definitionOf(parse('\n\ndef target(a):\n    pass\n'), 'target');

      expect(f?.nameRange).toEqual({ start: { line: 2, character: 4 }, end: { line: 2, character: 10 } });
    });
  });

  describe('module scope', () => {
    it('should see definitions inside top-level if, try and with blocks', () => {
      const source = [
        'if True:',
        '    def a(): pass',
        'try:',
        '    def b(): pass',
        'except ImportError:',
        '    def c(): pass',
        'with ctx():',
        '    class D: pass',
        '',
      ].join('\n');
      const module = parse(source);

      expect(module.status === 'parsed' ? [...module.definitions.keys()] : []).toEqual(['a', 'b', 'c', 'D']);
    });

    it('should not collect nested functions', () => {
      const module = parse('def outer():\n    def inner(): pass\n    return inner\n');

      expect(module.status === 'parsed' ? [...module.definitions.keys()] : []).toEqual(['outer']);
    });

    it('should let the last definition of a name win', () => {
      const module = parse('def f(a): pass\n\ndef f(a, b): pass\n');
      const f = definitionOf(module, 'f');

      if (f?.kind !== 'function') throw new Error('expected a function');
      expect(f.parameters.map((p) => p.name)).toEqual(['a', 'b']);
    });

    it('should record imports and let an assignment rebind a definition', () => {
      const source = [
        'import numpy as np',
        'import os.path',
        'from .models import Net, Plain as Base',
        'from ..core import *',
        'def helper(): pass',
        'helper = np.vectorize(helper)',
        '',
      ].join('\n');
      const module = parse(source);

      if (module.status !== 'parsed') throw new Error('expected a parsed module');
      expect(Object.fromEntries(module.imports)).toEqual({
        np: { module: 'numpy', name: null },
        os: { module: 'os', name: null },
        Net: { module: '.models', name: 'Net' },
        Base: { module: '.models', name: 'Plain' },
      });
      expect(module.starImports).toEqual(['..core']);
      expect(module.definitions.has('helper')).toBe(false);
      expect(module.assignedNames.has('helper')).toBe(true);
    });
  });

  describe('classes', () => {
    const models = readFileSync(path.join(PKG, 'models.py'), 'utf-8');

    it('should collect bases, methods and the cleaned docstring', () => {
      const net = definitionOf(parse(models, path.join(PKG, 'models.py')), 'Net');

      if (net?.kind !== 'class') throw new Error('expected a class');
      expect(net.bases).toEqual([]);
      expect([...net.methods.keys()]).toEqual(['__init__', 'from_size', 'describe']);
      expect(net.methods.get('describe')?.decorators).toEqual(['staticmethod']);
      expect(net.docstring).toBe('A small network.\n\nStacks linear layers.');
      expect(net.nameRange).toEqual({ start: { line: 5, character: 6 }, end: { line: 5, character: 9 } });
    });

    it('should collect annotated fields and skip class variables', () => {
      const config = definitionOf(parse(models), 'TrainerConfig');

      if (config?.kind !== 'class') throw new Error('expected a class');
      expect(config.decorators).toEqual(['dataclass']);
      expect(config.fields.map((f) => [f.name, f.hasDefault])).toEqual([
        ['epochs', false],
        ['seed', false],
        ['lr', true],
        ['tags', true],
      ]);
    });

    it('should read base class expressions', () => {
      const cls = definitionOf(parse('class A(Base, mixins.Log, metaclass=Meta):\n    pass\n'), 'A');

      if (cls?.kind !== 'class') throw new Error('expected a class');
      expect(cls.bases).toEqual(['Base', 'mixins.Log']);
    });
  });

  describe('fixture module', () => {
    it('should let the final top-level speedup replace the fallback and the import', () => {
      const module = parse(readFileSync(path.join(PKG, 'models.py'), 'utf-8'));

      if (module.status !== 'parsed') throw new Error('expected a parsed module');
      const speedup = module.definitions.get('speedup');
      if (speedup?.kind !== 'function') throw new Error('expected a function');
      expect(speedup.parameters.map((p) => p.name)).toEqual(['x', 'factor']);
      expect(module.imports.has('speedup')).toBe(false);
      expect(module.assignedNames.has('factory')).toBe(true);
    });
  });

  describe('syntax errors', () => {
    it('should accept a module without errors', () => {
      expect(parse('def f(a, *, b=1):\n    return a\n', '/ws/ok.py').status).toBe('parsed');
    });

    it('should report a parse error with the line of the first problem', () => {
      const source = readFileSync(path.join(PKG, 'broken.py'), 'utf-8');
      const module = parse(source, '/ws/broken.py');

      expect(module.status).toBe('parse-error');
      if (module.status !== 'parse-error') return;
      expect(module.filePath).toBe('/ws/broken.py');
      expect(module.message).toMatch(/^(?:Syntax error|Missing '.+') at line \d+$/);
      expect(module.range).not.toBeNull();
    });

    it('should accept an empty file', () => {
      const module = parse('');

      expect(module.status).toBe('parsed');
      expect(module.status === 'parsed' ? module.definitions.size : -1).toBe(0);
    });
  });
});

describe('cleanDocstring', () => {
  it('should strip quotes and the shared indentation', () => {
    expect(cleanDocstring('"""Summary.\n\n    Details here.\n      Indented.\n    """')).toBe(
      'Summary.\n\nDetails here.\n  Indented.'
    );
  });

  it('should accept single quotes and string prefixes', () => {
    expect(cleanDocstring("'one line'")).toBe('one line');
    expect(cleanDocstring('r"""raw \\d"""')).toBe('raw \\d');
  });

  it('should return null for an empty docstring', () => {
    expect(cleanDocstring('""""""')).toBeNull();
    expect(cleanDocstring('"""   """')).toBeNull();
  });
});
