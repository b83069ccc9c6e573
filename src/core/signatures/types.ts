/**
 * Python definitions and call signatures.
 */
import type { TextRange } from '../text/range.js';

export type ParameterKind =
  | 'positional-only'
  | 'positional-or-keyword'
  | 'variadic-positional'
  | 'keyword-only'
  | 'variadic-keyword';

export interface SignatureParameter {
  readonly name: string;
  readonly kind: ParameterKind;
  /** Annotation source text, display only. */
  readonly annotation: string | null;
  /** Default value source text, never evaluated. */
  readonly defaultValue: string | null;
  readonly hasDefault: boolean;
}

export interface FunctionDefinition {
  readonly kind: 'function';
  readonly name: string;
  readonly parameters: readonly SignatureParameter[];
  readonly returnType: string | null;
  readonly docstring: string | null;
  readonly nameRange: TextRange;
  /** Decorator expressions without the leading `@`. */
  readonly decorators: readonly string[];
  readonly isAsync: boolean;
}

export interface ClassDefinition {
  readonly kind: 'class';
  readonly name: string;
  readonly bases: readonly string[];
  readonly docstring: string | null;
  readonly nameRange: TextRange;
  readonly decorators: readonly string[];
  readonly methods: ReadonlyMap<string, FunctionDefinition>;
  /** Annotated class-level assignments, in order, for dataclass-style classes. */
  readonly fields: readonly SignatureParameter[];
}

export type PythonDefinition = FunctionDefinition | ClassDefinition;

/**
 * A name bound by an import statement. `name` is null for `import a.b as c`,
 * which binds the module itself.
 */
export interface ImportBinding {
  readonly module: string;
  readonly name: string | null;
}

export type ParsedModule =
  | {
      readonly status: 'parsed';
      readonly filePath: string;
      readonly definitions: ReadonlyMap<string, PythonDefinition>;
      readonly imports: ReadonlyMap<string, ImportBinding>;
      /** Modules pulled in with `from x import *`. */
      readonly starImports: readonly string[];
      /** Names bound by plain assignment, whose value is not analysed. */
      readonly assignedNames: ReadonlySet<string>;
    }
  | {
      readonly status: 'parse-error';
      readonly filePath: string;
      readonly message: string;
      readonly range: TextRange | null;
    };

/**
 * What a target can be called with.
 */
export interface Signature {
  readonly name: string;
  readonly kind: 'function' | 'class';
  readonly parameters: readonly SignatureParameter[];
  readonly returnType: string | null;
  readonly docstring: string | null;
  readonly filePath: string;
  readonly nameRange: TextRange;
  /**
   * True for a class whose constructor parameters are unknown (no `__init__`
   * and no dataclass fields). Parameters are not checked against it.
   */
  readonly implicit: boolean;
}
