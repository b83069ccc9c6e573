export { SignatureProvider } from './provider.js';
export type { OpenTextLookup } from './provider.js';
export { createPythonParser, parsePythonModule, cleanDocstring } from './python-parser.js';
export { toSignature, memberSignature, formatSignature, formatParameter, formatParameterList } from './signature.js';
export type {
  ParameterKind,
  SignatureParameter,
  FunctionDefinition,
  ClassDefinition,
  PythonDefinition,
  ImportBinding,
  ParsedModule,
  Signature,
} from './types.js';
