/**
 * Follows a dotted target path to a signature: module lookup, then the
 * symbol inside it, following re-exports through imports where needed.
 */
import type { Environment } from '../environment/environment.js';
import type { ModuleResolver } from '../resolution/resolver.js';
import type { SignatureProvider } from '../signatures/provider.js';
import { memberSignature, toSignature } from '../signatures/signature.js';
import { parseTargetPath } from '../targets/target-path.js';
import type { TargetOutcome } from '../diagnostics/types.js';

/** How many re-export hops are followed before giving up. */
const MAX_IMPORT_DEPTH = 4;

interface ModuleOrigin {
  readonly modulePath: string;
  readonly isPackage: boolean;
}

export class TargetResolver {
  constructor(
    private readonly modules: ModuleResolver,
    private readonly signatures: SignatureProvider
  ) {}

  /**
   * Resolves `pkg.module.Symbol`. When `pkg.module` names no module,
   * `pkg.Class.method` style paths are tried as a class member; the first
   * lookup's outcome stands unless that finds one.
   */
  async resolve(targetPath: string, environment: Environment): Promise<TargetOutcome> {
    const parsed = parseTargetPath(targetPath);
    if (!parsed.ok) {
      return { kind: 'malformed', reason: parsed.reason };
    }

    const primary = await this.lookup(parsed.modulePath, [parsed.symbol], environment, 0);
    if (primary.kind !== 'module-not-found' || parsed.segments.length < 3) {
      return primary;
    }

    const member = await this.lookup(
      parsed.segments.slice(0, -2).join('.'),
      parsed.segments.slice(-2),
      environment,
      0
    );
    return member.kind === 'resolved' ? member : primary;
  }

  private async lookup(
    modulePath: string,
    names: readonly string[],
    environment: Environment,
    depth: number
  ): Promise<TargetOutcome> {
    const module = await this.modules.resolve(modulePath, environment);
    if (module.layer === 'unresolved') {
      return { kind: 'module-not-found', modulePath, searched: module.searched };
    }

    const parsed = await this.signatures.load(module.filePath);
    if (parsed.status === 'parse-error') {
      return { kind: 'parse-error', modulePath, filePath: module.filePath, message: parsed.message };
    }

    const name = names[0];
    const member = names.length > 1 ? names[1] : undefined;
    const symbol = names.join('.');
    const definition = parsed.definitions.get(name);

    if (definition) {
      if (member === undefined) {
        return { kind: 'resolved', signature: toSignature(definition, module.filePath), layer: module.layer };
      }
      const method = definition.kind === 'class' ? definition.methods.get(member) : undefined;
      if (definition.kind === 'class' && method) {
        return {
          kind: 'resolved',
          signature: memberSignature(definition, method, module.filePath),
          layer: module.layer,
        };
      }
      return { kind: 'symbol-not-found', modulePath, symbol, filePath: module.filePath };
    }

    const unverifiable: TargetOutcome = { kind: 'unverifiable', modulePath, symbol, filePath: module.filePath };
    if (parsed.assignedNames.has(name)) {
      return unverifiable;
    }

    const binding = parsed.imports.get(name);
    if (binding) {
      if (depth >= MAX_IMPORT_DEPTH) return unverifiable;
      const source = absoluteModule(binding.module, module);
      if (source === null) return unverifiable;

      const rest = names.slice(1);
      const followed =
        binding.name === null
          ? rest.length > 0
            ? await this.lookup(source, rest, environment, depth + 1)
            : unverifiable
          : await this.followNamedImport(source, binding.name, rest, environment, depth + 1);
      return followed.kind === 'resolved' ? followed : unverifiable;
    }

    if (parsed.starImports.length > 0) {
      if (depth >= MAX_IMPORT_DEPTH) return unverifiable;
      for (const specifier of parsed.starImports) {
        const source = absoluteModule(specifier, module);
        if (source === null) continue;
        const followed = await this.lookup(source, names, environment, depth + 1);
        if (followed.kind === 'resolved') return followed;
      }
      return unverifiable;
    }

    return { kind: 'symbol-not-found', modulePath, symbol, filePath: module.filePath };
  }

  /**
   * `from source import name`: `name` is a definition in `source`, or a
   * submodule of it.
   */
  private async followNamedImport(
    source: string,
    name: string,
    rest: readonly string[],
    environment: Environment,
    depth: number
  ): Promise<TargetOutcome> {
    const asSymbol = await this.lookup(source, [name, ...rest], environment, depth);
    if (asSymbol.kind === 'resolved' || rest.length === 0) {
      return asSymbol;
    }
    return this.lookup(`${source}.${name}`, rest, environment, depth);
  }
}

/**
 * Turns a possibly relative import specifier into an absolute module path.
 * Returns null when the dots climb above the top-level package.
 */
export function absoluteModule(specifier: string, origin: ModuleOrigin): string | null {
  const dots = specifier.length - specifier.replace(/^\.+/, '').length;
  if (dots === 0) {
    return specifier;
  }

  const parts = origin.modulePath.split('.');
  const packageParts = origin.isPackage ? parts : parts.slice(0, -1);
  const climb = dots - 1;
  if (climb > packageParts.length) {
    return null;
  }

  const anchor = packageParts.slice(0, packageParts.length - climb);
  const rest = specifier.slice(dots);
  const joined = [...anchor, ...(rest ? rest.split('.') : [])].join('.');
  return joined.length > 0 ? joined : null;
}
