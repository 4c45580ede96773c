import { EnvironmentBuildError, PayloadParseError } from './errors.js';
import { mergeDeclarations, standardLibrary, type FunctionDecl, type Overload } from './functions.js';
import { isValidIdentifier } from './parser.js';
import { safeAccessors } from './safe-accessors.js';
import {
  classifyValue,
  formatKind,
  isAssignable,
  isPlainObject,
  type ValueKind,
} from './value-kind.js';

/** A caller-supplied variable, e.g. a typed object provided by the host. */
export interface VariableDeclaration {
  readonly name: string;
  readonly kind: ValueKind;
  /** When omitted, the same-named document key supplies the value. */
  readonly value?: unknown;
}

export interface VariableBinding {
  readonly name: string;
  readonly kind: ValueKind;
  /** `false` for a declaration with no value anywhere; reading it fails at run time. */
  readonly bound: boolean;
  readonly value: unknown;
}

/**
 * Variable values for one evaluation.
 *
 * Only the environment that produced an activation can be evaluated
 * against it.
 */
export class Activation {
  constructor(
    readonly environment: Environment,
    private readonly values: ReadonlyMap<string, VariableBinding>,
  ) {}

  resolve(name: string): VariableBinding | undefined {
    return this.values.get(name);
  }
}

/**
 * Declared variables and functions visible to one expression.
 *
 * Built from scratch for every evaluation: each event document may
 * expose a different key set with different kinds.
 */
export class Environment {
  private readonly overloadIndex: Map<string, Overload> = new Map();

  constructor(
    readonly variables: ReadonlyMap<string, VariableBinding>,
    readonly functions: ReadonlyMap<string, FunctionDecl>,
  ) {
    for (const fn of functions.values()) {
      for (const o of fn.overloads) this.overloadIndex.set(o.id, o);
    }
  }

  findOverload(id: string): Overload | undefined {
    return this.overloadIndex.get(id);
  }

  /** Variable names and kinds, sorted by name: `age:double,user:string`. */
  signature(): string {
    return [...this.variables.values()]
      .map((binding) => `${binding.name}:${formatKind(binding.kind)}`)
      .sort()
      .join(',');
  }

  activation(): Activation {
    return new Activation(this, this.variables);
  }
}

/**
 * Decodes the raw document into its top-level mapping.
 * Anything but a JSON object is rejected.
 */
export function parseDocument(raw: string): Record<string, unknown> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err: unknown) {
    throw new PayloadParseError('cannot unmarshal data', { reason: errorMessage(err) }, { cause: err });
  }
  if (!isPlainObject(decoded)) {
    throw new PayloadParseError('cannot unmarshal data', { reason: 'document is not a JSON object' });
  }
  return decoded;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Assembles the environment for one document.
 *
 * 1. decode the document's top-level mapping
 * 2. one binding per top-level key that is a usable identifier
 * 3. standard library plus `exists`/`safe` bound to the raw text
 * 4. caller declarations, which win on name collision
 */
export function buildEnvironment(
  raw: string,
  declarations: readonly VariableDeclaration[] = [],
): Environment {
  const document = parseDocument(raw);
  const variables = new Map<string, VariableBinding>();

  for (const [name, value] of Object.entries(document)) {
    // keys like "user-agent" stay reachable through exists()/safe()
    if (!isValidIdentifier(name)) continue;
    variables.set(name, { name, kind: classifyValue(value), bound: true, value });
  }

  const functions = mergeDeclarations([...standardLibrary(), ...safeAccessors(raw)]);

  const seen = new Set<string>();
  for (const decl of declarations) {
    variables.set(decl.name, resolveDeclaration(decl, document, functions, seen));
  }

  return new Environment(variables, functions);
}

function resolveDeclaration(
  decl: VariableDeclaration,
  document: Record<string, unknown>,
  functions: ReadonlyMap<string, FunctionDecl>,
  seen: Set<string>,
): VariableBinding {
  const fail = (message: string): never => {
    throw new EnvironmentBuildError(message, { declaration: decl.name, kind: formatKind(decl.kind) });
  };

  if (!isValidIdentifier(decl.name)) fail(`invalid variable name '${decl.name}'`);
  if (seen.has(decl.name)) fail(`variable '${decl.name}' declared more than once`);
  if (functions.has(decl.name)) fail(`variable '${decl.name}' collides with a function of the same name`);
  seen.add(decl.name);

  let value: unknown;
  let bound: boolean;
  if ('value' in decl) {
    value = decl.value;
    bound = true;
  } else if (Object.prototype.hasOwnProperty.call(document, decl.name)) {
    value = document[decl.name];
    bound = true;
  } else {
    value = undefined;
    bound = false;
  }

  if (bound) {
    const actual = classifyValue(value);
    if (!isAssignable(decl.kind, actual)) {
      fail(`variable '${decl.name}' declared as ${formatKind(decl.kind)} but its value is ${formatKind(actual)}`);
    }
  }

  return { name: decl.name, kind: decl.kind, bound, value };
}
