import type { Value } from "./ast.js";
import type { RuntimeFailure } from "./errors.js";
import { fail, ok, type Result } from "./result.js";
import type { Token } from "./token.js";

/** Index of a scope inside an `Environment` arena. */
export type Scope = number;

type Frame = {
  values: Map<string, Value>;
  parent?: Scope;
};

const undefinedVariable = (name: Token): RuntimeFailure => ({
  token: name,
  message: `Undefined variable '${name.lexeme}'.`,
});

/**
 * Arena of variable scopes. Scope 0 is the global one and lives as long as
 * the arena; every other scope is opened on block entry and closed on exit,
 * so live scopes always form a stack.
 */
export class Environment {
  private frames: Frame[] = [{ values: new Map() }];

  public readonly global: Scope = 0;

  /** Opens a child of `parent` and returns its handle. */
  public enterScope = (parent: Scope): Scope => {
    this.frames.push({ values: new Map(), parent });
    return this.frames.length - 1;
  };

  /** Closes `scope` and every scope opened after it. */
  public exitScope = (scope: Scope): void => {
    if (scope === this.global) return;
    this.frames.length = Math.min(this.frames.length, scope);
  };

  public get depth(): number {
    return this.frames.length;
  }

  // redeclaring in the same scope replaces the binding
  public define = (scope: Scope, name: string, value: Value): void => {
    this.frames[scope].values.set(name, value);
  };

  public get = (scope: Scope, name: Token): Result<Value, RuntimeFailure> => {
    const owner = this.resolve(scope, name.lexeme);
    if (owner === undefined) return fail(undefinedVariable(name));
    // resolve() only returns frames that hold the name
    return ok(this.frames[owner].values.get(name.lexeme) ?? null);
  };

  /** Rebinds the nearest existing `name`; never creates one. */
  public assign = (
    scope: Scope,
    name: Token,
    value: Value,
  ): Result<Value, RuntimeFailure> => {
    const owner = this.resolve(scope, name.lexeme);
    if (owner === undefined) return fail(undefinedVariable(name));
    this.frames[owner].values.set(name.lexeme, value);
    return ok(value);
  };

  private resolve = (scope: Scope, name: string): Scope | undefined => {
    let cursor: Scope | undefined = scope;
    while (cursor !== undefined) {
      const frame: Frame = this.frames[cursor];
      if (frame.values.has(name)) return cursor;
      cursor = frame.parent;
    }
    return undefined;
  };
}
