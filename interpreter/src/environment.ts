/**
 * Lexical scoping environment for the Sprig interpreter.
 *
 * Each environment holds a map of bindings and a reference to its parent
 * scope. Environments are shared by reference: every closure created in a
 * scope holds that same scope, so a binding made later through `set` is
 * seen by all of them. A function bound in the scope it captured forms a
 * cycle; nothing here walks bound values, so the cycle is harmless.
 */

import { SprigValue } from './values';

export class Environment {
  private vars: Map<string, SprigValue>;
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.vars = new Map();
    this.parent = parent;
  }

  /**
   * Look up a name, walking outward through the parent chain.
   * Returns undefined when no scope binds it.
   */
  get(name: string): SprigValue | undefined {
    for (let env: Environment | null = this; env !== null; env = env.parent) {
      const value = env.vars.get(name);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  /**
   * Check if a name is bound in this environment or any parent.
   */
  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Bind a name in this scope, overwriting a local binding or shadowing an
   * outer one. Outer scopes are never modified.
   */
  set(name: string, value: SprigValue): SprigValue {
    this.vars.set(name, value);
    return value;
  }

  /**
   * Names bound directly in this scope, in binding order.
   */
  localNames(): string[] {
    return [...this.vars.keys()];
  }

  /**
   * Create a child scope.
   */
  child(): Environment {
    return new Environment(this);
  }
}
