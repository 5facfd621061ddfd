/**
 * Lexical scoping environment for the Sprig interpreter.
 *
 * Each environment holds a map of bindings and a reference to its
 * parent scope. Parents only ever point outward toward the global
 * root, so the scope graph is a tree.
 *
 * Every definition is stamped from a clock shared by the whole tree.
 * A closure records the clock when it is created and its call frames
 * see the enclosing scopes as of that moment: rebinding a name with
 * `let` afterwards does not change what an existing closure sees.
 * A name that did not exist yet when the closure was made resolves to
 * its current binding, which is what makes self- and forward
 * references between top-level procedures work.
 *
 * Older bindings stay in a name's history for the life of the scope.
 */

import { Value } from './values';
import { UndefinedVariableError } from './errors';

interface Binding {
  value: Value;
  stamp: number;
}

interface Clock {
  now: number;
  /** Latest stamp any closure has captured. */
  lastCapture: number;
}

export class Environment {
  private vars: Map<string, Binding[]>;
  private parent: Environment | null;
  /** Parent bindings stamped after this are invisible from here. */
  private horizon: number;
  private clock: Clock;

  constructor(parent: Environment | null = null, horizon = Infinity) {
    this.vars = new Map();
    this.parent = parent;
    this.horizon = horizon;
    this.clock = parent !== null ? parent.clock : { now: 0, lastCapture: -1 };
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  lookup(name: string, asOf = Infinity): Value {
    const history = this.vars.get(name);
    if (history !== undefined) {
      return visibleBinding(history, asOf).value;
    }
    if (this.parent !== null) {
      return this.parent.lookup(name, Math.min(asOf, this.horizon));
    }
    throw new UndefinedVariableError(name);
  }

  /**
   * Check if a variable is defined in this environment or any parent.
   */
  has(name: string): boolean {
    if (this.vars.has(name)) return true;
    if (this.parent !== null) return this.parent.has(name);
    return false;
  }

  /**
   * Bind `name` in this scope only. Closures that captured before this
   * call keep seeing the previous binding.
   */
  define(name: string, value: Value): void {
    const stamp = ++this.clock.now;
    const history = this.vars.get(name);
    if (history === undefined) {
      this.vars.set(name, [{ value, stamp }]);
      return;
    }
    const latest = history[history.length - 1];
    if (latest.stamp > this.clock.lastCapture) {
      // No closure can have seen the current binding; replace it.
      latest.value = value;
      latest.stamp = stamp;
    } else {
      history.push({ value, stamp });
    }
  }

  /**
   * Overwrite the nearest existing binding of `name`. Never creates one.
   */
  assign(name: string, value: Value, asOf = Infinity): void {
    const history = this.vars.get(name);
    if (history !== undefined) {
      visibleBinding(history, asOf).value = value;
      return;
    }
    if (this.parent !== null) {
      this.parent.assign(name, value, Math.min(asOf, this.horizon));
      return;
    }
    throw new UndefinedVariableError(name);
  }

  /**
   * Record that a closure is being created over this scope and return
   * the stamp its call frames should use as their horizon.
   */
  capture(): number {
    this.clock.lastCapture = this.clock.now;
    return this.clock.now;
  }

  /**
   * Current bindings held directly by this scope, in insertion order.
   */
  *entries(): IterableIterator<[string, Value]> {
    for (const [name, history] of this.vars) {
      yield [name, history[history.length - 1].value];
    }
  }

  getParent(): Environment | null {
    return this.parent;
  }

  /**
   * Create a child scope that sees this one as of `horizon`.
   */
  child(horizon = Infinity): Environment {
    return new Environment(this, horizon);
  }
}

function visibleBinding(history: Binding[], asOf: number): Binding {
  for (let i = history.length - 1; i >= 0; i--) {
    if (history[i].stamp <= asOf) return history[i];
  }
  // Defined after the capture point: a forward reference.
  return history[history.length - 1];
}
