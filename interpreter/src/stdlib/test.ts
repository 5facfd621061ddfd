/**
 * Standard library: assertions for writing Sprig test programs.
 */

import { Environment } from '../environment';
import { Value, mkBuiltin, mkNil, valueToRepr, valuesEqual } from '../values';
import { AssertionFailedError, WrongNumArgsError } from '../errors';

function message(args: Value[], index: number, fallback: string): string {
  const v = args[index];
  return v !== undefined && v.kind === 'string' ? v.value : fallback;
}

/**
 * Register all test builtins into the given environment.
 */
export function registerTestBuiltins(env: Environment): void {
  // ---- (assert condition [message]) ----

  env.define('assert', mkBuiltin('assert', (args: Value[]): Value => {
    if (args.length < 1 || args.length > 2) {
      throw new WrongNumArgsError(`assert expects 1 or 2 arguments, but got ${args.length}`);
    }
    const cond = args[0];
    if (cond.kind !== 'boolean' || !cond.value) {
      throw new AssertionFailedError(message(args, 1, `expected true, got ${valueToRepr(cond)}`));
    }
    return mkNil();
  }));

  // ---- (assert-equal actual expected [message]) ----

  env.define('assert-equal', mkBuiltin('assert-equal', (args: Value[]): Value => {
    if (args.length < 2 || args.length > 3) {
      throw new WrongNumArgsError(`assert-equal expects 2 or 3 arguments, but got ${args.length}`);
    }
    const [actual, expected] = args;
    if (!valuesEqual(actual, expected)) {
      throw new AssertionFailedError(
        message(args, 2, `expected ${valueToRepr(expected)}, got ${valueToRepr(actual)}`),
      );
    }
    return mkNil();
  }));
}
