/**
 * Standard library: math functions for the Sprig language.
 *
 * Rounding, roots, powers and min/max on top of the core arithmetic
 * builtins, plus the PI constant.
 */

import { Environment } from '../environment';
import { Value, mkBuiltin, mkNumber } from '../values';
import { DivisionByZeroError, SprigTypeError } from '../errors';
import { checkArity, checkMinArity, expectNumber } from '../builtins';

function unary(name: string, op: (n: number) => number): Value {
  return mkBuiltin(name, (args: Value[]): Value => {
    checkArity(name, args, 1);
    return mkNumber(op(expectNumber(name, args[0])));
  });
}

/**
 * Register all math builtins into the given environment.
 */
export function registerMathBuiltins(env: Environment): void {
  env.define('PI', mkNumber(Math.PI));

  env.define('abs', unary('abs', Math.abs));
  env.define('floor', unary('floor', Math.floor));
  env.define('ceil', unary('ceil', Math.ceil));
  env.define('round', unary('round', Math.round));

  env.define('sqrt', mkBuiltin('sqrt', (args: Value[]): Value => {
    checkArity('sqrt', args, 1);
    const n = expectNumber('sqrt', args[0]);
    if (n < 0) throw new SprigTypeError('sqrt expects a non-negative number');
    return mkNumber(Math.sqrt(n));
  }));

  env.define('pow', mkBuiltin('pow', (args: Value[]): Value => {
    checkArity('pow', args, 2);
    return mkNumber(Math.pow(expectNumber('pow', args[0]), expectNumber('pow', args[1])));
  }));

  // Result takes the sign of the divisor, so (mod -1 3) is 2.
  env.define('mod', mkBuiltin('mod', (args: Value[]): Value => {
    checkArity('mod', args, 2);
    const a = expectNumber('mod', args[0]);
    const b = expectNumber('mod', args[1]);
    if (b === 0) throw new DivisionByZeroError();
    return mkNumber(((a % b) + b) % b);
  }));

  env.define('min', mkBuiltin('min', (args: Value[]): Value => {
    checkMinArity('min', args, 1);
    return mkNumber(Math.min(...args.map(a => expectNumber('min', a))));
  }));

  env.define('max', mkBuiltin('max', (args: Value[]): Value => {
    checkMinArity('max', args, 1);
    return mkNumber(Math.max(...args.map(a => expectNumber('max', a))));
  }));
}
