/**
 * Standard library: string utilities for the Sprig language.
 */

import { Environment } from '../environment';
import { Value, mkBuiltin, mkNumber, mkString, valueToString, kindName } from '../values';
import { SprigTypeError } from '../errors';
import { checkArity } from '../builtins';

function expectString(name: string, v: Value): string {
  if (v.kind !== 'string') throw new SprigTypeError(`${name} expects a String, got ${kindName(v)}`);
  return v.value;
}

/**
 * Register all string builtins into the given environment.
 */
export function registerStringBuiltins(env: Environment): void {
  env.define('concat', mkBuiltin('concat', (args: Value[]): Value => {
    return mkString(args.map(valueToString).join(''));
  }));

  env.define('length', mkBuiltin('length', (args: Value[]): Value => {
    checkArity('length', args, 1);
    return mkNumber(expectString('length', args[0]).length);
  }));

  env.define('upcase', mkBuiltin('upcase', (args: Value[]): Value => {
    checkArity('upcase', args, 1);
    return mkString(expectString('upcase', args[0]).toUpperCase());
  }));

  env.define('downcase', mkBuiltin('downcase', (args: Value[]): Value => {
    checkArity('downcase', args, 1);
    return mkString(expectString('downcase', args[0]).toLowerCase());
  }));

  env.define('to-string', mkBuiltin('to-string', (args: Value[]): Value => {
    checkArity('to-string', args, 1);
    return mkString(valueToString(args[0]));
  }));
}
