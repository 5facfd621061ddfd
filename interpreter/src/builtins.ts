/**
 * Built-in procedures present in every fresh global environment.
 */

import { Environment } from './environment';
import {
  Value,
  mkBuiltin,
  mkNumber,
  mkBool,
  mkNil,
  valueToString,
  valuesEqual,
  kindName,
} from './values';
import { DivisionByZeroError, SprigTypeError, WrongNumArgsError } from './errors';

/**
 * Destination for `print`. Receives one complete line, newline included.
 */
export type OutputSink = (text: string) => void;

export const stdoutSink: OutputSink = (text) => {
  process.stdout.write(text);
};

/** Names registered by registerBuiltins, in registration order. */
export const BUILTIN_NAMES = ['+', '-', '*', '/', '=', '!=', '>', '<', '>=', '<=', 'print'] as const;

// ---- Argument checking ----

export function checkArity(name: string, args: Value[], expected: number): void {
  if (args.length !== expected) {
    throw new WrongNumArgsError(`${name} expects ${expected} arguments, but got ${args.length}`);
  }
}

export function checkMinArity(name: string, args: Value[], min: number): void {
  if (args.length < min) {
    throw new WrongNumArgsError(`${name} expects at least ${min} arguments, but got ${args.length}`);
  }
}

export function expectNumber(name: string, v: Value): number {
  if (v.kind !== 'number') {
    throw new SprigTypeError(`${name} expects numbers, got ${kindName(v)}`);
  }
  return v.value;
}

function numbers(name: string, args: Value[]): number[] {
  return args.map(arg => expectNumber(name, arg));
}

function twoNumbers(name: string, args: Value[]): [number, number] {
  checkArity(name, args, 2);
  return [expectNumber(name, args[0]), expectNumber(name, args[1])];
}

function comparison(name: string, test: (a: number, b: number) => boolean) {
  return mkBuiltin(name, (args: Value[]): Value => {
    const [a, b] = twoNumbers(name, args);
    return mkBool(test(a, b));
  });
}

/**
 * Register all built-in procedures into the given environment.
 */
export function registerBuiltins(env: Environment, output: OutputSink = stdoutSink): void {
  // ---- Arithmetic ----

  env.define('+', mkBuiltin('+', (args: Value[]): Value => {
    return mkNumber(numbers('+', args).reduce((sum, n) => sum + n, 0));
  }));

  env.define('-', mkBuiltin('-', (args: Value[]): Value => {
    checkMinArity('-', args, 1);
    const [first, ...rest] = numbers('-', args);
    if (rest.length === 0) return mkNumber(-first);
    return mkNumber(first - rest.reduce((sum, n) => sum + n, 0));
  }));

  env.define('*', mkBuiltin('*', (args: Value[]): Value => {
    return mkNumber(numbers('*', args).reduce((product, n) => product * n, 1));
  }));

  env.define('/', mkBuiltin('/', (args: Value[]): Value => {
    const [numerator, denominator] = twoNumbers('/', args);
    if (denominator === 0) throw new DivisionByZeroError();
    return mkNumber(numerator / denominator);
  }));

  // ---- Comparison ----

  env.define('=', mkBuiltin('=', (args: Value[]): Value => {
    checkArity('=', args, 2);
    return mkBool(valuesEqual(args[0], args[1]));
  }));

  env.define('!=', mkBuiltin('!=', (args: Value[]): Value => {
    checkArity('!=', args, 2);
    return mkBool(!valuesEqual(args[0], args[1]));
  }));

  env.define('>', comparison('>', (a, b) => a > b));
  env.define('<', comparison('<', (a, b) => a < b));
  env.define('>=', comparison('>=', (a, b) => a >= b));
  env.define('<=', comparison('<=', (a, b) => a <= b));

  // ---- I/O ----

  env.define('print', mkBuiltin('print', (args: Value[]): Value => {
    output(args.map(valueToString).join(' ') + '\n');
    return mkNil();
  }));
}
