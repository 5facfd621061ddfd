/**
 * Runtime value representations for the Sprig interpreter.
 */

import type { Environment } from './environment';
import type { Expression } from './ast';

/**
 * Native procedure. Receives the already-evaluated arguments and
 * fails by throwing an EvalError.
 */
export type BuiltinFn = (args: Value[]) => Value;

export type Callable =
  | { readonly kind: 'builtin'; readonly name: string; readonly fn: BuiltinFn }
  | {
      readonly kind: 'lambda';
      readonly params: readonly string[];
      readonly body: readonly Expression[];
      readonly closure: Environment;
      /** Clock reading of `closure` when the lambda was evaluated. */
      readonly capturedAt: number;
    };

export type Value =
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'nil' }
  | { readonly kind: 'function'; readonly callable: Callable };

export type FunctionValue = Extract<Value, { kind: 'function' }>;

// ---- Value constructors ----

export function mkNumber(value: number): Value {
  return { kind: 'number', value };
}

export function mkString(value: string): Value {
  return { kind: 'string', value };
}

export function mkBool(value: boolean): Value {
  return { kind: 'boolean', value };
}

const NIL: Value = { kind: 'nil' };

export function mkNil(): Value {
  return NIL;
}

export function mkBuiltin(name: string, fn: BuiltinFn): Value {
  return { kind: 'function', callable: { kind: 'builtin', name, fn } };
}

export function mkLambda(
  params: readonly string[],
  body: readonly Expression[],
  closure: Environment,
  capturedAt: number = closure.capture(),
): Value {
  return { kind: 'function', callable: { kind: 'lambda', params, body, closure, capturedAt } };
}

// ---- Value utilities ----

/**
 * Only the literal `true` selects the then-branch of `if`.
 */
export function isTrue(v: Value): boolean {
  return v.kind === 'boolean' && v.value;
}

function numberToString(n: number): string {
  if (n === Infinity) return 'inf';
  if (n === -Infinity) return '-inf';
  return String(n);
}

export function callableToString(c: Callable): string {
  switch (c.kind) {
    case 'builtin': return `#<builtin ${c.name}>`;
    case 'lambda': return `#<lambda (${c.params.join(' ')})>`;
  }
}

/**
 * Display form, as written by `print`.
 */
export function valueToString(v: Value): string {
  switch (v.kind) {
    case 'number': return numberToString(v.value);
    case 'string': return v.value;
    case 'boolean': return String(v.value);
    case 'nil': return 'nil';
    case 'function': return callableToString(v.callable);
  }
}

/**
 * Like valueToString, but strings are shown quoted. Used by the REPL
 * and in error messages.
 */
export function valueToRepr(v: Value): string {
  if (v.kind === 'string') return JSON.stringify(v.value);
  return valueToString(v);
}

/**
 * Structural equality for data, identity for functions.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'number':
      return b.kind === 'number' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'boolean':
      return b.kind === 'boolean' && a.value === b.value;
    case 'nil':
      return b.kind === 'nil';
    case 'function':
      return b.kind === 'function' && a.callable === b.callable;
  }
}

/**
 * Human-readable name of a value's kind, for error messages.
 */
export function kindName(v: Value): string {
  switch (v.kind) {
    case 'number': return 'Number';
    case 'string': return 'String';
    case 'boolean': return 'Boolean';
    case 'nil': return 'Nil';
    case 'function': return 'Function';
  }
}
