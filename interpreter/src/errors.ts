/**
 * Error types for the Sprig interpreter.
 *
 * Reading failures (LexError, ParseError) carry a source location.
 * Evaluation failures are EvalError subclasses discriminated by `kind`.
 */

import type { Value } from './values';
import { valueToRepr } from './values';

export class SprigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SprigError';
  }
}

function location(line?: number, column?: number): string {
  return line !== undefined ? ` [line ${line}, col ${column ?? 0}]` : '';
}

export class LexError extends SprigError {
  /** The message without the location prefix. */
  public readonly reason: string;
  public readonly line: number;
  public readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`LexError${location(line, column)}: ${message}`);
    this.name = 'LexError';
    this.reason = message;
    this.line = line;
    this.column = column;
  }
}

export class ParseError extends SprigError {
  /** The message without the location prefix. */
  public readonly reason: string;
  public readonly line: number;
  public readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`ParseError${location(line, column)}: ${message}`);
    this.name = 'ParseError';
    this.reason = message;
    this.line = line;
    this.column = column;
  }
}

export type EvalErrorKind =
  | 'undefined-variable'
  | 'type-error'
  | 'wrong-num-args'
  | 'not-callable'
  | 'special-form'
  | 'division-by-zero'
  | 'assertion-failed';

/**
 * Base class of every failure raised while evaluating.
 */
export abstract class EvalError extends SprigError {
  abstract readonly kind: EvalErrorKind;

  constructor(message: string) {
    super(message);
    this.name = 'EvalError';
  }
}

export class UndefinedVariableError extends EvalError {
  readonly kind = 'undefined-variable';
  public readonly variable: string;

  constructor(name: string) {
    super(`Undefined variable: '${name}'`);
    this.name = 'UndefinedVariableError';
    this.variable = name;
  }
}

export class SprigTypeError extends EvalError {
  readonly kind = 'type-error';
  public readonly context: string;

  constructor(context: string) {
    super(`Type error: ${context}`);
    this.name = 'SprigTypeError';
    this.context = context;
  }
}

export class WrongNumArgsError extends EvalError {
  readonly kind = 'wrong-num-args';
  public readonly context: string;

  constructor(context: string) {
    super(`Wrong number of arguments: ${context}`);
    this.name = 'WrongNumArgsError';
    this.context = context;
  }
}

export class NotCallableError extends EvalError {
  readonly kind = 'not-callable';
  public readonly value: Value;

  constructor(value: Value) {
    super(`Not a callable function: ${valueToRepr(value)}`);
    this.name = 'NotCallableError';
    this.value = value;
  }
}

/**
 * Malformed special-form syntax not covered by the arity or type checks.
 */
export class SpecialFormError extends EvalError {
  readonly kind = 'special-form';
  public readonly context: string;

  constructor(context: string) {
    super(`Special form error: ${context}`);
    this.name = 'SpecialFormError';
    this.context = context;
  }
}

export class DivisionByZeroError extends EvalError {
  readonly kind = 'division-by-zero';

  constructor() {
    super('Division by zero');
    this.name = 'DivisionByZeroError';
  }
}

/** Raised by the stdlib `assert` family. */
export class AssertionFailedError extends EvalError {
  readonly kind = 'assertion-failed';

  constructor(message: string) {
    super(`Assertion failed: ${message}`);
    this.name = 'AssertionFailedError';
  }
}
