/**
 * Basic tests for the Sprig runtime model.
 *
 * These tests exercise environments, values and error types directly,
 * without going through the reader.
 */

import { Environment } from '../src/environment';
import {
  Value,
  mkNumber,
  mkString,
  mkBool,
  mkNil,
  mkBuiltin,
  mkLambda,
  isTrue,
  valueToString,
  valueToRepr,
  valuesEqual,
  kindName,
} from '../src/values';
import { ident, list } from '../src/ast';
import {
  EvalError,
  SprigError,
  UndefinedVariableError,
  NotCallableError,
  DivisionByZeroError,
  WrongNumArgsError,
  ParseError,
} from '../src/errors';

// ==================================================================
// Environment tests
// ==================================================================

describe('Environment', () => {
  test('define and lookup a variable', () => {
    const env = new Environment();
    env.define('x', mkNumber(42));
    expect(env.lookup('x')).toEqual(mkNumber(42));
  });

  test('undefined variable throws UndefinedVariableError carrying the name', () => {
    const env = new Environment();
    expect(() => env.lookup('unknown')).toThrow(UndefinedVariableError);
    try {
      env.lookup('unknown');
    } catch (e) {
      expect(e).toBeInstanceOf(UndefinedVariableError);
      if (e instanceof UndefinedVariableError) {
        expect(e.variable).toBe('unknown');
        expect(e.kind).toBe('undefined-variable');
      }
    }
  });

  test('define overwrites in the same scope', () => {
    const env = new Environment();
    env.define('x', mkNumber(1));
    env.define('x', mkNumber(2));
    expect(env.lookup('x')).toEqual(mkNumber(2));
  });

  test('child scope inherits parent variables', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(10));
    const child = parent.child();
    expect(child.lookup('x')).toEqual(mkNumber(10));
    expect(child.getParent()).toBe(parent);
  });

  test('child scope can shadow parent variables', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(10));
    const child = parent.child();
    child.define('x', mkNumber(20));
    expect(child.lookup('x')).toEqual(mkNumber(20));
    expect(parent.lookup('x')).toEqual(mkNumber(10));
  });

  test('assign mutates the nearest existing binding', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(1));
    const child = parent.child();
    child.assign('x', mkNumber(2));
    expect(parent.lookup('x')).toEqual(mkNumber(2));
    expect(Array.from(child.entries())).toEqual([]);
  });

  test('assign prefers a local shadow over the parent binding', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(1));
    const child = parent.child();
    child.define('x', mkNumber(5));
    child.assign('x', mkNumber(6));
    expect(child.lookup('x')).toEqual(mkNumber(6));
    expect(parent.lookup('x')).toEqual(mkNumber(1));
  });

  test('assign never creates a binding', () => {
    const env = new Environment().child();
    expect(() => env.assign('missing', mkNumber(1))).toThrow(UndefinedVariableError);
    expect(env.has('missing')).toBe(false);
  });

  test('has returns true for defined variables', () => {
    const parent = new Environment();
    parent.define('x', mkNumber(1));
    const child = parent.child();
    expect(child.has('x')).toBe(true);
    expect(child.has('y')).toBe(false);
  });

  test('entries lists local bindings in insertion order', () => {
    const env = new Environment();
    env.define('b', mkNumber(2));
    env.define('a', mkNumber(1));
    expect(Array.from(env.entries()).map(([name]) => name)).toEqual(['b', 'a']);
  });
});

// ==================================================================
// Value tests
// ==================================================================

describe('Values', () => {
  const noop = (): Value => mkNil();

  test('isTrue accepts only the boolean true', () => {
    expect(isTrue(mkBool(true))).toBe(true);
    expect(isTrue(mkBool(false))).toBe(false);
    expect(isTrue(mkNumber(1))).toBe(false);
    expect(isTrue(mkNumber(0))).toBe(false);
    expect(isTrue(mkString('true'))).toBe(false);
    expect(isTrue(mkNil())).toBe(false);
  });

  test('valueToString', () => {
    expect(valueToString(mkNumber(49))).toBe('49');
    expect(valueToString(mkNumber(3.5))).toBe('3.5');
    expect(valueToString(mkNumber(-5))).toBe('-5');
    expect(valueToString(mkString('hello'))).toBe('hello');
    expect(valueToString(mkBool(false))).toBe('false');
    expect(valueToString(mkNil())).toBe('nil');
    expect(valueToString(mkBuiltin('+', noop))).toBe('#<builtin +>');
    expect(valueToString(mkLambda(['x', 'y'], [ident('x')], new Environment()))).toBe('#<lambda (x y)>');
    expect(valueToString(mkLambda([], [ident('x')], new Environment()))).toBe('#<lambda ()>');
  });

  test('valueToRepr quotes strings only', () => {
    expect(valueToRepr(mkString('a "b"'))).toBe('"a \\"b\\""');
    expect(valueToRepr(mkNumber(2))).toBe('2');
  });

  test('valuesEqual is structural for data', () => {
    expect(valuesEqual(mkNumber(1), mkNumber(1))).toBe(true);
    expect(valuesEqual(mkNumber(1), mkNumber(2))).toBe(false);
    expect(valuesEqual(mkString('a'), mkString('a'))).toBe(true);
    expect(valuesEqual(mkString('a'), mkString('b'))).toBe(false);
    expect(valuesEqual(mkBool(true), mkBool(true))).toBe(true);
    expect(valuesEqual(mkNil(), mkNil())).toBe(true);
    expect(valuesEqual(mkNumber(1), mkString('1'))).toBe(false);
    expect(valuesEqual(mkNil(), mkBool(false))).toBe(false);
  });

  test('valuesEqual follows IEEE-754 for NaN', () => {
    expect(valuesEqual(mkNumber(NaN), mkNumber(NaN))).toBe(false);
    expect(valuesEqual(mkNumber(0), mkNumber(-0))).toBe(true);
  });

  test('functions are equal only to themselves', () => {
    const env = new Environment();
    const body = [list([ident('*'), ident('x'), ident('x')])];
    const f = mkLambda(['x'], body, env);
    const g = mkLambda(['x'], body, env);
    expect(valuesEqual(f, f)).toBe(true);
    expect(valuesEqual(f, g)).toBe(false);
    expect(valuesEqual(mkBuiltin('p', noop), mkBuiltin('p', noop))).toBe(false);
  });

  test('kindName', () => {
    expect(kindName(mkNumber(1))).toBe('Number');
    expect(kindName(mkNil())).toBe('Nil');
    expect(kindName(mkBuiltin('p', noop))).toBe('Function');
  });
});

// ==================================================================
// Error tests
// ==================================================================

describe('Errors', () => {
  test('evaluation errors share a base class', () => {
    const err = new DivisionByZeroError();
    expect(err).toBeInstanceOf(EvalError);
    expect(err).toBeInstanceOf(SprigError);
    expect(err.message).toBe('Division by zero');
    expect(err.kind).toBe('division-by-zero');
  });

  test('NotCallableError carries the offending value', () => {
    const err = new NotCallableError(mkString('f'));
    expect(err.value).toEqual(mkString('f'));
    expect(err.message).toBe('Not a callable function: "f"');
  });

  test('WrongNumArgsError includes its context', () => {
    const err = new WrongNumArgsError('/ expects 2 arguments, but got 1');
    expect(err.message).toBe('Wrong number of arguments: / expects 2 arguments, but got 1');
  });

  test('ParseError includes location info', () => {
    const err = new ParseError("unexpected ')'", 3, 7);
    expect(err.message).toBe("ParseError [line 3, col 7]: unexpected ')'");
    expect(err.line).toBe(3);
    expect(err.column).toBe(7);
  });
});
