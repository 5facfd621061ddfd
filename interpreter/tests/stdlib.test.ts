/**
 * Tests for the opt-in standard library.
 */

import { Interpreter } from '../src/interpreter';
import { STDLIB_NAMES } from '../src/stdlib';
import { Value, mkNumber, mkString, mkBool, mkNil } from '../src/values';
import {
  AssertionFailedError,
  DivisionByZeroError,
  SprigTypeError,
  UndefinedVariableError,
  WrongNumArgsError,
} from '../src/errors';

function run(source: string): Value {
  return new Interpreter({ stdlib: true, output: () => undefined }).run(source);
}

describe('registration', () => {
  test('is absent unless requested', () => {
    const interp = new Interpreter({ output: () => undefined });
    expect(() => interp.run('(abs -1)')).toThrow(UndefinedVariableError);
  });

  test('binds every advertised name', () => {
    const env = new Interpreter({ stdlib: true }).getGlobalEnv();
    for (const name of STDLIB_NAMES) {
      expect(env.has(name)).toBe(true);
    }
  });
});

describe('math', () => {
  test('rounding and abs', () => {
    expect(run('(abs -3)')).toEqual(mkNumber(3));
    expect(run('(floor 2.7)')).toEqual(mkNumber(2));
    expect(run('(ceil 2.1)')).toEqual(mkNumber(3));
    expect(run('(round 2.5)')).toEqual(mkNumber(3));
  });

  test('sqrt and pow', () => {
    expect(run('(sqrt 16)')).toEqual(mkNumber(4));
    expect(() => run('(sqrt -1)')).toThrow(SprigTypeError);
    expect(run('(pow 2 10)')).toEqual(mkNumber(1024));
  });

  test('mod takes the sign of the divisor', () => {
    expect(run('(mod 7 3)')).toEqual(mkNumber(1));
    expect(run('(mod -1 3)')).toEqual(mkNumber(2));
    expect(() => run('(mod 1 0)')).toThrow(DivisionByZeroError);
  });

  test('min and max', () => {
    expect(run('(min 3 1 2)')).toEqual(mkNumber(1));
    expect(run('(max 3 1 2)')).toEqual(mkNumber(3));
    expect(() => run('(max)')).toThrow(WrongNumArgsError);
    expect(() => run('(min 1 "2")')).toThrow(SprigTypeError);
  });

  test('PI', () => {
    expect(run('PI')).toEqual(mkNumber(Math.PI));
  });
});

describe('strings', () => {
  test('concat joins display forms', () => {
    expect(run('(concat "n=" 4 " " true)')).toEqual(mkString('n=4 true'));
    expect(run('(concat)')).toEqual(mkString(''));
  });

  test('length and case', () => {
    expect(run('(length "hello")')).toEqual(mkNumber(5));
    expect(run('(upcase "abc")')).toEqual(mkString('ABC'));
    expect(run('(downcase "ABC")')).toEqual(mkString('abc'));
    expect(() => run('(length 5)')).toThrow('Type error: length expects a String, got Number');
  });

  test('to-string', () => {
    expect(run('(to-string 2.5)')).toEqual(mkString('2.5'));
    expect(run('(to-string ())')).toEqual(mkString('nil'));
  });
});

describe('logic', () => {
  test('not accepts booleans only', () => {
    expect(run('(not false)')).toEqual(mkBool(true));
    expect(() => run('(not 0)')).toThrow(SprigTypeError);
  });

  test('kind predicates', () => {
    expect(run('(number? 1)')).toEqual(mkBool(true));
    expect(run('(string? 1)')).toEqual(mkBool(false));
    expect(run('(boolean? false)')).toEqual(mkBool(true));
    expect(run('(nil? ())')).toEqual(mkBool(true));
    expect(run('(procedure? +)')).toEqual(mkBool(true));
    expect(run('(procedure? (lambda () 1))')).toEqual(mkBool(true));
  });
});

describe('assertions', () => {
  test('assert passes on true', () => {
    expect(run('(assert (= 1 1))')).toEqual(mkNil());
  });

  test('assert fails on anything else', () => {
    expect(() => run('(assert 1)')).toThrow(AssertionFailedError);
    expect(() => run('(assert false "custom")')).toThrow('Assertion failed: custom');
    expect(() => run('(assert "x")')).toThrow('Assertion failed: expected true, got "x"');
  });

  test('assert-equal compares structurally', () => {
    expect(run('(assert-equal (+ 1 1) 2)')).toEqual(mkNil());
    expect(() => run('(assert-equal 1 2)')).toThrow('Assertion failed: expected 2, got 1');
    expect(() => run('(assert-equal 1)')).toThrow(WrongNumArgsError);
  });
});
