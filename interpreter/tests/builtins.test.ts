/**
 * Tests for the core builtin procedures.
 */

import { Interpreter } from '../src/interpreter';
import { Environment } from '../src/environment';
import { BUILTIN_NAMES, registerBuiltins } from '../src/builtins';
import { Value, mkNumber, mkBool, mkNil, mkString } from '../src/values';
import { DivisionByZeroError, SprigTypeError, WrongNumArgsError } from '../src/errors';

function runWithOutput(source: string): { value: Value; lines: string[] } {
  const lines: string[] = [];
  const interp = new Interpreter({ output: (text) => { lines.push(text); } });
  const value = interp.run(source);
  return { value, lines };
}

function run(source: string): Value {
  return runWithOutput(source).value;
}

describe('registration', () => {
  test('a fresh global environment holds exactly the core builtins', () => {
    const env = new Environment();
    registerBuiltins(env, () => undefined);
    expect(Array.from(env.entries()).map(([name]) => name)).toEqual([...BUILTIN_NAMES]);
  });

  test('interpreters start with the same set', () => {
    const names = Array.from(new Interpreter().getGlobalEnv().entries()).map(([name]) => name);
    expect(names.sort()).toEqual([...BUILTIN_NAMES].sort());
  });
});

describe('arithmetic', () => {
  test('+ and * fold with their identities', () => {
    expect(run('(+)')).toEqual(mkNumber(0));
    expect(run('(*)')).toEqual(mkNumber(1));
    expect(run('(+ 1 2 3.5)')).toEqual(mkNumber(6.5));
    expect(run('(* 2 3 4)')).toEqual(mkNumber(24));
    expect(run('(+ 7)')).toEqual(mkNumber(7));
  });

  test('- negates or subtracts the sum of the rest', () => {
    expect(run('(- 5)')).toEqual(mkNumber(-5));
    expect(run('(- 10 3 2)')).toEqual(mkNumber(5));
    expect(run('(- 10 4)')).toEqual(mkNumber(6));
  });

  test('- needs at least one argument', () => {
    expect(() => run('(-)')).toThrow(WrongNumArgsError);
    expect(() => run('(-)')).toThrow('- expects at least 1 arguments, but got 0');
  });

  test('/ divides exactly two numbers', () => {
    expect(run('(/ 10 4)')).toEqual(mkNumber(2.5));
    expect(() => run('(/ 10)')).toThrow(WrongNumArgsError);
    expect(() => run('(/ 1 2 3)')).toThrow(WrongNumArgsError);
  });

  test('/ by zero fails', () => {
    expect(() => run('(/ 10 0)')).toThrow(DivisionByZeroError);
    expect(() => run('(/ 0 0)')).toThrow(DivisionByZeroError);
    expect(() => run('(/ 1 -0)')).toThrow(DivisionByZeroError);
  });

  test('non-numeric operands are type errors', () => {
    expect(() => run('(+ 1 "2")')).toThrow(SprigTypeError);
    expect(() => run('(* true)')).toThrow('Type error: * expects numbers, got Boolean');
    expect(() => run('(- "a")')).toThrow(SprigTypeError);
    expect(() => run('(/ 1 ())')).toThrow('Type error: / expects numbers, got Nil');
  });
});

describe('comparison', () => {
  test('= and != compare structurally', () => {
    expect(run('(= 1 1)')).toEqual(mkBool(true));
    expect(run('(= 1 1.0)')).toEqual(mkBool(true));
    expect(run('(= "a" "b")')).toEqual(mkBool(false));
    expect(run('(= "a" "a")')).toEqual(mkBool(true));
    expect(run('(= true true)')).toEqual(mkBool(true));
    expect(run('(= () ())')).toEqual(mkBool(true));
    expect(run('(= 1 "1")')).toEqual(mkBool(false));
    expect(run('(!= 1 2)')).toEqual(mkBool(true));
    expect(run('(!= "x" "x")')).toEqual(mkBool(false));
  });

  test('functions compare by identity', () => {
    expect(run('(let f (lambda (x) x)) (= f f)')).toEqual(mkBool(true));
    expect(run('(= (lambda (x) x) (lambda (x) x))')).toEqual(mkBool(false));
    expect(run('(let f (lambda (x) x)) (let g (lambda (x) x)) (= f g)')).toEqual(mkBool(false));
    expect(run('(= + +)')).toEqual(mkBool(true));
    expect(run('(= + -)')).toEqual(mkBool(false));
  });

  test('NaN is not equal to itself', () => {
    const interp = new Interpreter({ output: () => undefined });
    interp.getGlobalEnv().define('nan', mkNumber(NaN));
    expect(interp.run('(= nan nan)')).toEqual(mkBool(false));
    expect(interp.run('(!= nan nan)')).toEqual(mkBool(true));
    expect(interp.run('(< nan 1)')).toEqual(mkBool(false));
  });

  test('= needs exactly two arguments', () => {
    expect(() => run('(= 1)')).toThrow(WrongNumArgsError);
    expect(() => run('(!= 1 2 3)')).toThrow(WrongNumArgsError);
  });

  test('ordering operators', () => {
    expect(run('(> 3 2)')).toEqual(mkBool(true));
    expect(run('(< 3 2)')).toEqual(mkBool(false));
    expect(run('(>= 2 2)')).toEqual(mkBool(true));
    expect(run('(<= 2.5 2)')).toEqual(mkBool(false));
  });

  test('ordering operators check types and arity', () => {
    expect(() => run('(> "b" "a")')).toThrow(SprigTypeError);
    expect(() => run('(< 1)')).toThrow('Wrong number of arguments: < expects 2 arguments, but got 1');
  });
});

describe('print', () => {
  test('writes display forms separated by spaces', () => {
    const { value, lines } = runWithOutput('(print "x =" 42 true () (lambda (a) a) +)');
    expect(value).toEqual(mkNil());
    expect(lines).toEqual(['x = 42 true nil #<lambda (a)> #<builtin +>\n']);
  });

  test('with no arguments writes an empty line', () => {
    expect(runWithOutput('(print)').lines).toEqual(['\n']);
  });

  test('does not change any binding', () => {
    const { value } = runWithOutput('(let s "same") (print s) s');
    expect(value).toEqual(mkString('same'));
  });
});
