/**
 * Tree-walking evaluator for the Sprig language.
 *
 * Evaluation is synchronous and recursive, with no tail-call
 * elimination: a deeply recursive program exhausts the host stack and
 * surfaces as a RangeError, which is not an EvalError and is left for
 * the host to treat as fatal.
 */

import { Environment } from './environment';
import { Expression, ListExpression } from './ast';
import { parse } from './parser';
import {
  Value,
  BuiltinFn,
  FunctionValue,
  mkNumber,
  mkString,
  mkBool,
  mkNil,
  mkBuiltin,
  mkLambda,
  isTrue,
} from './values';
import {
  NotCallableError,
  SprigTypeError,
  WrongNumArgsError,
} from './errors';
import { OutputSink, registerBuiltins, stdoutSink } from './builtins';
import { registerStdlib } from './stdlib';

export interface InterpreterOptions {
  /** Where `print` writes. Defaults to process.stdout. */
  output?: OutputSink;
  /** Register the standard library on top of the core builtins. */
  stdlib?: boolean;
}

export class Interpreter {
  private globalEnv: Environment;

  constructor(options: InterpreterOptions = {}) {
    const output = options.output ?? stdoutSink;
    this.globalEnv = new Environment();
    registerBuiltins(this.globalEnv, output);
    if (options.stdlib) {
      registerStdlib(this.globalEnv);
    }
  }

  /**
   * Get the global environment (useful for testing and embedding).
   */
  getGlobalEnv(): Environment {
    return this.globalEnv;
  }

  /**
   * Register an additional native procedure in the global environment.
   */
  defineBuiltin(name: string, fn: BuiltinFn): void {
    this.globalEnv.define(name, mkBuiltin(name, fn));
  }

  /**
   * Read and evaluate source text against the global environment.
   */
  run(source: string): Value {
    return this.evaluateProgram(parse(source));
  }

  /**
   * Evaluate top-level forms in order. Returns the last value, or nil
   * for an empty program. The first failure aborts the rest.
   */
  evaluateProgram(nodes: readonly Expression[]): Value {
    let result: Value = mkNil();
    for (const node of nodes) {
      result = this.evaluate(node, this.globalEnv);
    }
    return result;
  }

  /**
   * Main dispatch: evaluate any node.
   */
  evaluate(node: Expression, env: Environment = this.globalEnv): Value {
    switch (node.kind) {
      case 'number':
        return mkNumber(node.value);
      case 'string':
        return mkString(node.value);
      case 'boolean':
        return mkBool(node.value);
      case 'identifier':
        return env.lookup(node.name);
      case 'list':
        return this.evalList(node, env);
    }
  }

  // ==================================================================
  // Lists: special forms and calls
  // ==================================================================

  private evalList(node: ListExpression, env: Environment): Value {
    const elements = node.elements;
    if (elements.length === 0) return mkNil();

    const head = elements[0];
    if (head.kind === 'identifier') {
      switch (head.name) {
        case 'if':
          return this.evalIf(elements, env);
        case 'let':
          return this.evalLet(elements, env);
        case 'lambda':
          return this.evalLambda(elements, env);
      }
    }
    return this.evalCall(elements, env);
  }

  private evalIf(elements: readonly Expression[], env: Environment): Value {
    if (elements.length < 3 || elements.length > 4) {
      throw new WrongNumArgsError('if expects 2 or 3 arguments (condition then-expr [else-expr])');
    }
    const condition = this.evaluate(elements[1], env);
    if (isTrue(condition)) {
      return this.evaluate(elements[2], env);
    }
    if (elements.length === 4) {
      return this.evaluate(elements[3], env);
    }
    return mkNil();
  }

  private evalLet(elements: readonly Expression[], env: Environment): Value {
    if (elements.length !== 3) {
      throw new WrongNumArgsError('let expects 2 arguments (variable value)');
    }
    const target = elements[1];
    if (target.kind !== 'identifier') {
      throw new SprigTypeError('let expects an identifier as variable name');
    }
    const value = this.evaluate(elements[2], env);
    env.define(target.name, value);
    return mkNil();
  }

  private evalLambda(elements: readonly Expression[], env: Environment): Value {
    if (elements.length < 3) {
      throw new WrongNumArgsError('lambda expects at least (params) body');
    }
    const paramList = elements[1];
    if (paramList.kind !== 'list') {
      throw new SprigTypeError('lambda parameters must be a list');
    }
    const params = paramList.elements.map((param) => {
      if (param.kind !== 'identifier') {
        throw new SprigTypeError('lambda parameters must be identifiers');
      }
      return param.name;
    });
    return mkLambda(params, elements.slice(2), env);
  }

  // ==================================================================
  // Procedure calls
  // ==================================================================

  private evalCall(elements: readonly Expression[], env: Environment): Value {
    const fn = this.evaluate(elements[0], env);
    if (fn.kind !== 'function') {
      throw new NotCallableError(fn);
    }
    // Arguments are evaluated left to right in the caller's scope.
    const args = elements.slice(1).map(arg => this.evaluate(arg, env));
    return this.callFunction(fn, args);
  }

  /**
   * Apply a procedure value to already-evaluated arguments.
   */
  callFunction(fn: FunctionValue, args: Value[]): Value {
    const callable = fn.callable;
    switch (callable.kind) {
      case 'builtin':
        return callable.fn(args);
      case 'lambda': {
        if (args.length !== callable.params.length) {
          throw new WrongNumArgsError(
            `Function expects ${callable.params.length} arguments, but got ${args.length}`,
          );
        }
        // Parent is the defining scope, not the caller's.
        const callEnv = callable.closure.child(callable.capturedAt);
        callable.params.forEach((name, i) => callEnv.define(name, args[i]));
        let result: Value = mkNil();
        for (const expr of callable.body) {
          result = this.evaluate(expr, callEnv);
        }
        return result;
      }
    }
  }
}
