/**
 * Standard library: boolean negation and kind predicates.
 */

import { Environment } from '../environment';
import { Value, mkBuiltin, mkBool, kindName } from '../values';
import { SprigTypeError } from '../errors';
import { checkArity } from '../builtins';

function predicate(name: string, kind: Value['kind']): Value {
  return mkBuiltin(name, (args: Value[]): Value => {
    checkArity(name, args, 1);
    return mkBool(args[0].kind === kind);
  });
}

export function registerLogicBuiltins(env: Environment): void {
  env.define('not', mkBuiltin('not', (args: Value[]): Value => {
    checkArity('not', args, 1);
    const v = args[0];
    if (v.kind !== 'boolean') throw new SprigTypeError(`not expects a Boolean, got ${kindName(v)}`);
    return mkBool(!v.value);
  }));

  env.define('number?', predicate('number?', 'number'));
  env.define('string?', predicate('string?', 'string'));
  env.define('boolean?', predicate('boolean?', 'boolean'));
  env.define('nil?', predicate('nil?', 'nil'));
  env.define('procedure?', predicate('procedure?', 'function'));
}
