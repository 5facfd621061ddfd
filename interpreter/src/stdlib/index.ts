/**
 * Sprig standard library barrel module.
 *
 * None of this is in a fresh global environment; it is registered
 * only when an interpreter is created with `stdlib: true`.
 */

import { Environment } from '../environment';
import { registerMathBuiltins } from './math';
import { registerStringBuiltins } from './string';
import { registerLogicBuiltins } from './logic';
import { registerTestBuiltins } from './test';

export { registerMathBuiltins } from './math';
export { registerStringBuiltins } from './string';
export { registerLogicBuiltins } from './logic';
export { registerTestBuiltins } from './test';

/** Names the standard library binds, for tools that need to know them statically. */
export const STDLIB_NAMES: readonly string[] = [
  'PI', 'abs', 'floor', 'ceil', 'round', 'sqrt', 'pow', 'mod', 'min', 'max',
  'concat', 'length', 'upcase', 'downcase', 'to-string',
  'not', 'number?', 'string?', 'boolean?', 'nil?', 'procedure?',
  'assert', 'assert-equal',
];

/**
 * Register the entire standard library into the given environment.
 */
export function registerStdlib(env: Environment): void {
  registerMathBuiltins(env);
  registerStringBuiltins(env);
  registerLogicBuiltins(env);
  registerTestBuiltins(env);
}
