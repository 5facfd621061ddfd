/**
 * Lint rule: shadowed-builtin
 *
 * Warns when `let` or a lambda parameter reuses the name of a core
 * builtin such as `print` or `+`.
 */

import { BUILTIN_NAMES, Expression } from '../../../interpreter/src';
import { LintRule, Diagnostic } from '../linter';
import { analyzeScopes } from '../scope';

const BUILTINS = new Set<string>(BUILTIN_NAMES);

export const shadowedBuiltinRule: LintRule = {
  name: 'shadowed-builtin',
  description: 'Warn when a binding reuses a builtin name',
  severity: 'warning',

  run(program: Expression[]): Diagnostic[] {
    return analyzeScopes(program).bindings
      .filter(b => BUILTINS.has(b.name))
      .map((b): Diagnostic => ({
        rule: 'shadowed-builtin',
        severity: 'warning',
        message: `'${b.name}' shadows the builtin of the same name`,
        line: b.line,
        column: b.column,
      }));
  },
};
