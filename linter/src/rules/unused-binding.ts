/**
 * Lint rule: unused-binding
 *
 * Detects `let` bindings and lambda parameters that are never
 * referenced. Names starting with `_` are exempt.
 */

import { Expression } from '../../../interpreter/src';
import { LintRule, Diagnostic } from '../linter';
import { analyzeScopes } from '../scope';

export const unusedBindingRule: LintRule = {
  name: 'unused-binding',
  description: 'Detect bindings and parameters that are never used',
  severity: 'warning',

  run(program: Expression[]): Diagnostic[] {
    return analyzeScopes(program).bindings
      .filter(b => !b.used && !b.name.startsWith('_'))
      .map((b): Diagnostic => ({
        rule: 'unused-binding',
        severity: 'warning',
        message: b.kind === 'parameter'
          ? `Parameter '${b.name}' is never used`
          : `'${b.name}' is bound but never used`,
        line: b.line,
        column: b.column,
      }));
  },
};
