/**
 * Lint rule: undefined-identifier
 *
 * Flags identifiers that nothing in the program binds and that are not
 * builtins. Standard library names count as builtins.
 */

import { BUILTIN_NAMES, Expression, STDLIB_NAMES } from '../../../interpreter/src';
import { LintRule, Diagnostic } from '../linter';
import { analyzeScopes } from '../scope';

const KNOWN = new Set<string>([...BUILTIN_NAMES, ...STDLIB_NAMES]);

export const undefinedIdentifierRule: LintRule = {
  name: 'undefined-identifier',
  description: 'Detect references to names that are never bound',
  severity: 'warning',

  run(program: Expression[]): Diagnostic[] {
    return analyzeScopes(program).references
      .filter(r => r.bindings === null && !KNOWN.has(r.name))
      .map((r): Diagnostic => ({
        rule: 'undefined-identifier',
        severity: 'warning',
        message: `Undefined identifier '${r.name}'`,
        line: r.line,
        column: r.column,
      }));
  },
};
