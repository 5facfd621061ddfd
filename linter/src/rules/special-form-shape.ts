/**
 * Lint rule: special-form-shape
 *
 * Reports `if`, `let` and `lambda` forms that would fail with a
 * special form error as soon as they were evaluated.
 */

import { Expression, ListExpression, specialFormOf } from '../../../interpreter/src';
import { LintRule, Diagnostic } from '../linter';
import { spanOf } from '../scope';

function checkForm(node: ListExpression): Array<{ message: string; at: Expression }> {
  const [, ...args] = node.elements;

  switch (specialFormOf(node)) {
    case 'if':
      if (args.length < 2 || args.length > 3) {
        return [{ message: 'if expects 2 or 3 arguments (condition then-expr [else-expr])', at: node }];
      }
      return [];

    case 'let':
      if (args.length !== 2) {
        return [{ message: 'let expects 2 arguments (variable value)', at: node }];
      }
      if (args[0].kind !== 'identifier') {
        return [{ message: 'let expects an identifier as variable name', at: args[0] }];
      }
      return [];

    case 'lambda': {
      if (args.length < 2) {
        return [{ message: 'lambda expects at least (params) body', at: node }];
      }
      const params = args[0];
      if (params.kind !== 'list') {
        return [{ message: 'lambda parameters must be a list', at: params }];
      }
      return params.elements
        .filter(p => p.kind !== 'identifier')
        .map(p => ({ message: 'lambda parameters must be identifiers', at: p }));
    }

    case null:
      return [];
  }
}

function walk(node: Expression, diagnostics: Diagnostic[]): void {
  if (node.kind !== 'list') return;

  for (const problem of checkForm(node)) {
    const span = spanOf(problem.at);
    diagnostics.push({
      rule: 'special-form-shape',
      severity: 'error',
      message: problem.message,
      line: span.line,
      column: span.column,
    });
  }

  for (const child of node.elements) {
    walk(child, diagnostics);
  }
}

export const specialFormShapeRule: LintRule = {
  name: 'special-form-shape',
  description: 'Detect malformed if, let and lambda forms',
  severity: 'error',

  run(program: Expression[]): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    for (const node of program) walk(node, diagnostics);
    return diagnostics;
  },
};
