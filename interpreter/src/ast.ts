/**
 * Syntax tree produced by the reader and consumed by the evaluator,
 * the formatter and the linter.
 */

export interface Span {
  line: number;
  column: number;
}

export type Expression =
  | { readonly kind: 'number'; readonly value: number; readonly span?: Span }
  | { readonly kind: 'string'; readonly value: string; readonly span?: Span }
  | { readonly kind: 'boolean'; readonly value: boolean; readonly span?: Span }
  | { readonly kind: 'identifier'; readonly name: string; readonly span?: Span }
  | { readonly kind: 'list'; readonly elements: readonly Expression[]; readonly span?: Span };

export type ListExpression = Extract<Expression, { kind: 'list' }>;

/** Keywords that introduce a special form when they head a list. */
export const SPECIAL_FORMS = ['if', 'let', 'lambda'] as const;

export type SpecialFormName = typeof SPECIAL_FORMS[number];

export function isSpecialFormName(name: string): name is SpecialFormName {
  return (SPECIAL_FORMS as readonly string[]).includes(name);
}

// ---- Node constructors ----

export function num(value: number, span?: Span): Expression {
  return { kind: 'number', value, span };
}

export function str(value: string, span?: Span): Expression {
  return { kind: 'string', value, span };
}

export function bool(value: boolean, span?: Span): Expression {
  return { kind: 'boolean', value, span };
}

export function ident(name: string, span?: Span): Expression {
  return { kind: 'identifier', name, span };
}

export function list(elements: Expression[], span?: Span): Expression {
  return { kind: 'list', elements, span };
}

// ---- Helpers ----

/**
 * Name of the special form a list introduces, or null for calls and atoms.
 */
export function specialFormOf(node: Expression): SpecialFormName | null {
  if (node.kind !== 'list' || node.elements.length === 0) return null;
  const head = node.elements[0];
  if (head.kind === 'identifier' && isSpecialFormName(head.name)) return head.name;
  return null;
}

/**
 * Render a node back to source text on a single line.
 */
export function expressionToString(node: Expression): string {
  switch (node.kind) {
    case 'number': return String(node.value);
    case 'string': return quoteString(node.value);
    case 'boolean': return String(node.value);
    case 'identifier': return node.name;
    case 'list': return `(${node.elements.map(expressionToString).join(' ')})`;
  }
}

/**
 * Quote a string literal, escaping what the lexer decodes.
 */
export function quoteString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}
