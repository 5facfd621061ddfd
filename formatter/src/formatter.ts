/**
 * Sprig code formatter.
 *
 * Lexes the source with comments kept, builds a small concrete syntax
 * tree and prints it back with consistent whitespace. Lists that fit on
 * the current line stay on one line; the rest are broken according to
 * the form at their head.
 */

import { ParseError, Token, tokenize, parseTokens, quoteString } from '../../interpreter/src';

export interface FormatOptions {
  /** Number of spaces a lambda body is indented by (default: 2) */
  indentSize: number;
  /** Max line width before a list is broken across lines */
  maxLineWidth: number;
  /** Blank lines kept where the source separates top-level forms with blank lines */
  blankLinesBetweenForms: number;
}

export const DEFAULT_OPTIONS: FormatOptions = {
  indentSize: 2,
  maxLineWidth: 80,
  blankLinesBetweenForms: 1,
};

interface Atom {
  kind: 'atom';
  text: string;
  line: number;
  endLine: number;
  trailing?: string;
}

interface Comment {
  kind: 'comment';
  text: string;
  line: number;
  endLine: number;
}

interface Group {
  kind: 'group';
  items: CstNode[];
  line: number;
  endLine: number;
  trailing?: string;
}

type CstNode = Atom | Comment | Group;

/**
 * Format Sprig source code. Throws the reader's error on malformed input.
 */
export function format(source: string, options?: Partial<FormatOptions>): string {
  const opts: FormatOptions = { ...DEFAULT_OPTIONS, ...options };
  const tokens = tokenize(source, { comments: true });
  // Reject unbalanced input with the same errors the interpreter reports.
  parseTokens(tokens);

  const formatter = new SprigFormatter(opts);
  const lines: string[] = [];
  let prev: CstNode | null = null;

  for (const form of buildTree(tokens)) {
    if (prev !== null && form.line - prev.endLine > 1) {
      for (let i = 0; i < opts.blankLinesBetweenForms; i++) {
        lines.push('');
      }
    }
    lines.push(formatter.formatItem(form, 0));
    prev = form;
  }

  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}

function buildTree(tokens: Token[]): CstNode[] {
  const root: CstNode[] = [];
  const stack: Array<{ items: CstNode[]; line: number }> = [];
  let items = root;

  for (const token of tokens) {
    switch (token.kind) {
      case 'lparen':
        stack.push({ items, line: token.line });
        items = [];
        break;
      case 'rparen': {
        const frame = stack.pop();
        if (frame === undefined) {
          throw new ParseError("unexpected ')'", token.line, token.column);
        }
        frame.items.push({ kind: 'group', items, line: frame.line, endLine: token.line });
        items = frame.items;
        break;
      }
      case 'comment': {
        const text = token.text.trimEnd();
        const prev = items[items.length - 1];
        // A comment on the same line as the element before it stays attached to it.
        if (prev !== undefined && prev.kind !== 'comment' && prev.trailing === undefined && prev.endLine === token.line) {
          prev.trailing = text;
        } else {
          items.push({ kind: 'comment', text, line: token.line, endLine: token.line });
        }
        break;
      }
      case 'string':
        items.push({ kind: 'atom', text: quoteString(token.text), line: token.line, endLine: token.endLine });
        break;
      case 'number':
      case 'symbol':
        items.push({ kind: 'atom', text: token.text, line: token.line, endLine: token.endLine });
        break;
      case 'eof':
        break;
    }
  }

  return root;
}

/**
 * Single-line rendering of a node, or null when it holds a comment.
 */
function flat(node: CstNode): string | null {
  switch (node.kind) {
    case 'atom':
      return node.text;
    case 'comment':
      return null;
    case 'group': {
      const parts: string[] = [];
      for (const item of node.items) {
        if (item.kind !== 'comment' && item.trailing !== undefined) return null;
        const text = flat(item);
        if (text === null) return null;
        parts.push(text);
      }
      return '(' + parts.join(' ') + ')';
    }
  }
}

function endsInComment(node: CstNode): boolean {
  return node.kind === 'comment' || node.trailing !== undefined;
}

class SprigFormatter {
  private opts: FormatOptions;

  constructor(opts: FormatOptions) {
    this.opts = opts;
  }

  /**
   * Format a node starting at `column`, including any comment attached to it.
   */
  formatItem(node: CstNode, column: number): string {
    switch (node.kind) {
      case 'comment':
        return node.text;
      case 'atom':
        return this.withTrailing(node.text, node);
      case 'group':
        return this.withTrailing(this.formatGroup(node, column), node);
    }
  }

  private withTrailing(text: string, node: Atom | Group): string {
    return node.trailing !== undefined ? `${text} ${node.trailing}` : text;
  }

  private formatGroup(group: Group, column: number): string {
    const oneLine = flat(group);
    if (oneLine !== null && column + oneLine.length <= this.opts.maxLineWidth) {
      return oneLine;
    }

    const [head, first, ...rest] = group.items;

    if (head !== undefined && head.kind === 'atom' && head.trailing === undefined
        && first !== undefined && first.kind !== 'comment') {
      if (head.text === 'lambda') {
        // (lambda (params)
        //   body...)
        const opening = '(lambda ' + this.formatItem(first, column + 8);
        return this.layout(opening, rest, column + this.opts.indentSize, group, column);
      }

      // let, if and calls: operands aligned under the first one.
      const align = column + head.text.length + 2;
      const opening = `(${head.text} ` + this.formatItem(first, align);
      return this.layout(opening, rest, align, group, column);
    }

    // Anything else: one element per line, aligned after the paren.
    if (head === undefined) return '()';
    const opening = '(' + this.formatItem(head, column + 1);
    return this.layout(opening, group.items.slice(1), column + 1, group, column);
  }

  /**
   * Put `items` on their own lines at `itemColumn` after `opening` and close the list.
   */
  private layout(opening: string, items: CstNode[], itemColumn: number, group: Group, column: number): string {
    let result = opening;
    for (const item of items) {
      result += '\n' + this.pad(itemColumn) + this.formatItem(item, itemColumn);
    }

    const last = group.items[group.items.length - 1];
    if (last !== undefined && endsInComment(last)) {
      return result + '\n' + this.pad(column) + ')';
    }
    return result + ')';
  }

  private pad(column: number): string {
    return ' '.repeat(column);
  }
}
