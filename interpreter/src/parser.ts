/**
 * Recursive-descent reader: turns Sprig source into syntax trees.
 */

import { Expression, Span } from './ast';
import { ParseError } from './errors';
import { Token, tokenize } from './lexer';

/**
 * Parse Sprig source code into a sequence of top-level expressions.
 */
export function parse(source: string): Expression[] {
  return parseTokens(tokenize(source));
}

/**
 * Parse an already-lexed token list. Comment tokens are skipped.
 */
export function parseTokens(tokens: Token[]): Expression[] {
  const significant = tokens.filter(t => t.kind !== 'comment');
  const last = significant[significant.length - 1];
  if (last === undefined || last.kind !== 'eof') {
    const line = last?.endLine ?? 1;
    significant.push({ kind: 'eof', text: '', line, column: last?.column ?? 0, endLine: line });
  }
  return new Reader(significant).readProgram();
}

class Reader {
  private tokens: Token[];
  private index = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  readProgram(): Expression[] {
    const program: Expression[] = [];
    while (this.peek().kind !== 'eof') {
      program.push(this.readExpression());
    }
    return program;
  }

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (this.index < this.tokens.length) this.index++;
    return token;
  }

  private readExpression(): Expression {
    const token = this.next();
    const span: Span = { line: token.line, column: token.column };

    switch (token.kind) {
      case 'number':
        return { kind: 'number', value: Number(token.text), span };
      case 'string':
        return { kind: 'string', value: token.text, span };
      case 'symbol':
        if (token.text === 'true') return { kind: 'boolean', value: true, span };
        if (token.text === 'false') return { kind: 'boolean', value: false, span };
        return { kind: 'identifier', name: token.text, span };
      case 'lparen':
        return this.readList(span);
      case 'rparen':
        throw new ParseError("unexpected ')'", token.line, token.column);
      case 'eof':
        throw new ParseError('unexpected end of input', token.line, token.column);
      case 'comment':
        throw new ParseError('unexpected comment', token.line, token.column);
    }
  }

  private readList(open: Span): Expression {
    const elements: Expression[] = [];
    for (;;) {
      const token = this.peek();
      if (token.kind === 'rparen') {
        this.next();
        return { kind: 'list', elements, span: open };
      }
      if (token.kind === 'eof') {
        throw new ParseError("unclosed '('", open.line, open.column);
      }
      elements.push(this.readExpression());
    }
  }
}
