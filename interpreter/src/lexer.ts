/**
 * Lexer for Sprig source text.
 *
 * Produces a flat token list terminated by an `eof` token. Comments are
 * dropped unless the caller asks for them (the formatter does).
 */

import { LexError } from './errors';

export type TokenKind = 'lparen' | 'rparen' | 'string' | 'number' | 'symbol' | 'comment' | 'eof';

export interface Token {
  kind: TokenKind;
  /** Decoded value: string contents, comment text, or the atom as written. */
  text: string;
  line: number;
  column: number;
  /** Line the token ends on; differs from `line` only for strings spanning lines. */
  endLine: number;
}

export interface LexOptions {
  /** Emit `comment` tokens instead of skipping them. */
  comments?: boolean;
}

const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  '"': '"',
  '\\': '\\',
};

function isDelimiter(ch: string): boolean {
  return ch === '(' || ch === ')' || ch === '"' || ch === ';' || /\s/.test(ch);
}

export function tokenize(source: string, options?: LexOptions): Token[] {
  const tokens: Token[] = [];
  const keepComments = options?.comments ?? false;
  let pos = 0;
  let line = 1;
  let column = 0;

  const advance = (): string => {
    const ch = source[pos++];
    if (ch === '\n') {
      line++;
      column = 0;
    } else {
      column++;
    }
    return ch;
  };

  while (pos < source.length) {
    const ch = source[pos];

    if (/\s/.test(ch)) {
      advance();
      continue;
    }

    const startLine = line;
    const startColumn = column;

    if (ch === '(' || ch === ')') {
      advance();
      tokens.push({ kind: ch === '(' ? 'lparen' : 'rparen', text: ch, line: startLine, column: startColumn, endLine: startLine });
      continue;
    }

    if (ch === ';') {
      let text = '';
      while (pos < source.length && source[pos] !== '\n') text += advance();
      if (keepComments) {
        tokens.push({ kind: 'comment', text, line: startLine, column: startColumn, endLine: startLine });
      }
      continue;
    }

    if (ch === '"') {
      advance();
      let text = '';
      let closed = false;
      while (pos < source.length) {
        const c = advance();
        if (c === '"') {
          closed = true;
          break;
        }
        if (c === '\\' && pos < source.length) {
          const next = advance();
          text += ESCAPES[next] ?? next;
          continue;
        }
        text += c;
      }
      if (!closed) {
        throw new LexError('unterminated string', startLine, startColumn);
      }
      tokens.push({ kind: 'string', text, line: startLine, column: startColumn, endLine: line });
      continue;
    }

    let atom = '';
    while (pos < source.length && !isDelimiter(source[pos])) atom += advance();
    tokens.push({
      kind: NUMBER_PATTERN.test(atom) ? 'number' : 'symbol',
      text: atom,
      line: startLine,
      column: startColumn,
      endLine: startLine,
    });
  }

  tokens.push({ kind: 'eof', text: '', line, column, endLine: line });
  return tokens;
}
