/**
 * KiCad S-Expression Tokenizer
 *
 * Turns text into a lazy stream of tokens. No classification happens here:
 * `yes`, `20231014` and `-1.5` are all plain symbols.
 */

import type { DiagnosticBag } from './diagnostics';
import type { SourceLocation } from './sexpr';

interface TokenBase {
  location: SourceLocation;
  /** Line breaks in the whitespace before this token */
  lineBreaks: number;
  /** Leading whitespace of the token's line when it starts one, else '' */
  indent: string;
}

export type Token =
  | (TokenBase & { kind: 'open' })
  | (TokenBase & { kind: 'close' })
  | (TokenBase & { kind: 'symbol'; text: string })
  | (TokenBase & { kind: 'string'; value: string; raw?: string })
  | (TokenBase & { kind: 'eof' });

export type TokenKind = Token['kind'];

const BYTE_ORDER_MARK = 0xfeff;

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

function isDelimiter(ch: string): boolean {
  return isWhitespace(ch) || ch === '(' || ch === ')' || ch === '"';
}

function decodeEscape(ch: string): string {
  switch (ch) {
    case '"': return '"';
    case '\\': return '\\';
    case 'n': return '\n';
    case 'r': return '\r';
    case 't': return '\t';
    default: return `\\${ch}`;
  }
}

/**
 * Tokenize an S-expression string. Lexical errors (unterminated string, stray
 * close paren) are reported to `diagnostics` and recovered from.
 */
export function* tokenize(input: string, diagnostics: DiagnosticBag): Generator<Token, void, undefined> {
  const len = input.length;
  let pos = input.charCodeAt(0) === BYTE_ORDER_MARK ? 1 : 0;
  let line = 1;
  let column = 1;
  let depth = 0;
  let lineBreaks = 0;
  let indent = '';

  const advance = (ch: string): void => {
    pos++;
    if (ch === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
  };

  while (pos < len) {
    const ch = input[pos];

    if (isWhitespace(ch)) {
      if (ch === '\n') {
        lineBreaks++;
        indent = '';
      } else if (ch !== '\r') {
        indent += ch;
      }
      advance(ch);
      continue;
    }

    const base: TokenBase = { location: { line, column, offset: pos }, lineBreaks, indent: lineBreaks > 0 ? indent : '' };
    lineBreaks = 0;
    indent = '';

    if (ch === '(') {
      depth++;
      advance(ch);
      yield { ...base, kind: 'open' };
      continue;
    }

    if (ch === ')') {
      advance(ch);
      if (depth === 0) {
        diagnostics.error("Unexpected ')' with no open list", base.location);
        continue;
      }
      depth--;
      yield { ...base, kind: 'close' };
      continue;
    }

    if (ch === '"') {
      advance(ch);
      const rawStart = pos;
      let value = '';
      let terminated = false;
      while (pos < len) {
        const c = input[pos];
        if (c === '"') {
          terminated = true;
          break;
        }
        if (c === '\\' && pos + 1 < len) {
          const escaped = input[pos + 1];
          value += decodeEscape(escaped);
          advance(c);
          advance(escaped);
          continue;
        }
        value += c;
        advance(c);
      }
      if (terminated) {
        const raw = input.slice(rawStart, pos);
        advance('"');
        yield { ...base, kind: 'string', value, raw };
      } else {
        diagnostics.error('Unterminated string', base.location);
        yield { ...base, kind: 'string', value };
      }
      continue;
    }

    // Symbol: maximal run up to whitespace or a delimiter
    const start = pos;
    while (pos < len && !isDelimiter(input[pos])) advance(input[pos]);
    yield { ...base, kind: 'symbol', text: input.slice(start, pos) };
  }

  yield { kind: 'eof', location: { line, column, offset: pos }, lineBreaks, indent: lineBreaks > 0 ? indent : '' };
}
