/**
 * KiCad S-Expression Parser
 *
 * Builds one root list from the token stream. Never throws on malformed
 * input: problems become diagnostics and the best-effort tree is returned.
 * Uses an explicit stack, so nesting depth is bounded only by memory.
 */

import { DiagnosticBag, type Diagnostic } from './diagnostics';
import { list, num, str, sym, type SAtom, type SExpr, type SList, type SourceLocation } from './sexpr';
import { tokenize, type Token } from './tokenizer';

export interface ParseResult {
  root: SList;
  diagnostics: readonly Diagnostic[];
  hasErrors: boolean;
  /** Indentation unit of the source (first indented line at depth 1) */
  indent?: string;
  newline: '\n' | '\r\n';
}

export interface ParseOptions {
  /** Collect into an existing bag instead of a fresh one */
  diagnostics?: DiagnosticBag;
}

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

export function isNumericText(text: string): boolean {
  return NUMBER_PATTERN.test(text);
}

/** Numeric-looking symbols become numbers that remember their source text */
export function classifySymbol(text: string): SAtom {
  return isNumericText(text) ? num(Number(text), text) : sym(text);
}

interface Frame {
  items: SExpr[];
  breaks: number[];
  location: SourceLocation;
  /** Line breaks before the opening paren */
  lineBreaks: number;
}

export function parseSExpression(input: string, options: ParseOptions = {}): ParseResult {
  const diagnostics = options.diagnostics ?? new DiagnosticBag();
  const stack: Frame[] = [];
  let root: SList | undefined;
  let indentUnit: string | undefined;
  let reportedIndent = false;
  let reportedTrailing = false;

  // `level` is the nesting depth the token's line should be indented to
  const checkIndent = (token: Token, level: number): void => {
    if (token.lineBreaks === 0 || level === 0 && token.indent === '') return;
    if (indentUnit === undefined) {
      if (level === 1 && token.indent !== '') indentUnit = token.indent;
      return;
    }
    if (!reportedIndent && token.indent !== indentUnit.repeat(level)) {
      reportedIndent = true;
      diagnostics.info('Indentation is not a uniform multiple of the first indent; layout will be normalised', token.location);
    }
  };

  const attach = (node: SList, lineBreaks: number): void => {
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.items.push(node);
      parent.breaks.push(lineBreaks);
    } else if (!root) {
      root = node;
    }
    // anything after the root was already reported when it opened
  };

  for (const token of tokenize(input, diagnostics)) {
    switch (token.kind) {
      case 'open': {
        if (stack.length === 0 && root && !reportedTrailing) {
          reportedTrailing = true;
          diagnostics.error('Unexpected content after the root list', token.location);
        }
        checkIndent(token, stack.length);
        stack.push({ items: [], breaks: [], location: token.location, lineBreaks: token.lineBreaks });
        break;
      }
      case 'close': {
        const frame = stack.pop();
        if (!frame) break;
        checkIndent(token, stack.length);
        attach(list(frame.items, { breaks: frame.breaks, closeBreak: token.lineBreaks }, frame.location), frame.lineBreaks);
        break;
      }
      case 'symbol':
      case 'string': {
        const atom = token.kind === 'string' ? str(token.value, token.raw) : classifySymbol(token.text);
        const parent = stack[stack.length - 1];
        if (!parent) {
          diagnostics.error(`Unexpected ${token.kind} outside of a list`, token.location);
          break;
        }
        checkIndent(token, stack.length);
        parent.items.push(atom);
        parent.breaks.push(token.lineBreaks);
        break;
      }
      case 'eof': {
        if (stack.length > 0) {
          diagnostics.error(`Unexpected end of input: ${stack.length} unclosed list(s)`, token.location);
        }
        for (let frame = stack.pop(); frame; frame = stack.pop()) {
          attach(list(frame.items, { breaks: frame.breaks, closeBreak: 0 }, frame.location), frame.lineBreaks);
        }
        if (!root) {
          diagnostics.error('No S-expression list found', token.location);
        }
        break;
      }
    }
  }

  return {
    root: root ?? list([]),
    diagnostics: diagnostics.all,
    hasErrors: diagnostics.hasErrors,
    indent: indentUnit,
    newline: input.includes('\r\n') ? '\r\n' : '\n',
  };
}
