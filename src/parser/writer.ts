/**
 * KiCad S-Expression Writer
 *
 * Lists that carry a recorded layout are written with the same line structure
 * they were read with. Everything else gets the canonical layout: atom-only
 * lists on one line, otherwise one nested list per line and the closing paren
 * on its own line.
 */

import { ContractViolationError } from '../shared/errors';
import type { SAtom, SExpr, SList } from './sexpr';

export interface WriteOptions {
  /** One indentation unit (default: tab) */
  indent?: string;
  newline?: '\n' | '\r\n';
  /** Reproduce recorded line breaks (default: true) */
  preserveLayout?: boolean;
}

interface WriteContext {
  indent: string;
  newline: string;
  preserveLayout: boolean;
}

const INDENT_PATTERN = /^[\t ]*$/;

/** Integers without a point, reals with up to six trimmed fractional digits */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new ContractViolationError(`Cannot write non-finite number ${value}`, { operation: 'formatNumber' });
  }
  if (Number.isInteger(value)) {
    if (value === 0) return '0';
    return Math.abs(value) < 1e21 ? value.toFixed(0) : BigInt(value).toString();
  }
  const text = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return text === '-0' ? '0' : text;
}

/** Quote a string, escaping only `"` and `\`; newlines stay literal */
export function quoteString(value: string): string {
  return `"${value.replace(/[\\"]/g, ch => `\\${ch}`)}"`;
}

export function formatAtom(atom: SAtom): string {
  switch (atom.type) {
    case 'symbol':
      return atom.value;
    case 'string':
      return atom.raw !== undefined ? `"${atom.raw}"` : quoteString(atom.value);
    case 'number':
      return atom.raw ?? formatNumber(atom.value);
  }
}

/** Line breaks before each item and before the closing paren, without a recorded layout */
function canonicalBreaks(node: SList): { breaks: readonly number[]; closeBreak: number } {
  const firstList = node.items.findIndex((item, i) => i > 0 && item.type === 'list');
  if (firstList === -1) {
    return { breaks: node.items.map(() => 0), closeBreak: 0 };
  }
  const breaks = node.items.map((item, i) => (i >= firstList && (item.type === 'list' || i > firstList) ? 1 : 0));
  return { breaks, closeBreak: 1 };
}

function writeList(node: SList, depth: number, ctx: WriteContext, out: string[]): void {
  if (node.items.length === 0) {
    out.push('()');
    return;
  }
  const layout = ctx.preserveLayout && node.layout && node.layout.breaks.length === node.items.length
    ? node.layout
    : canonicalBreaks(node);
  const lineBreak = (count: number, level: number): string => ctx.newline.repeat(count) + ctx.indent.repeat(level);

  out.push('(');
  node.items.forEach((item, i) => {
    const breaks = layout.breaks[i];
    if (breaks > 0) {
      out.push(lineBreak(breaks, depth + 1));
    } else if (i > 0) {
      out.push(' ');
    }
    writeExpr(item, depth + 1, ctx, out);
  });
  if (layout.closeBreak > 0) out.push(lineBreak(layout.closeBreak, depth));
  out.push(')');
}

function writeExpr(expr: SExpr, depth: number, ctx: WriteContext, out: string[]): void {
  if (expr.type === 'list') {
    writeList(expr, depth, ctx, out);
  } else {
    out.push(formatAtom(expr));
  }
}

/** Serialize a tree to text ending with exactly one newline */
export function serializeSExpression(root: SExpr, options: WriteOptions = {}): string {
  const indent = options.indent ?? '\t';
  if (!INDENT_PATTERN.test(indent)) {
    throw new ContractViolationError(`Indent may only contain tabs and spaces, got ${JSON.stringify(indent)}`, {
      operation: 'serializeSExpression',
    });
  }
  const newline = options.newline ?? '\n';
  const out: string[] = [];
  writeExpr(root, 0, { indent, newline, preserveLayout: options.preserveLayout ?? true }, out);
  out.push(newline);
  return out.join('');
}
