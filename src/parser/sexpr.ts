/**
 * KiCad S-expression node model & navigation helpers
 *
 * Nodes are immutable once built. A list's first item is, by convention, the
 * symbol naming it (its tag), e.g. `(pad "1" smd rect ...)`.
 */

import { Coord } from './coord';

export interface SourceLocation {
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  /** 0-based character offset */
  offset: number;
}

export interface SSymbol {
  readonly type: 'symbol';
  readonly value: string;
}

export interface SString {
  readonly type: 'string';
  readonly value: string;
  /** Source text between the quotes, when parsed */
  readonly raw?: string;
}

export interface SNumber {
  readonly type: 'number';
  readonly value: number;
  /** Source text, when parsed or explicitly formatted */
  readonly raw?: string;
}

export type SAtom = SSymbol | SString | SNumber;

/**
 * Line structure recorded while parsing: the number of line breaks before
 * each item and before the closing paren.
 */
export interface ListLayout {
  readonly breaks: readonly number[];
  readonly closeBreak: number;
}

export interface SList {
  readonly type: 'list';
  readonly items: readonly SExpr[];
  readonly layout?: ListLayout;
  readonly location?: SourceLocation;
}

export type SExpr = SAtom | SList;

// --- Construction ---

export function sym(value: string): SSymbol {
  const node: SSymbol = { type: 'symbol', value };
  return Object.freeze(node);
}

export function str(value: string, raw?: string): SString {
  const node: SString = raw === undefined ? { type: 'string', value } : { type: 'string', value, raw };
  return Object.freeze(node);
}

export function num(value: number, raw?: string): SNumber {
  const node: SNumber = raw === undefined ? { type: 'number', value } : { type: 'number', value, raw };
  return Object.freeze(node);
}

export function list(items: readonly SExpr[], layout?: ListLayout, location?: SourceLocation): SList {
  const node: { type: 'list'; items: readonly SExpr[]; layout?: ListLayout; location?: SourceLocation } = {
    type: 'list',
    items: Object.freeze([...items]),
  };
  if (layout) {
    node.layout = Object.freeze({ breaks: Object.freeze([...layout.breaks]), closeBreak: layout.closeBreak });
  }
  if (location) node.location = location;
  return Object.freeze(node);
}

/** Same tag and items, with a new item list; layout is kept only when the item count is unchanged */
export function withItems(node: SList, items: readonly SExpr[]): SList {
  const layout = node.layout && node.layout.breaks.length === items.length ? node.layout : undefined;
  return list(items, layout, node.location);
}

// --- Type guards ---

export function isList(expr: SExpr | undefined): expr is SList {
  return expr?.type === 'list';
}

export function isAtom(expr: SExpr | undefined): expr is SAtom {
  return expr !== undefined && expr.type !== 'list';
}

export function isSymbol(expr: SExpr | undefined, name?: string): expr is SSymbol {
  return expr?.type === 'symbol' && (name === undefined || expr.value === name);
}

// --- Navigation ---

/** The tag of a list: its first item when that is a symbol */
export function tagOf(expr: SExpr): string | undefined {
  if (expr.type !== 'list') return undefined;
  const head = expr.items[0];
  return head?.type === 'symbol' ? head.value : undefined;
}

/** Items after the tag */
export function childrenOf(node: SList): readonly SExpr[] {
  return tagOf(node) === undefined ? node.items : node.items.slice(1);
}

/** Find a child expression by its tag */
export function findExpr(node: SList, tag: string): SList | undefined {
  for (const child of node.items) {
    if (child.type === 'list' && tagOf(child) === tag) return child;
  }
  return undefined;
}

/** Find all child expressions matching a tag */
export function findAllExpr(node: SList, tag: string): SList[] {
  const results: SList[] = [];
  for (const child of node.items) {
    if (child.type === 'list' && tagOf(child) === tag) results.push(child);
  }
  return results;
}

/** The n-th item after the tag */
export function valueAt(node: SList, index: number): SExpr | undefined {
  return childrenOf(node)[index];
}

/** Text of an atom: symbols and strings as-is, numbers as written */
export function atomText(expr: SExpr | undefined): string | undefined {
  if (!expr) return undefined;
  switch (expr.type) {
    case 'symbol':
    case 'string':
      return expr.value;
    case 'number':
      return expr.raw ?? String(expr.value);
    case 'list':
      return undefined;
  }
}

export function atomNumber(expr: SExpr | undefined): number | undefined {
  return expr?.type === 'number' ? expr.value : undefined;
}

/** Get a text value from a tagged expression: (tag "value") -> "value" */
export function getStringValue(node: SList, tag: string): string | undefined {
  const found = findExpr(node, tag);
  return found ? atomText(valueAt(found, 0)) : undefined;
}

/** Get a number value from a tagged expression: (tag 123) -> 123 */
export function getNumberValue(node: SList, tag: string): number | undefined {
  const found = findExpr(node, tag);
  return found ? atomNumber(valueAt(found, 0)) : undefined;
}

/** Read a millimetre atom exactly from its source text; undefined when out of range */
export function atomCoord(expr: SExpr | undefined): Coord | undefined {
  if (expr?.type !== 'number') return undefined;
  return expr.raw !== undefined ? Coord.parse(expr.raw) : Coord.tryFromMm(expr.value);
}

/** Get XY coordinates from: (at 10 20 [90]) or (xy 10 20) */
export function getXY(node: SList, tag: string = 'at'): { x: Coord; y: Coord; rotation?: number } | undefined {
  const found = findExpr(node, tag);
  if (!found) return undefined;
  const x = atomCoord(valueAt(found, 0));
  const y = atomCoord(valueAt(found, 1));
  if (!x || !y) return undefined;
  const rotation = atomNumber(valueAt(found, 2));
  return rotation === undefined ? { x, y } : { x, y, rotation };
}

/** Get size from: (size 10 20) */
export function getSize(node: SList, tag: string = 'size'): { w: Coord; h: Coord } | undefined {
  const found = findExpr(node, tag);
  if (!found) return undefined;
  const w = atomCoord(valueAt(found, 0));
  const h = atomCoord(valueAt(found, 1));
  return w && h ? { w, h } : undefined;
}

/** Whether a bare symbol such as `hide` or `locked` appears among the items */
export function hasFlag(node: SList, name: string): boolean {
  return childrenOf(node).some(item => isSymbol(item, name));
}

const DECIMAL_TEXT = /^([+-]?)0*(\d*?)(?:\.(\d*?)0*)?$/;

/** Decimal text without sign noise or padding zeros: "+007.50" -> "7.5" */
function canonicalDecimal(text: string): string | undefined {
  const match = DECIMAL_TEXT.exec(text);
  if (!match) return undefined;
  const [, sign, whole, fraction = ''] = match;
  const magnitude = fraction ? `${whole || '0'}.${fraction}` : whole || '0';
  return sign === '-' && magnitude !== '0' ? `-${magnitude}` : magnitude;
}

// Exact on source text when both sides carry it; floats merge integers past 2^53
function sameNumber(a: SNumber, b: SNumber): boolean {
  const left = a.raw === undefined ? undefined : canonicalDecimal(a.raw);
  const right = b.raw === undefined ? undefined : canonicalDecimal(b.raw);
  return left !== undefined && right !== undefined ? left === right : a.value === b.value;
}

/**
 * Semantic equality: atom kinds and values, list items in order.
 * Layout, locations and source text are ignored.
 */
export function sexprEquals(a: SExpr, b: SExpr): boolean {
  if (a === b) return true;
  switch (a.type) {
    case 'symbol':
    case 'string':
      return (b.type === 'symbol' || b.type === 'string') && b.type === a.type && b.value === a.value;
    case 'number':
      return b.type === 'number' && sameNumber(a, b);
    case 'list': {
      if (b.type !== 'list' || b.items.length !== a.items.length) return false;
      for (let i = 0; i < a.items.length; i++) {
        if (!sexprEquals(a.items[i], b.items[i])) return false;
      }
      return true;
    }
  }
}

/** Compact single-line rendering for messages and debugging */
export function describeExpr(expr: SExpr, maxLength = 60): string {
  const text = expr.type === 'list'
    ? `(${expr.items.map(item => describeExpr(item, maxLength)).join(' ')})`
    : expr.type === 'string' ? JSON.stringify(expr.value) : atomText(expr) ?? '';
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}
