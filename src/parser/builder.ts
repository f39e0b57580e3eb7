/**
 * Fluent construction of S-expression lists.
 *
 * @example
 * new SExprBuilder('pad').addValue('1').addSymbol('smd').addSymbol('circle').build()
 * // (pad "1" smd circle)
 */

import { ContractViolationError } from '../shared/errors';
import { Coord } from './coord';
import { isNumericText } from './reader';
import { list, num, str, sym, type SExpr, type SList } from './sexpr';

const UNSAFE_SYMBOL = /[\s()"]/;

function violation(operation: string, message: string): ContractViolationError {
  return new ContractViolationError(message, { operation: `SExprBuilder.${operation}` });
}

/** Whether `name` can be written as a bare symbol */
export function isValidSymbol(name: string): boolean {
  return name.length > 0 && !UNSAFE_SYMBOL.test(name);
}

function checkSymbol(operation: string, name: unknown): string {
  if (typeof name !== 'string') {
    throw violation(operation, `Expected a symbol name, got ${typeof name}`);
  }
  if (!isValidSymbol(name)) {
    throw violation(operation, `Invalid symbol ${JSON.stringify(name)}: must be non-empty without whitespace, parentheses or quotes`);
  }
  return name;
}

function checkFinite(operation: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw violation(operation, `Numbers must be finite, got ${value}`);
  }
  return value;
}

function isNode(value: unknown): value is SExpr {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false;
  const { type } = value;
  return type === 'list' || type === 'symbol' || type === 'string' || type === 'number';
}

export class SExprBuilder {
  private readonly items: SExpr[] = [];
  private built = false;

  constructor(tag: string) {
    this.items.push(sym(checkSymbol('constructor', tag)));
  }

  static create(tag: string): SExprBuilder {
    return new SExprBuilder(tag);
  }

  /** Strings become quoted string atoms, numbers become number atoms */
  addValue(value: string | number): this {
    this.assertOpen('addValue');
    if (typeof value === 'string') {
      this.items.push(str(value));
    } else if (typeof value === 'number') {
      this.items.push(num(checkFinite('addValue', value)));
    } else {
      throw violation('addValue', `Expected a string or number, got ${typeof value}`);
    }
    return this;
  }

  /** A bare keyword such as a layer name or `smd`; never quoted */
  addSymbol(name: string): this {
    this.assertOpen('addSymbol');
    this.items.push(sym(checkSymbol('addSymbol', name)));
    return this;
  }

  addMm(coord: Coord): this {
    this.assertOpen('addMm');
    if (!(coord instanceof Coord)) {
      throw violation('addMm', 'Expected a Coord');
    }
    this.items.push(num(coord.toMm(), coord.toString()));
    return this;
  }

  addBool(value: boolean): this {
    this.assertOpen('addBool');
    if (typeof value !== 'boolean') {
      throw violation('addBool', `Expected a boolean, got ${typeof value}`);
    }
    this.items.push(sym(value ? 'yes' : 'no'));
    return this;
  }

  /** A number with its exact text, e.g. re-emitting "1.000" as read */
  addNumber(value: number, text: string): this {
    this.assertOpen('addNumber');
    checkFinite('addNumber', value);
    if (typeof text !== 'string' || !isNumericText(text)) {
      throw violation('addNumber', `Invalid number text ${JSON.stringify(text)}`);
    }
    this.items.push(num(value, text));
    return this;
  }

  /** Append a nested list built by `configure` */
  addChild(tag: string, configure?: (child: SExprBuilder) => void): this;
  /** Append an existing node, e.g. a passthrough subtree kept from parsing */
  addChild(node: SExpr): this;
  addChild(tagOrNode: string | SExpr, configure?: (child: SExprBuilder) => void): this {
    this.assertOpen('addChild');
    if (typeof tagOrNode === 'string') {
      const child = new SExprBuilder(tagOrNode);
      configure?.(child);
      this.items.push(child.build());
    } else if (isNode(tagOrNode)) {
      this.items.push(tagOrNode);
    } else {
      throw violation('addChild', 'Expected a tag or an S-expression node');
    }
    return this;
  }

  addChildren(nodes: Iterable<SExpr>): this {
    for (const node of nodes) this.addChild(node);
    return this;
  }

  build(): SList {
    this.assertOpen('build');
    this.built = true;
    return list(this.items);
  }

  private assertOpen(operation: string): void {
    if (this.built) {
      throw violation(operation, 'Builder was already built');
    }
  }
}
