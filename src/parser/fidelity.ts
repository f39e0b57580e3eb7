/**
 * Fidelity-flag contract
 *
 * Mappers record how a value was encoded when it was read (`EncodedValue`),
 * the order of a list's children (`ChildOrder`) and every child they do not
 * model (`Section`). Builders consult those records so an unedited model
 * rebuilds to the tree it was read from, and `reconcile` then restores the
 * source layout and number/string text on every unchanged node.
 */

import type { DiagnosticBag } from './diagnostics';
import { describeExpr, list, sexprEquals, tagOf, type SExpr, type SList } from './sexpr';

// --- Encoded values ---

export interface EncodedValue<T, V extends string = never> {
  readonly value: T;
  /** Present in the source, or set by user code; absent values are not written */
  readonly explicit: boolean;
  /** Encoding observed in the source; undefined means the canonical one */
  readonly variant?: V;
}

/** A value as read from the source */
export function encoded<T, V extends string>(value: T, variant: V): EncodedValue<T, V> {
  return { value, explicit: true, variant };
}

/** A value created in memory; written with the canonical encoding */
export function fresh<T, V extends string = never>(value: T): EncodedValue<T, V> {
  return { value, explicit: true };
}

/** A value that was absent from the source */
export function defaulted<T, V extends string = never>(value: T): EncodedValue<T, V> {
  return { value, explicit: false };
}

/** Replace the value, keeping the observed encoding */
export function withValue<T, V extends string>(current: EncodedValue<T, V>, value: T): EncodedValue<T, V> {
  return current.variant === undefined ? { value, explicit: true } : { value, explicit: true, variant: current.variant };
}

export function variantOr<T, V extends string>(current: EncodedValue<T, V>, canonical: V): V {
  return current.variant ?? canonical;
}

// --- Sections ---

export type Section<T> =
  | { readonly kind: 'modeled'; readonly value: T }
  | { readonly kind: 'unmodeled'; readonly node: SExpr };

export function modeled<T>(value: T): Section<T> {
  return { kind: 'modeled', value };
}

export function unmodeled<T = never>(node: SExpr): Section<T> {
  return { kind: 'unmodeled', node };
}

export function modeledValues<T>(sections: readonly Section<T>[]): T[] {
  const values: T[] = [];
  for (const section of sections) {
    if (section.kind === 'modeled') values.push(section.value);
  }
  return values;
}

/** Modeled items of one type, e.g. the pads among a footprint's items */
export function itemsOfType<I extends { type: string }, T extends I['type']>(
  sections: readonly Section<I>[],
  type: T,
): Extract<I, { type: T }>[] {
  const isType = (item: I): item is Extract<I, { type: T }> => item.type === type;
  const values: Extract<I, { type: T }>[] = [];
  for (const section of sections) {
    if (section.kind === 'modeled' && isType(section.value)) values.push(section.value);
  }
  return values;
}

export function sectionNode<T>(section: Section<T>, build: (value: T) => SExpr): SExpr {
  return section.kind === 'modeled' ? build(section.value) : section.node;
}

// --- Child order ---

/**
 * Order of a list's children after its positional atoms: each slot is either
 * the key of a modeled field or an unmodeled node kept verbatim.
 */
export class ChildOrder {
  static readonly empty = new ChildOrder([]);

  private constructor(readonly slots: readonly Section<string>[]) {}

  /** `keyOf` names the field an item was read into, or undefined for unmodeled items */
  static capture(node: SList, startIndex: number, keyOf: (item: SExpr) => string | undefined): ChildOrder {
    const slots: Section<string>[] = [];
    for (let i = startIndex; i < node.items.length; i++) {
      const item = node.items[i];
      const key = keyOf(item);
      slots.push(key === undefined ? unmodeled(item) : modeled(key));
    }
    return slots.length === 0 ? ChildOrder.empty : new ChildOrder(slots);
  }

  get unmodeledNodes(): SExpr[] {
    const nodes: SExpr[] = [];
    for (const slot of this.slots) {
      if (slot.kind === 'unmodeled') nodes.push(slot.node);
    }
    return nodes;
  }

  /**
   * Lay out built children: each slot takes the next node produced for its
   * key, unmodeled nodes stay in place, surplus nodes follow the last slot of
   * their key, and keys with no slot are inserted by their canonical rank.
   */
  arrange(produced: ReadonlyMap<string, readonly SExpr[]>, canonical: readonly string[]): SExpr[] {
    const queues = new Map<string, SExpr[]>();
    for (const [key, nodes] of produced) queues.set(key, [...nodes]);

    const lastSlot = new Map<string, number>();
    this.slots.forEach((slot, i) => {
      if (slot.kind === 'modeled') lastSlot.set(slot.value, i);
    });

    const out: { key?: string; node: SExpr }[] = [];
    this.slots.forEach((slot, i) => {
      if (slot.kind === 'unmodeled') {
        out.push({ node: slot.node });
        return;
      }
      const queue = queues.get(slot.value);
      if (!queue) return;
      const take = lastSlot.get(slot.value) === i ? queue.length : Math.min(1, queue.length);
      for (const node of queue.splice(0, take)) out.push({ key: slot.value, node });
    });

    const rank = (key: string | undefined): number => (key === undefined ? -1 : canonical.indexOf(key));
    const missing = [...queues.keys()]
      .filter(key => !lastSlot.has(key) && (queues.get(key)?.length ?? 0) > 0)
      .sort((a, b) => {
        const ra = rank(a);
        const rb = rank(b);
        return (ra === -1 ? canonical.length : ra) - (rb === -1 ? canonical.length : rb);
      });

    for (const key of missing) {
      const nodes = (queues.get(key) ?? []).map(node => ({ key, node }));
      const own = rank(key);
      const before = own === -1 ? -1 : out.findIndex(entry => rank(entry.key) > own);
      if (before === -1) {
        out.push(...nodes);
      } else {
        out.splice(before, 0, ...nodes);
      }
    }
    return out.map(entry => entry.node);
  }
}

/** Collects built child nodes by field key for `ChildOrder.arrange` */
export class ChildEmitter {
  private readonly produced = new Map<string, SExpr[]>();

  add(key: string, node: SExpr | undefined): this {
    if (node === undefined) return this;
    const nodes = this.produced.get(key);
    if (nodes) {
      nodes.push(node);
    } else {
      this.produced.set(key, [node]);
    }
    return this;
  }

  addAll(key: string, nodes: Iterable<SExpr>): this {
    for (const node of nodes) this.add(key, node);
    return this;
  }

  arrange(order: ChildOrder, canonical: readonly string[]): SExpr[] {
    return order.arrange(this.produced, canonical);
  }
}

// --- Reading ---

/**
 * Walks one list while a mapper reads it, remembering which children were
 * consumed into modeled fields so the rest can be kept as passthrough.
 */
export class ListReader {
  private readonly keys = new Map<SExpr, string>();

  constructor(
    readonly node: SList,
    readonly diagnostics: DiagnosticBag,
    readonly context: string,
  ) {}

  get tag(): string | undefined {
    return tagOf(this.node);
  }

  /** Item at `index` of the whole list (the tag is index 0) */
  item(index: number): SExpr | undefined {
    return this.node.items[index];
  }

  /** First child list with the tag that has not been consumed */
  list(tag: string): SList | undefined {
    for (const item of this.node.items) {
      if (item.type === 'list' && !this.keys.has(item) && tagOf(item) === tag) return item;
    }
    return undefined;
  }

  lists(tag: string): SList[] {
    const found: SList[] = [];
    for (const item of this.node.items) {
      if (item.type === 'list' && !this.keys.has(item) && tagOf(item) === tag) found.push(item);
    }
    return found;
  }

  /** Bare symbol child with the given name */
  symbol(name: string, startIndex = 1): SExpr | undefined {
    for (let i = startIndex; i < this.node.items.length; i++) {
      const item = this.node.items[i];
      if (item.type === 'symbol' && item.value === name && !this.keys.has(item)) return item;
    }
    return undefined;
  }

  consume(item: SExpr, key: string): void {
    this.keys.set(item, key);
  }

  /** Items from `startIndex` on that no field has consumed */
  remaining(startIndex: number): SExpr[] {
    return this.node.items.slice(startIndex).filter(item => !this.keys.has(item));
  }

  /** Context path for a child, e.g. "kicad_pcb > segment" */
  nested(tag: string): string {
    return `${this.context} > ${tag}`;
  }

  warn(message: string, item: SExpr = this.node): void {
    const location = item.type === 'list' ? item.location : this.node.location;
    this.diagnostics.warning(`${message}: ${describeExpr(item)}`, location, this.context);
  }

  order(startIndex: number): ChildOrder {
    return ChildOrder.capture(this.node, startIndex, item => this.keys.get(item));
  }
}

// --- Reconciling ---

function sameShape(a: SExpr, b: SExpr): boolean {
  if (a.type === 'list' || b.type === 'list') {
    return a.type === 'list' && b.type === 'list' && tagOf(a) === tagOf(b);
  }
  return true;
}

/**
 * Map a rebuilt tree back onto the tree it was read from. Nodes equal to
 * their source counterpart are replaced by it; lists that changed keep the
 * source line structure around their unchanged items.
 */
export function reconcile(fresh: SExpr, source: SExpr | undefined): SExpr {
  if (!source) return fresh;
  if (sexprEquals(fresh, source)) return source;
  if (fresh.type !== 'list' || source.type !== 'list' || tagOf(fresh) !== tagOf(source)) return fresh;

  const sourceBreaks = source.layout?.breaks;
  const broken = sourceBreaks?.some(count => count > 0) ?? false;
  const items: SExpr[] = [];
  const breaks: number[] = [];
  let cursor = 0;

  for (const item of fresh.items) {
    let matched = -1;
    if (cursor < source.items.length && sexprEquals(item, source.items[cursor])) {
      matched = cursor;
    } else if (item.type === 'list') {
      for (let j = cursor + 1; j < source.items.length; j++) {
        if (sexprEquals(item, source.items[j])) {
          matched = j;
          break;
        }
      }
    }

    if (matched !== -1) {
      items.push(source.items[matched]);
      breaks.push(sourceBreaks?.[matched] ?? 0);
      cursor = matched + 1;
    } else if (cursor < source.items.length && sameShape(item, source.items[cursor])) {
      items.push(reconcile(item, source.items[cursor]));
      breaks.push(sourceBreaks?.[cursor] ?? 0);
      cursor++;
    } else {
      items.push(item);
      breaks.push(broken && item.type === 'list' ? 1 : 0);
    }
  }

  if (!source.layout) return list(items, undefined, source.location);
  return list(items, { breaks, closeBreak: source.layout.closeBreak }, source.location);
}
