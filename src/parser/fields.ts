/**
 * Field readers and builders shared by the document mappers.
 *
 * Every era-dependent encoding is captured on read and reproduced on build:
 * symbol vs quoted text, bare vs `(flag yes)` flags, `uuid` vs `tstamp`,
 * `(stroke ...)` vs legacy `(width ...)`.
 */

import { Coord, type CoordPoint } from './coord';
import { SExprBuilder, isValidSymbol } from './builder';
import {
  ChildEmitter, ChildOrder, ListReader,
  defaulted, encoded, fresh, variantOr,
  type EncodedValue,
} from './fidelity';
import { isNumericText } from './reader';
import { atomCoord, atomNumber, atomText, num, str, sym, type SExpr, type SList } from './sexpr';

// --- Text atoms ---

export type AtomKind = 'symbol' | 'string' | 'number';
export type Text = EncodedValue<string, AtomKind>;

export function readText(expr: SExpr | undefined): Text | undefined {
  if (!expr || expr.type === 'list') return undefined;
  return encoded(atomText(expr) ?? '', expr.type);
}

export function freshText(value: string): Text {
  return fresh(value);
}

/** Atom for a text value in its observed kind; falls back to a quoted string when that kind cannot hold the text */
export function textAtom(text: Text, canonical: AtomKind = 'string'): SExpr {
  const kind = variantOr(text, canonical);
  if (kind === 'symbol' && isValidSymbol(text.value)) return sym(text.value);
  if (kind === 'number' && isNumericText(text.value)) return num(Number(text.value), text.value);
  return str(text.value);
}

/** (tag value) */
export function readTextField(reader: ListReader, tag: string): Text | undefined {
  const node = reader.list(tag);
  if (!node) return undefined;
  const text = node.items.length === 2 ? readText(node.items[1]) : undefined;
  if (!text) {
    reader.warn(`Malformed ${tag}`, node);
    return undefined;
  }
  reader.consume(node, tag);
  return text;
}

export function textNode(tag: string, text: Text, canonical: AtomKind = 'string'): SList {
  return new SExprBuilder(tag).addChild(textAtom(text, canonical)).build();
}

/** (tag a b c ...) with atoms only */
export function readTextList(reader: ListReader, tag: string): Text[] | undefined {
  const node = reader.list(tag);
  if (!node) return undefined;
  const texts: Text[] = [];
  for (const item of node.items.slice(1)) {
    const text = readText(item);
    if (!text) {
      reader.warn(`Malformed ${tag}`, node);
      return undefined;
    }
    texts.push(text);
  }
  reader.consume(node, tag);
  return texts;
}

export function textListNode(tag: string, texts: readonly Text[], canonical: AtomKind = 'string'): SList {
  return new SExprBuilder(tag).addChildren(texts.map(text => textAtom(text, canonical))).build();
}

// --- Numbers and lengths ---

export function readNumberField(reader: ListReader, tag: string): number | undefined {
  const node = reader.list(tag);
  if (!node) return undefined;
  const value = node.items.length === 2 ? atomNumber(node.items[1]) : undefined;
  if (value === undefined) {
    reader.warn(`Malformed ${tag}`, node);
    return undefined;
  }
  reader.consume(node, tag);
  return value;
}

export function numberNode(tag: string, value: number): SList {
  return new SExprBuilder(tag).addValue(value).build();
}

export function readCoordField(reader: ListReader, tag: string): Coord | undefined {
  const node = reader.list(tag);
  if (!node) return undefined;
  const value = node.items.length === 2 ? atomCoord(node.items[1]) : undefined;
  if (!value) {
    reader.warn(`Malformed ${tag}`, node);
    return undefined;
  }
  reader.consume(node, tag);
  return value;
}

export function coordNode(tag: string, value: Coord): SList {
  return new SExprBuilder(tag).addMm(value).build();
}

// --- Flags ---

export type FlagEncoding = 'bare' | 'child';
export type Flag = EncodedValue<boolean, FlagEncoding>;

export interface FlagOptions {
  /** Value when the flag is absent */
  fallback?: boolean;
  /** First item index where a bare flag may appear */
  startIndex?: number;
}

/** `name` as a bare symbol, or `(name yes|no)` */
export function readFlag(reader: ListReader, name: string, options: FlagOptions = {}): Flag {
  const bare = reader.symbol(name, options.startIndex);
  if (bare) {
    reader.consume(bare, name);
    return encoded(true, 'bare');
  }
  const child = reader.list(name);
  if (child) {
    const value = child.items[1];
    if (child.items.length === 2 && value.type === 'symbol' && (value.value === 'yes' || value.value === 'no')) {
      reader.consume(child, name);
      return encoded(value.value === 'yes', 'child');
    }
    reader.warn(`Malformed ${name} flag`, child);
  }
  return defaulted(options.fallback ?? false);
}

export function freshFlag(value: boolean): Flag {
  return fresh(value);
}

/** Bare flags are only written when set; child flags whenever they are explicit */
export function flagNode(name: string, flag: Flag): SExpr | undefined {
  if (variantOr(flag, 'child') === 'bare') {
    return flag.value ? sym(name) : undefined;
  }
  if (!flag.explicit) return undefined;
  return new SExprBuilder(name).addBool(flag.value).build();
}

// --- Header ---

export interface FileHeader {
  version?: number;
  generator?: Text;
  generatorVersion?: Text;
}

export function readHeader(reader: ListReader): FileHeader {
  const header: FileHeader = {};
  const version = readNumberField(reader, 'version');
  if (version !== undefined) header.version = version;
  const generator = readTextField(reader, 'generator');
  if (generator) header.generator = generator;
  const generatorVersion = readTextField(reader, 'generator_version');
  if (generatorVersion) header.generatorVersion = generatorVersion;
  return header;
}

export function emitHeader(emitter: ChildEmitter, header: FileHeader): void {
  if (header.version !== undefined) emitter.add('version', numberNode('version', header.version));
  if (header.generator) emitter.add('generator', textNode('generator', header.generator));
  if (header.generatorVersion) emitter.add('generator_version', textNode('generator_version', header.generatorVersion));
}

// --- Geometry ---

export interface Position {
  x: Coord;
  y: Coord;
  /** Degrees; absent when the source omitted it */
  angle?: number;
  /** Trailing atoms such as `unlocked` */
  extra?: readonly SExpr[];
}

export function positionOf(node: SList): Position | undefined {
  const x = atomCoord(node.items[1]);
  const y = atomCoord(node.items[2]);
  if (!x || !y) return undefined;
  const angle = atomNumber(node.items[3]);
  const extra = node.items.slice(angle === undefined ? 3 : 4);
  if (extra.some(item => item.type === 'list')) return undefined;
  const position: Position = { x, y };
  if (angle !== undefined) position.angle = angle;
  if (extra.length > 0) position.extra = extra;
  return position;
}

/** (at x y [angle]) */
export function readPosition(reader: ListReader, tag = 'at'): Position | undefined {
  const node = reader.list(tag);
  if (!node) return undefined;
  const position = positionOf(node);
  if (!position) {
    reader.warn(`Malformed ${tag}`, node);
    return undefined;
  }
  reader.consume(node, tag);
  return position;
}

export function positionNode(position: Position, tag = 'at'): SList {
  const builder = new SExprBuilder(tag).addMm(position.x).addMm(position.y);
  if (position.angle !== undefined) builder.addValue(position.angle);
  if (position.extra) builder.addChildren(position.extra);
  return builder.build();
}

export function pointOf(node: SList): CoordPoint | undefined {
  if (node.items.length !== 3) return undefined;
  const x = atomCoord(node.items[1]);
  const y = atomCoord(node.items[2]);
  return x && y ? { x, y } : undefined;
}

/** (start x y), (end x y), (xy x y) ... */
export function readPoint(reader: ListReader, tag: string): CoordPoint | undefined {
  const node = reader.list(tag);
  if (!node) return undefined;
  const point = pointOf(node);
  if (!point) {
    reader.warn(`Malformed ${tag}`, node);
    return undefined;
  }
  reader.consume(node, tag);
  return point;
}

export function pointNode(tag: string, point: CoordPoint): SList {
  return new SExprBuilder(tag).addMm(point.x).addMm(point.y).build();
}

/** (pts (xy ..) ...); lists holding anything but xy points stay unmodeled */
export function readPoints(reader: ListReader): CoordPoint[] | undefined {
  const node = reader.list('pts');
  if (!node) return undefined;
  const points: CoordPoint[] = [];
  for (const item of node.items.slice(1)) {
    const point = item.type === 'list' && atomText(item.items[0]) === 'xy' ? pointOf(item) : undefined;
    if (!point) return undefined;
    points.push(point);
  }
  reader.consume(node, 'pts');
  return points;
}

export function pointsNode(points: readonly CoordPoint[]): SList {
  return new SExprBuilder('pts').addChildren(points.map(p => pointNode('xy', p))).build();
}

export interface Size {
  w: Coord;
  h: Coord;
}

export function readSize(reader: ListReader, tag = 'size'): Size | undefined {
  const node = reader.list(tag);
  if (!node) return undefined;
  const point = pointOf(node);
  if (!point) {
    reader.warn(`Malformed ${tag}`, node);
    return undefined;
  }
  reader.consume(node, tag);
  return { w: point.x, h: point.y };
}

export function sizeNode(size: Size, tag = 'size'): SList {
  return new SExprBuilder(tag).addMm(size.w).addMm(size.h).build();
}

// --- Identity ---

export type UuidToken = 'uuid' | 'tstamp';

export interface Uuid {
  id: Text;
  /** Undefined for fresh ids, which are written as `uuid` */
  token?: UuidToken;
}

export function readUuid(reader: ListReader): Uuid | undefined {
  for (const token of ['uuid', 'tstamp'] as const) {
    const node = reader.list(token);
    if (!node) continue;
    const id = node.items.length === 2 ? readText(node.items[1]) : undefined;
    if (!id) {
      reader.warn(`Malformed ${token}`, node);
      return undefined;
    }
    reader.consume(node, 'uuid');
    return { id, token };
  }
  return undefined;
}

export function freshUuid(id: string): Uuid {
  return { id: freshText(id) };
}

export function uuidNode(uuid: Uuid): SList {
  return textNode(uuid.token ?? 'uuid', uuid.id);
}

// --- Stroke ---

export type StrokeStyle = 'stroke' | 'width';

export interface Stroke {
  width: Coord;
  type?: Text;
  order: ChildOrder;
}

export const STROKE_FIELDS = ['width', 'type'] as const;

/** (stroke (width w) (type t) ...) or the legacy (width w); consumed under the key `stroke` */
export function readStroke(reader: ListReader): EncodedValue<Stroke, StrokeStyle> | undefined {
  const node = reader.list('stroke');
  if (node) {
    const inner = new ListReader(node, reader.diagnostics, reader.nested('stroke'));
    const width = readCoordField(inner, 'width');
    if (!width) {
      reader.warn('Stroke without width', node);
      return undefined;
    }
    const stroke: Stroke = { width, order: ChildOrder.empty };
    const type = readTextField(inner, 'type');
    if (type) stroke.type = type;
    stroke.order = inner.order(1);
    reader.consume(node, 'stroke');
    return encoded(stroke, 'stroke');
  }
  const legacy = reader.list('width');
  if (!legacy) return undefined;
  const width = legacy.items.length === 2 ? atomCoord(legacy.items[1]) : undefined;
  if (!width) {
    reader.warn('Malformed width', legacy);
    return undefined;
  }
  reader.consume(legacy, 'stroke');
  return encoded({ width, order: ChildOrder.empty }, 'width');
}

export function freshStroke(width: Coord, type?: string): EncodedValue<Stroke, StrokeStyle> {
  return fresh(type === undefined
    ? { width, order: ChildOrder.empty }
    : { width, type: freshText(type), order: ChildOrder.empty });
}

export function strokeNode(stroke: EncodedValue<Stroke, StrokeStyle>): SList {
  const { width, type, order } = stroke.value;
  if (variantOr(stroke, 'stroke') === 'width' && !type) return coordNode('width', width);
  const emitter = new ChildEmitter().add('width', coordNode('width', width));
  if (type) emitter.add('type', textNode('type', type, 'symbol'));
  return new SExprBuilder('stroke').addChildren(emitter.arrange(order, STROKE_FIELDS)).build();
}

// --- Text effects ---

export interface Font {
  size?: Size;
  thickness?: Coord;
  order: ChildOrder;
}

export interface Effects {
  font?: Font;
  hide: Flag;
  order: ChildOrder;
}

export const FONT_FIELDS = ['size', 'thickness'] as const;
export const EFFECTS_FIELDS = ['font', 'hide'] as const;

export function readEffects(reader: ListReader): Effects | undefined {
  const node = reader.list('effects');
  if (!node) return undefined;
  const inner = new ListReader(node, reader.diagnostics, reader.nested('effects'));
  const effects: Effects = { hide: readFlag(inner, 'hide'), order: ChildOrder.empty };

  const fontNode = inner.list('font');
  if (fontNode) {
    const fontReader = new ListReader(fontNode, reader.diagnostics, inner.nested('font'));
    const font: Font = { order: ChildOrder.empty };
    const size = readSize(fontReader);
    if (size) font.size = size;
    const thickness = readCoordField(fontReader, 'thickness');
    if (thickness) font.thickness = thickness;
    font.order = fontReader.order(1);
    effects.font = font;
    inner.consume(fontNode, 'font');
  }

  effects.order = inner.order(1);
  reader.consume(node, 'effects');
  return effects;
}

export function freshEffects(size?: Size, hide = false): Effects {
  return {
    font: size ? { size, order: ChildOrder.empty } : undefined,
    hide: hide ? freshFlag(true) : defaulted(false),
    order: ChildOrder.empty,
  };
}

export function effectsNode(effects: Effects): SList {
  const emitter = new ChildEmitter();
  const { font } = effects;
  if (font) {
    const fontEmitter = new ChildEmitter();
    if (font.size) fontEmitter.add('size', sizeNode(font.size));
    if (font.thickness) fontEmitter.add('thickness', coordNode('thickness', font.thickness));
    emitter.add('font', new SExprBuilder('font').addChildren(fontEmitter.arrange(font.order, FONT_FIELDS)).build());
  }
  emitter.add('hide', flagNode('hide', effects.hide));
  return new SExprBuilder('effects').addChildren(emitter.arrange(effects.order, EFFECTS_FIELDS)).build();
}

// --- Properties ---

export interface Property {
  type: 'property';
  key: Text;
  value: Text;
  /** Field id written by KiCad 6 and 7 */
  id?: number;
  at?: Position;
  layer?: Text;
  hide: Flag;
  uuid?: Uuid;
  effects?: Effects;
  order: ChildOrder;
}

export const PROPERTY_FIELDS = ['id', 'at', 'layer', 'hide', 'uuid', 'effects'] as const;

/** (property key value ...); undefined (with a warning) when key or value is missing */
export function readProperty(reader: ListReader): Property | undefined {
  const key = readText(reader.item(1));
  const value = readText(reader.item(2));
  if (!key || !value) {
    reader.warn('Property without key or value');
    return undefined;
  }
  const property: Property = {
    type: 'property',
    key,
    value,
    hide: readFlag(reader, 'hide', { startIndex: 3 }),
    order: ChildOrder.empty,
  };
  const id = readNumberField(reader, 'id');
  if (id !== undefined) property.id = id;
  const at = readPosition(reader);
  if (at) property.at = at;
  const layer = readTextField(reader, 'layer');
  if (layer) property.layer = layer;
  const uuid = readUuid(reader);
  if (uuid) property.uuid = uuid;
  const effects = readEffects(reader);
  if (effects) property.effects = effects;
  property.order = reader.order(3);
  return property;
}

export function freshProperty(key: string, value: string, fields: Partial<Omit<Property, 'type' | 'key' | 'value'>> = {}): Property {
  return {
    type: 'property',
    key: freshText(key),
    value: freshText(value),
    hide: defaulted(false),
    order: ChildOrder.empty,
    ...fields,
  };
}

export function propertyNode(property: Property): SList {
  const emitter = new ChildEmitter();
  if (property.id !== undefined) emitter.add('id', numberNode('id', property.id));
  if (property.at) emitter.add('at', positionNode(property.at));
  if (property.layer) emitter.add('layer', textNode('layer', property.layer));
  emitter.add('hide', flagNode('hide', property.hide));
  if (property.uuid) emitter.add('uuid', uuidNode(property.uuid));
  if (property.effects) emitter.add('effects', effectsNode(property.effects));
  return new SExprBuilder('property')
    .addChild(textAtom(property.key))
    .addChild(textAtom(property.value))
    .addChildren(emitter.arrange(property.order, PROPERTY_FIELDS))
    .build();
}

/** Find a property by key */
export function findProperty(properties: readonly Property[], key: string): Property | undefined {
  return properties.find(p => p.key.value === key);
}
