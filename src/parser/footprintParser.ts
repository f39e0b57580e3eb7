/**
 * KiCad Footprint (.kicad_mod) Parser
 *
 * Reads standalone footprints and footprints embedded in boards into a typed
 * model and builds them back. Children the model does not cover stay in
 * `items` as unmodeled sections.
 */

import type { Coord } from './coord';
import { SExprBuilder } from './builder';
import { DiagnosticBag, type Diagnostic } from './diagnostics';
import {
  ChildEmitter, ChildOrder, ListReader,
  defaulted, itemsOfType, modeled, sectionNode, unmodeled,
  type Section,
} from './fidelity';
import {
  coordNode, effectsNode, emitHeader, flagNode, freshText, numberNode, positionNode,
  propertyNode, readCoordField, readEffects, readFlag, readHeader, readNumberField,
  readPosition, readProperty, readSize, readText, readTextField, readTextList, readUuid,
  sizeNode, textAtom, textListNode, textNode, uuidNode,
  type Effects, type FileHeader, type Flag, type Position, type Property, type Size, type Text, type Uuid,
} from './fields';
import { buildGraphic, graphicShapeOf, readGraphic, type Graphic } from './graphics';
import { parseSExpression } from './reader';
import { atomCoord, atomNumber, tagOf, type SExpr, type SList } from './sexpr';
import { serializeSExpression, type WriteOptions } from './writer';

// --- Types ---

export type FootprintToken = 'footprint' | 'module';

export interface PadNet {
  number: number;
  name: Text;
}

export interface Pad {
  type: 'pad';
  number: Text;
  /** smd, thru_hole, np_thru_hole, connect */
  padType: Text;
  /** rect, circle, oval, roundrect, trapezoid, custom */
  shape: Text;
  at: Position;
  size?: Size;
  /** Round drills only; oval or offset drills stay unmodeled */
  drill?: Coord;
  layers?: Text[];
  roundrectRatio?: number;
  net?: PadNet;
  locked: Flag;
  uuid?: Uuid;
  order: ChildOrder;
}

export interface FpText {
  type: 'fp_text';
  /** reference, value or user */
  kind: Text;
  text: Text;
  at?: Position;
  layer?: Text;
  hide: Flag;
  uuid?: Uuid;
  effects?: Effects;
  order: ChildOrder;
}

export type FootprintItem = Property | FpText | Pad | Graphic;

export interface Footprint {
  type: 'footprint';
  /** Undefined for fresh footprints, which are written as `footprint` */
  token?: FootprintToken;
  /** Library id, e.g. "Resistor_SMD:R_0603_1608Metric" */
  name: Text;
  header: FileHeader;
  locked: Flag;
  placed: Flag;
  layer?: Text;
  descr?: Text;
  tags?: Text;
  /** Placement on a board */
  at?: Position;
  attributes?: Text[];
  uuid?: Uuid;
  items: Section<FootprintItem>[];
  order: ChildOrder;
}

export interface FootprintParseResult {
  footprint?: Footprint;
  root: SList;
  diagnostics: readonly Diagnostic[];
  hasErrors: boolean;
}

export const FOOTPRINT_FIELDS = [
  'locked', 'placed', 'version', 'generator', 'generator_version',
  'layer', 'uuid', 'at', 'descr', 'tags', 'attr', 'item',
] as const;
export const PAD_FIELDS = ['locked', 'at', 'size', 'drill', 'layers', 'roundrect_rratio', 'net', 'uuid'] as const;
export const FP_TEXT_FIELDS = ['at', 'layer', 'hide', 'uuid', 'effects'] as const;

export function isFootprintToken(tag: string | undefined): tag is FootprintToken {
  return tag === 'footprint' || tag === 'module';
}

// --- Parser ---

export class KicadFootprintParser {
  parse(content: string): FootprintParseResult {
    const diagnostics = new DiagnosticBag();
    const { root } = parseSExpression(content, { diagnostics });
    let footprint: Footprint | undefined;
    if (isFootprintToken(tagOf(root))) {
      footprint = this.read(root, diagnostics);
    } else {
      diagnostics.error(`Expected a footprint, found (${tagOf(root) ?? ''} ...)`, root.location);
    }
    return { footprint, root, diagnostics: diagnostics.all, hasErrors: diagnostics.hasErrors };
  }

  /** Undefined (with a warning) when the list is not a readable footprint */
  read(node: SList, diagnostics: DiagnosticBag, context?: string): Footprint | undefined {
    const token = tagOf(node);
    if (!isFootprintToken(token)) {
      diagnostics.warning(`Not a footprint: (${token ?? ''} ...)`, node.location, context);
      return undefined;
    }
    const reader = new ListReader(node, diagnostics, context ? `${context} > ${token}` : token);
    const name = readText(node.items[1]);
    if (!name) {
      reader.warn('Footprint without a name');
      return undefined;
    }

    const footprint: Footprint = {
      type: 'footprint',
      token,
      name,
      header: readHeader(reader),
      locked: readFlag(reader, 'locked', { startIndex: 2 }),
      placed: readFlag(reader, 'placed', { startIndex: 2 }),
      items: [],
      order: ChildOrder.empty,
    };
    const layer = readTextField(reader, 'layer');
    if (layer) footprint.layer = layer;
    const descr = readTextField(reader, 'descr');
    if (descr) footprint.descr = descr;
    const tags = readTextField(reader, 'tags');
    if (tags) footprint.tags = tags;
    const at = readPosition(reader);
    if (at) footprint.at = at;
    const attributes = readTextList(reader, 'attr');
    if (attributes) footprint.attributes = attributes;
    const uuid = readUuid(reader);
    if (uuid) footprint.uuid = uuid;

    for (const item of reader.remaining(2)) {
      footprint.items.push(this.readItem(item, diagnostics, reader.context));
      reader.consume(item, 'item');
    }
    footprint.order = reader.order(2);
    return footprint;
  }

  build(footprint: Footprint): SList {
    const emitter = new ChildEmitter();
    emitter.add('locked', flagNode('locked', footprint.locked));
    emitter.add('placed', flagNode('placed', footprint.placed));
    emitHeader(emitter, footprint.header);
    if (footprint.layer) emitter.add('layer', textNode('layer', footprint.layer));
    if (footprint.uuid) emitter.add('uuid', uuidNode(footprint.uuid));
    if (footprint.at) emitter.add('at', positionNode(footprint.at));
    if (footprint.descr) emitter.add('descr', textNode('descr', footprint.descr));
    if (footprint.tags) emitter.add('tags', textNode('tags', footprint.tags));
    if (footprint.attributes) emitter.add('attr', textListNode('attr', footprint.attributes, 'symbol'));
    emitter.addAll('item', footprint.items.map(section => sectionNode(section, item => this.buildItem(item))));

    return new SExprBuilder(footprint.token ?? 'footprint')
      .addChild(textAtom(footprint.name))
      .addChildren(emitter.arrange(footprint.order, FOOTPRINT_FIELDS))
      .build();
  }

  private readItem(item: SExpr, diagnostics: DiagnosticBag, context: string): Section<FootprintItem> {
    if (item.type !== 'list') return unmodeled(item);
    const tag = tagOf(item);
    const reader = new ListReader(item, diagnostics, `${context} > ${tag ?? '?'}`);
    let value: FootprintItem | undefined;
    if (tag === 'property') {
      value = readProperty(reader);
    } else if (tag === 'fp_text') {
      value = this.readFpText(reader);
    } else if (tag === 'pad') {
      value = this.readPad(reader);
    } else {
      const shape = graphicShapeOf(tag, 'fp_');
      if (!shape) return unmodeled(item);
      value = readGraphic(item, shape, diagnostics, context);
    }
    return value ? modeled(value) : unmodeled(item);
  }

  private buildItem(item: FootprintItem): SList {
    switch (item.type) {
      case 'property': return propertyNode(item);
      case 'fp_text': return this.buildFpText(item);
      case 'pad': return this.buildPad(item);
      case 'graphic': return buildGraphic(item);
    }
  }

  private readFpText(reader: ListReader): FpText | undefined {
    const kind = readText(reader.item(1));
    const text = readText(reader.item(2));
    if (!kind || !text) {
      reader.warn('fp_text without kind or text');
      return undefined;
    }
    const fpText: FpText = {
      type: 'fp_text',
      kind,
      text,
      hide: readFlag(reader, 'hide', { startIndex: 3 }),
      order: ChildOrder.empty,
    };
    const at = readPosition(reader);
    if (at) fpText.at = at;
    const layer = readTextField(reader, 'layer');
    if (layer) fpText.layer = layer;
    const uuid = readUuid(reader);
    if (uuid) fpText.uuid = uuid;
    const effects = readEffects(reader);
    if (effects) fpText.effects = effects;
    fpText.order = reader.order(3);
    return fpText;
  }

  private buildFpText(fpText: FpText): SList {
    const emitter = new ChildEmitter();
    if (fpText.at) emitter.add('at', positionNode(fpText.at));
    if (fpText.layer) emitter.add('layer', textNode('layer', fpText.layer));
    emitter.add('hide', flagNode('hide', fpText.hide));
    if (fpText.uuid) emitter.add('uuid', uuidNode(fpText.uuid));
    if (fpText.effects) emitter.add('effects', effectsNode(fpText.effects));
    return new SExprBuilder('fp_text')
      .addChild(textAtom(fpText.kind, 'symbol'))
      .addChild(textAtom(fpText.text))
      .addChildren(emitter.arrange(fpText.order, FP_TEXT_FIELDS))
      .build();
  }

  private readPad(reader: ListReader): Pad | undefined {
    const number = readText(reader.item(1));
    const padType = readText(reader.item(2));
    const shape = readText(reader.item(3));
    const at = readPosition(reader);
    if (!number || !padType || !shape || !at) {
      reader.warn('Pad without number, type, shape or position');
      return undefined;
    }
    const pad: Pad = {
      type: 'pad',
      number,
      padType,
      shape,
      at,
      locked: readFlag(reader, 'locked', { startIndex: 4 }),
      order: ChildOrder.empty,
    };
    const size = readSize(reader);
    if (size) pad.size = size;

    const drillNode = reader.list('drill');
    const drill = drillNode && drillNode.items.length === 2 ? atomCoord(drillNode.items[1]) : undefined;
    if (drillNode && drill) {
      pad.drill = drill;
      reader.consume(drillNode, 'drill');
    }

    const layers = readTextList(reader, 'layers');
    if (layers) pad.layers = layers;
    const ratio = readNumberField(reader, 'roundrect_rratio');
    if (ratio !== undefined) pad.roundrectRatio = ratio;

    const netNode = reader.list('net');
    if (netNode) {
      const netNumber = atomNumber(netNode.items[1]);
      const netName = readText(netNode.items[2]);
      if (netNode.items.length === 3 && netNumber !== undefined && netName) {
        pad.net = { number: netNumber, name: netName };
        reader.consume(netNode, 'net');
      }
    }

    const uuid = readUuid(reader);
    if (uuid) pad.uuid = uuid;
    pad.order = reader.order(4);
    return pad;
  }

  private buildPad(pad: Pad): SList {
    const emitter = new ChildEmitter();
    emitter.add('locked', flagNode('locked', pad.locked));
    emitter.add('at', positionNode(pad.at));
    if (pad.size) emitter.add('size', sizeNode(pad.size));
    if (pad.drill) emitter.add('drill', coordNode('drill', pad.drill));
    if (pad.layers) emitter.add('layers', textListNode('layers', pad.layers));
    if (pad.roundrectRatio !== undefined) emitter.add('roundrect_rratio', numberNode('roundrect_rratio', pad.roundrectRatio));
    if (pad.net) {
      emitter.add('net', new SExprBuilder('net').addValue(pad.net.number).addChild(textAtom(pad.net.name)).build());
    }
    if (pad.uuid) emitter.add('uuid', uuidNode(pad.uuid));
    return new SExprBuilder('pad')
      .addChild(textAtom(pad.number))
      .addChild(textAtom(pad.padType, 'symbol'))
      .addChild(textAtom(pad.shape, 'symbol'))
      .addChildren(emitter.arrange(pad.order, PAD_FIELDS))
      .build();
  }
}

// --- Construction helpers ---

export function freshFootprint(name: string, fields: Partial<Omit<Footprint, 'type' | 'name'>> = {}): Footprint {
  return {
    type: 'footprint',
    name: freshText(name),
    header: {},
    locked: defaulted(false),
    placed: defaulted(false),
    items: [],
    order: ChildOrder.empty,
    ...fields,
  };
}

export function freshPad(
  number: string,
  padType: string,
  shape: string,
  at: Position,
  fields: Partial<Omit<Pad, 'type' | 'number' | 'padType' | 'shape' | 'at'>> = {},
): Pad {
  return {
    type: 'pad',
    number: freshText(number),
    padType: freshText(padType),
    shape: freshText(shape),
    at,
    locked: defaulted(false),
    order: ChildOrder.empty,
    ...fields,
  };
}

// --- Views ---

export function footprintPads(footprint: Footprint): Pad[] {
  return itemsOfType(footprint.items, 'pad');
}

export function footprintGraphics(footprint: Footprint): Graphic[] {
  return itemsOfType(footprint.items, 'graphic');
}

export function footprintProperties(footprint: Footprint): Property[] {
  return itemsOfType(footprint.items, 'property');
}

export function footprintTexts(footprint: Footprint): FpText[] {
  return itemsOfType(footprint.items, 'fp_text');
}

// --- Entry points ---

const footprintParser = new KicadFootprintParser();

export function readFootprint(node: SList, diagnostics: DiagnosticBag, context?: string): Footprint | undefined {
  return footprintParser.read(node, diagnostics, context);
}

export function buildFootprint(footprint: Footprint): SList {
  return footprintParser.build(footprint);
}

export function parseFootprint(content: string): FootprintParseResult {
  return footprintParser.parse(content);
}

export function serializeFootprint(footprint: Footprint, options?: WriteOptions): string {
  return serializeSExpression(buildFootprint(footprint), options);
}
