/**
 * KiCad Schematic (.kicad_sch) Parser
 *
 * Models embedded library symbols, wires, junctions, no-connects, labels and
 * placed symbols. Sheets, buses, text and instances stay unmodeled.
 */

import type { Coord, CoordPoint } from './coord';
import { SExprBuilder } from './builder';
import { DiagnosticBag, type Diagnostic } from './diagnostics';
import {
  ChildEmitter, ChildOrder, ListReader,
  defaulted, itemsOfType, modeled, sectionNode, unmodeled,
  type EncodedValue, type Section,
} from './fidelity';
import {
  coordNode, effectsNode, emitHeader, flagNode, freshText, numberNode, pointsNode, positionNode,
  propertyNode, readCoordField, readEffects, readFlag, readHeader, readNumberField, readPoints,
  readPosition, readProperty, readStroke, readText, readTextField, readUuid, strokeNode, textAtom,
  textNode, uuidNode,
  type Effects, type FileHeader, type Flag, type Position, type Property, type Stroke, type StrokeStyle,
  type Text, type Uuid,
} from './fields';
import { parseSExpression } from './reader';
import { tagOf, type SExpr, type SList } from './sexpr';
import { buildLibSymbol, readLibSymbol, type LibSymbol } from './symbolLibParser';
import { serializeSExpression, type WriteOptions } from './writer';

// --- Types ---

export interface Wire {
  type: 'wire';
  points: CoordPoint[];
  stroke?: EncodedValue<Stroke, StrokeStyle>;
  uuid?: Uuid;
  order: ChildOrder;
}

export interface Junction {
  type: 'junction';
  at: Position;
  diameter?: Coord;
  uuid?: Uuid;
  order: ChildOrder;
}

export interface NoConnect {
  type: 'no_connect';
  at: Position;
  uuid?: Uuid;
  order: ChildOrder;
}

export type LabelToken = 'label' | 'global_label' | 'hierarchical_label';

export interface Label {
  type: 'label';
  token: LabelToken;
  text: Text;
  /** input, output, bidirectional, ... (global and hierarchical labels) */
  shape?: Text;
  at: Position;
  effects?: Effects;
  uuid?: Uuid;
  properties: Property[];
  order: ChildOrder;
}

/** A symbol instance placed on the sheet */
export interface PlacedSymbol {
  type: 'symbol';
  libId: Text;
  at: Position;
  /** x or y */
  mirror?: Text;
  unit?: number;
  excludeFromSim: Flag;
  inBom: Flag;
  onBoard: Flag;
  dnp: Flag;
  uuid?: Uuid;
  properties: Property[];
  order: ChildOrder;
}

export type SchematicItem = Wire | Junction | NoConnect | Label | PlacedSymbol;

export interface Schematic {
  header: FileHeader;
  uuid?: Uuid;
  paper?: Text;
  libSymbols?: Section<LibSymbol>[];
  items: Section<SchematicItem>[];
  order: ChildOrder;
}

export interface SchematicParseResult {
  schematic?: Schematic;
  root: SList;
  diagnostics: readonly Diagnostic[];
  hasErrors: boolean;
}

export const SCHEMATIC_FIELDS = ['version', 'generator', 'generator_version', 'uuid', 'paper', 'lib_symbols', 'item'] as const;
export const WIRE_FIELDS = ['pts', 'stroke', 'uuid'] as const;
export const JUNCTION_FIELDS = ['at', 'diameter', 'uuid'] as const;
export const LABEL_FIELDS = ['shape', 'at', 'effects', 'uuid', 'property'] as const;
export const PLACED_SYMBOL_FIELDS = [
  'lib_id', 'at', 'mirror', 'unit', 'exclude_from_sim', 'in_bom', 'on_board', 'dnp', 'uuid', 'property',
] as const;

function isLabelToken(tag: string | undefined): tag is LabelToken {
  return tag === 'label' || tag === 'global_label' || tag === 'hierarchical_label';
}

// --- Parser ---

export class KicadSchematicParser {
  parse(content: string): SchematicParseResult {
    const diagnostics = new DiagnosticBag();
    const { root } = parseSExpression(content, { diagnostics });
    let schematic: Schematic | undefined;
    if (tagOf(root) === 'kicad_sch') {
      schematic = this.read(root, diagnostics);
    } else {
      diagnostics.error(`Invalid KiCad schematic: root must be "kicad_sch", found (${tagOf(root) ?? ''} ...)`, root.location);
    }
    return { schematic, root, diagnostics: diagnostics.all, hasErrors: diagnostics.hasErrors };
  }

  read(root: SList, diagnostics: DiagnosticBag): Schematic {
    const reader = new ListReader(root, diagnostics, 'kicad_sch');
    const schematic: Schematic = { header: readHeader(reader), items: [], order: ChildOrder.empty };
    const uuid = readUuid(reader);
    if (uuid) schematic.uuid = uuid;
    const paper = this.readPaper(reader);
    if (paper) schematic.paper = paper;

    const libSymbols = reader.list('lib_symbols');
    if (libSymbols) {
      const context = reader.nested('lib_symbols');
      schematic.libSymbols = libSymbols.items.slice(1).map(item => readLibSymbol(item, diagnostics, context));
      reader.consume(libSymbols, 'lib_symbols');
    }

    for (const item of reader.remaining(1)) {
      schematic.items.push(this.readItem(item, diagnostics));
      reader.consume(item, 'item');
    }
    schematic.order = reader.order(1);
    return schematic;
  }

  build(schematic: Schematic): SList {
    const emitter = new ChildEmitter();
    emitHeader(emitter, schematic.header);
    if (schematic.uuid) emitter.add('uuid', uuidNode(schematic.uuid));
    if (schematic.paper) emitter.add('paper', textNode('paper', schematic.paper));
    if (schematic.libSymbols) {
      const symbols = schematic.libSymbols.map(section => sectionNode(section, buildLibSymbol));
      emitter.add('lib_symbols', new SExprBuilder('lib_symbols').addChildren(symbols).build());
    }
    emitter.addAll('item', schematic.items.map(section => sectionNode(section, item => this.buildItem(item))));
    return new SExprBuilder('kicad_sch').addChildren(emitter.arrange(schematic.order, SCHEMATIC_FIELDS)).build();
  }

  /** (paper "A4") only; custom sizes and portrait flags stay unmodeled */
  private readPaper(reader: ListReader): Text | undefined {
    const node = reader.list('paper');
    if (!node || node.items.length !== 2) return undefined;
    return readTextField(reader, 'paper');
  }

  private readItem(item: SExpr, diagnostics: DiagnosticBag): Section<SchematicItem> {
    if (item.type !== 'list') return unmodeled(item);
    const tag = tagOf(item);
    const reader = new ListReader(item, diagnostics, `kicad_sch > ${tag ?? '?'}`);
    let value: SchematicItem | undefined;
    if (tag === 'wire') {
      value = this.readWire(reader);
    } else if (tag === 'junction') {
      value = this.readJunction(reader);
    } else if (tag === 'no_connect') {
      value = this.readNoConnect(reader);
    } else if (isLabelToken(tag)) {
      value = this.readLabel(reader, tag);
    } else if (tag === 'symbol') {
      value = this.readPlacedSymbol(reader);
    } else {
      return unmodeled(item);
    }
    return value ? modeled(value) : unmodeled(item);
  }

  private buildItem(item: SchematicItem): SList {
    switch (item.type) {
      case 'wire': return this.buildWire(item);
      case 'junction': return this.buildJunction(item);
      case 'no_connect': return this.buildNoConnect(item);
      case 'label': return this.buildLabel(item);
      case 'symbol': return this.buildPlacedSymbol(item);
    }
  }

  private readWire(reader: ListReader): Wire | undefined {
    const points = readPoints(reader);
    if (!points || points.length < 2) {
      reader.warn('Wire without two points');
      return undefined;
    }
    const wire: Wire = { type: 'wire', points, order: ChildOrder.empty };
    const stroke = readStroke(reader);
    if (stroke) wire.stroke = stroke;
    const uuid = readUuid(reader);
    if (uuid) wire.uuid = uuid;
    wire.order = reader.order(1);
    return wire;
  }

  private buildWire(wire: Wire): SList {
    const emitter = new ChildEmitter().add('pts', pointsNode(wire.points));
    if (wire.stroke) emitter.add('stroke', strokeNode(wire.stroke));
    if (wire.uuid) emitter.add('uuid', uuidNode(wire.uuid));
    return new SExprBuilder('wire').addChildren(emitter.arrange(wire.order, WIRE_FIELDS)).build();
  }

  private readJunction(reader: ListReader): Junction | undefined {
    const at = readPosition(reader);
    if (!at) {
      reader.warn('Junction without position');
      return undefined;
    }
    const junction: Junction = { type: 'junction', at, order: ChildOrder.empty };
    const diameter = readCoordField(reader, 'diameter');
    if (diameter) junction.diameter = diameter;
    const uuid = readUuid(reader);
    if (uuid) junction.uuid = uuid;
    junction.order = reader.order(1);
    return junction;
  }

  private buildJunction(junction: Junction): SList {
    const emitter = new ChildEmitter().add('at', positionNode(junction.at));
    if (junction.diameter) emitter.add('diameter', coordNode('diameter', junction.diameter));
    if (junction.uuid) emitter.add('uuid', uuidNode(junction.uuid));
    return new SExprBuilder('junction').addChildren(emitter.arrange(junction.order, JUNCTION_FIELDS)).build();
  }

  private readNoConnect(reader: ListReader): NoConnect | undefined {
    const at = readPosition(reader);
    if (!at) {
      reader.warn('No-connect without position');
      return undefined;
    }
    const noConnect: NoConnect = { type: 'no_connect', at, order: ChildOrder.empty };
    const uuid = readUuid(reader);
    if (uuid) noConnect.uuid = uuid;
    noConnect.order = reader.order(1);
    return noConnect;
  }

  private buildNoConnect(noConnect: NoConnect): SList {
    const emitter = new ChildEmitter().add('at', positionNode(noConnect.at));
    if (noConnect.uuid) emitter.add('uuid', uuidNode(noConnect.uuid));
    return new SExprBuilder('no_connect').addChildren(emitter.arrange(noConnect.order, ['at', 'uuid'])).build();
  }

  private readProperties(reader: ListReader): Property[] {
    const properties: Property[] = [];
    for (const node of reader.lists('property')) {
      const property = readProperty(new ListReader(node, reader.diagnostics, reader.nested('property')));
      if (!property) continue;
      properties.push(property);
      reader.consume(node, 'property');
    }
    return properties;
  }

  private readLabel(reader: ListReader, token: LabelToken): Label | undefined {
    const text = readText(reader.item(1));
    const at = readPosition(reader);
    if (!text || !at) {
      reader.warn(`${token} without text or position`);
      return undefined;
    }
    const label: Label = { type: 'label', token, text, at, properties: this.readProperties(reader), order: ChildOrder.empty };
    const shape = readTextField(reader, 'shape');
    if (shape) label.shape = shape;
    const effects = readEffects(reader);
    if (effects) label.effects = effects;
    const uuid = readUuid(reader);
    if (uuid) label.uuid = uuid;
    label.order = reader.order(2);
    return label;
  }

  private buildLabel(label: Label): SList {
    const emitter = new ChildEmitter();
    if (label.shape) emitter.add('shape', textNode('shape', label.shape, 'symbol'));
    emitter.add('at', positionNode(label.at));
    if (label.effects) emitter.add('effects', effectsNode(label.effects));
    if (label.uuid) emitter.add('uuid', uuidNode(label.uuid));
    emitter.addAll('property', label.properties.map(propertyNode));
    return new SExprBuilder(label.token)
      .addChild(textAtom(label.text))
      .addChildren(emitter.arrange(label.order, LABEL_FIELDS))
      .build();
  }

  private readPlacedSymbol(reader: ListReader): PlacedSymbol | undefined {
    const libId = readTextField(reader, 'lib_id');
    const at = readPosition(reader);
    if (!libId || !at) {
      reader.warn('Symbol without lib_id or position');
      return undefined;
    }
    const symbol: PlacedSymbol = {
      type: 'symbol',
      libId,
      at,
      excludeFromSim: readFlag(reader, 'exclude_from_sim'),
      inBom: readFlag(reader, 'in_bom', { fallback: true }),
      onBoard: readFlag(reader, 'on_board', { fallback: true }),
      dnp: readFlag(reader, 'dnp'),
      properties: this.readProperties(reader),
      order: ChildOrder.empty,
    };
    const mirror = readTextField(reader, 'mirror');
    if (mirror) symbol.mirror = mirror;
    const unit = readNumberField(reader, 'unit');
    if (unit !== undefined) symbol.unit = unit;
    const uuid = readUuid(reader);
    if (uuid) symbol.uuid = uuid;
    symbol.order = reader.order(1);
    return symbol;
  }

  private buildPlacedSymbol(symbol: PlacedSymbol): SList {
    const emitter = new ChildEmitter()
      .add('lib_id', textNode('lib_id', symbol.libId))
      .add('at', positionNode(symbol.at));
    if (symbol.mirror) emitter.add('mirror', textNode('mirror', symbol.mirror, 'symbol'));
    if (symbol.unit !== undefined) emitter.add('unit', numberNode('unit', symbol.unit));
    emitter
      .add('exclude_from_sim', flagNode('exclude_from_sim', symbol.excludeFromSim))
      .add('in_bom', flagNode('in_bom', symbol.inBom))
      .add('on_board', flagNode('on_board', symbol.onBoard))
      .add('dnp', flagNode('dnp', symbol.dnp));
    if (symbol.uuid) emitter.add('uuid', uuidNode(symbol.uuid));
    emitter.addAll('property', symbol.properties.map(propertyNode));
    return new SExprBuilder('symbol').addChildren(emitter.arrange(symbol.order, PLACED_SYMBOL_FIELDS)).build();
  }
}

// --- Construction helpers ---

export function freshSchematic(header: FileHeader = {}): Schematic {
  return { header, items: [], order: ChildOrder.empty };
}

export function freshWire(points: CoordPoint[], uuid?: Uuid): Wire {
  const wire: Wire = { type: 'wire', points, order: ChildOrder.empty };
  if (uuid) wire.uuid = uuid;
  return wire;
}

export function freshLabel(text: string, at: Position, token: LabelToken = 'label'): Label {
  return { type: 'label', token, text: freshText(text), at, properties: [], order: ChildOrder.empty };
}

export function freshPlacedSymbol(libId: string, at: Position, properties: Property[] = []): PlacedSymbol {
  return {
    type: 'symbol',
    libId: freshText(libId),
    at,
    excludeFromSim: defaulted(false),
    inBom: defaulted(true),
    onBoard: defaulted(true),
    dnp: defaulted(false),
    properties,
    order: ChildOrder.empty,
  };
}

// --- Views ---

export function schematicWires(schematic: Schematic): Wire[] {
  return itemsOfType(schematic.items, 'wire');
}

export function schematicLabels(schematic: Schematic): Label[] {
  return itemsOfType(schematic.items, 'label');
}

export function schematicSymbols(schematic: Schematic): PlacedSymbol[] {
  return itemsOfType(schematic.items, 'symbol');
}

export function schematicJunctions(schematic: Schematic): Junction[] {
  return itemsOfType(schematic.items, 'junction');
}

// --- Entry points ---

const schematicParser = new KicadSchematicParser();

export function readSchematic(root: SList, diagnostics: DiagnosticBag): Schematic {
  return schematicParser.read(root, diagnostics);
}

export function buildSchematic(schematic: Schematic): SList {
  return schematicParser.build(schematic);
}

export function parseSchematic(content: string): SchematicParseResult {
  return schematicParser.parse(content);
}

export function serializeSchematic(schematic: Schematic, options?: WriteOptions): string {
  return serializeSExpression(buildSchematic(schematic), options);
}
