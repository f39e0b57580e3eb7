/**
 * KiCad PCB (.kicad_pcb) Parser
 *
 * Models the layer table, nets, footprints, track segments, vias and board
 * graphics. Zones, groups, setup and anything newer stay unmodeled and are
 * written back untouched.
 */

import type { Coord, CoordPoint } from './coord';
import { SExprBuilder } from './builder';
import { DiagnosticBag, type Diagnostic } from './diagnostics';
import {
  ChildEmitter, ChildOrder, ListReader,
  defaulted, itemsOfType, modeled, sectionNode, unmodeled,
  type Section,
} from './fidelity';
import {
  coordNode, emitHeader, flagNode, freshText, pointNode, readCoordField, readFlag,
  readHeader, readPoint, readText, readTextField, readTextList,
  readUuid, textAtom, textListNode, textNode, uuidNode,
  type FileHeader, type Flag, type Text, type Uuid,
} from './fields';
import { buildFootprint, isFootprintToken, readFootprint, type Footprint } from './footprintParser';
import { buildGraphic, graphicShapeOf, readGraphic, type Graphic } from './graphics';
import { parseSExpression } from './reader';
import { atomNumber, list, num, tagOf, type SExpr, type SList } from './sexpr';
import { serializeSExpression, type WriteOptions } from './writer';

// --- Types ---

/** One row of the layer table: (0 "F.Cu" signal ["Front"]) */
export interface PcbLayer {
  type: 'layer';
  ordinal: number;
  name: Text;
  /** signal, power, mixed, jumper, user */
  layerType: Text;
  userName?: Text;
}

export interface PcbNet {
  number: number;
  name: Text;
}

export interface PcbTrack {
  type: 'segment';
  start: CoordPoint;
  end: CoordPoint;
  width: Coord;
  layer: Text;
  net?: number;
  locked: Flag;
  uuid?: Uuid;
  order: ChildOrder;
}

export interface PcbVia {
  type: 'via';
  at: CoordPoint;
  size: Coord;
  drill?: Coord;
  layers?: Text[];
  net?: number;
  locked: Flag;
  uuid?: Uuid;
  order: ChildOrder;
}

export type PcbItem = Footprint | PcbTrack | PcbVia | Graphic;

export interface PcbBoard {
  header: FileHeader;
  layers?: Section<PcbLayer>[];
  nets: PcbNet[];
  /** Everything else in file order */
  items: Section<PcbItem>[];
  order: ChildOrder;
}

export interface PcbParseResult {
  board?: PcbBoard;
  root: SList;
  diagnostics: readonly Diagnostic[];
  hasErrors: boolean;
}

export const BOARD_FIELDS = ['version', 'generator', 'generator_version', 'layers', 'net', 'item'] as const;
export const TRACK_FIELDS = ['locked', 'start', 'end', 'width', 'layer', 'net', 'uuid'] as const;
export const VIA_FIELDS = ['locked', 'at', 'size', 'drill', 'layers', 'net', 'uuid'] as const;

// --- Parser ---

export class KicadPcbParser {
  parse(content: string): PcbParseResult {
    const diagnostics = new DiagnosticBag();
    const { root } = parseSExpression(content, { diagnostics });
    let board: PcbBoard | undefined;
    if (tagOf(root) === 'kicad_pcb') {
      board = this.read(root, diagnostics);
    } else {
      diagnostics.error(`Invalid KiCad PCB file: root must be "kicad_pcb", found (${tagOf(root) ?? ''} ...)`, root.location);
    }
    return { board, root, diagnostics: diagnostics.all, hasErrors: diagnostics.hasErrors };
  }

  read(root: SList, diagnostics: DiagnosticBag): PcbBoard {
    const reader = new ListReader(root, diagnostics, 'kicad_pcb');
    const board: PcbBoard = {
      header: readHeader(reader),
      nets: this.readNets(reader),
      items: [],
      order: ChildOrder.empty,
    };
    const layers = this.readLayers(reader);
    if (layers) board.layers = layers;

    for (const item of reader.remaining(1)) {
      board.items.push(this.readItem(item, diagnostics));
      reader.consume(item, 'item');
    }
    board.order = reader.order(1);
    return board;
  }

  build(board: PcbBoard): SList {
    const emitter = new ChildEmitter();
    emitHeader(emitter, board.header);
    if (board.layers) {
      const rows = board.layers.map(section => sectionNode(section, layer => this.buildLayer(layer)));
      emitter.add('layers', new SExprBuilder('layers').addChildren(rows).build());
    }
    emitter.addAll('net', board.nets.map(net => new SExprBuilder('net').addValue(net.number).addChild(textAtom(net.name)).build()));
    emitter.addAll('item', board.items.map(section => sectionNode(section, item => this.buildItem(item))));
    return new SExprBuilder('kicad_pcb').addChildren(emitter.arrange(board.order, BOARD_FIELDS)).build();
  }

  private readLayers(reader: ListReader): Section<PcbLayer>[] | undefined {
    const node = reader.list('layers');
    if (!node) return undefined;
    reader.consume(node, 'layers');
    return node.items.slice(1).map(row => {
      const layer = row.type === 'list' ? this.readLayer(row) : undefined;
      return layer ? modeled(layer) : unmodeled(row);
    });
  }

  private readLayer(row: SList): PcbLayer | undefined {
    const ordinal = atomNumber(row.items[0]);
    const name = readText(row.items[1]);
    const layerType = readText(row.items[2]);
    const userName = readText(row.items[3]);
    if (ordinal === undefined || !name || !layerType || row.items.length > 4) return undefined;
    if (row.items.length === 4 && !userName) return undefined;
    const layer: PcbLayer = { type: 'layer', ordinal, name, layerType };
    if (userName) layer.userName = userName;
    return layer;
  }

  private buildLayer(layer: PcbLayer): SList {
    const items: SExpr[] = [num(layer.ordinal), textAtom(layer.name), textAtom(layer.layerType, 'symbol')];
    if (layer.userName) items.push(textAtom(layer.userName));
    return list(items);
  }

  private readNets(reader: ListReader): PcbNet[] {
    const nets: PcbNet[] = [];
    for (const node of reader.lists('net')) {
      const number = atomNumber(node.items[1]);
      const name = readText(node.items[2]);
      if (node.items.length !== 3 || number === undefined || !name) {
        reader.warn('Malformed net', node);
        continue;
      }
      nets.push({ number, name });
      reader.consume(node, 'net');
    }
    return nets;
  }

  private readItem(item: SExpr, diagnostics: DiagnosticBag): Section<PcbItem> {
    if (item.type !== 'list') return unmodeled(item);
    const tag = tagOf(item);
    let value: PcbItem | undefined;
    if (isFootprintToken(tag)) {
      value = readFootprint(item, diagnostics, 'kicad_pcb');
    } else if (tag === 'segment') {
      value = this.readTrack(new ListReader(item, diagnostics, 'kicad_pcb > segment'));
    } else if (tag === 'via') {
      value = this.readVia(new ListReader(item, diagnostics, 'kicad_pcb > via'));
    } else {
      const shape = graphicShapeOf(tag, 'gr_');
      if (!shape) return unmodeled(item);
      value = readGraphic(item, shape, diagnostics, 'kicad_pcb');
    }
    return value ? modeled(value) : unmodeled(item);
  }

  private buildItem(item: PcbItem): SList {
    switch (item.type) {
      case 'footprint': return buildFootprint(item);
      case 'segment': return this.buildTrack(item);
      case 'via': return this.buildVia(item);
      case 'graphic': return buildGraphic(item);
    }
  }

  private readNet(reader: ListReader): number | undefined {
    const node = reader.list('net');
    if (!node) return undefined;
    const net = node.items.length === 2 ? atomNumber(node.items[1]) : undefined;
    if (net !== undefined) reader.consume(node, 'net');
    return net;
  }

  private readTrack(reader: ListReader): PcbTrack | undefined {
    const start = readPoint(reader, 'start');
    const end = readPoint(reader, 'end');
    const width = readCoordField(reader, 'width');
    const layer = readTextField(reader, 'layer');
    if (!start || !end || !width || !layer) {
      reader.warn('Segment without start, end, width or layer');
      return undefined;
    }
    const track: PcbTrack = {
      type: 'segment',
      start,
      end,
      width,
      layer,
      locked: readFlag(reader, 'locked'),
      order: ChildOrder.empty,
    };
    const net = this.readNet(reader);
    if (net !== undefined) track.net = net;
    const uuid = readUuid(reader);
    if (uuid) track.uuid = uuid;
    track.order = reader.order(1);
    return track;
  }

  private buildTrack(track: PcbTrack): SList {
    const emitter = new ChildEmitter()
      .add('locked', flagNode('locked', track.locked))
      .add('start', pointNode('start', track.start))
      .add('end', pointNode('end', track.end))
      .add('width', coordNode('width', track.width))
      .add('layer', textNode('layer', track.layer));
    if (track.net !== undefined) emitter.add('net', new SExprBuilder('net').addValue(track.net).build());
    if (track.uuid) emitter.add('uuid', uuidNode(track.uuid));
    return new SExprBuilder('segment').addChildren(emitter.arrange(track.order, TRACK_FIELDS)).build();
  }

  private readVia(reader: ListReader): PcbVia | undefined {
    const at = readPoint(reader, 'at');
    const size = readCoordField(reader, 'size');
    if (!at || !size) {
      reader.warn('Via without position or size');
      return undefined;
    }
    const via: PcbVia = { type: 'via', at, size, locked: readFlag(reader, 'locked'), order: ChildOrder.empty };
    const drill = readCoordField(reader, 'drill');
    if (drill) via.drill = drill;
    const layers = readTextList(reader, 'layers');
    if (layers) via.layers = layers;
    const net = this.readNet(reader);
    if (net !== undefined) via.net = net;
    const uuid = readUuid(reader);
    if (uuid) via.uuid = uuid;
    via.order = reader.order(1);
    return via;
  }

  private buildVia(via: PcbVia): SList {
    const emitter = new ChildEmitter()
      .add('locked', flagNode('locked', via.locked))
      .add('at', pointNode('at', via.at))
      .add('size', coordNode('size', via.size));
    if (via.drill) emitter.add('drill', coordNode('drill', via.drill));
    if (via.layers) emitter.add('layers', textListNode('layers', via.layers));
    if (via.net !== undefined) emitter.add('net', new SExprBuilder('net').addValue(via.net).build());
    if (via.uuid) emitter.add('uuid', uuidNode(via.uuid));
    return new SExprBuilder('via').addChildren(emitter.arrange(via.order, VIA_FIELDS)).build();
  }
}

// --- Construction helpers ---

export function freshBoard(header: FileHeader = {}): PcbBoard {
  return { header, nets: [], items: [], order: ChildOrder.empty };
}

export function freshTrack(start: CoordPoint, end: CoordPoint, width: Coord, layer: string, net?: number): PcbTrack {
  const track: PcbTrack = {
    type: 'segment',
    start,
    end,
    width,
    layer: freshText(layer),
    locked: defaulted(false),
    order: ChildOrder.empty,
  };
  if (net !== undefined) track.net = net;
  return track;
}

export function freshVia(at: CoordPoint, size: Coord, drill: Coord, layers: readonly string[] = ['F.Cu', 'B.Cu']): PcbVia {
  return {
    type: 'via',
    at,
    size,
    drill,
    layers: layers.map(freshText),
    locked: defaulted(false),
    order: ChildOrder.empty,
  };
}

// --- Views ---

export function boardFootprints(board: PcbBoard): Footprint[] {
  return itemsOfType(board.items, 'footprint');
}

export function boardTracks(board: PcbBoard): PcbTrack[] {
  return itemsOfType(board.items, 'segment');
}

export function boardVias(board: PcbBoard): PcbVia[] {
  return itemsOfType(board.items, 'via');
}

export function boardGraphics(board: PcbBoard): Graphic[] {
  return itemsOfType(board.items, 'graphic');
}

// --- Entry points ---

const pcbParser = new KicadPcbParser();

export function readBoard(root: SList, diagnostics: DiagnosticBag): PcbBoard {
  return pcbParser.read(root, diagnostics);
}

export function buildBoard(board: PcbBoard): SList {
  return pcbParser.build(board);
}

export function parseBoard(content: string): PcbParseResult {
  return pcbParser.parse(content);
}

export function serializeBoard(board: PcbBoard, options?: WriteOptions): string {
  return serializeSExpression(buildBoard(board), options);
}
