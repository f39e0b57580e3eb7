/**
 * KiCad Symbol Library (.kicad_sym) Parser
 *
 * Also reads the symbols embedded in a schematic's lib_symbols section.
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
  coordNode, effectsNode, emitHeader, flagNode, freshText, positionNode, propertyNode,
  readCoordField, readEffects, readFlag, readHeader, readPosition, readProperty,
  readText, readTextField, textAtom, textNode,
  type Effects, type FileHeader, type Flag, type Position, type Property, type Text,
} from './fields';
import { parseSExpression } from './reader';
import { tagOf, type SExpr, type SList } from './sexpr';
import { serializeSExpression, type WriteOptions } from './writer';

// --- Types ---

export interface PinText {
  text: Text;
  effects?: Effects;
  order: ChildOrder;
}

export interface LibPin {
  type: 'pin';
  /** input, output, passive, power_in, ... */
  electricalType: Text;
  /** line, inverted, clock, ... */
  graphicStyle: Text;
  at: Position;
  length: Coord;
  hide: Flag;
  name?: PinText;
  number?: PinText;
  order: ChildOrder;
}

/** A unit/body-style sub-symbol, e.g. (symbol "R_1_1" ...); graphics stay unmodeled */
export interface SymbolUnit {
  type: 'unit';
  name: Text;
  items: Section<LibPin>[];
  order: ChildOrder;
}

/** (pin_numbers hide) or (pin_numbers (hide yes)) */
export interface PinNumbers {
  hide: Flag;
  order: ChildOrder;
}

/** (pin_names (offset 1.016) hide) or (pin_names (offset 1.016) (hide yes)) */
export interface PinNames {
  offset?: Coord;
  hide: Flag;
  order: ChildOrder;
}

export type LibSymbolItem = Property | SymbolUnit;

export interface LibSymbol {
  type: 'lib_symbol';
  name: Text;
  extends?: Text;
  pinNumbers?: PinNumbers;
  pinNames?: PinNames;
  excludeFromSim: Flag;
  inBom: Flag;
  onBoard: Flag;
  items: Section<LibSymbolItem>[];
  order: ChildOrder;
}

export interface SymbolLibrary {
  header: FileHeader;
  items: Section<LibSymbol>[];
  order: ChildOrder;
}

export interface SymbolLibParseResult {
  library?: SymbolLibrary;
  root: SList;
  diagnostics: readonly Diagnostic[];
  hasErrors: boolean;
}

export const LIBRARY_FIELDS = ['version', 'generator', 'generator_version', 'item'] as const;
export const LIB_SYMBOL_FIELDS = ['extends', 'pin_numbers', 'pin_names', 'exclude_from_sim', 'in_bom', 'on_board', 'item'] as const;
export const PIN_FIELDS = ['at', 'length', 'hide', 'name', 'number'] as const;

// --- Parser ---

export class KicadSymbolLibParser {
  parse(content: string): SymbolLibParseResult {
    const diagnostics = new DiagnosticBag();
    const { root } = parseSExpression(content, { diagnostics });
    let library: SymbolLibrary | undefined;
    if (tagOf(root) === 'kicad_symbol_lib') {
      library = this.read(root, diagnostics);
    } else {
      diagnostics.error(`Invalid KiCad symbol library: root must be "kicad_symbol_lib", found (${tagOf(root) ?? ''} ...)`, root.location);
    }
    return { library, root, diagnostics: diagnostics.all, hasErrors: diagnostics.hasErrors };
  }

  read(root: SList, diagnostics: DiagnosticBag): SymbolLibrary {
    const reader = new ListReader(root, diagnostics, 'kicad_symbol_lib');
    const library: SymbolLibrary = { header: readHeader(reader), items: [], order: ChildOrder.empty };
    for (const item of reader.remaining(1)) {
      library.items.push(this.readSymbolSection(item, diagnostics, reader.context));
      reader.consume(item, 'item');
    }
    library.order = reader.order(1);
    return library;
  }

  build(library: SymbolLibrary): SList {
    const emitter = new ChildEmitter();
    emitHeader(emitter, library.header);
    emitter.addAll('item', library.items.map(section => sectionNode(section, symbol => this.buildSymbol(symbol))));
    return new SExprBuilder('kicad_symbol_lib').addChildren(emitter.arrange(library.order, LIBRARY_FIELDS)).build();
  }

  /** A (symbol ...) list as a section; anything else stays unmodeled */
  readSymbolSection(item: SExpr, diagnostics: DiagnosticBag, context: string): Section<LibSymbol> {
    if (item.type !== 'list' || tagOf(item) !== 'symbol') return unmodeled(item);
    const symbol = this.readSymbol(new ListReader(item, diagnostics, `${context} > symbol`));
    return symbol ? modeled(symbol) : unmodeled(item);
  }

  readSymbol(reader: ListReader): LibSymbol | undefined {
    const name = readText(reader.item(1));
    if (!name) {
      reader.warn('Symbol without a name');
      return undefined;
    }
    const symbol: LibSymbol = {
      type: 'lib_symbol',
      name,
      excludeFromSim: readFlag(reader, 'exclude_from_sim'),
      inBom: readFlag(reader, 'in_bom', { fallback: true }),
      onBoard: readFlag(reader, 'on_board', { fallback: true }),
      items: [],
      order: ChildOrder.empty,
    };
    const parent = readTextField(reader, 'extends');
    if (parent) symbol.extends = parent;

    const pinNumbers = reader.list('pin_numbers');
    if (pinNumbers) {
      const inner = new ListReader(pinNumbers, reader.diagnostics, reader.nested('pin_numbers'));
      symbol.pinNumbers = { hide: readFlag(inner, 'hide'), order: inner.order(1) };
      reader.consume(pinNumbers, 'pin_numbers');
    }

    const pinNames = reader.list('pin_names');
    if (pinNames) {
      const inner = new ListReader(pinNames, reader.diagnostics, reader.nested('pin_names'));
      const names: PinNames = { hide: readFlag(inner, 'hide'), order: ChildOrder.empty };
      const offset = readCoordField(inner, 'offset');
      if (offset) names.offset = offset;
      names.order = inner.order(1);
      symbol.pinNames = names;
      reader.consume(pinNames, 'pin_names');
    }

    for (const item of reader.remaining(2)) {
      if (item.type !== 'list') continue;
      const tag = tagOf(item);
      const itemReader = new ListReader(item, reader.diagnostics, reader.nested(tag ?? '?'));
      let value: LibSymbolItem | undefined;
      if (tag === 'property') {
        value = readProperty(itemReader);
      } else if (tag === 'symbol') {
        value = this.readUnit(itemReader);
      } else {
        continue;
      }
      symbol.items.push(value ? modeled(value) : unmodeled(item));
      reader.consume(item, 'item');
    }
    symbol.order = reader.order(2);
    return symbol;
  }

  buildSymbol(symbol: LibSymbol): SList {
    const emitter = new ChildEmitter();
    if (symbol.extends) emitter.add('extends', textNode('extends', symbol.extends));
    if (symbol.pinNumbers) {
      const inner = new ChildEmitter().add('hide', flagNode('hide', symbol.pinNumbers.hide));
      emitter.add('pin_numbers', new SExprBuilder('pin_numbers').addChildren(inner.arrange(symbol.pinNumbers.order, ['hide'])).build());
    }
    if (symbol.pinNames) {
      const inner = new ChildEmitter();
      if (symbol.pinNames.offset) inner.add('offset', coordNode('offset', symbol.pinNames.offset));
      inner.add('hide', flagNode('hide', symbol.pinNames.hide));
      emitter.add('pin_names', new SExprBuilder('pin_names').addChildren(inner.arrange(symbol.pinNames.order, ['offset', 'hide'])).build());
    }
    emitter.add('exclude_from_sim', flagNode('exclude_from_sim', symbol.excludeFromSim));
    emitter.add('in_bom', flagNode('in_bom', symbol.inBom));
    emitter.add('on_board', flagNode('on_board', symbol.onBoard));
    emitter.addAll('item', symbol.items.map(section => sectionNode(section, item => (
      item.type === 'property' ? propertyNode(item) : this.buildUnit(item)
    ))));
    return new SExprBuilder('symbol')
      .addChild(textAtom(symbol.name))
      .addChildren(emitter.arrange(symbol.order, LIB_SYMBOL_FIELDS))
      .build();
  }

  private readUnit(reader: ListReader): SymbolUnit | undefined {
    const name = readText(reader.item(1));
    if (!name) {
      reader.warn('Unit symbol without a name');
      return undefined;
    }
    const unit: SymbolUnit = { type: 'unit', name, items: [], order: ChildOrder.empty };
    for (const pinNode of reader.lists('pin')) {
      const pin = this.readPin(new ListReader(pinNode, reader.diagnostics, reader.nested('pin')));
      unit.items.push(pin ? modeled(pin) : unmodeled(pinNode));
      reader.consume(pinNode, 'item');
    }
    unit.order = reader.order(2);
    return unit;
  }

  private buildUnit(unit: SymbolUnit): SList {
    const emitter = new ChildEmitter();
    emitter.addAll('item', unit.items.map(section => sectionNode(section, pin => this.buildPin(pin))));
    return new SExprBuilder('symbol')
      .addChild(textAtom(unit.name))
      .addChildren(emitter.arrange(unit.order, ['item']))
      .build();
  }

  private readPinText(reader: ListReader, tag: 'name' | 'number'): PinText | undefined {
    const node = reader.list(tag);
    if (!node) return undefined;
    const inner = new ListReader(node, reader.diagnostics, reader.nested(tag));
    const text = readText(inner.item(1));
    if (!text) {
      reader.warn(`Pin ${tag} without text`, node);
      return undefined;
    }
    const pinText: PinText = { text, order: ChildOrder.empty };
    const effects = readEffects(inner);
    if (effects) pinText.effects = effects;
    pinText.order = inner.order(2);
    reader.consume(node, tag);
    return pinText;
  }

  private buildPinText(tag: 'name' | 'number', pinText: PinText): SList {
    const emitter = new ChildEmitter();
    if (pinText.effects) emitter.add('effects', effectsNode(pinText.effects));
    return new SExprBuilder(tag)
      .addChild(textAtom(pinText.text))
      .addChildren(emitter.arrange(pinText.order, ['effects']))
      .build();
  }

  private readPin(reader: ListReader): LibPin | undefined {
    const electricalType = readText(reader.item(1));
    const graphicStyle = readText(reader.item(2));
    const at = readPosition(reader);
    const length = readCoordField(reader, 'length');
    if (!electricalType || !graphicStyle || !at || !length) {
      reader.warn('Pin without type, style, position or length');
      return undefined;
    }
    const pin: LibPin = {
      type: 'pin',
      electricalType,
      graphicStyle,
      at,
      length,
      hide: readFlag(reader, 'hide', { startIndex: 3 }),
      order: ChildOrder.empty,
    };
    const name = this.readPinText(reader, 'name');
    if (name) pin.name = name;
    const number = this.readPinText(reader, 'number');
    if (number) pin.number = number;
    pin.order = reader.order(3);
    return pin;
  }

  private buildPin(pin: LibPin): SList {
    const emitter = new ChildEmitter()
      .add('at', positionNode(pin.at))
      .add('length', coordNode('length', pin.length))
      .add('hide', flagNode('hide', pin.hide));
    if (pin.name) emitter.add('name', this.buildPinText('name', pin.name));
    if (pin.number) emitter.add('number', this.buildPinText('number', pin.number));
    return new SExprBuilder('pin')
      .addChild(textAtom(pin.electricalType, 'symbol'))
      .addChild(textAtom(pin.graphicStyle, 'symbol'))
      .addChildren(emitter.arrange(pin.order, PIN_FIELDS))
      .build();
  }
}

// --- Construction helpers ---

export function freshLibSymbol(name: string, fields: Partial<Omit<LibSymbol, 'type' | 'name'>> = {}): LibSymbol {
  return {
    type: 'lib_symbol',
    name: freshText(name),
    excludeFromSim: defaulted(false),
    inBom: defaulted(true),
    onBoard: defaulted(true),
    items: [],
    order: ChildOrder.empty,
    ...fields,
  };
}

// --- Views ---

export function symbolProperties(symbol: LibSymbol): Property[] {
  return itemsOfType(symbol.items, 'property');
}

export function symbolUnits(symbol: LibSymbol): SymbolUnit[] {
  return itemsOfType(symbol.items, 'unit');
}

export function unitPins(unit: SymbolUnit): LibPin[] {
  return itemsOfType(unit.items, 'pin');
}

// --- Entry points ---

const symbolLibParser = new KicadSymbolLibParser();

export function readSymbolLibrary(root: SList, diagnostics: DiagnosticBag): SymbolLibrary {
  return symbolLibParser.read(root, diagnostics);
}

export function buildSymbolLibrary(library: SymbolLibrary): SList {
  return symbolLibParser.build(library);
}

export function readLibSymbol(item: SExpr, diagnostics: DiagnosticBag, context: string): Section<LibSymbol> {
  return symbolLibParser.readSymbolSection(item, diagnostics, context);
}

export function buildLibSymbol(symbol: LibSymbol): SList {
  return symbolLibParser.buildSymbol(symbol);
}

export function parseSymbolLibrary(content: string): SymbolLibParseResult {
  return symbolLibParser.parse(content);
}

export function serializeSymbolLibrary(library: SymbolLibrary, options?: WriteOptions): string {
  return serializeSExpression(buildSymbolLibrary(library), options);
}
