import { describe, expect, it } from 'vitest';
import { Coord } from '../coord';
import { saveDocument } from '../document';
import { ChildOrder, modeled, modeledValues } from '../fidelity';
import { freshProperty } from '../fields';
import {
  buildSymbolLibrary, freshLibSymbol, parseSymbolLibrary, serializeSymbolLibrary, symbolProperties, symbolUnits, unitPins,
} from '../symbolLibParser';
import { sexprEquals } from '../sexpr';
import { loadSymbolLib, readFixture } from './helpers';

describe('KicadSymbolLibParser', () => {
  describe('KiCad 6 library', () => {
    const text = readFixture('kicad6', 'device.kicad_sym');

    it('reads symbol flags', () => {
      const { library, hasErrors } = parseSymbolLibrary(text);
      expect(hasErrors).toBe(false);
      if (!library) throw new Error('library expected');
      expect(library.header.generator?.value).toBe('kicad_symbol_editor');
      const [symbol] = modeledValues(library.items);
      expect(symbol.name.value).toBe('R');
      expect(symbol.pinNumbers?.hide).toEqual({ value: true, explicit: true, variant: 'bare' });
      expect(symbol.pinNames?.offset?.isZero()).toBe(true);
      expect(symbol.pinNames?.hide).toEqual({ value: false, explicit: false });
      expect(symbol.inBom).toEqual({ value: true, explicit: true, variant: 'child' });
      expect(symbol.excludeFromSim).toEqual({ value: false, explicit: false });
    });

    it('reads properties with ids', () => {
      const { library } = parseSymbolLibrary(text);
      const [symbol] = modeledValues(library?.items ?? []);
      const properties = symbolProperties(symbol);
      expect(properties.map(p => [p.key.value, p.value.value, p.id])).toEqual([
        ['Reference', 'R', 0],
        ['Value', 'R', 1],
        ['Footprint', '', 2],
      ]);
      expect(properties[2].effects?.hide.variant).toBe('bare');
      expect(properties[0].at?.angle).toBe(90);
    });

    it('reads units and pins', () => {
      const { library } = parseSymbolLibrary(text);
      const [symbol] = modeledValues(library?.items ?? []);
      const units = symbolUnits(symbol);
      expect(units.map(u => u.name.value)).toEqual(['R_0_1', 'R_1_1']);
      expect(unitPins(units[0])).toEqual([]);
      expect(units[0].order.unmodeledNodes).toHaveLength(1);
      const pins = unitPins(units[1]);
      expect(pins.map(p => p.number?.text.value)).toEqual(['1', '2']);
      expect(pins.map(p => p.name?.text.value)).toEqual(['~', '~']);
      expect(pins[0].electricalType.value).toBe('passive');
      expect(pins[0].length.toString()).toBe('1.27');
      expect(pins[0].at.angle).toBe(270);
    });

    it('rebuilds the tree it was read from', () => {
      const { library, root } = parseSymbolLibrary(text);
      if (!library) throw new Error('library expected');
      expect(sexprEquals(buildSymbolLibrary(library), root)).toBe(true);
    });

    it('round-trips byte for byte', () => {
      expect(saveDocument(loadSymbolLib(text))).toBe(text);
    });
  });

  describe('KiCad 8 library', () => {
    const text = readFixture('kicad8', 'device.kicad_sym');

    it('reads current flag encodings and derived symbols', () => {
      const { library } = parseSymbolLibrary(text);
      const symbols = modeledValues(library?.items ?? []);
      expect(symbols.map(s => s.name.value)).toEqual(['LED', 'LED_Red']);
      const [led, red] = symbols;
      expect(led.excludeFromSim).toEqual({ value: false, explicit: true, variant: 'child' });
      expect(led.pinNames?.offset?.toString()).toBe('1.016');
      expect(led.pinNames?.hide.variant).toBe('bare');
      expect(symbolProperties(led)[2].effects?.hide.variant).toBe('child');
      expect(red.extends?.value).toBe('LED');
      expect(symbolProperties(red).map(p => p.value.value)).toEqual(['LED_Red']);
      expect(symbolUnits(red)).toEqual([]);
    });

    it('round-trips byte for byte', () => {
      expect(saveDocument(loadSymbolLib(text))).toBe(text);
    });

    it('changes only the edited pin length', () => {
      const doc = loadSymbolLib(text);
      const [led] = modeledValues(doc.library.items);
      const pin = unitPins(symbolUnits(led)[1])[0];
      expect(pin.name?.text.value).toBe('K');
      pin.length = Coord.fromMm(5.08);
      expect(saveDocument(doc)).toBe(text.replace('(length 2.54)', '(length 5.08)'));
    });
  });

  it('serializes a fresh symbol without default flags', () => {
    const symbol = freshLibSymbol('J', { items: [modeled(freshProperty('Reference', 'J'))] });
    const library = { header: { version: 20231120 }, items: [modeled(symbol)], order: ChildOrder.empty };
    expect(serializeSymbolLibrary(library)).toBe(
      '(kicad_symbol_lib\n'
      + '\t(version 20231120)\n'
      + '\t(symbol "J"\n'
      + '\t\t(property "Reference" "J")\n'
      + '\t)\n'
      + ')\n',
    );
  });

  it('warns about a pin without a length', () => {
    const { library, diagnostics } = parseSymbolLibrary(
      '(kicad_symbol_lib (symbol "X" (symbol "X_1_1" (pin input line (at 0 0 0)))))',
    );
    const [symbol] = modeledValues(library?.items ?? []);
    expect(unitPins(symbolUnits(symbol)[0])).toEqual([]);
    expect(diagnostics.map(d => [d.message, d.context])).toEqual([
      ['Pin without type, style, position or length: (pin input line (at 0 0 0))', 'kicad_symbol_lib > symbol > symbol > pin'],
    ]);
  });
});
