import { describe, expect, it } from 'vitest';
import { Coord } from '../coord';
import { createDocument, loadDocument, saveDocument } from '../document';
import { modeled, withValue } from '../fidelity';
import { findProperty, freshFlag, freshText, freshUuid } from '../fields';
import {
  buildFootprint, footprintGraphics, footprintPads, footprintProperties, footprintTexts,
  freshFootprint, freshPad, parseFootprint, serializeFootprint,
} from '../footprintParser';
import { sexprEquals, tagOf } from '../sexpr';
import { loadFootprint, readFixture } from './helpers';

describe('KicadFootprintParser', () => {
  describe('KiCad 6 footprint', () => {
    const text = readFixture('kicad6', 'resistor.kicad_mod');

    it('reads the header and attributes', () => {
      const { footprint, hasErrors } = parseFootprint(text);
      expect(hasErrors).toBe(false);
      expect(footprint?.token).toBe('footprint');
      expect(footprint?.name.value).toBe('R_0603_1608Metric');
      expect(footprint?.header.version).toBe(20211014);
      expect(footprint?.header.generator).toEqual({ value: 'pcbnew', explicit: true, variant: 'symbol' });
      expect(footprint?.layer?.value).toBe('F.Cu');
      expect(footprint?.attributes?.map(a => a.value)).toEqual(['smd']);
    });

    it('reads pads', () => {
      const { footprint } = parseFootprint(text);
      if (!footprint) throw new Error('footprint expected');
      const pads = footprintPads(footprint);
      expect(pads.map(p => p.number.value)).toEqual(['1', '2']);
      const [first] = pads;
      expect(first.padType.value).toBe('smd');
      expect(first.shape.value).toBe('roundrect');
      expect(first.at.x.toString()).toBe('-0.7875');
      expect(first.at.angle).toBeUndefined();
      expect(first.size?.w.toString()).toBe('0.875');
      expect(first.size?.h.toString()).toBe('0.95');
      expect(first.layers?.map(l => l.value)).toEqual(['F.Cu', 'F.Paste', 'F.Mask']);
      expect(first.roundrectRatio).toBe(0.25);
      expect(first.uuid?.token).toBe('tstamp');
      expect(first.uuid?.id.value).toBe('1a2b3c4d-0000-4000-8000-000000000005');
    });

    it('reads texts with the bare hide flag', () => {
      const { footprint } = parseFootprint(text);
      if (!footprint) throw new Error('footprint expected');
      const texts = footprintTexts(footprint);
      expect(texts.map(t => [t.kind.value, t.text.value])).toEqual([
        ['reference', 'REF**'],
        ['value', 'R_0603_1608Metric'],
      ]);
      expect(texts[0].hide.value).toBe(false);
      expect(texts[1].hide).toEqual({ value: true, explicit: true, variant: 'bare' });
      expect(texts[1].effects?.font?.thickness?.toString()).toBe('0.15');
    });

    it('reads legacy graphics', () => {
      const { footprint } = parseFootprint(text);
      if (!footprint) throw new Error('footprint expected');
      const graphics = footprintGraphics(footprint);
      expect(graphics.map(g => g.shape)).toEqual(['line', 'circle']);
      expect(graphics[0].stroke?.variant).toBe('width');
      expect(graphics[0].stroke?.value.width.toString()).toBe('0.1');
      expect(graphics[1].center?.x.isZero()).toBe(true);
      expect(graphics[1].fill?.value).toBe('none');
    });

    it('keeps unmodeled children', () => {
      const { footprint } = parseFootprint(text);
      const unmodeled = footprint?.items.flatMap(section => (section.kind === 'unmodeled' ? [tagOf(section.node)] : []));
      expect(unmodeled).toEqual(['tedit', 'model']);
    });

    it('rebuilds the tree it was read from', () => {
      const { footprint, root } = parseFootprint(text);
      if (!footprint) throw new Error('footprint expected');
      expect(sexprEquals(buildFootprint(footprint), root)).toBe(true);
    });

    it('round-trips byte for byte', () => {
      expect(saveDocument(loadFootprint(text))).toBe(text);
    });

    it('drops a bare hide flag when it is cleared', () => {
      const doc = loadFootprint(text);
      const value = footprintTexts(doc.footprint)[1];
      value.hide = withValue(value.hide, false);
      const expected = text.replace(' (layer "F.Fab") hide\n', ' (layer "F.Fab")\n');
      expect(expected).not.toBe(text);
      expect(saveDocument(doc)).toBe(expected);
    });
  });

  describe('KiCad 8 footprint', () => {
    const text = readFixture('kicad8', 'resistor.kicad_mod');

    it('reads properties and the generator version', () => {
      const { footprint } = parseFootprint(text);
      if (!footprint) throw new Error('footprint expected');
      expect(footprint.header.generator?.variant).toBe('string');
      expect(footprint.header.generatorVersion?.value).toBe('8.0');
      const properties = footprintProperties(footprint);
      expect(properties.map(p => [p.key.value, p.value.value])).toEqual([
        ['Reference', 'REF**'],
        ['Value', 'R_0603_1608Metric'],
      ]);
      expect(properties[1].hide).toEqual({ value: true, explicit: true, variant: 'child' });
      expect(properties[0].at?.angle).toBe(0);
      expect(properties[0].uuid?.token).toBe('uuid');
      expect(findProperty(properties, 'Value')?.value.value).toBe('R_0603_1608Metric');
      expect(findProperty(properties, 'Footprint')).toBeUndefined();
    });

    it('reads stroked graphics and user texts', () => {
      const { footprint } = parseFootprint(text);
      if (!footprint) throw new Error('footprint expected');
      const graphics = footprintGraphics(footprint);
      expect(graphics.map(g => g.token)).toEqual(['fp_line', 'fp_rect']);
      expect(graphics[0].stroke?.variant).toBe('stroke');
      expect(graphics[0].stroke?.value.type?.value).toBe('solid');
      expect(footprintTexts(footprint).map(t => t.text.value)).toEqual(['${REFERENCE}']);
    });

    it('round-trips byte for byte', () => {
      expect(saveDocument(loadFootprint(text))).toBe(text);
    });
  });

  it('reads the legacy module token', () => {
    const text = '(module R (layer F.Cu) (tedit 5F68FEEE)\n  (fp_text reference R1 (at 0 0) (layer F.SilkS))\n)\n';
    const doc = loadFootprint(text);
    expect(doc.footprint.token).toBe('module');
    expect(doc.footprint.name).toEqual({ value: 'R', explicit: true, variant: 'symbol' });
    expect(saveDocument(doc)).toBe(text);
  });

  it('keeps a malformed pad unmodeled with a warning', () => {
    const text = '(footprint "X" (pad "1" smd))';
    const { footprint, diagnostics } = parseFootprint(text);
    expect(footprint && footprintPads(footprint)).toEqual([]);
    expect(diagnostics).toEqual([
      {
        severity: 'warning',
        message: 'Pad without number, type, shape or position: (pad "1" smd)',
        location: { line: 1, column: 16, offset: 15 },
        context: 'footprint > pad',
      },
    ]);
  });

  it('keeps a pad with an out-of-range position unmodeled', () => {
    const text = '(footprint "x" (layer "F.Cu") (pad "1" smd rect (at 99999999999 0) (size 1 1)))\n';
    const doc = loadDocument(text);
    if (doc.kind !== 'footprint') throw new Error('footprint expected');
    expect(footprintPads(doc.footprint)).toEqual([]);
    expect(doc.hasErrors).toBe(false);
    expect(doc.diagnostics.map(d => d.message)).toEqual([
      'Malformed at: (at 99999999999 0)',
      'Pad without number, type, shape or position: (pad "1" smd rect (at 99999999999 0) (size 1 1))',
    ]);
    expect(saveDocument(doc)).toBe(text);
  });

  it('rejects a root that is not a footprint', () => {
    const { footprint, hasErrors, diagnostics } = parseFootprint('(kicad_pcb (version 1))');
    expect(footprint).toBeUndefined();
    expect(hasErrors).toBe(true);
    expect(diagnostics[0].message).toBe('Expected a footprint, found (kicad_pcb ...)');
  });

  it('serializes a bare footprint on one line', () => {
    expect(serializeFootprint(freshFootprint('X'))).toBe('(footprint "X")\n');
  });

  it('writes a fresh footprint canonically', () => {
    const pad = freshPad('1', 'smd', 'rect', { x: Coord.zero, y: Coord.zero }, {
      size: { w: Coord.fromMm(1), h: Coord.fromMm(1) },
      layers: [freshText('F.Cu')],
    });
    const footprint = freshFootprint('Test:Pad', {
      locked: freshFlag(true),
      layer: freshText('F.Cu'),
      uuid: freshUuid('00000000-0000-4000-8000-000000000001'),
      items: [modeled(pad)],
    });
    expect(saveDocument(createDocument({ kind: 'footprint', footprint }))).toBe(
      '(footprint "Test:Pad"\n'
      + '\t(locked yes)\n'
      + '\t(layer "F.Cu")\n'
      + '\t(uuid "00000000-0000-4000-8000-000000000001")\n'
      + '\t(pad "1" smd rect\n'
      + '\t\t(at 0 0)\n'
      + '\t\t(size 1 1)\n'
      + '\t\t(layers "F.Cu")\n'
      + '\t)\n'
      + ')\n',
    );
  });
});
