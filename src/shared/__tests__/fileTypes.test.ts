import { describe, expect, it } from 'vitest';
import { DOCUMENT_EXTENSIONS, documentKindOf, getKicadFileType, isDocumentKind } from '../fileTypes';

describe('getKicadFileType', () => {
  it('maps extensions to file types', () => {
    expect(getKicadFileType('/work/board.kicad_pcb')).toBe('pcb');
    expect(getKicadFileType('C:\\work\\sheet.KICAD_SCH')).toBe('schematic');
    expect(getKicadFileType('lib/Device.kicad_sym')).toBe('symbol-lib');
    expect(getKicadFileType('R.pretty/R_0603.kicad_mod')).toBe('footprint');
  });

  it('ignores dots in directory names', () => {
    expect(getKicadFileType('R.pretty/README')).toBe('unknown');
    expect(getKicadFileType('notes.txt')).toBe('unknown');
  });
});

describe('documentKindOf', () => {
  it('returns a document kind only for S-expression documents', () => {
    expect(documentKindOf('board.kicad_pcb')).toBe('pcb');
    expect(getKicadFileType('demo.kicad_pro')).toBe('unknown');
    expect(documentKindOf('demo.kicad_pro')).toBeUndefined();
    expect(isDocumentKind('unknown')).toBe(false);
  });

  it('round-trips through the extension table', () => {
    for (const [kind, extension] of Object.entries(DOCUMENT_EXTENSIONS)) {
      expect(documentKindOf(`file${extension}`)).toBe(kind);
    }
  });
});
