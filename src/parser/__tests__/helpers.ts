import * as fs from 'fs';
import * as path from 'path';
import {
  loadDocument,
  type FootprintDocument, type PcbDocument, type SchematicDocument, type SymbolLibDocument,
} from '../document';

export type FixtureEra = 'kicad6' | 'kicad8';

export function readFixture(era: FixtureEra, file: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', era, file), 'utf-8');
}

export function loadPcb(text: string): PcbDocument {
  const doc = loadDocument(text, { kind: 'pcb' });
  if (doc.kind !== 'pcb') throw new Error(`Expected a board, got ${doc.kind}`);
  return doc;
}

export function loadFootprint(text: string): FootprintDocument {
  const doc = loadDocument(text, { kind: 'footprint' });
  if (doc.kind !== 'footprint') throw new Error(`Expected a footprint, got ${doc.kind}`);
  return doc;
}

export function loadSymbolLib(text: string): SymbolLibDocument {
  const doc = loadDocument(text, { kind: 'symbol-lib' });
  if (doc.kind !== 'symbol-lib') throw new Error(`Expected a symbol library, got ${doc.kind}`);
  return doc;
}

export function loadSchematic(text: string): SchematicDocument {
  const doc = loadDocument(text, { kind: 'schematic' });
  if (doc.kind !== 'schematic') throw new Error(`Expected a schematic, got ${doc.kind}`);
  return doc;
}
