import type { DocumentKind, KicadFileType } from './types';

/** Get the extension from a file path (works with both / and \ separators) */
function getExtension(filePath: string): string {
  const lastDot = filePath.lastIndexOf('.');
  const lastSlash = Math.max(filePath.lastIndexOf('/'), filePath.lastIndexOf('\\'));
  if (lastDot <= lastSlash) return '';
  return filePath.slice(lastDot).toLowerCase();
}

/** File extension to KiCad file type mapping */
export function getKicadFileType(filePath: string): KicadFileType {
  switch (getExtension(filePath)) {
    case '.kicad_sch': return 'schematic';
    case '.kicad_pcb': return 'pcb';
    case '.kicad_sym': return 'symbol-lib';
    case '.kicad_mod': return 'footprint';
    default: return 'unknown';
  }
}

export function isDocumentKind(type: KicadFileType): type is DocumentKind {
  return type === 'schematic' || type === 'pcb' || type === 'symbol-lib' || type === 'footprint';
}

/** Document kind of a path, or undefined for anything that is not an S-expression document */
export function documentKindOf(filePath: string): DocumentKind | undefined {
  const type = getKicadFileType(filePath);
  return isDocumentKind(type) ? type : undefined;
}

/** Extensions of the S-expression documents */
export const DOCUMENT_EXTENSIONS: Readonly<Record<DocumentKind, string>> = {
  'schematic': '.kicad_sch',
  'pcb': '.kicad_pcb',
  'symbol-lib': '.kicad_sym',
  'footprint': '.kicad_mod',
};
