// Shared types between the engine and the file boundary

export type KicadFileType = 'schematic' | 'pcb' | 'symbol-lib' | 'footprint' | 'unknown';

/** File types that hold an S-expression document this library can map */
export type DocumentKind = Extract<KicadFileType, 'schematic' | 'pcb' | 'symbol-lib' | 'footprint'>;

export const DOCUMENT_KINDS: readonly DocumentKind[] = ['pcb', 'footprint', 'symbol-lib', 'schematic'];

/** Root tag of each document kind; footprints may also use the legacy `module` */
export const ROOT_TAGS: Readonly<Record<DocumentKind, readonly string[]>> = {
  'pcb': ['kicad_pcb'],
  'footprint': ['footprint', 'module'],
  'symbol-lib': ['kicad_symbol_lib'],
  'schematic': ['kicad_sch'],
};

export interface ReadOptions {
  /** Expected kind; taken from the file extension when omitted */
  kind?: DocumentKind;
  signal?: AbortSignal;
}

export interface WriteFileOptions {
  indent?: string;
  newline?: 'lf' | 'crlf';
  preserveLayout?: boolean;
  signal?: AbortSignal;
}
