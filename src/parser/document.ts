/**
 * Document dispatch: detect the kind of a KiCad file from its root tag, map
 * it to a typed model and write it back.
 *
 * Saving rebuilds the tree from the model and reconciles it against the tree
 * that was read, so an unedited document reproduces its input exactly.
 */

import {
  formatEraOf, newlineText, resolveWriterSettings,
  type WriterSettings,
} from '../shared/config';
import { DOCUMENT_KINDS, ROOT_TAGS, type DocumentKind } from '../shared/types';
import { DiagnosticBag, type Diagnostic } from './diagnostics';
import { reconcile } from './fidelity';
import { buildFootprint, readFootprint, type Footprint } from './footprintParser';
import { buildBoard, readBoard, type PcbBoard } from './pcbParser';
import { parseSExpression } from './reader';
import { buildSchematic, readSchematic, type Schematic } from './schematicParser';
import { tagOf, type SExpr, type SList } from './sexpr';
import { buildSymbolLibrary, readSymbolLibrary, type SymbolLibrary } from './symbolLibParser';
import { serializeSExpression } from './writer';

// --- Types ---

interface DocumentBase {
  /** Tree the document was read from; undefined for documents created in memory */
  readonly source?: SList;
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
  /** Indentation unit found in the source */
  readonly indent?: string;
  readonly newline: '\n' | '\r\n';
}

export interface PcbDocument extends DocumentBase {
  kind: 'pcb';
  board: PcbBoard;
}

export interface FootprintDocument extends DocumentBase {
  kind: 'footprint';
  footprint: Footprint;
}

export interface SymbolLibDocument extends DocumentBase {
  kind: 'symbol-lib';
  library: SymbolLibrary;
}

export interface SchematicDocument extends DocumentBase {
  kind: 'schematic';
  schematic: Schematic;
}

/** Any S-expression file, kept as a raw tree */
export interface GenericDocument extends DocumentBase {
  kind: 'generic';
  root: SList;
}

export type KicadDocument = PcbDocument | FootprintDocument | SymbolLibDocument | SchematicDocument | GenericDocument;

export type DocumentModel =
  | { kind: 'pcb'; board: PcbBoard }
  | { kind: 'footprint'; footprint: Footprint }
  | { kind: 'symbol-lib'; library: SymbolLibrary }
  | { kind: 'schematic'; schematic: Schematic }
  | { kind: 'generic'; root: SList };

export interface LoadOptions {
  /** Expected kind; a different root is an error and yields a generic document */
  kind?: DocumentKind;
}

export type SaveOptions = Partial<WriterSettings>;

// --- Loading ---

/** Kind of document a root tag belongs to */
export function documentKindOfRoot(root: SExpr): DocumentKind | undefined {
  const tag = tagOf(root);
  if (tag === undefined) return undefined;
  return DOCUMENT_KINDS.find(kind => ROOT_TAGS[kind].includes(tag));
}

export function loadDocument(content: string, options: LoadOptions = {}): KicadDocument {
  const diagnostics = new DiagnosticBag();
  const parsed = parseSExpression(content, { diagnostics });
  const { root } = parsed;

  let kind = documentKindOfRoot(root);
  if (options.kind && kind !== options.kind) {
    diagnostics.error(`Expected a ${options.kind} document, found (${tagOf(root) ?? ''} ...)`, root.location);
    kind = undefined;
  }

  const model = readModel(kind, root, diagnostics);
  const base = {
    source: root,
    diagnostics: diagnostics.all,
    hasErrors: diagnostics.hasErrors,
    newline: parsed.newline,
  };
  return parsed.indent === undefined ? { ...base, ...model } : { ...base, ...model, indent: parsed.indent };
}

function readModel(kind: DocumentKind | undefined, root: SList, diagnostics: DiagnosticBag): DocumentModel {
  switch (kind) {
    case 'pcb':
      return { kind, board: readBoard(root, diagnostics) };
    case 'footprint': {
      const footprint = readFootprint(root, diagnostics);
      return footprint ? { kind, footprint } : { kind: 'generic', root };
    }
    case 'symbol-lib':
      return { kind, library: readSymbolLibrary(root, diagnostics) };
    case 'schematic':
      return { kind, schematic: readSchematic(root, diagnostics) };
    case undefined:
      return { kind: 'generic', root };
  }
}

/** A document for a model created in memory; written with canonical encodings and layout */
export function createDocument(model: DocumentModel): KicadDocument {
  return { ...model, diagnostics: [], hasErrors: false, newline: '\n' };
}

// --- Saving ---

/** Tree for the document's current model, before reconciling with the source */
export function buildDocumentTree(doc: KicadDocument): SList {
  switch (doc.kind) {
    case 'pcb': return buildBoard(doc.board);
    case 'footprint': return buildFootprint(doc.footprint);
    case 'symbol-lib': return buildSymbolLibrary(doc.library);
    case 'schematic': return buildSchematic(doc.schematic);
    case 'generic': return doc.root;
  }
}

function versionOf(doc: KicadDocument): number | undefined {
  switch (doc.kind) {
    case 'pcb': return doc.board.header.version;
    case 'footprint': return doc.footprint.header.version;
    case 'symbol-lib': return doc.library.header.version;
    case 'schematic': return doc.schematic.header.version;
    case 'generic': return undefined;
  }
}

/**
 * Writer settings for a document: explicit options win, then what was
 * detected in the source, then the defaults of the file's format era.
 */
export function writerSettingsFor(doc: KicadDocument, options: SaveOptions = {}): WriterSettings {
  return resolveWriterSettings({
    indent: options.indent ?? doc.indent ?? formatEraOf(versionOf(doc)).indent,
    newline: options.newline ?? (doc.newline === '\r\n' ? 'crlf' : 'lf'),
    preserveLayout: options.preserveLayout,
  });
}

export function saveDocument(doc: KicadDocument, options: SaveOptions = {}): string {
  const settings = writerSettingsFor(doc, options);
  const tree = reconcile(buildDocumentTree(doc), doc.source);
  return serializeSExpression(tree, {
    indent: settings.indent,
    newline: newlineText(settings.newline),
    preserveLayout: settings.preserveLayout,
  });
}
