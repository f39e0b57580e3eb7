export { Coord, point, pointMm, boundsOf, unionRect } from './coord';
export type { CoordPoint, CoordRect } from './coord';
export {
  sym, str, num, list, withItems, isList, isAtom, isSymbol, tagOf, childrenOf,
  findExpr, findAllExpr, valueAt, atomText, atomNumber, getStringValue, getNumberValue,
  atomCoord, getXY, getSize, hasFlag, sexprEquals, describeExpr,
} from './sexpr';
export type { SExpr, SList, SAtom, SSymbol, SString, SNumber, ListLayout, SourceLocation } from './sexpr';
export { DiagnosticBag, formatDiagnostic } from './diagnostics';
export type { Diagnostic, DiagnosticSeverity } from './diagnostics';
export { tokenize } from './tokenizer';
export type { Token, TokenKind } from './tokenizer';
export { parseSExpression, isNumericText, classifySymbol } from './reader';
export type { ParseResult, ParseOptions } from './reader';
export { SExprBuilder, isValidSymbol } from './builder';
export { serializeSExpression, formatNumber, quoteString, formatAtom } from './writer';
export type { WriteOptions } from './writer';
export {
  encoded, fresh, defaulted, withValue, variantOr, modeled, unmodeled, modeledValues,
  itemsOfType, sectionNode, ChildOrder, ChildEmitter, ListReader, reconcile,
} from './fidelity';
export type { EncodedValue, Section } from './fidelity';
export { freshText, freshFlag, freshUuid, freshStroke, freshEffects, freshProperty, findProperty, positionOf, pointOf } from './fields';
export type {
  AtomKind, Text, Flag, FlagEncoding, FileHeader, Position, Size, Uuid, UuidToken,
  Stroke, StrokeStyle, Font, Effects, Property,
} from './fields';
export { graphicShapeOf, graphicExtent } from './graphics';
export type { Graphic, GraphicShape } from './graphics';

export {
  KicadFootprintParser, readFootprint, buildFootprint, parseFootprint, serializeFootprint,
  freshFootprint, freshPad, footprintPads, footprintGraphics, footprintProperties, footprintTexts,
} from './footprintParser';
export type { Footprint, FootprintItem, FootprintToken, Pad, PadNet, FpText, FootprintParseResult } from './footprintParser';
export {
  KicadPcbParser, readBoard, buildBoard, parseBoard, serializeBoard,
  freshBoard, freshTrack, freshVia, boardFootprints, boardTracks, boardVias, boardGraphics,
} from './pcbParser';
export type { PcbBoard, PcbItem, PcbLayer, PcbNet, PcbTrack, PcbVia, PcbParseResult } from './pcbParser';
export {
  KicadSymbolLibParser, readSymbolLibrary, buildSymbolLibrary, readLibSymbol, buildLibSymbol,
  parseSymbolLibrary, serializeSymbolLibrary, freshLibSymbol, symbolProperties, symbolUnits, unitPins,
} from './symbolLibParser';
export type {
  SymbolLibrary, LibSymbol, LibSymbolItem, SymbolUnit, LibPin, PinText, PinNumbers, PinNames, SymbolLibParseResult,
} from './symbolLibParser';
export {
  KicadSchematicParser, readSchematic, buildSchematic, parseSchematic, serializeSchematic,
  freshSchematic, freshWire, freshLabel, freshPlacedSymbol,
  schematicWires, schematicLabels, schematicSymbols, schematicJunctions,
} from './schematicParser';
export type {
  Schematic, SchematicItem, Wire, Junction, NoConnect, Label, LabelToken, PlacedSymbol, SchematicParseResult,
} from './schematicParser';
export { rotatePoint, footprintBounds, placedFootprintBounds, boardBounds } from './bounds';
export {
  loadDocument, saveDocument, createDocument, buildDocumentTree, documentKindOfRoot, writerSettingsFor,
} from './document';
export type {
  KicadDocument, DocumentModel, PcbDocument, FootprintDocument, SymbolLibDocument, SchematicDocument,
  GenericDocument, LoadOptions, SaveOptions,
} from './document';
