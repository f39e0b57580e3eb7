export * from './parser';
export { readKicadFile, readKicadStream, writeKicadFile, writeKicadStream } from './main/documentIo';
export { KicadError, ContractViolationError, KicadFileError, OperationAbortedError, isKicadError } from './shared/errors';
export type { ErrorContext } from './shared/errors';
export { getKicadFileType, documentKindOf, isDocumentKind, DOCUMENT_EXTENSIONS } from './shared/fileTypes';
export { DOCUMENT_KINDS, ROOT_TAGS } from './shared/types';
export type { KicadFileType, DocumentKind, ReadOptions, WriteFileOptions } from './shared/types';
export { DEFAULT_SETTINGS, resolveSettings, resolveWriterSettings, FORMAT_ERAS, formatEraOf } from './shared/config';
export type { Settings, WriterSettings, LoggingSettings, FormatEra, FormatEraProfile } from './shared/config';
export { createLogger, configureLogging, logger } from './shared/logger';
export type { Logger, LogMetadata } from './shared/logger';
