/**
 * File and stream boundary.
 *
 * The whole input is read before tokenizing and the whole text is produced
 * before anything is written. Cancellation is checked before and after I/O.
 */

import * as fs from 'fs/promises';
import type { Readable, Writable } from 'stream';
import { text as readText } from 'stream/consumers';
import { KicadFileError, OperationAbortedError } from '../shared/errors';
import { documentKindOf } from '../shared/fileTypes';
import { logger } from '../shared/logger';
import type { ReadOptions, WriteFileOptions } from '../shared/types';
import { loadDocument, saveDocument, type KicadDocument } from '../parser/document';

const log = logger.child({ component: 'documentIo' });

function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) throw new OperationAbortedError(operation);
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function loaded(doc: KicadDocument, content: string, started: number, filePath?: string): KicadDocument {
  const duration = Date.now() - started;
  log.debug('Loaded document', { filePath, kind: doc.kind, bytes: content.length, duration });
  if (doc.hasErrors) {
    const errors = doc.diagnostics.filter(d => d.severity === 'error').length;
    log.warn('Document loaded with errors', { filePath, kind: doc.kind, errors });
  }
  return doc;
}

export async function readKicadFile(filePath: string, options: ReadOptions = {}): Promise<KicadDocument> {
  const operation = 'readKicadFile';
  const started = Date.now();
  throwIfAborted(options.signal, operation);

  let content: string;
  try {
    content = await fs.readFile(filePath, { encoding: 'utf-8', signal: options.signal });
  } catch (error) {
    throwIfAborted(options.signal, operation);
    throw new KicadFileError(`Failed to read ${filePath}: ${describeFailure(error)}`, filePath, error, { operation });
  }
  throwIfAborted(options.signal, operation);

  const kind = options.kind ?? documentKindOf(filePath);
  return loaded(loadDocument(content, { kind }), content, started, filePath);
}

export async function readKicadStream(stream: Readable, options: ReadOptions = {}): Promise<KicadDocument> {
  const operation = 'readKicadStream';
  const started = Date.now();
  throwIfAborted(options.signal, operation);

  let content: string;
  try {
    content = await readText(stream);
  } catch (error) {
    throw new KicadFileError(`Failed to read stream: ${describeFailure(error)}`, undefined, error, { operation });
  }
  throwIfAborted(options.signal, operation);

  return loaded(loadDocument(content, { kind: options.kind }), content, started);
}

export async function writeKicadFile(doc: KicadDocument, filePath: string, options: WriteFileOptions = {}): Promise<void> {
  const operation = 'writeKicadFile';
  const started = Date.now();
  throwIfAborted(options.signal, operation);

  const content = saveDocument(doc, options);
  try {
    await fs.writeFile(filePath, content, { encoding: 'utf-8', signal: options.signal });
  } catch (error) {
    throwIfAborted(options.signal, operation);
    throw new KicadFileError(`Failed to write ${filePath}: ${describeFailure(error)}`, filePath, error, { operation });
  }
  throwIfAborted(options.signal, operation);
  log.debug('Saved document', { filePath, kind: doc.kind, bytes: content.length, duration: Date.now() - started });
}

/** Writes the whole document to `stream`; the stream is left open */
export async function writeKicadStream(doc: KicadDocument, stream: Writable, options: WriteFileOptions = {}): Promise<void> {
  const operation = 'writeKicadStream';
  const started = Date.now();
  throwIfAborted(options.signal, operation);

  const content = saveDocument(doc, options);
  try {
    await new Promise<void>((resolve, reject) => {
      // a failed write also emits 'error'; the once-listener takes it
      stream.once('error', reject);
      stream.write(content, 'utf-8', error => {
        if (error) {
          reject(error);
          return;
        }
        stream.off('error', reject);
        resolve();
      });
    });
  } catch (error) {
    throw new KicadFileError(`Failed to write stream: ${describeFailure(error)}`, undefined, error, { operation });
  }
  throwIfAborted(options.signal, operation);
  log.debug('Saved document', { kind: doc.kind, bytes: content.length, duration: Date.now() - started });
}
