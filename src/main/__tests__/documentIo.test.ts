import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PassThrough, Readable, Writable } from 'stream';
import { text } from 'stream/consumers';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readKicadFile, readKicadStream, writeKicadFile, writeKicadStream } from '../documentIo';
import { KicadFileError, OperationAbortedError } from '../../shared/errors';

const FIXTURES = path.join(__dirname, '..', '..', 'parser', '__tests__', 'fixtures');
const BOARD = path.join(FIXTURES, 'kicad8', 'board.kicad_pcb');

describe('documentIo', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'kicad-sexpr-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('readKicadFile', () => {
    it('reads a document of the kind its extension names', async () => {
      const doc = await readKicadFile(BOARD);
      expect(doc.kind).toBe('pcb');
      expect(doc.hasErrors).toBe(false);
    });

    it('reports a root that does not match the extension', async () => {
      const filePath = path.join(dir, 'part.kicad_pcb');
      await fs.writeFile(filePath, '(footprint "R")\n', 'utf-8');
      const doc = await readKicadFile(filePath);
      expect(doc.kind).toBe('generic');
      expect(doc.diagnostics.map(d => d.message)).toEqual(['Expected a pcb document, found (footprint ...)']);
    });

    it('detects the kind from the root for other extensions', async () => {
      const filePath = path.join(dir, 'board.txt');
      await fs.writeFile(filePath, '(kicad_pcb (version 20240108))\n', 'utf-8');
      expect((await readKicadFile(filePath)).kind).toBe('pcb');
    });

    it('wraps file-system failures', async () => {
      const filePath = path.join(dir, 'missing.kicad_sch');
      const result = readKicadFile(filePath);
      await expect(result).rejects.toBeInstanceOf(KicadFileError);
      await expect(result).rejects.toMatchObject({ code: 'FILE_ERROR', filePath });
    });

    it('honours an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(readKicadFile(BOARD, { signal: controller.signal })).rejects.toThrow(OperationAbortedError);
    });
  });

  describe('writeKicadFile', () => {
    it('writes an unedited document back byte for byte', async () => {
      const source = await fs.readFile(BOARD, 'utf-8');
      const target = path.join(dir, 'copy.kicad_pcb');
      await writeKicadFile(await readKicadFile(BOARD), target);
      expect(await fs.readFile(target, 'utf-8')).toBe(source);
    });

    it('wraps file-system failures', async () => {
      const doc = await readKicadFile(BOARD);
      const target = path.join(dir, 'no-such-dir', 'copy.kicad_pcb');
      await expect(writeKicadFile(doc, target)).rejects.toMatchObject({
        code: 'FILE_ERROR',
        filePath: target,
        message: expect.stringMatching(/^Failed to write /),
      });
    });

    it('does not write when the signal is already aborted', async () => {
      const doc = await readKicadFile(BOARD);
      const target = path.join(dir, 'copy.kicad_pcb');
      const controller = new AbortController();
      controller.abort();
      await expect(writeKicadFile(doc, target, { signal: controller.signal })).rejects.toThrow('Operation aborted: writeKicadFile');
      await expect(fs.access(target)).rejects.toThrow();
    });
  });

  describe('streams', () => {
    it('reads a document from a stream', async () => {
      const doc = await readKicadStream(Readable.from(['(kicad_sch', ' (version 20231120))\n']));
      expect(doc.kind).toBe('schematic');
      expect(doc.kind === 'schematic' && doc.schematic.header.version).toBe(20231120);
    });

    it('writes a document to a stream and leaves it open', async () => {
      const doc = await readKicadStream(Readable.from(['(fp_lib_table\n  (lib (name "A"))\n)\n']));
      const output = new PassThrough();
      await writeKicadStream(doc, output, { indent: '\t' });
      expect(output.writableEnded).toBe(false);
      output.end();
      expect(await text(output)).toBe('(fp_lib_table\n\t(lib (name "A"))\n)\n');
    });

    it('reports a failing stream as a file error only', async () => {
      const doc = await readKicadStream(Readable.from(['(fp_lib_table)\n']));
      const output = new Writable({
        write(_chunk, _encoding, callback) {
          callback(new Error('disk full'));
        },
      });
      const failure = writeKicadStream(doc, output);
      await expect(failure).rejects.toThrow(KicadFileError);
      await expect(failure).rejects.toThrow('Failed to write stream: disk full');
      await new Promise(resolve => setImmediate(resolve));
      expect(output.destroyed).toBe(true);
      expect(output.listenerCount('error')).toBe(0);
    });

    it('leaves no error listener behind after a successful write', async () => {
      const doc = await readKicadStream(Readable.from(['(fp_lib_table)\n']));
      const output = new PassThrough();
      await writeKicadStream(doc, output);
      expect(output.listenerCount('error')).toBe(0);
    });
  });
});
