import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileByteSource, FileByteSink } from '../../../src/infra/local/file/index.js';
import { encodeStream, decodeStream } from '../../../src/usecases/transcode.js';

describe('file byte streams', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'i2p-base64-file-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('reads a file in fixed-size chunks', async () => {
    const filePath = path.join(tempDir, 'input.bin');
    fs.writeFileSync(filePath, Buffer.from([1, 2, 3, 4, 5]));

    const source = (await FileByteSource.open(filePath, { chunkSize: 3 }))._unsafeUnwrap();

    expect(Array.from((await source.readChunk())._unsafeUnwrap() ?? [])).toEqual([1, 2, 3]);
    expect(Array.from((await source.readChunk())._unsafeUnwrap() ?? [])).toEqual([4, 5]);
    expect((await source.readChunk())._unsafeUnwrap()).toBeNull();
    (await source.close())._unsafeUnwrap();
    (await source.close())._unsafeUnwrap();
    expect(source.description).toBe(filePath);
  });

  it('reports a missing input file as not found', async () => {
    const filePath = path.join(tempDir, 'missing.txt');

    const error = (await FileByteSource.open(filePath, { chunkSize: 12 }))._unsafeUnwrapErr();

    expect(error).toEqual({ code: 'IO_NOT_FOUND', message: `Not found: ${filePath}`, target: filePath });
  });

  it('creates or truncates the output file', async () => {
    const filePath = path.join(tempDir, 'out.txt');
    fs.writeFileSync(filePath, 'previous contents that are longer');

    const sink = (await FileByteSink.open(filePath))._unsafeUnwrap();
    (await sink.writeChunk(new TextEncoder().encode('Zm9v')))._unsafeUnwrap();
    (await sink.close())._unsafeUnwrap();

    expect(fs.readFileSync(filePath, 'utf8')).toBe('Zm9v');
    expect((await sink.writeChunk(new Uint8Array([1])))._unsafeUnwrapErr().message).toBe(
      `Write after close: ${filePath}`
    );
  });

  it('fails to open an output path inside a missing directory', async () => {
    const filePath = path.join(tempDir, 'no-such-dir', 'out.txt');

    const error = (await FileByteSink.open(filePath))._unsafeUnwrapErr();

    expect(error.code).toBe('IO_NOT_FOUND');
  });

  it('round-trips a file through encode and decode', async () => {
    const original = Buffer.from(Array.from({ length: 1000 }, (_, i) => (i * 7) % 256));
    const inputPath = path.join(tempDir, 'data.bin');
    const encodedPath = path.join(tempDir, 'data.b64');
    const decodedPath = path.join(tempDir, 'data.out');
    fs.writeFileSync(inputPath, original);

    const encodeSource = (await FileByteSource.open(inputPath, { chunkSize: 96 }))._unsafeUnwrap();
    const encodeSink = (await FileByteSink.open(encodedPath))._unsafeUnwrap();
    const encoded = await encodeStream({ source: encodeSource, sink: encodeSink }, { lineWidth: 76 });
    expect(encoded._unsafeUnwrap()).toEqual({ bytesIn: 1000, bytesOut: 1336 + 18, chunks: 11 });

    const decodeSource = (await FileByteSource.open(encodedPath, { chunkSize: 100 }))._unsafeUnwrap();
    const decodeSink = (await FileByteSink.open(decodedPath))._unsafeUnwrap();
    const decoded = await decodeStream({ source: decodeSource, sink: decodeSink }, { whitespace: 'ignore' });
    expect(decoded._unsafeUnwrap().bytesOut).toBe(1000);

    expect(fs.readFileSync(decodedPath).equals(original)).toBe(true);
  });
});
