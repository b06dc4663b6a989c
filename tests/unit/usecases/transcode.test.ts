import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import pino from 'pino';
import { encodeStream, decodeStream } from '../../../src/usecases/transcode.js';
import { InMemoryByteSource, InMemoryByteSink } from '../../../src/infra/local/in-memory/index.js';
import { NodeStreamByteSource } from '../../../src/infra/local/node-stream/index.js';
import type { ByteSinkPort } from '../../../src/ports/byte-stream.port.js';
import { ScriptedByteSource, FailingByteSink } from '../../fakes/index.js';

function captureLogger() {
  const lines: string[] = [];
  const logger = pino({ level: 'debug' }, { write: (line: string) => void lines.push(line) });
  const records = () => lines.map((line): Record<string, unknown> => JSON.parse(line));
  return { logger, records };
}

describe('encodeStream', () => {
  it('encodes chunk by chunk and reports totals', async () => {
    const source = new InMemoryByteSource('foobar', { chunkSize: 4 });
    const sink = new InMemoryByteSink();

    const summary = (await encodeStream({ source, sink }))._unsafeUnwrap();

    expect(sink.text()).toBe('Zm9vYmFy');
    expect(summary).toEqual({ bytesIn: 6, bytesOut: 8, chunks: 2 });
    expect(sink.isClosed).toBe(true);
  });

  it('writes padding and the wrap newline on finish', async () => {
    const source = new InMemoryByteSource('hello', { chunkSize: 12 });
    const sink = new InMemoryByteSink();

    const summary = (await encodeStream({ source, sink }, { lineWidth: 6 }))._unsafeUnwrap();

    expect(sink.text()).toBe('aGVsbG\n8=\n');
    expect(summary.bytesOut).toBe(10);
  });

  it('encodes empty input to nothing', async () => {
    const sink = new InMemoryByteSink();

    const summary = (await encodeStream({ source: new InMemoryByteSource(''), sink }))._unsafeUnwrap();

    expect(summary).toEqual({ bytesIn: 0, bytesOut: 0, chunks: 0 });
    expect(sink.chunkCount).toBe(0);
  });

  it('fails with the write error and closes both ends', async () => {
    const source = new ScriptedByteSource(['foo']);
    const sink = new FailingByteSink();

    const error = (await encodeStream({ source, sink }))._unsafeUnwrapErr();

    expect(error.code).toBe('IO_ERROR');
    expect(error.message).toBe('I/O error during write on failing: simulated failure');
    expect(source.closeCount).toBe(1);
    expect(sink.closeCount).toBe(1);
  });
});

describe('decodeStream', () => {
  it('decodes groups split across chunks', async () => {
    const source = new InMemoryByteSource('Zm9vYmFy', { chunkSize: 3 });
    const sink = new InMemoryByteSink();

    const summary = (await decodeStream({ source, sink }))._unsafeUnwrap();

    expect(new TextDecoder().decode(sink.bytes())).toBe('foobar');
    expect(summary).toEqual({ bytesIn: 8, bytesOut: 6, chunks: 3 });
    // The first chunk completes no group, so nothing is written for it.
    expect(sink.chunkCount).toBe(2);
  });

  it('passes decode options through', async () => {
    const sink = new InMemoryByteSink();

    const result = await decodeStream(
      { source: new InMemoryByteSource('Zm9v\nYm E', { chunkSize: 4 }), sink },
      { whitespace: 'ignore', padding: 'optional' }
    );

    expect(result.isOk()).toBe(true);
    expect(new TextDecoder().decode(sink.bytes())).toBe('fooba');
  });

  it('stops at the first bad symbol and leaves earlier output written', async () => {
    const source = new ScriptedByteSource(['Zm9v', '+mFy']);
    const sink = new InMemoryByteSink();

    const error = (await decodeStream({ source, sink }))._unsafeUnwrapErr();

    expect(error).toEqual({
      code: 'BASE64_INVALID_SYMBOL',
      message: "Invalid I2P base64 symbol '+' at position 4",
      position: 4,
      symbol: '+',
    });
    expect(new TextDecoder().decode(sink.bytes())).toBe('foo');
    expect(source.closeCount).toBe(1);
    expect(sink.isClosed).toBe(true);
  });

  it('reports a length error found at end of input', async () => {
    const sink = new InMemoryByteSink();

    const error = (await decodeStream({ source: new InMemoryByteSource('Zm9vY'), sink }))._unsafeUnwrapErr();

    expect(error.code).toBe('BASE64_INVALID_LENGTH');
    expect(sink.isClosed).toBe(true);
  });

  it('surfaces a read failure instead of ending early', async () => {
    const source = new ScriptedByteSource(['Zm9v'], { failAfterChunks: true });
    const sink = new InMemoryByteSink();

    const error = (await decodeStream({ source, sink }))._unsafeUnwrapErr();

    expect(error).toEqual({
      code: 'IO_ERROR',
      message: 'I/O error during read on scripted: simulated failure',
      operation: 'read',
      target: 'scripted',
    });
    expect(source.closeCount).toBe(1);
  });

  it('fails when the input stream is abandoned midway', async () => {
    const stream = new PassThrough();
    const source = new NodeStreamByteSource(stream, { description: 'stdin' });
    const memory = new InMemoryByteSink();
    const sink: ByteSinkPort = {
      description: 'out',
      writeChunk: (bytes) => {
        stream.destroy();
        return memory.writeChunk(bytes);
      },
      close: () => memory.close(),
    };

    stream.write('Zm9v');
    const error = (await decodeStream({ source, sink }))._unsafeUnwrapErr();

    expect(error).toEqual({
      code: 'IO_ERROR',
      message: 'I/O error during read on stdin: Premature close',
      operation: 'read',
      target: 'stdin',
    });
    expect(memory.text()).toBe('foo');
    expect(memory.isClosed).toBe(true);
  });

  it('reports a sink close failure after a clean run', async () => {
    const source = new ScriptedByteSource(['Zm9v']);
    const sink = new FailingByteSink({ acceptWrites: 1, failOnClose: true });

    const error = (await decodeStream({ source, sink }))._unsafeUnwrapErr();

    expect(error).toEqual({
      code: 'IO_ERROR',
      message: 'I/O error during close on failing: simulated failure',
      operation: 'close',
      target: 'failing',
    });
    expect(source.closeCount).toBe(1);
    expect(sink.closeCount).toBe(1);
    expect(new TextDecoder().decode(sink.accepted[0])).toBe('foo');
  });

  it('closes the sink even when closing the source fails', async () => {
    const source = new ScriptedByteSource(['Zm9v'], { failOnClose: true });
    const sink = new FailingByteSink({ acceptWrites: 1 });

    const error = (await decodeStream({ source, sink }))._unsafeUnwrapErr();

    expect(error.code).toBe('IO_ERROR');
    expect(error.message).toBe('I/O error during close on scripted: simulated failure');
    expect(source.closeCount).toBe(1);
    expect(sink.closeCount).toBe(1);
    expect(new TextDecoder().decode(sink.accepted[0])).toBe('foo');
  });

  it('keeps the original failure when cleanup also fails', async () => {
    const source = new ScriptedByteSource(['Zm9v', '!'], { failOnClose: true });
    const sink = new InMemoryByteSink();

    const error = (await decodeStream({ source, sink }))._unsafeUnwrapErr();

    expect(error.code).toBe('BASE64_INVALID_SYMBOL');
    expect(sink.isClosed).toBe(true);
  });

  it('logs start, and failure with totals', async () => {
    const { logger, records } = captureLogger();
    const source = new InMemoryByteSource('Zm9v=', { description: 'input.txt' });

    await decodeStream({ source, sink: new InMemoryByteSink({ description: 'out.bin' }), logger });

    const [started, failed] = records();
    expect(started).toMatchObject({ msg: 'Transcode started', direction: 'decode', source: 'input.txt', sink: 'out.bin' });
    expect(failed).toMatchObject({ msg: 'Transcode failed', bytesIn: 5, bytesOut: 0, chunks: 1 });
    expect(failed?.['error']).toMatchObject({ code: 'BASE64_INVALID_PADDING', position: 4 });
  });
});
