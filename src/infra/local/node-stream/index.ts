import type { Readable, Writable } from 'stream';
import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { ByteSourcePort, ByteSinkPort, IoError } from '../../../ports/byte-stream.port.js';
import { ioError, mapNodeIoError } from '../io-error.js';

/**
 * Node Readable adapter (stdin, sockets, anything stream-shaped).
 *
 * Reads through the stream's async iterator, so a stream that errors or is
 * destroyed before 'end' rejects the pending read (ERR_STREAM_PREMATURE_CLOSE)
 * instead of looking like a normal end of input.
 */
export class NodeStreamByteSource implements ByteSourcePort {
  readonly description: string;
  private readonly iterator: AsyncIterator<unknown>;
  private done = false;

  constructor(stream: Readable, options: { description: string }) {
    this.description = options.description;
    this.iterator = stream[Symbol.asyncIterator]();
  }

  readChunk(): ResultAsync<Uint8Array | null, IoError> {
    if (this.done) return okAsync(null);

    return RA.fromPromise(this.iterator.next(), (e) => mapNodeIoError(e, this.description, 'read')).andThen(
      (step) => {
        if (step.done) {
          this.done = true;
          return okAsync(null);
        }
        return toBytes(step.value, this.description);
      }
    );
  }

  /** Releases the stream when reading stopped early (the iterator destroys it). */
  close(): ResultAsync<void, IoError> {
    if (this.done) return okAsync(undefined);
    this.done = true;

    const release = this.iterator.return?.();
    if (!release) return okAsync(undefined);
    return RA.fromPromise(release, (e) => mapNodeIoError(e, this.description, 'close')).map(() => undefined);
  }
}

function toBytes(value: unknown, description: string): ResultAsync<Uint8Array, IoError> {
  if (value instanceof Uint8Array) return okAsync(value);
  if (typeof value === 'string') return okAsync(new TextEncoder().encode(value));
  return errAsync(ioError('read', description, `Unsupported chunk type from ${description}: ${typeof value}`));
}

/**
 * Node Writable adapter (stdout, file streams).
 *
 * Each write resolves from the stream's write callback, so at most one chunk is
 * in flight. `endOnClose: false` leaves the stream open (stdout belongs to the process).
 */
export class NodeStreamByteSink implements ByteSinkPort {
  readonly description: string;
  private readonly stream: Writable;
  private readonly endOnClose: boolean;
  private streamError: Error | null = null;

  constructor(stream: Writable, options: { description: string; endOnClose?: boolean }) {
    this.stream = stream;
    this.description = options.description;
    this.endOnClose = options.endOnClose ?? true;

    // An unhandled 'error' event would crash the process; keep it and report it on the next call.
    stream.on('error', (e: Error) => {
      this.streamError = e;
    });
  }

  writeChunk(bytes: Uint8Array): ResultAsync<void, IoError> {
    const unusable = this.unusableReason();
    if (unusable) return errAsync(unusable);
    if (bytes.length === 0) return okAsync(undefined);

    return RA.fromPromise(
      new Promise<void>((resolve, reject) => {
        this.stream.write(bytes, (e) => (e ? reject(e) : resolve()));
      }),
      (e) => mapNodeIoError(e, this.description, 'write')
    );
  }

  close(): ResultAsync<void, IoError> {
    if (this.streamError) return errAsync(mapNodeIoError(this.streamError, this.description, 'close'));
    if (!this.endOnClose || this.stream.writableEnded) return okAsync(undefined);

    return RA.fromPromise(
      new Promise<void>((resolve, reject) => {
        this.stream.once('error', reject);
        this.stream.end(() => resolve());
      }),
      (e) => mapNodeIoError(e, this.description, 'close')
    );
  }

  private unusableReason(): IoError | null {
    if (this.streamError) return mapNodeIoError(this.streamError, this.description, 'write');
    if (this.stream.destroyed || this.stream.writableEnded) {
      return ioError('write', this.description, `Destination is closed: ${this.description}`);
    }
    return null;
  }
}
