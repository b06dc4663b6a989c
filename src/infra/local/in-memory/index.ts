import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import type { ByteSourcePort, ByteSinkPort, IoError } from '../../../ports/byte-stream.port.js';
import { concatBytes, asciiToString } from '../../../core/encoding/bytes.js';
import { ioError } from '../io-error.js';

export const DEFAULT_IN_MEMORY_CHUNK_SIZE = 3 * 4 * 1024;

/**
 * In-memory source over a byte array or a string (encoded as UTF-8).
 *
 * Hands out `chunkSize` slices without copying.
 */
export class InMemoryByteSource implements ByteSourcePort {
  readonly description: string;
  private readonly bytes: Uint8Array;
  private readonly chunkSize: number;
  private offset = 0;
  private closed = false;

  constructor(input: Uint8Array | string, options: { chunkSize?: number; description?: string } = {}) {
    this.bytes = typeof input === 'string' ? new TextEncoder().encode(input) : input;
    this.chunkSize = options.chunkSize ?? DEFAULT_IN_MEMORY_CHUNK_SIZE;
    if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${this.chunkSize}`);
    }
    this.description = options.description ?? 'memory';
  }

  readChunk(): ResultAsync<Uint8Array | null, IoError> {
    if (this.closed) {
      return errAsync(ioError('read', this.description, `Read after close: ${this.description}`));
    }
    if (this.offset >= this.bytes.length) return okAsync(null);

    const end = Math.min(this.offset + this.chunkSize, this.bytes.length);
    const chunk = this.bytes.subarray(this.offset, end);
    this.offset = end;
    return okAsync(chunk);
  }

  close(): ResultAsync<void, IoError> {
    this.closed = true;
    return okAsync(undefined);
  }
}

/**
 * In-memory sink collecting every written chunk (copied, so callers may reuse buffers).
 */
export class InMemoryByteSink implements ByteSinkPort {
  readonly description: string;
  private readonly chunks: Uint8Array[] = [];
  private closed = false;

  constructor(options: { description?: string } = {}) {
    this.description = options.description ?? 'memory';
  }

  writeChunk(bytes: Uint8Array): ResultAsync<void, IoError> {
    if (this.closed) {
      return errAsync(ioError('write', this.description, `Write after close: ${this.description}`));
    }
    this.chunks.push(bytes.slice());
    return okAsync(undefined);
  }

  close(): ResultAsync<void, IoError> {
    this.closed = true;
    return okAsync(undefined);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get chunkCount(): number {
    return this.chunks.length;
  }

  bytes(): Uint8Array {
    return concatBytes(this.chunks);
  }

  /** Collected output as text; meant for encoder output, which is ASCII. */
  text(): string {
    return asciiToString(this.bytes());
  }
}
