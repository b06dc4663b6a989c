import * as fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { ByteSourcePort, ByteSinkPort, IoError } from '../../../ports/byte-stream.port.js';
import { ioError, mapNodeIoError } from '../io-error.js';

/**
 * File source reading fixed-size chunks through a file handle.
 *
 * Use {@link FileByteSource.open}; the constructor takes an already opened handle.
 */
export class FileByteSource implements ByteSourcePort {
  readonly description: string;
  private readonly handle: FileHandle;
  private readonly chunkSize: number;
  private closed = false;

  private constructor(handle: FileHandle, filePath: string, chunkSize: number) {
    this.handle = handle;
    this.description = filePath;
    this.chunkSize = chunkSize;
  }

  static open(filePath: string, options: { chunkSize: number }): ResultAsync<FileByteSource, IoError> {
    return RA.fromPromise(fs.open(filePath, 'r'), (e) => mapNodeIoError(e, filePath, 'open')).map(
      (handle) => new FileByteSource(handle, filePath, options.chunkSize)
    );
  }

  readChunk(): ResultAsync<Uint8Array | null, IoError> {
    if (this.closed) {
      return errAsync(ioError('read', this.description, `Read after close: ${this.description}`));
    }

    // Fresh buffer per read: the caller owns the returned chunk.
    const buffer = new Uint8Array(this.chunkSize);
    return RA.fromPromise(this.handle.read(buffer, 0, this.chunkSize, null), (e) =>
      mapNodeIoError(e, this.description, 'read')
    ).map(({ bytesRead }) => (bytesRead === 0 ? null : buffer.subarray(0, bytesRead)));
  }

  close(): ResultAsync<void, IoError> {
    if (this.closed) return okAsync(undefined);
    this.closed = true;
    return RA.fromPromise(this.handle.close(), (e) => mapNodeIoError(e, this.description, 'close'));
  }
}

/**
 * File sink writing through a file handle (created or truncated on open).
 */
export class FileByteSink implements ByteSinkPort {
  readonly description: string;
  private readonly handle: FileHandle;
  private closed = false;

  private constructor(handle: FileHandle, filePath: string) {
    this.handle = handle;
    this.description = filePath;
  }

  static open(filePath: string): ResultAsync<FileByteSink, IoError> {
    return RA.fromPromise(fs.open(filePath, 'w', 0o644), (e) => mapNodeIoError(e, filePath, 'open')).map(
      (handle) => new FileByteSink(handle, filePath)
    );
  }

  writeChunk(bytes: Uint8Array): ResultAsync<void, IoError> {
    if (this.closed) {
      return errAsync(ioError('write', this.description, `Write after close: ${this.description}`));
    }
    if (bytes.length === 0) return okAsync(undefined);

    // FileHandle.write may write fewer bytes than asked; loop until everything is out.
    return RA.fromPromise(this.writeAll(bytes), (e) => mapNodeIoError(e, this.description, 'write'));
  }

  close(): ResultAsync<void, IoError> {
    if (this.closed) return okAsync(undefined);
    this.closed = true;
    return RA.fromPromise(this.handle.close(), (e) => mapNodeIoError(e, this.description, 'close'));
  }

  private async writeAll(bytes: Uint8Array): Promise<void> {
    let offset = 0;
    while (offset < bytes.length) {
      const { bytesWritten } = await this.handle.write(bytes, offset, bytes.length - offset, null);
      offset += bytesWritten;
    }
  }
}
