import type { ResultAsync } from 'neverthrow';

export type IoOperation = 'open' | 'read' | 'write' | 'close';

export type IoError =
  | {
      readonly code: 'IO_ERROR';
      readonly message: string;
      readonly operation: IoOperation;
      readonly target: string;
    }
  | { readonly code: 'IO_NOT_FOUND'; readonly message: string; readonly target: string }
  | { readonly code: 'IO_PERMISSION_DENIED'; readonly message: string; readonly target: string };

/**
 * Port: chunked byte input (file, stdin, in-memory buffer).
 *
 * readChunk() resolves to null once the source is exhausted. A source that is
 * torn down before its end must fail with an IoError, never report a short end.
 */
export interface ByteSourcePort {
  /** Human-readable origin, used in logs and error messages (path, "stdin", ...). */
  readonly description: string;

  readChunk(): ResultAsync<Uint8Array | null, IoError>;
  close(): ResultAsync<void, IoError>;
}

/**
 * Port: chunked byte output (file, stdout, in-memory buffer).
 *
 * writeChunk() resolves once the sink has accepted the bytes. Writes are not
 * retracted on a later failure.
 */
export interface ByteSinkPort {
  readonly description: string;

  writeChunk(bytes: Uint8Array): ResultAsync<void, IoError>;
  close(): ResultAsync<void, IoError>;
}
