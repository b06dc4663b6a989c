import type { Result, ResultAsync } from 'neverthrow';
import { ok, okAsync, errAsync } from 'neverthrow';
import type { ByteSourcePort, ByteSinkPort, IoError } from '../ports/byte-stream.port.js';
import type { Logger } from '../core/logging/types.js';
import { I2pBase64Encoder, type EncodeOptions } from '../core/encoding/i2p-encoder.js';
import { I2pBase64Decoder, type DecodeOptions, type Base64DecodeError } from '../core/encoding/i2p-decoder.js';

// =============================================================================
// Types
// =============================================================================

export interface TranscodeSummary {
  readonly bytesIn: number;
  readonly bytesOut: number;
  readonly chunks: number;
}

export type TranscodeError = Base64DecodeError | IoError;

export interface TranscodePorts {
  readonly source: ByteSourcePort;
  readonly sink: ByteSinkPort;
  readonly logger?: Logger;
}

/**
 * Chunk transform shared by both directions: push each source chunk, then flush once.
 */
interface ChunkTransform<E> {
  push(chunk: Uint8Array): Result<Uint8Array, E>;
  finish(): Result<Uint8Array, E>;
}

// =============================================================================
// Use Cases
// =============================================================================

/**
 * Encode everything `source` yields into I2P base64 on `sink`.
 *
 * Only I/O can fail. Source and sink are closed in every outcome.
 */
export function encodeStream(
  ports: TranscodePorts,
  options: EncodeOptions = {}
): ResultAsync<TranscodeSummary, IoError> {
  const encoder = new I2pBase64Encoder(options);
  return transcode<never>('encode', ports, {
    push: (chunk) => ok(encoder.push(chunk)),
    finish: () => ok(encoder.finish()),
  });
}

/**
 * Decode I2P base64 read from `source` into raw bytes on `sink`.
 *
 * Stops at the first malformed character. Bytes already written stay written,
 * so a failed decode into a file leaves a partial file behind.
 */
export function decodeStream(
  ports: TranscodePorts,
  options: DecodeOptions = {}
): ResultAsync<TranscodeSummary, TranscodeError> {
  const decoder = new I2pBase64Decoder(options);
  return transcode<Base64DecodeError>('decode', ports, {
    push: (chunk) => decoder.push(chunk),
    finish: () => decoder.finish(),
  });
}

// =============================================================================
// Internal
// =============================================================================

function transcode<E extends Base64DecodeError>(
  direction: 'encode' | 'decode',
  ports: TranscodePorts,
  transform: ChunkTransform<E>
): ResultAsync<TranscodeSummary, E | IoError> {
  const { source, sink } = ports;
  const logger = ports.logger?.child({ direction, source: source.description, sink: sink.description });
  const totals = { bytesIn: 0, bytesOut: 0, chunks: 0 };

  const write = (bytes: Uint8Array): ResultAsync<void, E | IoError> => {
    if (bytes.length === 0) return okAsync(undefined);
    totals.bytesOut += bytes.length;
    return sink.writeChunk(bytes);
  };

  const pump = (): ResultAsync<void, E | IoError> =>
    source.readChunk().andThen((chunk): ResultAsync<void, E | IoError> => {
      if (chunk === null) {
        return transform.finish().asyncAndThen(write);
      }
      totals.bytesIn += chunk.length;
      totals.chunks++;
      return transform.push(chunk).asyncAndThen(write).andThen(pump);
    });

  logger?.debug('Transcode started');

  return pump()
    .orElse((failure) =>
      closeBoth(source, sink)
        .orElse((closeFailure) => {
          logger?.warn({ error: closeFailure }, 'Close after failure also failed');
          return okAsync(undefined);
        })
        .andThen(() => {
          logger?.warn({ error: failure, ...totals }, 'Transcode failed');
          return errAsync(failure);
        })
    )
    .andThen(() => closeBoth(source, sink))
    .map((): TranscodeSummary => {
      logger?.debug({ ...totals }, 'Transcode finished');
      return { ...totals };
    });
}

function closeBoth(source: ByteSourcePort, sink: ByteSinkPort): ResultAsync<void, IoError> {
  // Close both even when the first close fails; report the first failure.
  return source
    .close()
    .orElse((sourceFailure) =>
      sink
        .close()
        .mapErr(() => sourceFailure)
        .andThen(() => errAsync(sourceFailure))
    )
    .andThen(() => sink.close());
}
