/**
 * i2p-base64 public API.
 */

export {
  I2P_BASE64_ALPHABET,
  I2P_BASE64_PADDING,
  indexOf,
  symbolOf,
  asSextetIndex,
  type SextetIndex,
  type AlphabetLookupError,
} from './core/encoding/i2p-alphabet.js';
export { I2pBase64Encoder, type EncodeOptions } from './core/encoding/i2p-encoder.js';
export {
  I2pBase64Decoder,
  type DecodeOptions,
  type Base64DecodeError,
  type WhitespaceMode,
  type PaddingMode,
} from './core/encoding/i2p-decoder.js';
export { encodeI2pBase64, decodeI2pBase64, encodedLength, type I2pBase64Text } from './core/encoding/i2p-base64.js';

export type { ByteSourcePort, ByteSinkPort, IoError, IoOperation } from './ports/byte-stream.port.js';
export { InMemoryByteSource, InMemoryByteSink } from './infra/local/in-memory/index.js';
export { NodeStreamByteSource, NodeStreamByteSink } from './infra/local/node-stream/index.js';
export { FileByteSource, FileByteSink } from './infra/local/file/index.js';

export {
  encodeStream,
  decodeStream,
  type TranscodePorts,
  type TranscodeSummary,
  type TranscodeError,
} from './usecases/transcode.js';
