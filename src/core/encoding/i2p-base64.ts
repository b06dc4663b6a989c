import type { Result } from 'neverthrow';
import type { Brand } from '../../runtime/brand.js';
import { I2pBase64Encoder, type EncodeOptions } from './i2p-encoder.js';
import { I2pBase64Decoder, type DecodeOptions, type Base64DecodeError } from './i2p-decoder.js';
import { asciiToString, concatBytes } from './bytes.js';

export type I2pBase64Text = Brand<string, 'I2pBase64Text'>;

/**
 * Encode bytes to I2P base64 in one call.
 *
 * Deterministic; with the default options the result length is 4 * ceil(n / 3)
 * and every character is an alphabet symbol or '='.
 */
export function encodeI2pBase64(bytes: Uint8Array, options?: EncodeOptions): I2pBase64Text {
  const encoder = new I2pBase64Encoder(options);
  const head = encoder.push(bytes);
  const tail = encoder.finish();
  return asciiToString(concatBytes([head, tail])) as I2pBase64Text;
}

/**
 * Decode I2P base64 text (or its ASCII bytes) in one call.
 *
 * @returns the decoded bytes, or the first error with its character position
 */
export function decodeI2pBase64(
  input: string | Uint8Array,
  options?: DecodeOptions
): Result<Uint8Array, Base64DecodeError> {
  const decoder = new I2pBase64Decoder(options);
  return decoder
    .push(input)
    .andThen((head) => decoder.finish().map((tail) => concatBytes([head, tail])));
}

/** Unwrapped encoded length for `byteLength` input bytes. */
export function encodedLength(byteLength: number): number {
  return Math.ceil(byteLength / 3) * 4;
}
