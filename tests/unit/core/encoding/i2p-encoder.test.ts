import { describe, it, expect } from 'vitest';
import { I2pBase64Encoder } from '../../../../src/core/encoding/i2p-encoder.js';
import { asciiToString } from '../../../../src/core/encoding/bytes.js';

function encodeInChunks(bytes: Uint8Array, chunkSizes: readonly number[], lineWidth = 0): string {
  const encoder = new I2pBase64Encoder({ lineWidth });
  let out = '';
  let offset = 0;
  for (const size of chunkSizes) {
    out += asciiToString(encoder.push(bytes.subarray(offset, offset + size)));
    offset += size;
  }
  out += asciiToString(encoder.push(bytes.subarray(offset)));
  return out + asciiToString(encoder.finish());
}

const utf8 = (s: string) => new TextEncoder().encode(s);

describe('I2pBase64Encoder', () => {
  it('emits only complete groups on push and carries the rest', () => {
    const encoder = new I2pBase64Encoder();

    expect(asciiToString(encoder.push(utf8('fo')))).toBe('');
    expect(asciiToString(encoder.push(utf8('ob')))).toBe('Zm9v');
    expect(asciiToString(encoder.push(utf8('ar')))).toBe('YmFy');
    expect(asciiToString(encoder.finish())).toBe('');
  });

  it('pads a one-byte tail with "==" and a two-byte tail with "="', () => {
    const one = new I2pBase64Encoder();
    one.push(utf8('f'));
    expect(asciiToString(one.finish())).toBe('Zg==');

    const two = new I2pBase64Encoder();
    two.push(utf8('fo'));
    expect(asciiToString(two.finish())).toBe('Zm8=');
  });

  it('produces the same text for any chunking', () => {
    const bytes = utf8('The quick brown fox jumps over the lazy dog');
    const whole = encodeInChunks(bytes, []);

    expect(encodeInChunks(bytes, [1, 1, 1, 1, 1])).toBe(whole);
    expect(encodeInChunks(bytes, [2, 5, 7, 11])).toBe(whole);
    expect(encodeInChunks(bytes, [0, 0, 3, 0, 40])).toBe(whole);
  });

  it('wraps lines at the configured width and ends with a newline', () => {
    const bytes = utf8('foobarbaz!');
    // Unwrapped: Zm9vYmFyYmF6IQ==
    expect(encodeInChunks(bytes, [], 4)).toBe('Zm9v\nYmFy\nYmF6\nIQ==\n');
    expect(encodeInChunks(bytes, [], 6)).toBe('Zm9vYm\nFyYmF6\nIQ==\n');
    expect(encodeInChunks(bytes, [1, 4, 2], 6)).toBe('Zm9vYm\nFyYmF6\nIQ==\n');
  });

  it('writes no newline for empty input when wrapping', () => {
    expect(encodeInChunks(new Uint8Array(0), [], 76)).toBe('');
  });

  it('rejects a negative or fractional line width', () => {
    expect(() => new I2pBase64Encoder({ lineWidth: -1 })).toThrow(RangeError);
    expect(() => new I2pBase64Encoder({ lineWidth: 2.5 })).toThrow(RangeError);
  });

  it('cannot be used after finish', () => {
    const encoder = new I2pBase64Encoder();
    encoder.finish();

    expect(() => encoder.push(utf8('x'))).toThrow('I2pBase64Encoder.push() called after finish()');
    expect(() => encoder.finish()).toThrow('I2pBase64Encoder.finish() called after finish()');
  });
});
