import { symbolCodeOf, PADDING_CODE } from './i2p-alphabet.js';

const NEWLINE_CODE = 0x0a;

export interface EncodeOptions {
  /**
   * Insert '\n' after every `lineWidth` output characters and terminate a non-empty
   * last line with '\n'. 0 disables wrapping.
   */
  readonly lineWidth?: number;
}

/**
 * Incremental I2P base64 encoder.
 *
 * Accepts bytes in chunks of any size and returns the ASCII symbols for every
 * complete 3-byte group seen so far. At most 2 bytes are carried between pushes,
 * so memory use is bounded by the chunk size, not by the input size.
 *
 * Unwrapped output length for n input bytes is 4 * ceil(n / 3).
 */
export class I2pBase64Encoder {
  private readonly carry = new Uint8Array(2);
  private carryLength = 0;
  private column = 0;
  private finished = false;
  private readonly lineWidth: number;

  constructor(options: EncodeOptions = {}) {
    const lineWidth = options.lineWidth ?? 0;
    if (!Number.isInteger(lineWidth) || lineWidth < 0) {
      throw new RangeError(`lineWidth must be a non-negative integer, got ${lineWidth}`);
    }
    this.lineWidth = lineWidth;
  }

  push(bytes: Uint8Array): Uint8Array {
    this.assertOpen('push');

    const total = this.carryLength + bytes.length;
    const groups = Math.floor(total / 3);
    const out = this.allocate(groups * 4);
    const writer = { out, at: 0 };

    const carried = this.carryLength;
    const byteAt = (k: number): number =>
      (k < carried ? this.carry[k] : bytes[k - carried]) as number;

    for (let g = 0; g < groups; g++) {
      const k = g * 3;
      const b0 = byteAt(k);
      const b1 = byteAt(k + 1);
      const b2 = byteAt(k + 2);
      this.emit(writer, symbolCodeOf(b0 >> 2));
      this.emit(writer, symbolCodeOf(((b0 & 0x03) << 4) | (b1 >> 4)));
      this.emit(writer, symbolCodeOf(((b1 & 0x0f) << 2) | (b2 >> 6)));
      this.emit(writer, symbolCodeOf(b2 & 0x3f));
    }

    // Remainder indices start at or past `carried` whenever a group was emitted,
    // so the carry is never overwritten before it is read.
    let remaining = 0;
    for (let k = groups * 3; k < total; k++) {
      this.carry[remaining++] = byteAt(k);
    }
    this.carryLength = remaining;

    return out.subarray(0, writer.at);
  }

  /**
   * Flush the final partial group (with padding) and the closing newline when wrapping.
   * The encoder cannot be used afterwards.
   */
  finish(): Uint8Array {
    this.assertOpen('finish');
    this.finished = true;

    const writer = { out: this.allocate(4, 1), at: 0 };

    if (this.carryLength === 1) {
      const b0 = this.carry[0] as number;
      this.emit(writer, symbolCodeOf(b0 >> 2));
      this.emit(writer, symbolCodeOf((b0 & 0x03) << 4));
      this.emit(writer, PADDING_CODE);
      this.emit(writer, PADDING_CODE);
    } else if (this.carryLength === 2) {
      const b0 = this.carry[0] as number;
      const b1 = this.carry[1] as number;
      this.emit(writer, symbolCodeOf(b0 >> 2));
      this.emit(writer, symbolCodeOf(((b0 & 0x03) << 4) | (b1 >> 4)));
      this.emit(writer, symbolCodeOf((b1 & 0x0f) << 2));
      this.emit(writer, PADDING_CODE);
    }
    this.carryLength = 0;

    if (this.lineWidth > 0 && this.column > 0) {
      writer.out[writer.at++] = NEWLINE_CODE;
      this.column = 0;
    }

    return writer.out.subarray(0, writer.at);
  }

  private emit(writer: { out: Uint8Array; at: number }, code: number): void {
    writer.out[writer.at++] = code;
    if (this.lineWidth > 0 && ++this.column === this.lineWidth) {
      writer.out[writer.at++] = NEWLINE_CODE;
      this.column = 0;
    }
  }

  private allocate(symbols: number, extra: number = 0): Uint8Array {
    const newlines = this.lineWidth > 0 ? Math.floor((this.column + symbols) / this.lineWidth) : 0;
    return new Uint8Array(symbols + newlines + extra);
  }

  private assertOpen(operation: string): void {
    if (this.finished) {
      throw new Error(`I2pBase64Encoder.${operation}() called after finish()`);
    }
  }
}
