import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import {
  indexOfCode,
  symbolCodeOf,
  isPaddingCode,
  isIgnorableWhitespaceCode,
  describeCode,
} from './i2p-alphabet.js';

export type Base64DecodeError =
  | {
      readonly code: 'BASE64_INVALID_SYMBOL';
      readonly message: string;
      readonly position: number;
      readonly symbol: string;
    }
  | { readonly code: 'BASE64_INVALID_LENGTH'; readonly message: string; readonly length: number }
  | { readonly code: 'BASE64_INVALID_PADDING'; readonly message: string; readonly position: number };

export type WhitespaceMode = 'reject' | 'ignore';
export type PaddingMode = 'required' | 'optional';

export interface DecodeOptions {
  /** 'ignore' skips space, tab, CR, LF, VT and FF anywhere in the input. Default 'reject'. */
  readonly whitespace?: WhitespaceMode;
  /** 'optional' accepts a final group of 2 or 3 symbols without '='. Default 'required'. */
  readonly padding?: PaddingMode;
}

/**
 * Incremental I2P base64 decoder.
 *
 * Input is a sequence of character codes, given as string chunks or as byte chunks
 * (e.g. straight from a file). Positions in errors count every input character,
 * ignored whitespace included; for byte chunks that is the byte offset.
 *
 * Constraints:
 * - '=' only at positions 2 and 3 of the final group ("xx==" or "xxx=")
 * - nothing significant after a padded group
 * - discarded low bits of the last symbol must be zero (canonical encoding)
 * - at most 3 sextets are carried between pushes
 *
 * The first error poisons the decoder: later calls return the same error.
 */
export class I2pBase64Decoder {
  private readonly sextets = new Uint8Array(4);
  private symbolCount = 0;
  private padCount = 0;
  private firstPadPosition = -1;
  private lastSymbolPosition = -1;
  private significant = 0;
  private position = 0;
  private sealed = false;
  private finished = false;
  private failure: Base64DecodeError | null = null;

  private readonly whitespace: WhitespaceMode;
  private readonly padding: PaddingMode;

  constructor(options: DecodeOptions = {}) {
    this.whitespace = options.whitespace ?? 'reject';
    this.padding = options.padding ?? 'required';
  }

  push(chunk: string | Uint8Array): Result<Uint8Array, Base64DecodeError> {
    if (this.failure) return err(this.failure);
    this.assertOpen('push');

    const pending = this.symbolCount + this.padCount;
    const out = new Uint8Array(Math.floor((pending + chunk.length) / 4) * 3);
    const writer = { out, at: 0 };

    const codeAt = codeReader(chunk);

    for (let i = 0; i < chunk.length; i++) {
      const failure = this.step(codeAt(i), writer);
      this.position++;
      if (failure) {
        this.failure = failure;
        return err(failure);
      }
    }

    return ok(out.subarray(0, writer.at));
  }

  /**
   * Validate the end of input and flush an unpadded final group (padding: 'optional').
   */
  finish(): Result<Uint8Array, Base64DecodeError> {
    if (this.failure) return err(this.failure);
    this.assertOpen('finish');
    this.finished = true;

    const pending = this.symbolCount + this.padCount;
    if (pending === 0) return ok(new Uint8Array(0));

    const failure = this.checkEnd();
    if (failure) {
      this.failure = failure;
      return err(failure);
    }

    const writer = { out: new Uint8Array(2), at: 0 };
    const canonical = this.flushPartialGroup(writer);
    if (canonical) {
      this.failure = canonical;
      return err(canonical);
    }
    return ok(writer.out.subarray(0, writer.at));
  }

  private checkEnd(): Base64DecodeError | null {
    if (this.padding === 'required') {
      return {
        code: 'BASE64_INVALID_LENGTH',
        message: `Invalid I2P base64: length ${this.significant} is not a multiple of 4`,
        length: this.significant,
      };
    }
    if (this.padCount > 0) {
      return {
        code: 'BASE64_INVALID_PADDING',
        message: `Invalid I2P base64 padding: incomplete padding at position ${this.firstPadPosition}`,
        position: this.firstPadPosition,
      };
    }
    if (this.symbolCount === 1) {
      return {
        code: 'BASE64_INVALID_LENGTH',
        message: `Invalid I2P base64 length: final group has a single symbol (${this.significant} characters)`,
        length: this.significant,
      };
    }
    return null;
  }

  private step(code: number, writer: { out: Uint8Array; at: number }): Base64DecodeError | null {
    if (this.whitespace === 'ignore' && isIgnorableWhitespaceCode(code)) return null;

    if (isPaddingCode(code)) {
      this.significant++;
      return this.stepPadding(writer);
    }

    const value = indexOfCode(code);
    if (value < 0) {
      return {
        code: 'BASE64_INVALID_SYMBOL',
        message: `Invalid I2P base64 symbol ${describeCode(code)} at position ${this.position}`,
        position: this.position,
        symbol: String.fromCharCode(code),
      };
    }
    this.significant++;

    if (this.sealed || this.padCount > 0) {
      return {
        code: 'BASE64_INVALID_PADDING',
        message: `Invalid I2P base64 padding: data after padding at position ${this.position}`,
        position: this.position,
      };
    }

    this.sextets[this.symbolCount++] = value;
    this.lastSymbolPosition = this.position;

    if (this.symbolCount === 4) {
      const s0 = this.sextets[0] as number;
      const s1 = this.sextets[1] as number;
      const s2 = this.sextets[2] as number;
      const s3 = this.sextets[3] as number;
      writer.out[writer.at++] = (s0 << 2) | (s1 >> 4);
      writer.out[writer.at++] = ((s1 & 0x0f) << 4) | (s2 >> 2);
      writer.out[writer.at++] = ((s2 & 0x03) << 6) | s3;
      this.symbolCount = 0;
    }
    return null;
  }

  private stepPadding(writer: { out: Uint8Array; at: number }): Base64DecodeError | null {
    const groupPosition = this.symbolCount + this.padCount;

    if (this.sealed || groupPosition < 2) {
      return {
        code: 'BASE64_INVALID_PADDING',
        message: this.sealed
          ? `Invalid I2P base64 padding: data after padding at position ${this.position}`
          : `Invalid I2P base64 padding: '=' at group position ${groupPosition} (position ${this.position})`,
        position: this.position,
      };
    }

    if (this.padCount === 0) this.firstPadPosition = this.position;
    this.padCount++;

    if (this.symbolCount + this.padCount < 4) return null;

    this.sealed = true;
    return this.flushPartialGroup(writer);
  }

  /**
   * Emit the bytes of a 2- or 3-symbol final group. Returns an error when the
   * bits the group discards are not zero.
   */
  private flushPartialGroup(writer: { out: Uint8Array; at: number }): Base64DecodeError | null {
    const s0 = this.sextets[0] as number;
    const s1 = this.sextets[1] as number;

    if (this.symbolCount === 2) {
      if ((s1 & 0x0f) !== 0) return this.nonCanonical();
      writer.out[writer.at++] = (s0 << 2) | (s1 >> 4);
    } else {
      const s2 = this.sextets[2] as number;
      if ((s2 & 0x03) !== 0) return this.nonCanonical();
      writer.out[writer.at++] = (s0 << 2) | (s1 >> 4);
      writer.out[writer.at++] = ((s1 & 0x0f) << 4) | (s2 >> 2);
    }

    this.symbolCount = 0;
    this.padCount = 0;
    return null;
  }

  private nonCanonical(): Base64DecodeError {
    const symbolCode = this.lastSymbolCode();
    return {
      code: 'BASE64_INVALID_SYMBOL',
      message: `Invalid I2P base64 symbol ${describeCode(symbolCode)} at position ${this.lastSymbolPosition}: non-zero trailing bits`,
      position: this.lastSymbolPosition,
      symbol: String.fromCharCode(symbolCode),
    };
  }

  private lastSymbolCode(): number {
    return symbolCodeOf(this.sextets[this.symbolCount - 1] as number);
  }

  private assertOpen(operation: string): void {
    if (this.finished) {
      throw new Error(`I2pBase64Decoder.${operation}() called after finish()`);
    }
  }
}

function codeReader(chunk: string | Uint8Array): (i: number) => number {
  if (typeof chunk === 'string') {
    const text = chunk;
    return (i) => text.charCodeAt(i);
  }
  const bytes = chunk;
  return (i) => bytes[i] as number;
}
