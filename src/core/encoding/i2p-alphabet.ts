import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../../runtime/brand.js';

/**
 * I2P Base64 alphabet.
 *
 * Same 62 alphanumerics as RFC 4648 base64, but index 62 is '-' (instead of '+')
 * and index 63 is '~' (instead of '/'). Padding stays '='.
 *
 * Locked invariants:
 * - 64 distinct printable ASCII symbols
 * - padding symbol is not part of the 64-symbol set
 * - the inverse table is total over the alphabet and built once at module load
 */
export const I2P_BASE64_ALPHABET =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-~' as const;

export const I2P_BASE64_PADDING = '=' as const;

export const PADDING_CODE = 0x3d;

/** A value in 0..63 that has been checked against the alphabet. */
export type SextetIndex = Brand<number, 'SextetIndex'>;

export type AlphabetLookupError = {
  readonly code: 'BASE64_INVALID_SYMBOL';
  readonly message: string;
  readonly symbol: string;
};

const NOT_IN_ALPHABET = -1;

// Forward table as char codes so the engines never allocate per symbol.
const SYMBOL_CODES: Uint8Array = (() => {
  const codes = new Uint8Array(64);
  for (let i = 0; i < 64; i++) {
    codes[i] = I2P_BASE64_ALPHABET.charCodeAt(i);
  }
  return codes;
})();

// Inverse table over 7-bit ASCII; anything outside it is not a symbol.
const INDEX_BY_CODE: Int8Array = (() => {
  const table = new Int8Array(128).fill(NOT_IN_ALPHABET);
  for (let i = 0; i < 64; i++) {
    table[I2P_BASE64_ALPHABET.charCodeAt(i)] = i;
  }
  return table;
})();

/**
 * Char code of the symbol at `index`.
 *
 * Callers pass 6-bit values produced by masking, so the index is always in range.
 */
export function symbolCodeOf(index: number): number {
  return SYMBOL_CODES[index & 0x3f] as number;
}

/**
 * Sextet value of a char code, or -1 when the code is not an alphabet symbol.
 * Hot-path variant of {@link indexOf} used by the decoder.
 */
export function indexOfCode(code: number): number {
  if (code < 0 || code >= 128) return NOT_IN_ALPHABET;
  return INDEX_BY_CODE[code] as number;
}

export function symbolOf(index: SextetIndex): string {
  return I2P_BASE64_ALPHABET[index & 0x3f] as string;
}

export function indexOf(symbol: string): Result<SextetIndex, AlphabetLookupError> {
  const value = symbol.length === 1 ? indexOfCode(symbol.charCodeAt(0)) : NOT_IN_ALPHABET;
  if (value === NOT_IN_ALPHABET) {
    return err({
      code: 'BASE64_INVALID_SYMBOL',
      message: `Not an I2P base64 symbol: ${describeSymbol(symbol)}`,
      symbol,
    });
  }
  return ok(value as SextetIndex);
}

export function asSextetIndex(value: number): Result<SextetIndex, AlphabetLookupError> {
  if (!Number.isInteger(value) || value < 0 || value > 63) {
    return err({
      code: 'BASE64_INVALID_SYMBOL',
      message: `Sextet index out of range: ${value}`,
      symbol: String(value),
    });
  }
  return ok(value as SextetIndex);
}

export function isPaddingCode(code: number): boolean {
  return code === PADDING_CODE;
}

/** Space, tab, LF, vertical tab, form feed, CR. */
export function isIgnorableWhitespaceCode(code: number): boolean {
  return code === 0x20 || (code >= 0x09 && code <= 0x0d);
}

/**
 * Printable rendering of a symbol for error messages.
 * Control characters and non-ASCII code units are shown as hex.
 */
export function describeSymbol(symbol: string): string {
  if (symbol.length !== 1) return JSON.stringify(symbol);
  return describeCode(symbol.charCodeAt(0));
}

export function describeCode(code: number): string {
  if (code >= 0x21 && code <= 0x7e) return `'${String.fromCharCode(code)}'`;
  return `0x${code.toString(16).padStart(2, '0')}`;
}
