const EMPTY = new Uint8Array(0);

/**
 * Concatenate byte chunks into one freshly allocated array.
 */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  if (parts.length === 0) return EMPTY;
  if (parts.length === 1) return parts[0] as Uint8Array;

  let total = 0;
  for (const part of parts) total += part.length;

  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

const asciiDecoder = new TextDecoder('utf-8', { fatal: false });

/**
 * Encoder output is 7-bit ASCII, which is valid UTF-8, so TextDecoder is exact here.
 */
export function asciiToString(bytes: Uint8Array): string {
  return asciiDecoder.decode(bytes);
}
