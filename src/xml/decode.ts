/**
 * Byte decoding with encoding fallback
 */

export interface DecodedText {
  text: string;
  encoding: string;
}

/**
 * Decode bytes, failing on any invalid sequence
 * Returns null when the bytes are not valid in `encoding` or the label is unknown.
 */
export function decodeStrict(bytes: Uint8Array, encoding: string): string | null {
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Read the encoding named in the XML declaration, if any
 */
export function declaredEncoding(bytes: Uint8Array): string | null {
  const head = new TextDecoder("latin1").decode(bytes.subarray(0, 256));
  const match = /^\s*<\?xml[^>]*\bencoding\s*=\s*["']([A-Za-z0-9._-]+)["']/.exec(
    head,
  );
  return match ? match[1].toLowerCase() : null;
}

/**
 * Try the declared encoding, then each fallback in order, and return the
 * first that decodes without error
 */
export function decodeWithFallback(
  bytes: Uint8Array,
  encodings: readonly string[],
): DecodedText | null {
  const declared = declaredEncoding(bytes);
  const candidates = declared ? [declared, ...encodings] : [...encodings];

  for (const encoding of new Set(candidates)) {
    const text = decodeStrict(bytes, encoding);
    if (text !== null) {
      return { text, encoding };
    }
  }

  return null;
}
