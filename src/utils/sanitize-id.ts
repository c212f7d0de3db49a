/**
 * Make an identifier safe for use as a GraphML id
 *
 * @example
 * sanitizeId("Review & Sign") // "Review___Sign"
 * sanitizeId("1st-pass")      // "n_1st_pass"
 * sanitizeId("")              // "node_unknown"
 */
export function sanitizeId(identifier: string): string {
  if (!identifier) {
    return "node_unknown";
  }

  const sanitized = identifier.replace(/[^a-zA-Z0-9_]/g, "_");

  // Must start with a letter or underscore
  return /^[0-9]/.test(sanitized) ? `n_${sanitized}` : sanitized;
}

/**
 * Replace anything that is not a letter, digit, underscore or whitespace
 * with an underscore, for names written into diagram markup
 */
export function sanitizeDisplayName(name: string): string {
  return name.replace(/[^\p{L}\p{N}_\s]/gu, "_");
}
