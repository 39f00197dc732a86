/**
 * Address helpers shared by the guard, the rate limiter and reply resolution.
 */

const ANGLE_ADDRESS = /<([^<>]*)>/;
const BARE_ADDRESS = /[\w.+%-]+@[\w.-]+/;

/**
 * Reduce a header value such as `"Alice" <Alice@Example.com>` to
 * `alice@example.com`. Values without an address are trimmed and lowercased.
 */
export function normalizeAddress(value: string): string {
  const angled = ANGLE_ADDRESS.exec(value);
  if (angled) return angled[1].trim().toLowerCase();

  const bare = BARE_ADDRESS.exec(value);
  if (bare) return bare[0].toLowerCase();

  return value.trim().toLowerCase();
}

/** First address-like token in a line of text, case preserved. */
export function findAddress(text: string): string | null {
  const match = BARE_ADDRESS.exec(text);
  return match ? match[0] : null;
}
