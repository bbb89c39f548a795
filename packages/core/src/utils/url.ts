/**
 * URL Sanitization
 *
 * Turns a candidate long URL into the form embedded in a provider's query
 * string: scheme-prefixed, then percent-encoded.
 *
 *   "example.com"               -> "http%3A%2F%2Fexample.com"
 *   "https://a.io/x?y=1"        -> "https%3A%2F%2Fa.io%2Fx%3Fy%3D1"
 *   "example.com/a%2Fb"         -> "http%3A%2F%2Fexample.com%2Fa%252Fb"
 *   "http%3A%2F%2Fexample.com"  -> "http%3A%2F%2Fexample.com"
 */

import { URL_CONFIG } from "../constants/index.js";

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Decode percent-escapes, keeping the input as-is when it holds a stray "%".
 */
function decodeEscapes(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Whether the candidate already starts with http:// or https://
 */
export function hasScheme(candidate: string): boolean {
  return URL_CONFIG.SCHEME_PATTERN.test(candidate);
}

/**
 * Sanitize a candidate long URL.
 *
 * Escapes already in the candidate are kept and their "%" encoded again, so
 * `a%26b` still decodes to `a%26b` on the provider's side. Input that is
 * already in sanitized form comes back unchanged. Never throws.
 */
export function sanitizeUrl(candidate: string): string {
  const decoded = decodeEscapes(candidate).replace(LONE_SURROGATE, "\uFFFD");
  if (hasScheme(decoded) && encodeURIComponent(decoded) === candidate) {
    return candidate;
  }

  const wellFormed = candidate.replace(LONE_SURROGATE, "\uFFFD");
  const absolute = hasScheme(wellFormed) ? wellFormed : `${URL_CONFIG.DEFAULT_SCHEME}${wellFormed}`;
  return encodeURIComponent(absolute);
}
