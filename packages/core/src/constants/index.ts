/**
 * Shrinker Defaults
 *
 * Values every shrinker gets unless it supplies its own.
 */
export const SHRINKER_DEFAULTS = {
  HTTP_METHOD: "GET",

  CONTENT_TYPE: "application/json",

  /** Response key holding a provider-reported error */
  ERROR_KEY: "error",
} as const;

/**
 * URL Sanitization Constants
 */
export const URL_CONFIG = {
  /** Prepended when a candidate has no scheme */
  DEFAULT_SCHEME: "http://",

  /**
   * Loose prefix test: no full parse, the rest of the URL is not validated.
   */
  SCHEME_PATTERN: /^https?:\/\//i,
} as const;

/**
 * API key variable: `<NAME>_URL_KEY`
 */
export const API_KEY_SUFFIX = "_URL_KEY";
