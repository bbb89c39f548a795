/**
 * Shrinker Errors
 */

/**
 * A required capability was invoked on a shrinker that never supplied it.
 * Signals a broken shrinker, not a runtime condition.
 */
export class NotImplementedError extends Error {
  constructor(
    public readonly shrinker: string,
    public readonly capability: string
  ) {
    super(`${capability} not implemented by shrinker "${shrinker}"`);
    this.name = "NotImplementedError";
  }
}

export type ShrinkerConfigErrorCode =
  | "INVALID_DEFINITION"
  | "DUPLICATE_SHRINKER"
  | "UNKNOWN_SHRINKER"
  | "MISSING_URL_KEY"
  | "URL_NOT_SET";

/**
 * Misconfigured shrinker, schema or caller
 */
export class ShrinkerConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ShrinkerConfigErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "ShrinkerConfigError";
  }
}
