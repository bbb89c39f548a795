/**
 * Core Type Definitions
 */

// =============================================================================
// Request Types
// =============================================================================

export type HttpMethod = "GET" | "POST";

/**
 * Body parameters for POST shrinkers
 */
export type BodyParams = Readonly<Record<string, unknown>>;

/**
 * Target image size for chart / QR code generation (e.g. width, height)
 */
export type ImageSize = Readonly<Record<string, unknown>>;

/**
 * Environment variables the API key is read from.
 * Defaults to process.env.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Passed to queryParameter (only called when an API key is present)
 */
export interface QueryContext {
  apiKey: string;
}

/**
 * Passed to bodyParameters
 */
export interface BodyContext {
  /** Sanitized long URL, null until set */
  url: string | null;
  apiKey: string | null;
}

/**
 * Outbound request shape handed to a network executor
 */
export interface ShrinkHttpRequest {
  method: HttpMethod;
  url: string;
  headers: {
    "Content-Type": string;
  };
  body: BodyParams | null;
}

// =============================================================================
// Response Schema
// =============================================================================

/**
 * Where the interesting fields live in a provider's JSON reply
 */
export interface ResponseSchema {
  /** Top-level key wrapping the real payload */
  readonly collectionKey?: string;

  /** Key holding the shortened URL (inside the collection, if any) */
  readonly urlKey?: string;

  /** Key holding a provider-reported error message */
  readonly errorKey: string;
}

export interface ResponseSchemaInput {
  collectionKey?: string;
  urlKey?: string;
  errorKey?: string;
}

/**
 * Result of navigating a decoded response body
 */
export type ShrinkResult =
  | { success: true; shortUrl: string }
  | {
      success: false;
      error: string;
      errorCode: "PROVIDER_ERROR" | "UNRECOGNIZED_RESPONSE";
    };

// =============================================================================
// Shrinker Types
// =============================================================================

/**
 * Capabilities a shrinker supplies. Anything left out falls back to the
 * shared default; required ones throw NotImplementedError when invoked.
 */
export interface ShrinkerCapabilities {
  /** API endpoint (required) */
  baseUrl?: () => string;

  /** Query string appended to baseUrl, e.g. `?url=<encoded>` (required) */
  queryParameter?: (sanitizedUrl: string, context: QueryContext) => string;

  /** Chart / QR code URL for providers that offer one */
  generateChartUrl?: (url: string, imageSize: ImageSize) => string;

  httpMethod?: () => HttpMethod;
  contentType?: () => string;
  bodyParameters?: (params: BodyParams, context: BodyContext) => BodyParams | null;
}

export interface ShrinkerOptions extends ShrinkerCapabilities {
  /**
   * Explicit identifier, e.g. "Shorty" or "shrinkers.Shorty".
   * The innermost component becomes the shrinker's name.
   */
  id: string;

  responseSchema?: ResponseSchema;
}

/**
 * A defined shrinker. Immutable once created.
 */
export interface Shrinker {
  readonly id: string;

  /** Derived short name; `<NAME>_URL_KEY` holds its API key */
  readonly name: string;

  readonly responseSchema: ResponseSchema;

  baseUrl(): string;
  queryParameter(sanitizedUrl: string, context: QueryContext): string;
  generateChartUrl(url: string, imageSize?: ImageSize): string;
  httpMethod(): HttpMethod;
  contentType(): string;
  bodyParameters(params: BodyParams, context: BodyContext): BodyParams | null;
}
