/**
 * Response Schema DSL
 *
 * Declares, once per shrinker, where a provider's JSON reply keeps the short
 * URL, an optional wrapping collection and an error message:
 *
 * ```ts
 * const schema = responseOptions((r) => {
 *   r.collection("data");
 *   r.shortUrl("url");
 *   r.error();
 * });
 * ```
 *
 * Schemas only describe replies; they play no part in building requests.
 */

import { z } from "zod";
import { SHRINKER_DEFAULTS } from "./constants/index.js";
import { ShrinkerConfigError } from "./errors.js";
import type { ResponseSchema, ResponseSchemaInput, ShrinkResult } from "./types/index.js";

// =============================================================================
// Validation
// =============================================================================

/** Keys are stored exactly as declared; only blank ones are rejected */
const responseKey = z.string().refine((key) => key.trim().length > 0, "Response key cannot be empty");

const responseSchemaInput = z.object({
  collectionKey: responseKey.optional(),
  urlKey: responseKey.optional(),
  errorKey: responseKey.default(SHRINKER_DEFAULTS.ERROR_KEY),
});

/**
 * Build a frozen Response Schema from a plain object
 *
 * @throws ShrinkerConfigError when a key is empty
 */
export function responseSchema(input: ResponseSchemaInput = {}): ResponseSchema {
  const parseResult = responseSchemaInput.safeParse(input);
  if (!parseResult.success) {
    throw new ShrinkerConfigError(
      "Invalid response schema",
      "INVALID_DEFINITION",
      parseResult.error.flatten().fieldErrors
    );
  }

  const { collectionKey, urlKey, errorKey } = parseResult.data;
  const schema: { collectionKey?: string; urlKey?: string; errorKey: string } = { errorKey };
  if (collectionKey !== undefined) schema.collectionKey = collectionKey;
  if (urlKey !== undefined) schema.urlKey = urlKey;

  return Object.freeze(schema);
}

// =============================================================================
// DSL
// =============================================================================

export interface ResponseOptionsBuilder {
  /** Top-level key wrapping the real payload */
  collection(key: string): ResponseOptionsBuilder;

  /** Key holding the shortened URL */
  shortUrl(key: string): ResponseOptionsBuilder;

  /** Key holding an error message (default "error") */
  error(key?: string): ResponseOptionsBuilder;
}

/**
 * Run a declaration block once and return the resulting schema
 */
export function responseOptions(block: (options: ResponseOptionsBuilder) => void): ResponseSchema {
  const declared: ResponseSchemaInput = {};

  const builder: ResponseOptionsBuilder = {
    collection(key) {
      declared.collectionKey = key;
      return builder;
    },
    shortUrl(key) {
      declared.urlKey = key;
      return builder;
    },
    error(key = SHRINKER_DEFAULTS.ERROR_KEY) {
      declared.errorKey = key;
      return builder;
    },
  };

  block(builder);
  return responseSchema(declared);
}

// =============================================================================
// Interpretation
// =============================================================================

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeError(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Navigate a decoded response body.
 *
 * Descends into `collectionKey` when set, then reads `urlKey` for success or
 * `errorKey` for a provider-reported failure. A top-level `errorKey` is
 * reported when the collection itself is missing.
 *
 * @throws ShrinkerConfigError when the schema declares no urlKey
 */
export function interpretResponse(schema: ResponseSchema, body: unknown): ShrinkResult {
  const { collectionKey, urlKey, errorKey } = schema;
  if (urlKey === undefined) {
    throw new ShrinkerConfigError("Response schema declares no short URL key", "MISSING_URL_KEY");
  }

  const payload = collectionKey !== undefined && isJsonObject(body) ? body[collectionKey] : body;

  if (isJsonObject(payload)) {
    const shortUrl = payload[urlKey];
    if (typeof shortUrl === "string") {
      return { success: true, shortUrl };
    }

    if (payload[errorKey] !== undefined) {
      return { success: false, error: describeError(payload[errorKey]), errorCode: "PROVIDER_ERROR" };
    }
  }

  if (collectionKey !== undefined && isJsonObject(body) && body[errorKey] !== undefined) {
    return { success: false, error: describeError(body[errorKey]), errorCode: "PROVIDER_ERROR" };
  }

  return {
    success: false,
    error: `Response has no "${urlKey}" or "${errorKey}" key`,
    errorCode: "UNRECOGNIZED_RESPONSE",
  };
}
