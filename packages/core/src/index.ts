/**
 * @linkshrink/core - Provider Contract
 *
 * Everything a URL-shortening provider integration needs: shrinker
 * definitions, the response schema DSL, API key resolution, URL
 * sanitization, request assembly and a registry.
 *
 * Network I/O is left to callers: build a request with `buildRequest`, send
 * it, then read the decoded body with `interpretResponse`.
 */

// Types (Shrinker, ResponseSchema, ShrinkHttpRequest, ...)
export * from "./types/index.js";

// Constants (SHRINKER_DEFAULTS, URL_CONFIG)
export * from "./constants/index.js";

// Utilities (sanitizeUrl, deriveShortName)
export * from "./utils/index.js";

export { NotImplementedError, ShrinkerConfigError, type ShrinkerConfigErrorCode } from "./errors.js";

export { apiKeyVariable, hasApiKey, resolveApiKey } from "./credentials.js";

export {
  responseOptions,
  responseSchema,
  interpretResponse,
  type ResponseOptionsBuilder,
} from "./schema.js";

export { defineShrinker, defaultBodyParameters } from "./shrinker.js";

export { ShrinkRequest, buildRequest, type ShrinkRequestOptions } from "./request.js";

export { ShrinkerRegistry, createRegistry } from "./registry.js";
