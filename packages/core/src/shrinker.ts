/**
 * Shrinker Definition
 *
 * A shrinker is a plain, frozen record of capabilities. Providers supply what
 * they need and inherit the rest:
 *
 * ```ts
 * export const shorty = defineShrinker({
 *   id: "Shorty",
 *   baseUrl: () => "http://shorty.com/api/2.0/shorten",
 *   queryParameter: (url) => `?url=${url}`,
 *   responseSchema: responseOptions((r) => r.shortUrl("url")),
 * });
 * ```
 *
 * `baseUrl`, `queryParameter` and `generateChartUrl` have no default and throw
 * NotImplementedError when invoked without being supplied.
 */

import { z } from "zod";
import { SHRINKER_DEFAULTS } from "./constants/index.js";
import { NotImplementedError, ShrinkerConfigError } from "./errors.js";
import { responseSchema } from "./schema.js";
import type { BodyParams, ImageSize, Shrinker, ShrinkerOptions } from "./types/index.js";
import { deriveShortName } from "./utils/index.js";

const shrinkerId = z
  .string()
  .trim()
  .min(1, "Shrinker id is required")
  .refine((id) => deriveShortName(id).length > 0, "Shrinker id has no name component");

/**
 * Shared bodyParameters: null when empty, otherwise the params unchanged
 */
export function defaultBodyParameters(params: BodyParams = {}): BodyParams | null {
  return Object.keys(params).length === 0 ? null : params;
}

/**
 * Define a shrinker
 *
 * @throws ShrinkerConfigError when the id is empty or has no name component
 */
export function defineShrinker(options: ShrinkerOptions): Shrinker {
  const parseResult = shrinkerId.safeParse(options.id);
  if (!parseResult.success) {
    throw new ShrinkerConfigError(
      `Invalid shrinker id "${options.id}"`,
      "INVALID_DEFINITION",
      parseResult.error.flatten().formErrors
    );
  }

  const id = parseResult.data;
  const name = deriveShortName(id);
  const missing = (capability: string): never => {
    throw new NotImplementedError(name, capability);
  };

  const { baseUrl, queryParameter, generateChartUrl, httpMethod, contentType, bodyParameters } = options;

  const shrinker: Shrinker = {
    id,
    name,
    responseSchema: options.responseSchema ?? responseSchema(),

    baseUrl: () => (baseUrl ? baseUrl() : missing("baseUrl")),

    queryParameter: (sanitizedUrl, context) =>
      queryParameter ? queryParameter(sanitizedUrl, context) : missing("queryParameter"),

    generateChartUrl: (url: string, imageSize: ImageSize = {}) =>
      generateChartUrl ? generateChartUrl(url, imageSize) : missing("generateChartUrl"),

    httpMethod: () => (httpMethod ? httpMethod() : SHRINKER_DEFAULTS.HTTP_METHOD),

    contentType: () => (contentType ? contentType() : SHRINKER_DEFAULTS.CONTENT_TYPE),

    bodyParameters: (params, context) =>
      bodyParameters ? bodyParameters(params, context) : defaultBodyParameters(params),
  };

  return Object.freeze(shrinker);
}
