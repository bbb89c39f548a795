/**
 * Shrink Request
 *
 * Per-use target of a shrink operation: one shrinker, one long URL and the
 * environment its API key is read from. Single owner; do not share an
 * instance across concurrent operations.
 */

import { createLogger } from "@linkshrink/logger";
import { apiKeyVariable, hasApiKey, resolveApiKey } from "./credentials.js";
import { ShrinkerConfigError } from "./errors.js";
import type {
  BodyParams,
  EnvSource,
  HttpMethod,
  Shrinker,
  ShrinkHttpRequest,
} from "./types/index.js";
import { sanitizeUrl } from "./utils/index.js";

const log = createLogger("request");

export interface ShrinkRequestOptions {
  /** Where API keys are read from (default: process.env) */
  env?: EnvSource;
}

export class ShrinkRequest {
  private readonly env: EnvSource;
  private raw: string | null = null;
  private sanitized: string | null = null;

  constructor(
    public readonly shrinker: Shrinker,
    options: ShrinkRequestOptions = {}
  ) {
    this.env = options.env ?? process.env;
  }

  // =========================================================================
  // Long URL
  // =========================================================================

  /**
   * Set the long URL; only its sanitized form is kept for requests.
   */
  setUrl(candidate: string): string {
    this.raw = candidate;
    this.sanitized = sanitizeUrl(candidate);
    return this.sanitized;
  }

  /** Sanitized long URL, null until setUrl */
  get url(): string | null {
    return this.sanitized;
  }

  /** URL as given to setUrl */
  get rawUrl(): string | null {
    return this.raw;
  }

  // =========================================================================
  // Credentials
  // =========================================================================

  hasApiKey(): boolean {
    return hasApiKey(this.shrinker.name, this.env);
  }

  apiKey(): string | null {
    return resolveApiKey(this.shrinker.name, this.env);
  }

  // =========================================================================
  // Request Shape
  // =========================================================================

  /**
   * Full API URL. Without an API key this is the bare base URL; callers
   * decide whether such a request is worth sending.
   *
   * With an API key present, setUrl must have been called first: the query
   * parameter is built from the sanitized URL.
   *
   * @throws ShrinkerConfigError (URL_NOT_SET) when a key is present but no URL was set
   */
  apiUrl(): string {
    const apiKey = this.apiKey();
    if (apiKey === null) {
      log.warn(
        { shrinker: this.shrinker.name, variable: apiKeyVariable(this.shrinker.name) },
        "No API key configured, using bare base URL"
      );
      return this.shrinker.baseUrl();
    }

    if (this.sanitized === null) {
      throw new ShrinkerConfigError(
        `No URL set on request for shrinker "${this.shrinker.name}"`,
        "URL_NOT_SET"
      );
    }

    return this.shrinker.baseUrl() + this.shrinker.queryParameter(this.sanitized, { apiKey });
  }

  httpMethod(): HttpMethod {
    return this.shrinker.httpMethod();
  }

  contentType(): string {
    return this.shrinker.contentType();
  }

  bodyParameters(params: BodyParams = {}): BodyParams | null {
    return this.shrinker.bodyParameters(params, { url: this.sanitized, apiKey: this.apiKey() });
  }
}

/**
 * Assemble the outbound request for a network executor
 */
export function buildRequest(request: ShrinkRequest, params: BodyParams = {}): ShrinkHttpRequest {
  return {
    method: request.httpMethod(),
    url: request.apiUrl(),
    headers: { "Content-Type": request.contentType() },
    body: request.bodyParameters(params),
  };
}
