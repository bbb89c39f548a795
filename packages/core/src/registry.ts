/**
 * Shrinker Registry
 *
 * Maps short names to shrinkers. Lookups are case-insensitive
 * ("shorty", "Shorty" and "SHORTY" are the same shrinker).
 */

import { createLogger } from "@linkshrink/logger";
import { hasApiKey } from "./credentials.js";
import { ShrinkerConfigError } from "./errors.js";
import { ShrinkRequest, type ShrinkRequestOptions } from "./request.js";
import type { EnvSource, Shrinker } from "./types/index.js";

const log = createLogger("registry");

function registryKey(name: string): string {
  return name.trim().toLowerCase();
}

export class ShrinkerRegistry {
  private readonly shrinkers = new Map<string, Shrinker>();

  /**
   * @throws ShrinkerConfigError when a shrinker with the same name exists
   */
  register(shrinker: Shrinker): this {
    const key = registryKey(shrinker.name);
    const existing = this.shrinkers.get(key);
    if (existing) {
      throw new ShrinkerConfigError(
        `Shrinker "${shrinker.name}" is already registered (id "${existing.id}")`,
        "DUPLICATE_SHRINKER"
      );
    }

    this.shrinkers.set(key, shrinker);
    log.debug({ shrinker: shrinker.name, id: shrinker.id }, "Shrinker registered");
    return this;
  }

  has(name: string): boolean {
    return this.shrinkers.has(registryKey(name));
  }

  /**
   * @throws ShrinkerConfigError when no shrinker has this name
   */
  get(name: string): Shrinker {
    const shrinker = this.shrinkers.get(registryKey(name));
    if (!shrinker) {
      log.debug({ shrinker: name }, "Unknown shrinker requested");
      throw new ShrinkerConfigError(`Unknown shrinker "${name}"`, "UNKNOWN_SHRINKER");
    }
    return shrinker;
  }

  /** Shrinkers in registration order */
  list(): Shrinker[] {
    return [...this.shrinkers.values()];
  }

  /**
   * Shrinkers whose API key variable is present
   */
  configured(env: EnvSource = process.env): Shrinker[] {
    return this.list().filter((shrinker) => hasApiKey(shrinker.name, env));
  }

  /**
   * Start a request against a registered shrinker with its URL already set
   */
  request(name: string, url: string, options: ShrinkRequestOptions = {}): ShrinkRequest {
    const request = new ShrinkRequest(this.get(name), options);
    request.setUrl(url);
    return request;
  }
}

export function createRegistry(shrinkers: readonly Shrinker[] = []): ShrinkerRegistry {
  const registry = new ShrinkerRegistry();
  for (const shrinker of shrinkers) {
    registry.register(shrinker);
  }
  return registry;
}
