/**
 * API Key Resolution
 *
 * Keys come from the environment under `<NAME>_URL_KEY`, where NAME is the
 * shrinker's short name upper-cased (Shorty -> SHORTY_URL_KEY). A missing key
 * is a normal state: shrinkers that need none simply have no variable.
 */

import { API_KEY_SUFFIX } from "./constants/index.js";
import type { EnvSource } from "./types/index.js";

/**
 * Name of the variable holding a shrinker's API key
 */
export function apiKeyVariable(shortName: string): string {
  return `${shortName.toUpperCase()}${API_KEY_SUFFIX}`;
}

/**
 * Presence check only; an empty value still counts.
 */
export function hasApiKey(shortName: string, env: EnvSource = process.env): boolean {
  return env[apiKeyVariable(shortName)] !== undefined;
}

export function resolveApiKey(shortName: string, env: EnvSource = process.env): string | null {
  return env[apiKeyVariable(shortName)] ?? null;
}
