/**
 * Shrinker Registry Tests
 *
 * @see packages/core/src/registry.ts
 */

import { describe, it, expect } from "@jest/globals";
import {
  ShrinkerRegistry,
  createRegistry,
  defineShrinker,
  ShrinkerConfigError,
} from "../src/index.js";

const shorty = defineShrinker({
  id: "Shorty",
  baseUrl: () => "http://shorty.com/api/2.0/shorten",
  queryParameter: (url) => `?url=${url}`,
});

const isgd = defineShrinker({
  id: "shrinkers.Isgd",
  baseUrl: () => "https://isgd.test/create.php",
  queryParameter: (url) => `?format=json&url=${url}`,
});

describe("ShrinkerRegistry", () => {
  describe("register", () => {
    it("should register and look up by name", () => {
      const registry = new ShrinkerRegistry().register(shorty);

      expect(registry.get("Shorty")).toBe(shorty);
    });

    it("should look up case-insensitively", () => {
      const registry = createRegistry([shorty]);

      expect(registry.get("shorty")).toBe(shorty);
      expect(registry.get("SHORTY")).toBe(shorty);
      expect(registry.has("sHoRtY")).toBe(true);
    });

    it("should key shrinkers by short name, not id", () => {
      const registry = createRegistry([isgd]);

      expect(registry.has("isgd")).toBe(true);
      expect(registry.has("shrinkers.Isgd")).toBe(false);
    });

    it("should reject a second shrinker with the same name", () => {
      const registry = createRegistry([shorty]);
      const clash = defineShrinker({ id: "vendor::SHORTY" });

      try {
        registry.register(clash);
        throw new Error("expected register to throw");
      } catch (error) {
        expect(error).toBeInstanceOf(ShrinkerConfigError);
        expect(error).toMatchObject({ code: "DUPLICATE_SHRINKER" });
      }
      expect(registry.get("shorty")).toBe(shorty);
    });
  });

  describe("get", () => {
    it("should throw UNKNOWN_SHRINKER for unknown names", () => {
      const registry = createRegistry([shorty]);

      expect(registry.has("bitly")).toBe(false);
      expect(() => registry.get("bitly")).toThrow('Unknown shrinker "bitly"');
    });
  });

  describe("list", () => {
    it("should keep registration order", () => {
      expect(createRegistry([shorty, isgd]).list()).toEqual([shorty, isgd]);
    });

    it("should start empty", () => {
      expect(createRegistry().list()).toEqual([]);
    });
  });

  describe("configured", () => {
    it("should return shrinkers with an API key variable", () => {
      const registry = createRegistry([shorty, isgd]);

      expect(registry.configured({ ISGD_URL_KEY: "" })).toEqual([isgd]);
      expect(registry.configured({})).toEqual([]);
    });
  });

  describe("request", () => {
    it("should start a request with the URL set", () => {
      const registry = createRegistry([shorty, isgd]);
      const request = registry.request("isgd", "example.com", {
        env: { ISGD_URL_KEY: "test-secret" },
      });

      expect(request.shrinker).toBe(isgd);
      expect(request.url).toBe("http%3A%2F%2Fexample.com");
      expect(request.apiUrl()).toBe(
        "https://isgd.test/create.php?format=json&url=http%3A%2F%2Fexample.com"
      );
    });

    it("should throw for unknown shrinkers", () => {
      expect(() => createRegistry().request("shorty", "example.com")).toThrow(ShrinkerConfigError);
    });
  });
});
