import { describe, it, expect } from "vitest";
import { ensurePage, getPath, isMapping, splitPath, stringifyValue } from "./environment.js";
import type { Environment } from "../template/types.js";

describe("environment", () => {
  describe("splitPath", () => {
    it("should split on dots and skip empty segments", () => {
      expect(splitPath("a.b.c")).toEqual(["a", "b", "c"]);
      expect(splitPath("a..b.")).toEqual(["a", "b"]);
      expect(splitPath("...")).toEqual([]);
    });
  });

  describe("isMapping", () => {
    it("should accept objects and arrays only", () => {
      expect(isMapping({})).toBe(true);
      expect(isMapping([])).toBe(true);
      expect(isMapping(null)).toBe(false);
      expect(isMapping("text")).toBe(false);
      expect(isMapping(1)).toBe(false);
    });
  });

  describe("getPath", () => {
    it("should walk nested mappings", () => {
      expect(getPath({ a: { b: 1 } }, ["a", "b"])).toEqual({ found: true, value: 1 });
    });

    it("should index arrays by position", () => {
      expect(getPath({ list: ["x", "y"] }, ["list", "1"])).toEqual({
        found: true,
        value: "y",
      });
    });

    it("should stop at values that are not mappings", () => {
      expect(getPath({ a: "text" }, ["a", "length"])).toEqual({ found: false });
    });

    it("should ignore inherited properties", () => {
      expect(getPath({}, ["toString"])).toEqual({ found: false });
    });

    it("should treat null and undefined results as not found", () => {
      expect(getPath({ a: null }, ["a"])).toEqual({ found: false });
      expect(getPath({ a: undefined }, ["a"])).toEqual({ found: false });
    });

    it("should not resolve an empty path", () => {
      expect(getPath({ a: 1 }, [])).toEqual({ found: false });
    });
  });

  describe("ensurePage", () => {
    it("should create Page when missing", () => {
      const env: Environment = {};

      const page = ensurePage(env, "hello");

      expect(env.Page).toBe(page);
      expect(page).toEqual({ Content: "hello" });
    });

    it("should keep an existing Page mapping and overwrite Content", () => {
      const page = { Title: "T", Content: "old" };
      const env: Environment = { Page: page };

      ensurePage(env, "new");

      expect(env.Page).toBe(page);
      expect(page.Content).toBe("new");
    });
  });

  describe("stringifyValue", () => {
    it("should return strings unchanged", () => {
      expect(stringifyValue("<b>x</b>")).toBe("<b>x</b>");
    });

    it("should stringify primitives", () => {
      expect(stringifyValue(42)).toBe("42");
      expect(stringifyValue(true)).toBe("true");
      expect(stringifyValue(10n)).toBe("10");
    });

    it("should serialize mappings and arrays as JSON", () => {
      expect(stringifyValue({ a: [1, "b"] })).toBe('{"a":[1,"b"]}');
      expect(stringifyValue(["x"])).toBe('["x"]');
    });

    it("should fall back to String for cyclic mappings", () => {
      const cyclic: Record<string, unknown> = {};
      cyclic.self = cyclic;

      expect(stringifyValue(cyclic)).toBe("[object Object]");
    });
  });
});
