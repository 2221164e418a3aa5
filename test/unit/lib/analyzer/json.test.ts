import { describe, expect, it } from "vitest";

import { findJsonObject, parseJsonObject, parseUnitScore } from "@/lib/analyzer/json";

describe("analyzer/json", () => {
  describe("findJsonObject", () => {
    it("finds the first balanced object in surrounding prose", () => {
      expect(findJsonObject('Sure! {"score": 0.7} Hope that helps {"x": 1}')).toBe('{"score": 0.7}');
    });

    it("ignores braces inside strings", () => {
      expect(findJsonObject('x {"a": "}{", "b": {"c": 2}} y')).toBe('{"a": "}{", "b": {"c": 2}}');
    });

    it("returns null for unbalanced or missing objects", () => {
      expect(findJsonObject("no json here")).toBeNull();
      expect(findJsonObject('{"a": 1')).toBeNull();
    });
  });

  it("parseJsonObject returns null on invalid JSON", () => {
    expect(parseJsonObject("{not: json}")).toBeNull();
    expect(parseJsonObject('```json\n{"claims": ["a"]}\n```')).toEqual({ claims: ["a"] });
  });

  describe("parseUnitScore", () => {
    it("accepts a bare number", () => {
      expect(parseUnitScore(" 0.8 ")).toBe(0.8);
      expect(parseUnitScore("1")).toBe(1);
    });

    it("accepts a JSON object with a numeric score", () => {
      expect(parseUnitScore('{"score": 0.62, "type": "news", "reasoning": "regional outlet"}')).toBe(0.62);
    });

    it("rejects out-of-range and non-numeric scores", () => {
      expect(parseUnitScore("1.5")).toBeNull();
      expect(parseUnitScore("-0.1")).toBeNull();
      expect(parseUnitScore('{"score": "0.8"}')).toBeNull();
      expect(parseUnitScore("Score: 0.7")).toBeNull();
    });
  });
});
