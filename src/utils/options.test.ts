import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import { parseCount, parseLimit } from "./options";

describe("option parsers", () => {
  describe("parseCount", () => {
    it("should accept zero and positive integers", () => {
      expect(parseCount("0")).toBe(0);
      expect(parseCount("250")).toBe(250);
    });

    it("should reject negative, fractional and non-numeric values", () => {
      expect(() => parseCount("-1")).toThrow(InvalidArgumentError);
      expect(() => parseCount("1.5")).toThrow(InvalidArgumentError);
      expect(() => parseCount("ten")).toThrow("Expected a non-negative integer.");
      expect(() => parseCount("")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseLimit", () => {
    it("should accept positive integers", () => {
      expect(parseLimit("1")).toBe(1);
      expect(parseLimit("50")).toBe(50);
    });

    it("should reject a limit of zero", () => {
      expect(() => parseLimit("0")).toThrow("Expected a positive integer.");
    });

    it("should reject negative values", () => {
      expect(() => parseLimit("-3")).toThrow("Expected a non-negative integer.");
    });
  });
});
