import { describe, expect, it } from "vitest";
import { InvalidUrlError } from "./errors";
import {
  ensureTrailingSlash,
  filenameFromHref,
  isSubpath,
  resolveUrl,
  validateUrl,
} from "./url";

describe("URL utilities", () => {
  describe("validateUrl", () => {
    it("should accept absolute URLs", () => {
      expect(() => validateUrl("https://wheels.example.com/")).not.toThrow();
    });

    it("should throw InvalidUrlError for relative paths", () => {
      expect(() => validateUrl("wheels.example.com")).toThrow(InvalidUrlError);
      expect(() => validateUrl("wheels.example.com")).toThrow(
        "Invalid URL: wheels.example.com",
      );
    });
  });

  describe("ensureTrailingSlash", () => {
    it("should add a single trailing slash", () => {
      expect(ensureTrailingSlash("https://wheels.example.com")).toBe(
        "https://wheels.example.com/",
      );
      expect(ensureTrailingSlash("https://wheels.example.com///")).toBe(
        "https://wheels.example.com/",
      );
    });
  });

  describe("resolveUrl", () => {
    it("should resolve relative hrefs against the listing URL", () => {
      expect(resolveUrl("pkg-1.0.tar.gz", "https://host.test/abc/")).toBe(
        "https://host.test/abc/pkg-1.0.tar.gz",
      );
      expect(resolveUrl("../other/", "https://host.test/abc/vllm/")).toBe(
        "https://host.test/abc/other/",
      );
    });
  });

  describe("isSubpath", () => {
    it("should match nested paths on the same origin", () => {
      const base = new URL("https://host.test/abc/");
      expect(isSubpath(base, new URL("https://host.test/abc/vllm/"))).toBe(true);
      expect(isSubpath(base, new URL("https://host.test/abcd/"))).toBe(false);
      expect(isSubpath(base, new URL("https://other.test/abc/vllm/"))).toBe(false);
    });
  });

  describe("filenameFromHref", () => {
    it("should take the last path segment of absolute links", () => {
      expect(
        filenameFromHref("https://host.test/abc/vllm-1.0-py3-none-any.whl?x=1"),
      ).toBe("vllm-1.0-py3-none-any.whl");
    });

    it("should strip fragments and queries from relative links", () => {
      expect(filenameFromHref("../vllm-1.0.tar.gz#sha256=00ff")).toBe("vllm-1.0.tar.gz");
      expect(filenameFromHref("vllm-1.0.zip?download=1")).toBe("vllm-1.0.zip");
    });

    it("should return an empty name for directory links", () => {
      expect(filenameFromHref("vllm/")).toBe("");
      expect(filenameFromHref("https://host.test/abc/")).toBe("");
    });
  });
});
