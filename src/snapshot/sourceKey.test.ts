import { describe, expect, it } from "vitest";
import { SnapshotMode } from "../types";
import { formatSourceKey, parseSourceKey } from "./sourceKey";

describe("source keys", () => {
  it("should render wire keys per kind", () => {
    expect(formatSourceKey({ kind: "commit", hash: "a".repeat(40) })).toBe("a".repeat(40));
    expect(formatSourceKey({ kind: "release", tag: "v0.9.2" })).toBe("release_v0.9.2");
    expect(formatSourceKey({ kind: "version", version: "0.9.2" })).toBe("version_0.9.2");
    expect(formatSourceKey({ kind: "nightly" })).toBe("nightly");
    expect(formatSourceKey({ kind: "package", name: "vllm" })).toBe("vllm");
  });

  it("should parse prefixed keys back", () => {
    expect(parseSourceKey("release_v0.9.2")).toEqual({ kind: "release", tag: "v0.9.2" });
    expect(parseSourceKey("version_0.9.2")).toEqual({ kind: "version", version: "0.9.2" });
    expect(parseSourceKey("nightly")).toEqual({ kind: "nightly" });
    expect(parseSourceKey("abc123")).toEqual({ kind: "commit", hash: "abc123" });
  });

  it("should read every key as a package name in legacy snapshots", () => {
    expect(parseSourceKey("nightly", SnapshotMode.Legacy)).toEqual({
      kind: "package",
      name: "nightly",
    });
  });
});
