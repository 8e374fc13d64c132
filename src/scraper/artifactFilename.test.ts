import { describe, expect, it } from "vitest";
import {
  formatWheelFilename,
  isArtifactFilename,
  parseArtifactFilename,
} from "./artifactFilename";

describe("parseArtifactFilename", () => {
  it("should parse a wheel with a local version label", () => {
    const filename = "vllm-0.6.1.post1+cu118-cp312-cp312-manylinux1_x86_64.whl";
    expect(parseArtifactFilename(filename)).toEqual({
      type: "wheel",
      filename,
      name: "vllm",
      version: "0.6.1.post1+cu118",
      pythonTag: "cp312",
      abiTag: "cp312",
      platformTag: "manylinux1_x86_64",
    });
  });

  it("should decode percent-encoded characters in the version", () => {
    const parsed = parseArtifactFilename(
      "vllm-0.6.1.post1%2Bcu118-cp38-abi3-manylinux1_x86_64.whl",
    );
    expect(parsed.type).toBe("wheel");
    if (parsed.type === "wheel") {
      expect(parsed.version).toBe("0.6.1.post1+cu118");
      expect(parsed.filename).toBe("vllm-0.6.1.post1%2Bcu118-cp38-abi3-manylinux1_x86_64.whl");
    }
  });

  it("should keep a malformed escape as-is", () => {
    const parsed = parseArtifactFilename("vllm-1.0%ZZ-py3-none-any.whl");
    expect(parsed).toMatchObject({ type: "wheel", version: "1.0%ZZ" });
  });

  it("should extract an optional build tag", () => {
    expect(parseArtifactFilename("demo_pkg-2.1-1b-py3-none-any.whl")).toMatchObject({
      type: "wheel",
      name: "demo_pkg",
      version: "2.1",
      buildTag: "1b",
      pythonTag: "py3",
      abiTag: "none",
      platformTag: "any",
    });
  });

  it("should not set a build tag on five-segment wheels", () => {
    const parsed = parseArtifactFilename("demo-1.0-py3-none-any.whl");
    expect(parsed).not.toHaveProperty("buildTag");
  });

  it("should classify wheels with the wrong segment count as unknown", () => {
    expect(parseArtifactFilename("vllm-1.0-py3-any.whl")).toEqual({
      type: "unknown",
      filename: "vllm-1.0-py3-any.whl",
    });
    expect(parseArtifactFilename("a-b-1-c-d-e-f.whl").type).toBe("unknown");
  });

  it("should reject a build tag that does not start with a digit", () => {
    expect(parseArtifactFilename("demo-1.0-x1-py3-none-any.whl").type).toBe("unknown");
  });

  it("should reject empty segments", () => {
    expect(parseArtifactFilename("demo--py3-none-any.whl").type).toBe("unknown");
  });

  it("should classify source distributions without tag fields", () => {
    expect(parseArtifactFilename("vllm-0.6.1.tar.gz")).toEqual({
      type: "source",
      filename: "vllm-0.6.1.tar.gz",
      name: "vllm",
      version: "0.6.1",
    });
    const zip = parseArtifactFilename("vllm-0.5.0.zip");
    expect(zip).toMatchObject({ type: "source", name: "vllm", version: "0.5.0" });
    expect(zip).not.toHaveProperty("pythonTag");
    expect(zip).not.toHaveProperty("platformTag");
  });

  it("should leave name and version unset for undelimited source archives", () => {
    expect(parseArtifactFilename("bundle.tar.gz")).toEqual({
      type: "source",
      filename: "bundle.tar.gz",
    });
  });

  it("should classify other files as unknown", () => {
    expect(parseArtifactFilename("index.html")).toEqual({
      type: "unknown",
      filename: "index.html",
    });
  });
});

describe("formatWheelFilename", () => {
  it.each([
    "vllm-0.6.1.post1+cu118-cp312-cp312-manylinux1_x86_64.whl",
    "vllm-0.9.2-cp38-abi3-manylinux_2_31_aarch64.whl",
    "demo_pkg-2.1-1b-py3-none-any.whl",
  ])("should rebuild %s from its parsed fields", (filename) => {
    const parsed = parseArtifactFilename(filename);
    if (parsed.type !== "wheel") {
      throw new Error(`expected a wheel, got ${parsed.type}`);
    }
    expect(formatWheelFilename(parsed)).toBe(filename);
  });

  it("should rebuild the decoded form of percent-encoded names", () => {
    const parsed = parseArtifactFilename("vllm-1.0%2Bcpu-py3-none-any.whl");
    if (parsed.type !== "wheel") {
      throw new Error(`expected a wheel, got ${parsed.type}`);
    }
    expect(formatWheelFilename(parsed)).toBe("vllm-1.0+cpu-py3-none-any.whl");
  });
});

describe("isArtifactFilename", () => {
  it("should accept wheels and source archives only", () => {
    expect(isArtifactFilename("a-1-py3-none-any.whl")).toBe(true);
    expect(isArtifactFilename("a-1.tar.gz")).toBe(true);
    expect(isArtifactFilename("a-1.zip")).toBe(true);
    expect(isArtifactFilename("a-1.tar")).toBe(false);
    expect(isArtifactFilename("")).toBe(false);
  });
});
