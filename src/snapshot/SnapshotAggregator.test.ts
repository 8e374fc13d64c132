import { describe, expect, it } from "vitest";
import type { SourceRunResult } from "../scraper/types";
import { SnapshotMode } from "../types";
import { SnapshotAggregator, toArtifactRecord } from "./SnapshotAggregator";

const NOW = new Date("2024-05-01T12:00:00.000Z");
const BASE = "https://wheels.example.com/";

function runResult(partial: Partial<SourceRunResult> & Pick<SourceRunResult, "kind" | "groups">): SourceRunResult {
  return {
    source: partial.kind,
    candidates: partial.groups.length,
    skipped: 0,
    rateLimited: false,
    ...partial,
  };
}

const versionRun = runResult({
  kind: "version",
  groups: [
    {
      key: { kind: "version", version: "0.9.2" },
      artifacts: [
        { filename: "vllm-0.9.2-cp38-abi3-manylinux1_x86_64.whl", url: `${BASE}0.9.2/a.whl` },
        { filename: "vllm-0.9.2.tar.gz", url: `${BASE}0.9.2/vllm-0.9.2.tar.gz` },
        { filename: "vllm-0.9.2-cp38-abi3-manylinux2014_aarch64.whl", url: `${BASE}0.9.2/b.whl` },
      ],
    },
  ],
});

const commitRun = runResult({
  kind: "commit",
  groups: [
    { key: { kind: "commit", hash: "a".repeat(40) }, artifacts: [] },
    {
      key: { kind: "commit", hash: "b".repeat(40) },
      artifacts: [{ filename: "vllm-0.9.2.zip", url: `${BASE}bbb/vllm-0.9.2.zip` }],
    },
  ],
});

describe("SnapshotAggregator", () => {
  it("should keep run order and attach source keys", () => {
    const aggregator = new SnapshotAggregator({ baseUrl: BASE, mode: SnapshotMode.MultiSource });
    const snapshot = aggregator.aggregate([versionRun, commitRun], NOW);

    expect(snapshot.scrapeTime).toBe("2024-05-01T12:00:00.000Z");
    expect(snapshot.mode).toBe(SnapshotMode.MultiSource);
    expect(snapshot.results.map((group) => group.key)).toEqual([
      { kind: "version", version: "0.9.2" },
      { kind: "commit", hash: "b".repeat(40) },
    ]);
    expect(snapshot.results[0]?.records.map((record) => record.type)).toEqual([
      "wheel",
      "source",
      "wheel",
    ]);
    expect(snapshot.sources).toEqual({
      commits: 1,
      githubReleases: 0,
      nightly: 0,
      releaseVersions: 1,
      packages: 0,
    });
  });

  it("should keep only wheels with wheelsOnly", () => {
    const aggregator = new SnapshotAggregator({
      baseUrl: BASE,
      mode: SnapshotMode.MultiSource,
      wheelsOnly: true,
    });
    const snapshot = aggregator.aggregate([versionRun, commitRun], NOW);

    const records = snapshot.results.flatMap((group) => group.records);
    expect(records).toHaveLength(2);
    expect(records.every((record) => record.type === "wheel")).toBe(true);
    // The commit group held only a source archive
    expect(snapshot.results).toHaveLength(1);
    expect(snapshot.sources.commits).toBe(0);
  });

  it("should produce an empty snapshot when no source found candidates", () => {
    const aggregator = new SnapshotAggregator({ baseUrl: BASE, mode: SnapshotMode.Nightly });
    const snapshot = aggregator.aggregate(
      [runResult({ kind: "nightly", candidates: 0, groups: [] })],
      NOW,
    );
    expect(snapshot.results).toEqual([]);
    expect(snapshot.sources.nightly).toBe(0);
  });

  it("should carry the reported size into the record", () => {
    const record = toArtifactRecord(
      { filename: "vllm-1.0.tar.gz", url: "https://example.com/vllm-1.0.tar.gz", size: 10 },
      { kind: "release", tag: "v1.0" },
    );
    expect(record).toEqual({
      type: "source",
      filename: "vllm-1.0.tar.gz",
      name: "vllm",
      version: "1.0",
      url: "https://example.com/vllm-1.0.tar.gz",
      size: 10,
      source: { kind: "release", tag: "v1.0" },
    });
  });
});
