import { vol } from "memfs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { writeSnapshot } from "../snapshot/store";
import { SnapshotReadError } from "../snapshot/errors";
import { group, snapshotOf } from "../test-utils/snapshots";
import { StatsTool } from "./StatsTool";

vi.mock("node:fs/promises", () => ({ default: vol.promises }));
vi.mock("../utils/logger");

describe("StatsTool", () => {
  beforeEach(() => {
    vol.reset();
  });

  it("should write stats derived from the saved snapshot", async () => {
    await writeSnapshot(
      "/data/wheels.json",
      snapshotOf([
        group({ kind: "release", tag: "v1.0" }, ["vllm-1.0-cp38-abi3-manylinux1_x86_64.whl"]),
      ]),
    );

    const stats = await new StatsTool().execute({
      input: "/data/wheels.json",
      output: "/data/stats.json",
      now: new Date("2024-05-02T00:00:00.000Z"),
    });

    expect(stats.total_wheels).toBe(1);
    expect(stats.source_counts.github_releases).toBe(1);
    expect(JSON.parse(String(vol.readFileSync("/data/stats.json", "utf-8")))).toEqual(stats);
  });

  it("should fail when the snapshot is missing", async () => {
    await expect(
      new StatsTool().execute({ input: "/data/wheels.json", output: "/data/stats.json" }),
    ).rejects.toBeInstanceOf(SnapshotReadError);
  });
});
