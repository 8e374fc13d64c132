import { describe, expect, it } from "vitest";
import { TEST_SCRAPE_TIME, group, record, snapshotOf } from "../test-utils/snapshots";
import { toCsv } from "./csv";

const HEADER =
  "filename,source_type,source_info,version,python_tag,abi_tag,platform_tag,url,install_command,commit,release_tag,size,scraped_at";

describe("toCsv", () => {
  it("should write only the header when there are no wheels", () => {
    const snapshot = snapshotOf([group({ kind: "nightly" }, ["vllm-1.0.tar.gz"])]);
    expect(toCsv(snapshot)).toBe(`${HEADER}\n`);
  });

  it("should write one row per wheel with provenance columns", () => {
    const hash = "d".repeat(40);
    const release = { kind: "release", tag: "v0.9.2" } as const;
    const snapshot = snapshotOf([
      {
        key: release,
        records: [record("vllm-0.9.2-cp38-abi3-manylinux1_x86_64.whl", release, "rel", 1024)],
      },
      group({ kind: "commit", hash }, ["vllm-0.9.2-cp38-abi3-manylinux1_x86_64.whl", "vllm-0.9.2.tar.gz"], hash),
    ]);

    const lines = toCsv(snapshot).trimEnd().split("\n");
    expect(lines).toEqual([
      HEADER,
      [
        "vllm-0.9.2-cp38-abi3-manylinux1_x86_64.whl",
        "github_release",
        "v0.9.2",
        "0.9.2",
        "cp38",
        "abi3",
        "manylinux1_x86_64",
        "https://wheels.example.com/rel/vllm-0.9.2-cp38-abi3-manylinux1_x86_64.whl",
        "uv pip install https://wheels.example.com/rel/vllm-0.9.2-cp38-abi3-manylinux1_x86_64.whl --torch-backend auto",
        "",
        "v0.9.2",
        "1024",
        TEST_SCRAPE_TIME,
      ].join(","),
      [
        "vllm-0.9.2-cp38-abi3-manylinux1_x86_64.whl",
        "commit",
        hash,
        "0.9.2",
        "cp38",
        "abi3",
        "manylinux1_x86_64",
        `https://wheels.example.com/${hash}/vllm-0.9.2-cp38-abi3-manylinux1_x86_64.whl`,
        `uv pip install vllm --extra-index-url https://wheels.example.com/${hash} --torch-backend auto`,
        hash,
        "",
        "",
        TEST_SCRAPE_TIME,
      ].join(","),
    ]);
  });

  it("should build install commands against an overriding base URL", () => {
    const snapshot = snapshotOf([
      group({ kind: "nightly" }, ["vllm-1.0.0.dev1-cp38-abi3-manylinux1_x86_64.whl"]),
    ]);
    const row = toCsv(snapshot, { baseUrl: "https://mirror.example.org/" }).split("\n")[1];
    expect(row).toContain(
      ",uv pip install vllm --extra-index-url https://mirror.example.org/nightly --torch-backend auto,",
    );
  });
});
