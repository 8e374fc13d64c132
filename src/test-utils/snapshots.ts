import { toArtifactRecord } from "../snapshot/SnapshotAggregator";
import { countGroups } from "../snapshot/serialization";
import { type ArtifactRecord, type Snapshot, type SourceGroup, type SourceKey, SnapshotMode } from "../types";

export const TEST_BASE_URL = "https://wheels.example.com/";
export const TEST_SCRAPE_TIME = "2024-05-01T12:00:00.000Z";

/**
 * A record for `filename`, hosted under `<base>/<dir>/`.
 */
export function record(filename: string, source: SourceKey, dir = "files", size?: number): ArtifactRecord {
  return toArtifactRecord(
    { filename, url: `${TEST_BASE_URL}${dir}/${filename}`, ...(size !== undefined ? { size } : {}) },
    source,
  );
}

export function group(key: SourceKey, filenames: string[], dir?: string): SourceGroup {
  return { key, records: filenames.map((filename) => record(filename, key, dir)) };
}

export function snapshotOf(results: SourceGroup[], mode: SnapshotMode = SnapshotMode.MultiSource): Snapshot {
  return {
    scrapeTime: TEST_SCRAPE_TIME,
    baseUrl: TEST_BASE_URL,
    mode,
    sources: countGroups(results),
    results,
  };
}
