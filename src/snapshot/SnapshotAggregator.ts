import { parseArtifactFilename } from "../scraper/artifactFilename";
import type { DiscoveredGroup, SourceRunResult } from "../scraper/types";
import type {
  ArtifactRecord,
  RawArtifact,
  Snapshot,
  SnapshotMode,
  SourceGroup,
  SourceKey,
  WheelRecord,
} from "../types";
import { countGroups } from "./serialization";

export interface SnapshotAggregatorOptions {
  baseUrl: string;
  mode: SnapshotMode;
  /** Drop every record that is not a wheel */
  wheelsOnly?: boolean;
}

export function toArtifactRecord(artifact: RawArtifact, source: SourceKey): ArtifactRecord {
  return {
    ...parseArtifactFilename(artifact.filename),
    url: artifact.url,
    source,
    ...(artifact.size !== undefined ? { size: artifact.size } : {}),
  };
}

export function isWheelRecord(record: ArtifactRecord): record is WheelRecord {
  return record.type === "wheel";
}

/**
 * Builds the Snapshot from adapter outputs. Groups keep run order and records
 * keep listing order; groups left without records are dropped.
 */
export class SnapshotAggregator {
  constructor(private readonly options: SnapshotAggregatorOptions) {}

  aggregate(results: readonly SourceRunResult[], now: Date = new Date()): Snapshot {
    const groups = results
      .flatMap((result) => result.groups)
      .map((group) => this.toSourceGroup(group))
      .filter((group) => group.records.length > 0);

    return {
      scrapeTime: now.toISOString(),
      baseUrl: this.options.baseUrl,
      mode: this.options.mode,
      sources: countGroups(groups),
      results: groups,
    };
  }

  private toSourceGroup({ key, artifacts }: DiscoveredGroup): SourceGroup {
    const records = artifacts.map((artifact) => toArtifactRecord(artifact, key));
    return {
      key,
      records: this.options.wheelsOnly ? records.filter(isWheelRecord) : records,
    };
  }
}
