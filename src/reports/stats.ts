import { isWheelRecord } from "../snapshot/SnapshotAggregator";
import { countGroups } from "../snapshot/serialization";
import type { Snapshot, StatsSummary } from "../types";

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Aggregate counts over a snapshot for the browsing page.
 */
export function computeStats(snapshot: Snapshot, now: Date = new Date()): StatsSummary {
  const counts = countGroups(snapshot.results);
  const stats: StatsSummary = {
    last_updated: now.toISOString(),
    total_sources: snapshot.results.length,
    total_files: 0,
    total_wheels: 0,
    source_counts: {
      commits: counts.commits,
      github_releases: counts.githubReleases,
      nightly: counts.nightly,
      release_versions: counts.releaseVersions,
      packages: counts.packages,
    },
    python_versions: {},
    platforms: {},
  };

  for (const { records } of snapshot.results) {
    stats.total_files += records.length;
    for (const wheel of records.filter(isWheelRecord)) {
      stats.total_wheels++;
      increment(stats.python_versions, wheel.pythonTag);
      increment(stats.platforms, wheel.platformTag);
    }
  }
  return stats;
}
