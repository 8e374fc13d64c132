import { DEFAULT_PACKAGE_NAME } from "../config";
import { compareVersionsDesc } from "../scraper/clients/PyPiClient";
import { isWheelRecord } from "../snapshot/SnapshotAggregator";
import { countGroups } from "../snapshot/serialization";
import { type ArtifactRecord, type Snapshot, type SourceGroup, SnapshotMode } from "../types";
import { ensureTrailingSlash } from "../utils/url";
import { installCommand } from "./install";

export interface SummaryOptions {
  /** Include URLs, and sizes of release assets */
  verbose?: boolean;
  /** Legacy snapshots only: show just the newest version of each package */
  latestOnly?: boolean;
  packageName?: string;
}

function describeRecord(record: ArtifactRecord): string {
  return record.type === "wheel"
    ? `${record.filename} (${record.pythonTag}-${record.abiTag}-${record.platformTag})`
    : `${record.filename} (${record.type})`;
}

function recordLines(record: ArtifactRecord, indent: string, verbose: boolean): string[] {
  const lines = [`${indent}${describeRecord(record)}`];
  if (verbose) {
    lines.push(`${indent}  URL: ${record.url}`);
    if (record.source.kind === "release") {
      lines.push(`${indent}  Size: ${record.size ?? "N/A"} bytes`);
    }
  }
  return lines;
}

function recordVersion(record: ArtifactRecord): string {
  return record.type === "unknown" ? "unknown" : (record.version ?? "unknown");
}

function packageLines(group: SourceGroup, options: SummaryOptions): string[] {
  const byVersion = new Map<string, ArtifactRecord[]>();
  for (const record of group.records) {
    const version = recordVersion(record);
    byVersion.set(version, [...(byVersion.get(version) ?? []), record]);
  }
  let versions = [...byVersion.keys()].sort(compareVersionsDesc);
  if (options.latestOnly) {
    versions = versions.slice(0, 1);
  }
  return versions.flatMap((version) => [
    `  Version ${version}:`,
    ...(byVersion.get(version) ?? []).flatMap((record) =>
      recordLines(record, "    ", options.verbose ?? false),
    ),
  ]);
}

function groupTitle(group: SourceGroup): string {
  const { key } = group;
  switch (key.kind) {
    case "package":
      return `Package: ${key.name}`;
    case "release":
      return `GitHub Release: ${key.tag}`;
    case "nightly":
      return "Nightly Wheels:";
    case "version":
      return `Release Version: ${key.version}`;
    case "commit":
      return `Commit: ${key.hash}`;
  }
}

function installExamples(snapshot: Snapshot, packageName: string): string[] {
  const lines: string[] = [];
  const firstWheel = (kind: SourceGroup["key"]["kind"]) =>
    snapshot.results.find((group) => group.key.kind === kind)?.records.find(isWheelRecord);

  const nightly = firstWheel("nightly");
  if (nightly) {
    lines.push("  # Install nightly wheel:", `  ${installCommand(nightly, snapshot.baseUrl, packageName)}`);
  }
  const release = firstWheel("release");
  if (release && release.source.kind === "release") {
    lines.push(
      `  # Install GitHub release wheel (${release.source.tag}):`,
      `  ${installCommand(release, snapshot.baseUrl, packageName)}`,
    );
  }
  const version = firstWheel("version");
  if (version && version.source.kind === "version") {
    lines.push(
      `  # Install release version wheel (${version.source.version}):`,
      `  ${installCommand(version, snapshot.baseUrl, packageName)}`,
    );
  }
  const commit = firstWheel("commit");
  if (commit && commit.source.kind === "commit") {
    const { hash } = commit.source;
    lines.push(
      `  # Install commit wheel (${hash.slice(0, 8)}):`,
      `  export VLLM_COMMIT=${hash}`,
      `  uv pip install ${packageName} --extra-index-url ${ensureTrailingSlash(snapshot.baseUrl)}\${VLLM_COMMIT} --torch-backend auto`,
    );
  }
  return lines.length > 0 ? ["", "Installation Examples:", ...lines] : [];
}

/**
 * Human-readable report of a snapshot: the files of every group, totals per
 * source kind and one install example per kind.
 */
export function formatResultsSummary(snapshot: Snapshot, options: SummaryOptions = {}): string[] {
  const verbose = options.verbose ?? false;
  const legacy = snapshot.mode === SnapshotMode.Legacy;
  const rule = "=".repeat(50);
  const lines = ["", rule, "RESULTS SUMMARY", rule];

  for (const group of snapshot.results) {
    lines.push("", groupTitle(group));
    if (group.key.kind === "package") {
      lines.push(...packageLines(group, options));
    } else {
      lines.push(...group.records.flatMap((record) => recordLines(record, "  ", verbose)));
    }
  }

  const records = snapshot.results.flatMap((group) => group.records);
  const totalWheels = records.filter(isWheelRecord).length;
  const counts = countGroups(snapshot.results);

  lines.push("", "Summary:");
  if (legacy) {
    lines.push(`  Packages: ${snapshot.results.length}`);
  } else {
    if (counts.commits > 0) lines.push(`  Commits: ${counts.commits}`);
    if (counts.githubReleases > 0) lines.push(`  GitHub Releases: ${counts.githubReleases}`);
    if (counts.nightly > 0) lines.push(`  Nightly Wheels: ${counts.nightly}`);
    if (counts.releaseVersions > 0) lines.push(`  Release Versions: ${counts.releaseVersions}`);
  }
  lines.push(
    `  Total files: ${records.length}`,
    `  Wheel files: ${totalWheels}`,
    `  Source files: ${records.length - totalWheels}`,
  );

  if (totalWheels > 0) {
    lines.push(...installExamples(snapshot, options.packageName ?? DEFAULT_PACKAGE_NAME));
  }
  return lines;
}
