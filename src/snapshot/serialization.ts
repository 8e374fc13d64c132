import { z } from "zod";
import {
  type ArtifactRecord,
  type ArtifactType,
  type Snapshot,
  type SourceCounts,
  type SourceGroup,
  type SourceKey,
  SnapshotMode,
} from "../types";
import { formatSourceKey, parseSourceKey } from "./sourceKey";

/**
 * An artifact record as stored in `wheels.json`.
 */
export interface ArtifactRecordJson {
  filename: string;
  type: ArtifactType;
  name?: string;
  version?: string;
  build_tag?: string;
  python_tag?: string;
  abi_tag?: string;
  platform_tag?: string;
  url: string;
  size?: number;
  /** Provenance, depending on the source kind */
  commit?: string;
  source?: "github_release" | "release_version" | "nightly" | "package";
  release_tag?: string;
  version_directory?: string;
}

export interface SourceCountsJson {
  commits: number;
  github_releases: number;
  nightly: number;
  release_versions: number;
  packages: number;
}

export interface SnapshotJson {
  scrape_time: string;
  base_url: string;
  mode: SnapshotMode;
  sources: SourceCountsJson;
  results: Record<string, ArtifactRecordJson[]>;
}

function provenanceJson(key: SourceKey): Partial<ArtifactRecordJson> {
  switch (key.kind) {
    case "commit":
      return { commit: key.hash };
    case "release":
      return { source: "github_release", release_tag: key.tag };
    case "version":
      return { source: "release_version", version_directory: key.version };
    case "nightly":
      return { source: "nightly" };
    case "package":
      return { source: "package" };
  }
}

function packagingJson(record: ArtifactRecord): Partial<ArtifactRecordJson> {
  switch (record.type) {
    case "wheel":
      return {
        name: record.name,
        version: record.version,
        ...(record.buildTag ? { build_tag: record.buildTag } : {}),
        python_tag: record.pythonTag,
        abi_tag: record.abiTag,
        platform_tag: record.platformTag,
      };
    case "source":
      return {
        ...(record.name ? { name: record.name } : {}),
        ...(record.version ? { version: record.version } : {}),
      };
    case "unknown":
      return {};
  }
}

export function recordToJson(record: ArtifactRecord): ArtifactRecordJson {
  return {
    filename: record.filename,
    type: record.type,
    ...packagingJson(record),
    url: record.url,
    ...(record.size !== undefined ? { size: record.size } : {}),
    ...provenanceJson(record.source),
  };
}

function countsToJson(counts: SourceCounts): SourceCountsJson {
  return {
    commits: counts.commits,
    github_releases: counts.githubReleases,
    nightly: counts.nightly,
    release_versions: counts.releaseVersions,
    packages: counts.packages,
  };
}

/**
 * Converts a snapshot to its wire shape. Groups sharing a key are concatenated.
 */
export function toSnapshotJson(snapshot: Snapshot): SnapshotJson {
  const results: Record<string, ArtifactRecordJson[]> = {};
  for (const group of snapshot.results) {
    const key = formatSourceKey(group.key);
    const records = group.records.map(recordToJson);
    results[key] = results[key] ? [...results[key], ...records] : records;
  }
  return {
    scrape_time: snapshot.scrapeTime,
    base_url: snapshot.baseUrl,
    mode: snapshot.mode,
    sources: countsToJson(snapshot.sources),
    results,
  };
}

const provenanceFields = {
  url: z.string(),
  size: z.number().nullish(),
  commit: z.string().nullish(),
  source: z.enum(["github_release", "release_version", "nightly", "package"]).nullish(),
  release_tag: z.string().nullish(),
  version_directory: z.string().nullish(),
};

const recordJsonSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("wheel"),
    filename: z.string(),
    name: z.string(),
    version: z.string(),
    build_tag: z.string().nullish(),
    python_tag: z.string(),
    abi_tag: z.string(),
    platform_tag: z.string(),
    ...provenanceFields,
  }),
  z.object({
    type: z.literal("source"),
    filename: z.string(),
    name: z.string().nullish(),
    version: z.string().nullish(),
    ...provenanceFields,
  }),
  z.object({
    type: z.literal("unknown"),
    filename: z.string(),
    ...provenanceFields,
  }),
]);

const countSchema = z.number().int().nonnegative().default(0);

export const snapshotJsonSchema = z.object({
  scrape_time: z.string(),
  base_url: z.string(),
  mode: z.nativeEnum(SnapshotMode),
  sources: z
    .object({
      commits: countSchema,
      github_releases: countSchema,
      nightly: countSchema,
      release_versions: countSchema,
      packages: countSchema,
    })
    .optional(),
  results: z.record(z.array(recordJsonSchema)),
});

type RecordJson = z.infer<typeof recordJsonSchema>;

function recordFromJson(json: RecordJson, source: SourceKey): ArtifactRecord {
  const provenance = {
    url: json.url,
    source,
    ...(json.size != null ? { size: json.size } : {}),
  };
  switch (json.type) {
    case "wheel":
      return {
        type: "wheel",
        filename: json.filename,
        name: json.name,
        version: json.version,
        ...(json.build_tag ? { buildTag: json.build_tag } : {}),
        pythonTag: json.python_tag,
        abiTag: json.abi_tag,
        platformTag: json.platform_tag,
        ...provenance,
      };
    case "source":
      return {
        type: "source",
        filename: json.filename,
        ...(json.name ? { name: json.name } : {}),
        ...(json.version ? { version: json.version } : {}),
        ...provenance,
      };
    case "unknown":
      return { type: "unknown", filename: json.filename, ...provenance };
  }
}

/**
 * Source key of a stored group, read from the provenance its first record
 * carries. The wire key's prefix decides only when no record says.
 */
function groupKeyFromJson(rawKey: string, records: RecordJson[], mode: SnapshotMode): SourceKey {
  const first = records[0];
  if (!first) {
    return parseSourceKey(rawKey, mode);
  }
  if (first.commit) {
    return { kind: "commit", hash: first.commit };
  }
  switch (first.source) {
    case "github_release":
      return first.release_tag
        ? { kind: "release", tag: first.release_tag }
        : parseSourceKey(rawKey);
    case "release_version":
      return first.version_directory
        ? { kind: "version", version: first.version_directory }
        : parseSourceKey(rawKey);
    case "nightly":
      return { kind: "nightly" };
    case "package":
      return { kind: "package", name: rawKey };
    default:
      return parseSourceKey(rawKey, mode);
  }
}

function countGroups(groups: readonly SourceGroup[]): SourceCounts {
  const counts: SourceCounts = {
    commits: 0,
    githubReleases: 0,
    nightly: 0,
    releaseVersions: 0,
    packages: 0,
  };
  for (const { key } of groups) {
    switch (key.kind) {
      case "commit":
        counts.commits++;
        break;
      case "release":
        counts.githubReleases++;
        break;
      case "version":
        counts.releaseVersions++;
        break;
      case "nightly":
        counts.nightly++;
        break;
      case "package":
        counts.packages++;
        break;
    }
  }
  return counts;
}

/**
 * Validates a parsed `wheels.json` document and converts it to a Snapshot.
 * Source counts missing from older files are recomputed from the groups.
 *
 * @throws {z.ZodError} If the document does not have the snapshot shape
 */
export function fromSnapshotJson(json: unknown): Snapshot {
  const parsed = snapshotJsonSchema.parse(json);
  const results: SourceGroup[] = Object.entries(parsed.results).map(([rawKey, records]) => {
    const key = groupKeyFromJson(rawKey, records, parsed.mode);
    return { key, records: records.map((record) => recordFromJson(record, key)) };
  });
  const sources = parsed.sources
    ? {
        commits: parsed.sources.commits,
        githubReleases: parsed.sources.github_releases,
        nightly: parsed.sources.nightly,
        releaseVersions: parsed.sources.release_versions,
        packages: parsed.sources.packages,
      }
    : countGroups(results);

  return {
    scrapeTime: parsed.scrape_time,
    baseUrl: parsed.base_url,
    mode: parsed.mode,
    sources,
    results,
  };
}

export { countGroups };
