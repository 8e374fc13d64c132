/**
 * Identifies the discovery origin of a group of artifacts.
 * The prefixed string forms (`release_<tag>`, `version_<v>`) only exist on the wire.
 */
export type SourceKey =
  | { kind: "commit"; hash: string }
  | { kind: "release"; tag: string }
  | { kind: "version"; version: string }
  | { kind: "nightly" }
  | { kind: "package"; name: string };

export type SourceKind = SourceKey["kind"];

/**
 * A link to a downloadable file as reported by a source, before filename parsing.
 */
export interface RawArtifact {
  filename: string;
  url: string;
  /** Size in bytes, when the source reports it */
  size?: number;
}

export interface WheelArtifact {
  type: "wheel";
  filename: string;
  name: string;
  /** Percent-decoded version, e.g. `0.6.1.post1+cu118` */
  version: string;
  buildTag?: string;
  pythonTag: string;
  abiTag: string;
  platformTag: string;
}

export interface SourceDistArtifact {
  type: "source";
  filename: string;
  name?: string;
  version?: string;
}

/** A `.whl` link whose name does not follow the wheel filename convention */
export interface UnknownArtifact {
  type: "unknown";
  filename: string;
}

export type ParsedArtifact = WheelArtifact | SourceDistArtifact | UnknownArtifact;

export type ArtifactType = ParsedArtifact["type"];

export interface ArtifactProvenance {
  url: string;
  source: SourceKey;
  size?: number;
}

export type ArtifactRecord = Readonly<ParsedArtifact & ArtifactProvenance>;

export type WheelRecord = Extract<ArtifactRecord, { type: "wheel" }>;

export interface SourceGroup {
  key: SourceKey;
  records: readonly ArtifactRecord[];
}

/**
 * Label recorded in the snapshot describing which sources were selected.
 */
export enum SnapshotMode {
  Legacy = "legacy",
  SingleCommit = "single-commit",
  GitHubReleases = "github-releases",
  Nightly = "nightly",
  MultiSource = "multi-source",
}

export interface SourceCounts {
  commits: number;
  githubReleases: number;
  nightly: number;
  releaseVersions: number;
  packages: number;
}

/**
 * The full result set of one scrape. Replaced on every run, never merged.
 */
export interface Snapshot {
  /** ISO 8601 capture time */
  scrapeTime: string;
  baseUrl: string;
  mode: SnapshotMode;
  sources: SourceCounts;
  /** Groups in the order their adapters ran */
  results: readonly SourceGroup[];
}

/**
 * Summary written to `data/stats.json` for the browsing page.
 */
export interface StatsSummary {
  last_updated: string;
  total_sources: number;
  total_files: number;
  total_wheels: number;
  source_counts: {
    commits: number;
    github_releases: number;
    nightly: number;
    release_versions: number;
    packages: number;
  };
  python_versions: Record<string, number>;
  platforms: Record<string, number>;
}
