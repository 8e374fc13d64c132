import type { RawArtifact, SourceKey, SourceKind } from "../types";
import type { SourceAdapter } from "./sources";

/**
 * Which sources to scrape and how far back to look, as chosen on the command line.
 */
export interface SourceSelection {
  /** Scrape exactly this commit */
  commit?: string;
  githubReleases?: boolean;
  nightly?: boolean;
  releaseVersions?: boolean;
  allSources?: boolean;
  /** Discover commits from GitHub history instead of the host's root listing */
  useGitHub?: boolean;
  /** Package-based discovery for standard simple-index layouts */
  legacyMode?: boolean;
  maxCommits: number;
  maxReleases: number;
  maxVersions: number;
}

/**
 * An adapter scheduled to run, with its candidate bound.
 */
export interface PlannedSource {
  adapter: SourceAdapter;
  limit: number;
}

/**
 * Artifact links found for one candidate, before filename parsing.
 */
export interface DiscoveredGroup {
  key: SourceKey;
  artifacts: RawArtifact[];
}

/**
 * Outcome of running one adapter over its candidates.
 */
export interface SourceRunResult {
  source: string;
  kind: SourceKind;
  /** Candidates returned by discovery */
  candidates: number;
  /** Candidates that failed or were abandoned */
  skipped: number;
  rateLimited: boolean;
  /** One group per listed candidate, in discovery order */
  groups: DiscoveredGroup[];
}
