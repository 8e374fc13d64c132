import type { RawArtifact, SourceKey, SourceKind } from "../../types";

/**
 * A discovery origin for artifacts: enumerates candidate identifiers
 * (commit hashes, release tags, versions, package names) and lists the
 * files published for each.
 */
export interface SourceAdapter {
  /** Human-readable source name used in logs, e.g. "GitHub releases" */
  readonly name: string;
  readonly kind: SourceKind;

  /**
   * Returns at most `limit` candidate identifiers, newest first where the source has an order.
   */
  discover(limit: number): Promise<string[]>;

  /**
   * Lists the artifact links published for one candidate, in listing order.
   */
  listArtifacts(candidate: string): Promise<RawArtifact[]>;

  toSourceKey(candidate: string): SourceKey;

  /** Short label for progress logs */
  describe(candidate: string): string;
}

export interface SourceAdapterOptions {
  /** Artifact host root, with a trailing slash */
  baseUrl: string;
  /** Package subdirectory name on the artifact host */
  packageName: string;
}
