import {
  FALLBACK_COMMIT_PROBES,
  GITHUB_MAX_PER_PAGE,
  MIN_LISTED_COMMITS,
} from "../../config";
import type { RawArtifact, SourceKey } from "../../types";
import { RateLimitError, ScraperError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import type { GitHubClient } from "../clients";
import type { HttpFetcher } from "../fetcher";
import { BaseSourceAdapter } from "./BaseSourceAdapter";
import type { SourceAdapterOptions } from "./types";

const COMMIT_HASH = /^[a-f0-9]{40}$/;

export interface CommitSourceOptions extends SourceAdapterOptions {
  /** Discover commits from GitHub history only, keeping those with artifacts */
  useGitHub?: boolean;
  /** Scrape exactly this commit, skipping discovery */
  commit?: string;
}

/**
 * Per-commit builds published under `<base>/<sha>/` and `<base>/<sha>/<package>/`.
 */
export class CommitSourceAdapter extends BaseSourceAdapter {
  readonly name = "commit wheels";
  readonly kind = "commit";

  private readonly useGitHub: boolean;
  private readonly commit?: string;
  /** Listings already fetched while probing, reused by listArtifacts */
  private readonly listings = new Map<string, RawArtifact[]>();

  constructor(
    fetcher: HttpFetcher,
    private readonly github: GitHubClient,
    options: CommitSourceOptions,
  ) {
    super(fetcher, options);
    this.useGitHub = options.useGitHub ?? false;
    this.commit = options.commit;
  }

  async discover(limit: number): Promise<string[]> {
    if (this.commit) {
      return [this.commit];
    }

    if (this.useGitHub) {
      const recent = await this.github.listCommits(limit);
      logger.info("Testing commits for wheel availability...");
      return this.probe(recent);
    }

    const listed = await this.listHostedCommits();
    let commits = listed;
    if (listed.length < MIN_LISTED_COMMITS) {
      logger.info("Found few commits from server, trying GitHub API...");
      try {
        const recent = await this.github.listCommits(GITHUB_MAX_PER_PAGE);
        const available = await this.probe(recent.slice(0, FALLBACK_COMMIT_PROBES));
        commits = [...new Set([...listed, ...available])];
        logger.info(`Total commits with wheels: ${commits.length}`);
      } catch (error) {
        if (!(error instanceof ScraperError)) {
          throw error;
        }
        logger.warn(`⚠️ Could not fetch commits from GitHub: ${error.message}`);
      }
    }

    if (commits.length > limit) {
      logger.info(`Limiting to ${limit} most recent commits`);
      commits = commits.slice(0, limit);
    }
    return commits;
  }

  async listArtifacts(commit: string): Promise<RawArtifact[]> {
    const cached = this.listings.get(commit);
    if (cached) {
      return cached;
    }
    const artifacts = await this.scanDirectories(
      [this.directoryUrl(`${commit}/`), this.directoryUrl(`${commit}/${this.packageName}/`)],
      { descend: true },
    );
    this.listings.set(commit, artifacts);
    return artifacts;
  }

  toSourceKey(commit: string): SourceKey {
    return { kind: "commit", hash: commit };
  }

  describe(commit: string): string {
    return commit.slice(0, 8);
  }

  /**
   * Commit directories linked from the artifact host root.
   */
  private async listHostedCommits(): Promise<string[]> {
    logger.info(`Discovering commits from ${this.baseUrl}`);
    try {
      const links = await this.readListing(this.baseUrl);
      const commits = links
        .map((link) => link.href.replace(/\/+$/, ""))
        .filter((href) => COMMIT_HASH.test(href));
      logger.info(`Found ${commits.length} commits from wheels server`);
      return commits;
    } catch (error) {
      if (error instanceof RateLimitError || !(error instanceof ScraperError)) {
        throw error;
      }
      logger.warn(`⚠️ Could not fetch root index: ${error.message}`);
      return [];
    }
  }

  /**
   * Keeps the commits whose directories contain at least one artifact.
   */
  private async probe(commits: string[]): Promise<string[]> {
    const available: string[] = [];
    for (const commit of commits) {
      let artifacts: RawArtifact[] = [];
      try {
        artifacts = await this.listArtifacts(commit);
      } catch (error) {
        if (error instanceof RateLimitError || !(error instanceof ScraperError)) {
          throw error;
        }
        logger.debug(`Probe failed for commit ${this.describe(commit)}: ${error.message}`);
      }
      if (artifacts.length > 0) {
        available.push(commit);
        logger.info(`  ✓ Found wheels for commit ${this.describe(commit)}`);
      } else {
        logger.info(`  ✗ No wheels for commit ${this.describe(commit)}`);
      }
    }
    return available;
  }
}
