import { z } from "zod";
import { GITHUB_API_URL, GITHUB_MAX_PER_PAGE } from "../../config";
import { logger } from "../../utils/logger";
import { resolveUrl } from "../../utils/url";
import type { HttpFetcher } from "../fetcher";

const commitListSchema = z.array(z.object({ sha: z.string() }));

const releaseAssetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string(),
  size: z.number(),
});

const releaseListSchema = z.array(
  z.object({
    tag_name: z.string(),
    name: z.string().nullish(),
    published_at: z.string().nullish(),
    prerelease: z.boolean().default(false),
    assets: z.array(releaseAssetSchema).default([]),
  }),
);

export interface GitHubReleaseAsset {
  name: string;
  downloadUrl: string;
  size: number;
}

export interface GitHubRelease {
  tagName: string;
  name?: string;
  publishedAt?: string;
  prerelease: boolean;
  assets: GitHubReleaseAsset[];
}

export interface GitHubClientOptions {
  /** Repository as `owner/name` */
  repo: string;
  apiUrl?: string;
}

/**
 * Reads commit history and releases from the GitHub REST API (unauthenticated).
 */
export class GitHubClient {
  private readonly repo: string;
  private readonly apiUrl: string;

  constructor(
    private readonly fetcher: HttpFetcher,
    options: GitHubClientOptions,
  ) {
    this.repo = options.repo;
    this.apiUrl = options.apiUrl ?? GITHUB_API_URL;
  }

  private endpoint(resource: string, limit: number): string {
    const perPage = Math.max(1, Math.min(limit, GITHUB_MAX_PER_PAGE));
    return resolveUrl(`repos/${this.repo}/${resource}?per_page=${perPage}`, this.apiUrl);
  }

  private get headers(): Record<string, string> {
    return { Accept: "application/vnd.github.v3+json" };
  }

  /**
   * Lists the SHAs of the most recent commits on the default branch, newest first.
   */
  async listCommits(limit: number): Promise<string[]> {
    logger.info(`Fetching recent commits from GitHub for ${this.repo}`);
    const commits = await this.fetcher.fetchJson(
      this.endpoint("commits", limit),
      commitListSchema,
      { headers: this.headers },
    );
    const shas = commits.slice(0, limit).map((commit) => commit.sha);
    logger.info(`Found ${shas.length} recent commits from GitHub`);
    return shas;
  }

  /**
   * Lists the most recent releases with their attached assets, newest first.
   */
  async listReleases(limit: number): Promise<GitHubRelease[]> {
    logger.info(`Fetching releases from GitHub for ${this.repo}`);
    const releases = await this.fetcher.fetchJson(
      this.endpoint("releases", limit),
      releaseListSchema,
      { headers: this.headers },
    );
    return releases.slice(0, limit).map((release) => ({
      tagName: release.tag_name,
      name: release.name ?? undefined,
      publishedAt: release.published_at ?? undefined,
      prerelease: release.prerelease,
      assets: release.assets.map((asset) => ({
        name: asset.name,
        downloadUrl: asset.browser_download_url,
        size: asset.size,
      })),
    }));
  }
}
