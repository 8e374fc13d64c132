import type { RawArtifact, SourceKey } from "../../types";
import { ScraperError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import type { GitHubClient, GitHubRelease } from "../clients";
import type { SourceAdapter } from "./types";

const isWheelAsset = (name: string) => name.endsWith(".whl");

/**
 * Wheels attached to GitHub releases. Assets come straight from the API,
 * so no listing pages are read.
 */
export class ReleaseSourceAdapter implements SourceAdapter {
  readonly name = "GitHub releases";
  readonly kind = "release";

  private readonly releases = new Map<string, GitHubRelease>();

  constructor(private readonly github: GitHubClient) {}

  async discover(limit: number): Promise<string[]> {
    const releases = await this.github.listReleases(limit);
    const withWheels = releases.filter((release) =>
      release.assets.some((asset) => isWheelAsset(asset.name)),
    );
    for (const release of withWheels) {
      this.releases.set(release.tagName, release);
    }
    logger.info(`Found ${withWheels.length} releases with wheel assets from GitHub`);
    return withWheels.map((release) => release.tagName);
  }

  async listArtifacts(tag: string): Promise<RawArtifact[]> {
    const release = this.releases.get(tag);
    if (!release) {
      throw new ScraperError(`Release ${tag} was not discovered`);
    }
    logger.info(`Release: ${release.tagName} (${release.name ?? release.tagName})`);
    logger.info(`  Published: ${release.publishedAt ?? "unknown"}`);
    logger.info(`  Prerelease: ${release.prerelease}`);

    return release.assets
      .filter((asset) => isWheelAsset(asset.name))
      .map((asset) => ({ filename: asset.name, url: asset.downloadUrl, size: asset.size }));
  }

  toSourceKey(tag: string): SourceKey {
    return { kind: "release", tag };
  }

  describe(tag: string): string {
    return tag;
  }
}
