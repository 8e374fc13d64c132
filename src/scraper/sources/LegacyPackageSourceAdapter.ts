import type { RawArtifact, SourceKey } from "../../types";
import { RateLimitError, ScraperError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { isArtifactFilename } from "../artifactFilename";
import { BaseSourceAdapter } from "./BaseSourceAdapter";

/** Index pages that may list package directories on a PyPI-style host */
const INDEX_PATHS = ["", "simple/", "nightly/", "cu118/", "cu121/", "cu124/", "cu126/", "cpu/"];

/**
 * Package-based discovery for hosts laid out like a standard simple index.
 */
export class LegacyPackageSourceAdapter extends BaseSourceAdapter {
  readonly name = "packages";
  readonly kind = "package";

  async discover(limit: number): Promise<string[]> {
    logger.info(`Discovering packages from ${this.baseUrl}`);
    const packages = new Set<string>();

    for (const path of INDEX_PATHS) {
      const indexUrl = this.directoryUrl(path);
      logger.info(`Checking index: ${indexUrl}`);

      let found = 0;
      try {
        for (const link of await this.readListing(indexUrl)) {
          const name = this.packageNameFromHref(link.href);
          if (name) {
            packages.add(name);
            found++;
          }
        }
      } catch (error) {
        if (error instanceof RateLimitError || !(error instanceof ScraperError)) {
          throw error;
        }
        logger.debug(`Skipping index ${indexUrl}: ${error.message}`);
        continue;
      }
      if (found > 0) {
        logger.info(`  Found ${found} packages in ${path || "/"}`);
      }
    }

    return [...packages].slice(0, limit);
  }

  async listArtifacts(name: string): Promise<RawArtifact[]> {
    return this.scanDirectories(
      [
        this.directoryUrl(`simple/${name}/`),
        this.directoryUrl(`nightly/${name}/`),
        this.directoryUrl(`${name}/`),
      ],
      { firstMatch: true },
    );
  }

  toSourceKey(name: string): SourceKey {
    return { kind: "package", name };
  }

  /**
   * Package directories are relative, non-file links; anything else yields undefined.
   */
  private packageNameFromHref(href: string): string | undefined {
    const path = href.split(/[?#]/)[0];
    if (/^https?:/i.test(path) || isArtifactFilename(path)) {
      return undefined;
    }
    const name = path.replace(/\/+$/, "");
    if (!name || name === "." || name === ".." || name.includes("/")) {
      return undefined;
    }
    return name;
  }
}
