import type { RawArtifact, SourceKey, SourceKind } from "../../types";
import { NetworkError, RateLimitError, ScraperError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { isSubpath, resolveUrl } from "../../utils/url";
import type { HttpFetcher } from "../fetcher";
import { type ListingLink, artifactLinks, parseListing } from "../listing";
import type { SourceAdapter, SourceAdapterOptions } from "./types";

export interface ScanOptions {
  /** Stop at the first directory that yields artifacts */
  firstMatch?: boolean;
  /** Also list subdirectories linked from the starting directories, one level deep */
  descend?: boolean;
}

type QueueItem = {
  url: string;
  depth: number;
};

/**
 * Shared plumbing for adapters that read directory listings from the artifact host.
 */
export abstract class BaseSourceAdapter implements SourceAdapter {
  abstract readonly name: string;
  abstract readonly kind: SourceKind;

  protected readonly baseUrl: string;
  protected readonly packageName: string;

  constructor(
    protected readonly fetcher: HttpFetcher,
    options: SourceAdapterOptions,
  ) {
    this.baseUrl = options.baseUrl;
    this.packageName = options.packageName;
  }

  abstract discover(limit: number): Promise<string[]>;
  abstract listArtifacts(candidate: string): Promise<RawArtifact[]>;
  abstract toSourceKey(candidate: string): SourceKey;

  describe(candidate: string): string {
    return candidate;
  }

  protected directoryUrl(path: string): string {
    return resolveUrl(path, this.baseUrl);
  }

  /**
   * Fetches and parses one listing page. A missing directory (404) is empty.
   */
  protected async readListing(url: string): Promise<ListingLink[]> {
    try {
      const raw = await this.fetcher.fetch(url);
      return parseListing(raw.content, url);
    } catch (error) {
      if (error instanceof NetworkError && error.isNotFound) {
        logger.debug(`No listing at ${url}`);
        return [];
      }
      throw error;
    }
  }

  /**
   * Collects artifact links from `urls`, in order. A directory that fails to
   * load is skipped; the scan only fails when none of them could be read.
   */
  protected async scanDirectories(
    urls: string[],
    options: ScanOptions = {},
  ): Promise<RawArtifact[]> {
    const visited = new Set<string>();
    const queue: QueueItem[] = urls.map((url) => ({ url, depth: 0 }));
    const artifacts: RawArtifact[] = [];
    let lastError: ScraperError | undefined;
    let anyRead = false;

    for (let item = queue.shift(); item; item = queue.shift()) {
      if (visited.has(item.url)) {
        continue;
      }
      visited.add(item.url);

      let links: ListingLink[];
      try {
        links = await this.readListing(item.url);
        anyRead = true;
      } catch (error) {
        if (error instanceof RateLimitError || !(error instanceof ScraperError)) {
          throw error;
        }
        logger.debug(`Skipping listing ${item.url}: ${error.message}`);
        lastError = error;
        continue;
      }

      const found = artifactLinks(links);
      if (options.firstMatch && found.length > 0) {
        return found;
      }
      artifacts.push(...found);

      if (options.descend && item.depth === 0) {
        const parent = new URL(item.url);
        for (const link of links) {
          if (
            link.isDirectory &&
            link.url !== item.url &&
            !visited.has(link.url) &&
            isSubpath(parent, new URL(link.url))
          ) {
            queue.push({ url: link.url, depth: item.depth + 1 });
          }
        }
      }
    }

    if (!anyRead && lastError) {
      throw lastError;
    }
    return artifacts;
  }
}
