import * as cheerio from "cheerio";
import type { RawArtifact } from "../types";
import { ParsingError } from "../utils/errors";
import { logger } from "../utils/logger";
import { filenameFromHref } from "../utils/url";
import { isArtifactFilename } from "./artifactFilename";

/**
 * An anchor found on a directory listing page.
 */
export interface ListingLink {
  /** The raw href attribute */
  href: string;
  /** The href resolved against the listing URL */
  url: string;
  /** File name the href points at; empty for directory links */
  filename: string;
  isDirectory: boolean;
}

/**
 * Extracts every `<a href>` from an index page, in document order.
 * Links are resolved against `listingUrl`; repeated targets are kept once and
 * non-http(s) links are dropped.
 *
 * @throws {ParsingError} If the markup cannot be loaded
 */
export function parseListing(html: string, listingUrl: string): ListingLink[] {
  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch (error) {
    throw new ParsingError(
      `Invalid listing markup at ${listingUrl}`,
      error instanceof Error ? error : undefined,
    );
  }

  const links: ListingLink[] = [];
  const seen = new Set<string>();
  $("a[href]").each((_index, element) => {
    const href = $(element).attr("href")?.trim();
    if (!href) {
      return;
    }

    let url: URL;
    try {
      url = new URL(href, listingUrl);
    } catch {
      logger.debug(`Ignoring invalid URL syntax: ${href}`);
      return;
    }
    if (!["http:", "https:"].includes(url.protocol) || seen.has(url.href)) {
      return;
    }
    seen.add(url.href);

    const path = href.split(/[?#]/)[0];
    links.push({
      href,
      url: url.href,
      filename: filenameFromHref(href),
      isDirectory: path.endsWith("/"),
    });
  });

  logger.debug(`Extracted ${links.length} links from ${listingUrl}`);
  return links;
}

/**
 * Keeps the links that point at wheels or source archives.
 */
export function artifactLinks(links: ListingLink[]): RawArtifact[] {
  return links
    .filter(
      (link) =>
        !link.isDirectory &&
        link.filename !== "." &&
        link.filename !== ".." &&
        isArtifactFilename(link.filename),
    )
    .map((link) => ({ filename: link.filename, url: link.url }));
}
