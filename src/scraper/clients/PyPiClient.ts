import semver from "semver";
import { z } from "zod";
import { PYPI_API_URL } from "../../config";
import { logger } from "../../utils/logger";
import { resolveUrl } from "../../utils/url";
import type { HttpFetcher } from "../fetcher";

const projectSchema = z.object({
  releases: z.record(z.array(z.unknown())),
});

const PRE_RELEASE_RANK: Record<string, number> = {
  a: 0,
  alpha: 0,
  b: 1,
  beta: 1,
  c: 2,
  rc: 2,
  pre: 2,
  preview: 2,
};

/**
 * Ascending sort key for the pre, post and dev segments that follow the
 * release numbers: `1.0.dev1 < 1.0a1 < 1.0b1 < 1.0rc1 < 1.0 < 1.0.post1`.
 */
function suffixKey(version: string): number[] {
  const suffix = version
    .toLowerCase()
    .replace(/\+.*$/, "")
    .replace(/^v?\d+(?:\.\d+)*/, "");
  const pre = /(alpha|beta|preview|pre|rc|a|b|c)[._-]?(\d*)/.exec(suffix);
  const post = /(?:post|rev|r)(?![a-z])[._-]?(\d*)/.exec(suffix);
  const dev = /dev[._-]?(\d*)/.exec(suffix);

  let preRank = 3;
  if (pre) {
    preRank = PRE_RELEASE_RANK[pre[1] ?? ""] ?? 3;
  } else if (dev && !post) {
    preRank = -1;
  }
  return [
    preRank,
    pre ? Number(pre[2] || 0) : 0,
    post ? Number(post[1] || 0) : -1,
    dev ? Number(dev[1] || 0) : Number.POSITIVE_INFINITY,
  ];
}

/**
 * Orders versions newest first. PEP 440 strings are coerced to their
 * `major.minor.patch` core; equal cores are ranked by their pre, post and
 * dev segments, so `0.9.2` sorts before `0.9.2rc1` and after `0.9.2.post1`.
 * Strings with no numeric core sort last.
 */
export function compareVersionsDesc(a: string, b: string): number {
  const coreA = semver.coerce(a);
  const coreB = semver.coerce(b);
  if (coreA && coreB) {
    const order = semver.rcompare(coreA, coreB);
    if (order !== 0) {
      return order;
    }
    const keyA = suffixKey(a);
    const keyB = suffixKey(b);
    for (let i = 0; i < keyA.length; i++) {
      const partA = keyA[i] ?? 0;
      const partB = keyB[i] ?? 0;
      if (partA !== partB) {
        return partA < partB ? 1 : -1;
      }
    }
  } else if (coreA || coreB) {
    return coreA ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? 1 : -1;
}

/**
 * Reads a project's published versions from the PyPI JSON API.
 */
export class PyPiClient {
  constructor(
    private readonly fetcher: HttpFetcher,
    private readonly apiUrl: string = PYPI_API_URL,
  ) {}

  /**
   * Lists every released version of `packageName`, newest first.
   */
  async listVersions(packageName: string): Promise<string[]> {
    logger.info(`Fetching versions from PyPI for ${packageName}`);
    const project = await this.fetcher.fetchJson(
      resolveUrl(`${encodeURIComponent(packageName)}/json`, this.apiUrl),
      projectSchema,
    );
    const versions = Object.keys(project.releases).sort(compareVersionsDesc);
    logger.info(`Found ${versions.length} versions from PyPI`);
    return versions;
  }
}
