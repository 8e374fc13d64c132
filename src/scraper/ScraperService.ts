import { RateLimitError, ScraperError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { PlannedSource, SourceRunResult } from "./types";

function banner(title: string): string {
  const rule = "=".repeat(50);
  return `\n${rule}\nSCRAPING ${title.toUpperCase()}\n${rule}`;
}

function resetHint(error: RateLimitError): string {
  return error.resetAt ? ` (quota resets at ${error.resetAt.toISOString()})` : "";
}

/**
 * Runs source adapters one after another, one request at a time.
 *
 * A candidate that fails to list is skipped; a rate limit abandons the rest of
 * that adapter's candidates. Neither aborts the run. Errors that are not
 * ScraperErrors propagate.
 */
export class ScraperService {
  async run(plan: PlannedSource[]): Promise<SourceRunResult[]> {
    const results: SourceRunResult[] = [];
    for (const planned of plan) {
      results.push(await this.runSource(planned));
    }
    return results;
  }

  async runSource({ adapter, limit }: PlannedSource): Promise<SourceRunResult> {
    logger.info(banner(adapter.name));
    const result: SourceRunResult = {
      source: adapter.name,
      kind: adapter.kind,
      candidates: 0,
      skipped: 0,
      rateLimited: false,
      groups: [],
    };

    let candidates: string[];
    try {
      candidates = await adapter.discover(limit);
    } catch (error) {
      if (error instanceof RateLimitError) {
        logger.warn(
          `⚠️ Rate limit reached while discovering ${adapter.name}; skipping this source${resetHint(error)}`,
        );
        result.rateLimited = true;
        return result;
      }
      if (error instanceof ScraperError) {
        logger.warn(`⚠️ Failed to discover ${adapter.name}: ${error.message}`);
        return result;
      }
      throw error;
    }

    result.candidates = candidates.length;
    if (candidates.length === 0) {
      logger.info(`No ${adapter.name} found`);
      return result;
    }
    logger.info(`\nFound ${candidates.length} ${adapter.kind} candidates to check`);

    for (const [index, candidate] of candidates.entries()) {
      const label = adapter.describe(candidate);
      logger.info(`\nScraping ${adapter.kind} ${index + 1}/${candidates.length}: ${label}...`);
      try {
        const artifacts = await adapter.listArtifacts(candidate);
        result.groups.push({ key: adapter.toSourceKey(candidate), artifacts });
        logger.info(`  Found ${artifacts.length} files for ${label}`);
      } catch (error) {
        if (error instanceof RateLimitError) {
          const remaining = candidates.length - index;
          logger.warn(
            `⚠️ Rate limit reached; skipping ${remaining} remaining ${adapter.name}${resetHint(error)}`,
          );
          result.rateLimited = true;
          result.skipped += remaining;
          break;
        }
        if (error instanceof ScraperError) {
          result.skipped++;
          logger.debug(`Skipping ${adapter.kind} ${label}: ${error.message}`);
          continue;
        }
        throw error;
      }
    }

    return result;
  }
}
