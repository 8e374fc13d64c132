import { ScraperService } from "../scraper/ScraperService";
import { SourceRegistry, resolveSnapshotMode } from "../scraper/SourceRegistry";
import type { HttpFetcher } from "../scraper/fetcher";
import type { SourceRunResult, SourceSelection } from "../scraper/types";
import { formatResultsSummary } from "../reports/summary";
import { SnapshotAggregator } from "../snapshot/SnapshotAggregator";
import { writeSnapshot } from "../snapshot/store";
import type { Snapshot } from "../types";
import { logger } from "../utils/logger";
import { ensureTrailingSlash, validateUrl } from "../utils/url";
import { NoPackagesFoundError } from "./errors";

export interface ScrapeToolOptions {
  selection: SourceSelection;
  baseUrl: string;
  /** GitHub repository as `owner/name` */
  repo: string;
  packageName: string;
  /** Snapshot destination; nothing is written when omitted */
  output?: string;
  wheelsOnly?: boolean;
  /** Include URLs and sizes in the printed summary */
  verbose?: boolean;
  /** Print only the newest version of each legacy package */
  latestOnly?: boolean;
  /** Capture time; defaults to when the scrape finishes */
  now?: Date;
}

export interface ScrapeResult {
  snapshot: Snapshot;
  runs: SourceRunResult[];
}

export interface ScrapeToolDependencies {
  githubApiUrl?: string;
  pypiApiUrl?: string;
}

/**
 * Runs the selected source adapters, aggregates their output into a Snapshot,
 * prints a summary and optionally saves the snapshot.
 */
export class ScrapeTool {
  private readonly service = new ScraperService();

  constructor(
    private readonly fetcher: HttpFetcher,
    private readonly dependencies: ScrapeToolDependencies = {},
  ) {}

  async execute(options: ScrapeToolOptions): Promise<ScrapeResult> {
    validateUrl(options.baseUrl);
    const baseUrl = ensureTrailingSlash(options.baseUrl);
    const { selection } = options;

    const registry = new SourceRegistry({
      fetcher: this.fetcher,
      baseUrl,
      repo: options.repo,
      packageName: options.packageName,
      ...this.dependencies,
    });
    const mode = resolveSnapshotMode(selection);
    logger.info(`🔍 Scraping ${baseUrl} (${mode})`);

    const runs = await this.service.run(registry.getSources(selection));

    const legacyRun = runs.find((run) => run.kind === "package");
    if (legacyRun && legacyRun.candidates === 0 && !legacyRun.rateLimited) {
      throw new NoPackagesFoundError(baseUrl);
    }

    const aggregator = new SnapshotAggregator({
      baseUrl,
      mode,
      wheelsOnly: options.wheelsOnly,
    });
    const snapshot = aggregator.aggregate(runs, options.now);

    for (const line of formatResultsSummary(snapshot, {
      verbose: options.verbose,
      latestOnly: options.latestOnly,
      packageName: options.packageName,
    })) {
      logger.info(line);
    }

    const skipped = runs.reduce((total, run) => total + run.skipped, 0);
    if (skipped > 0) {
      logger.warn(`⚠️ ${skipped} candidates could not be listed and were skipped`);
    }

    if (options.output) {
      await writeSnapshot(options.output, snapshot);
    }
    return { snapshot, runs };
  }
}
