import { computeStats } from "../reports/stats";
import { readSnapshot, writeStats } from "../snapshot/store";
import type { StatsSummary } from "../types";
import { logger } from "../utils/logger";

export interface StatsToolOptions {
  /** Snapshot to summarize */
  input: string;
  output: string;
  now?: Date;
}

/**
 * Derives `stats.json` from a saved snapshot.
 */
export class StatsTool {
  async execute(options: StatsToolOptions): Promise<StatsSummary> {
    const snapshot = await readSnapshot(options.input);
    const stats = computeStats(snapshot, options.now);
    await writeStats(options.output, stats);
    logger.info(
      `Generated stats: ${stats.total_wheels} wheels from ${stats.total_sources} sources`,
    );
    return stats;
  }
}
