import { toCsv } from "../reports/csv";
import { isWheelRecord } from "../snapshot/SnapshotAggregator";
import { readSnapshot, writeText } from "../snapshot/store";
import { logger } from "../utils/logger";

export interface CsvToolOptions {
  input: string;
  output: string;
  /** Index root for install commands; the snapshot's own base URL otherwise */
  baseUrl?: string;
  packageName?: string;
}

export interface CsvResult {
  /** Wheel rows written, excluding the header */
  rows: number;
}

/**
 * Exports the wheels of a saved snapshot as CSV.
 */
export class CsvTool {
  async execute(options: CsvToolOptions): Promise<CsvResult> {
    const snapshot = await readSnapshot(options.input);
    await writeText(
      options.output,
      toCsv(snapshot, { baseUrl: options.baseUrl, packageName: options.packageName }),
    );
    const rows = snapshot.results.reduce(
      (total, group) => total + group.records.filter(isWheelRecord).length,
      0,
    );
    logger.info(`Generated CSV with ${rows} wheel entries`);
    return { rows };
  }
}
