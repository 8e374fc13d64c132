import { stringify } from "csv-stringify/sync";
import { DEFAULT_PACKAGE_NAME } from "../config";
import { isWheelRecord } from "../snapshot/SnapshotAggregator";
import type { Snapshot } from "../types";
import { installCommand, sourceInfo, sourceTypeLabel } from "./install";

export const CSV_COLUMNS = [
  "filename",
  "source_type",
  "source_info",
  "version",
  "python_tag",
  "abi_tag",
  "platform_tag",
  "url",
  "install_command",
  "commit",
  "release_tag",
  "size",
  "scraped_at",
] as const;

type CsvRow = Record<(typeof CSV_COLUMNS)[number], string>;

export interface CsvOptions {
  /** Index root used in install commands; defaults to the snapshot's base URL */
  baseUrl?: string;
  packageName?: string;
}

/**
 * One row per wheel. The header row is written even when there are no wheels.
 */
export function toCsv(snapshot: Snapshot, options: CsvOptions = {}): string {
  const baseUrl = options.baseUrl ?? snapshot.baseUrl;
  const packageName = options.packageName ?? DEFAULT_PACKAGE_NAME;

  const rows: CsvRow[] = snapshot.results.flatMap(({ key, records }) =>
    records.filter(isWheelRecord).map((wheel) => ({
      filename: wheel.filename,
      source_type: sourceTypeLabel(key),
      source_info: sourceInfo(key),
      version: wheel.version,
      python_tag: wheel.pythonTag,
      abi_tag: wheel.abiTag,
      platform_tag: wheel.platformTag,
      url: wheel.url,
      install_command: installCommand(wheel, baseUrl, packageName),
      commit: key.kind === "commit" ? key.hash : "",
      release_tag: key.kind === "release" ? key.tag : "",
      size: wheel.size !== undefined ? String(wheel.size) : "",
      scraped_at: snapshot.scrapeTime,
    })),
  );

  const header = stringify([[...CSV_COLUMNS]]);
  const body = stringify(rows, { columns: [...CSV_COLUMNS] });
  return header + body;
}
