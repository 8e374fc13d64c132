import fs from "node:fs/promises";
import path from "node:path";
import { ZodError } from "zod";
import type { Snapshot, StatsSummary } from "../types";
import { logger } from "../utils/logger";
import { SnapshotReadError, SnapshotWriteError } from "./errors";
import { fromSnapshotJson, toSnapshotJson } from "./serialization";

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Writes `content` to a sibling temp file and renames it over `filePath`,
 * so readers see either the old file or the new one.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tmpPath, content, "utf-8");
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
      logger.debug(`Could not remove ${tmpPath}: ${toError(cleanupError).message}`);
    });
    throw new SnapshotWriteError(filePath, toError(error));
  }
}

function toJsonText(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export async function writeSnapshot(filePath: string, snapshot: Snapshot): Promise<void> {
  await writeFileAtomic(filePath, toJsonText(toSnapshotJson(snapshot)));
  logger.info(`💾 Results saved to ${filePath}`);
}

export async function writeStats(filePath: string, stats: StatsSummary): Promise<void> {
  await writeFileAtomic(filePath, toJsonText(stats));
  logger.info(`📊 Stats saved to ${filePath}`);
}

export async function writeText(filePath: string, content: string): Promise<void> {
  await writeFileAtomic(filePath, content);
  logger.info(`💾 Saved ${filePath}`);
}

export async function readSnapshot(filePath: string): Promise<Snapshot> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    const cause = toError(error);
    throw new SnapshotReadError(filePath, cause.message, cause);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new SnapshotReadError(filePath, "invalid JSON", toError(error));
  }

  try {
    return fromSnapshotJson(json);
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new SnapshotReadError(
        filePath,
        `unexpected shape${where}: ${issue?.message ?? error.message}`,
        error,
      );
    }
    throw error;
  }
}
