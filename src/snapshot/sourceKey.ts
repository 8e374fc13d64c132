import { type SourceKey, SnapshotMode } from "../types";

const RELEASE_PREFIX = "release_";
const VERSION_PREFIX = "version_";
const NIGHTLY_KEY = "nightly";

/**
 * Renders the key used in the snapshot's `results` mapping.
 */
export function formatSourceKey(key: SourceKey): string {
  switch (key.kind) {
    case "commit":
      return key.hash;
    case "release":
      return `${RELEASE_PREFIX}${key.tag}`;
    case "version":
      return `${VERSION_PREFIX}${key.version}`;
    case "nightly":
      return NIGHTLY_KEY;
    case "package":
      return key.name;
  }
}

/**
 * Reads a `results` key back. Unprefixed keys are commits, or package names
 * in legacy snapshots.
 */
export function parseSourceKey(raw: string, mode?: SnapshotMode): SourceKey {
  if (mode === SnapshotMode.Legacy) {
    return { kind: "package", name: raw };
  }
  if (raw === NIGHTLY_KEY) {
    return { kind: "nightly" };
  }
  if (raw.startsWith(RELEASE_PREFIX)) {
    return { kind: "release", tag: raw.slice(RELEASE_PREFIX.length) };
  }
  if (raw.startsWith(VERSION_PREFIX)) {
    return { kind: "version", version: raw.slice(VERSION_PREFIX.length) };
  }
  return { kind: "commit", hash: raw };
}
