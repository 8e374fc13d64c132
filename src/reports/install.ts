import type { ArtifactRecord, SourceKey } from "../types";
import { ensureTrailingSlash } from "../utils/url";

const TORCH_BACKEND = "--torch-backend auto";

/**
 * The `uv` command that installs a record from the index it was found in.
 * Release assets and legacy packages install from their direct URL.
 */
export function installCommand(
  record: Pick<ArtifactRecord, "url" | "source">,
  baseUrl: string,
  packageName: string,
): string {
  const base = ensureTrailingSlash(baseUrl);
  const { source } = record;
  switch (source.kind) {
    case "release":
    case "package":
      return `uv pip install ${record.url} ${TORCH_BACKEND}`;
    case "version":
      return `uv pip install -U ${packageName}==${source.version} --extra-index-url ${base}${source.version} ${TORCH_BACKEND}`;
    case "nightly":
      return `uv pip install ${packageName} --extra-index-url ${base}nightly ${TORCH_BACKEND}`;
    case "commit":
      return `uv pip install ${packageName} --extra-index-url ${base}${source.hash} ${TORCH_BACKEND}`;
  }
}

/** Column value naming the kind of source, as used by the CSV export */
export function sourceTypeLabel(key: SourceKey): string {
  switch (key.kind) {
    case "commit":
      return "commit";
    case "release":
      return "github_release";
    case "version":
      return "release_version";
    case "nightly":
      return "nightly";
    case "package":
      return "package";
  }
}

/** The identifying part of a source key, without its wire prefix */
export function sourceInfo(key: SourceKey): string {
  switch (key.kind) {
    case "commit":
      return key.hash;
    case "release":
      return key.tag;
    case "version":
      return key.version;
    case "nightly":
      return "nightly";
    case "package":
      return key.name;
  }
}
