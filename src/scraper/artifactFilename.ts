import type { ParsedArtifact, WheelArtifact } from "../types";

const WHEEL_EXTENSION = ".whl";
const SOURCE_EXTENSIONS = [".tar.gz", ".zip"];

/**
 * Decodes `%XX` escapes, leaving the text untouched when an escape is malformed.
 */
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function parseWheel(filename: string): ParsedArtifact {
  // {name}-{version}(-{build})?-{python}-{abi}-{platform}.whl
  const segments = filename.slice(0, -WHEEL_EXTENSION.length).split("-");
  if (segments.some((segment) => segment === "")) {
    return { type: "unknown", filename };
  }

  let buildTag: string | undefined;
  if (segments.length === 6) {
    buildTag = segments.splice(2, 1)[0];
    if (!/^\d/.test(buildTag)) {
      return { type: "unknown", filename };
    }
  } else if (segments.length !== 5) {
    return { type: "unknown", filename };
  }

  const [name, version, pythonTag, abiTag, platformTag] = segments;
  const wheel: WheelArtifact = {
    type: "wheel",
    filename,
    name,
    version: decodeSegment(version),
    pythonTag,
    abiTag,
    platformTag,
  };
  if (buildTag !== undefined) {
    wheel.buildTag = buildTag;
  }
  return wheel;
}

function parseSourceDist(filename: string, extension: string): ParsedArtifact {
  const stem = filename.slice(0, -extension.length);
  const separator = stem.lastIndexOf("-");
  if (separator <= 0 || separator === stem.length - 1) {
    return { type: "source", filename };
  }
  return {
    type: "source",
    filename,
    name: stem.slice(0, separator),
    version: decodeSegment(stem.slice(separator + 1)),
  };
}

/**
 * Returns true for names the scraper treats as downloadable artifacts.
 */
export function isArtifactFilename(filename: string): boolean {
  return (
    filename.endsWith(WHEEL_EXTENSION) ||
    SOURCE_EXTENSIONS.some((extension) => filename.endsWith(extension))
  );
}

/**
 * Classifies an artifact filename and extracts its packaging fields.
 *
 * Wheels follow `{name}-{version}(-{build})?-{python}-{abi}-{platform}.whl`;
 * any other segment count yields `unknown`. Source distributions
 * (`.tar.gz`, `.zip`) carry at most a name and version. The version segment
 * is percent-decoded, so `1.0%2Bcu118` becomes `1.0+cu118`.
 */
export function parseArtifactFilename(filename: string): ParsedArtifact {
  if (filename.endsWith(WHEEL_EXTENSION)) {
    return parseWheel(filename);
  }
  const sourceExtension = SOURCE_EXTENSIONS.find((extension) =>
    filename.endsWith(extension),
  );
  if (sourceExtension) {
    return parseSourceDist(filename, sourceExtension);
  }
  return { type: "unknown", filename };
}

/**
 * Rebuilds the canonical wheel filename from its fields.
 */
export function formatWheelFilename(
  wheel: Pick<WheelArtifact, "name" | "version" | "buildTag" | "pythonTag" | "abiTag" | "platformTag">,
): string {
  const segments = [wheel.name, wheel.version];
  if (wheel.buildTag) {
    segments.push(wheel.buildTag);
  }
  segments.push(wheel.pythonTag, wheel.abiTag, wheel.platformTag);
  return `${segments.join("-")}${WHEEL_EXTENSION}`;
}
