/**
 * Default configuration values for the wheel scraper
 */

/** Artifact host serving per-commit, per-version and nightly directory listings */
export const DEFAULT_BASE_URL =
  process.env.WHEEL_INDEX_BASE_URL || "https://wheels.vllm.ai/";

/** GitHub repository (`owner/name`) queried for commits and releases */
export const DEFAULT_GITHUB_REPO = process.env.WHEEL_INDEX_REPO || "vllm-project/vllm";

/** Package tracked on PyPI and used as the per-commit subdirectory name */
export const DEFAULT_PACKAGE_NAME = process.env.WHEEL_INDEX_PACKAGE || "vllm";

export const GITHUB_API_URL = "https://api.github.com/";
export const PYPI_API_URL = "https://pypi.org/pypi/";

/** Maximum number of commits to check */
export const DEFAULT_MAX_COMMITS = 50;

/** Maximum number of GitHub releases to check */
export const DEFAULT_MAX_RELEASES = 20;

/** Maximum number of PyPI versions to check */
export const DEFAULT_MAX_VERSIONS = 20;

/** GitHub caps `per_page` at this value */
export const GITHUB_MAX_PER_PAGE = 100;

/** Below this many commits in the root listing, GitHub history is probed as well */
export const MIN_LISTED_COMMITS = 10;

/** Number of GitHub commits probed when the root listing is sparse */
export const FALLBACK_COMMIT_PROBES = 50;

/** Fixed pause between consecutive HTTP requests */
export const DEFAULT_REQUEST_DELAY_MS = 100;

/** Retries for responses without a status or with a 5xx status */
export const DEFAULT_MAX_RETRIES = 2;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export const USER_AGENT = "wheel-index/0.1";

/** Default locations of the generated data files */
export const DEFAULT_SNAPSHOT_PATH = "data/wheels.json";
export const DEFAULT_STATS_PATH = "data/stats.json";
export const DEFAULT_CSV_PATH = "data/wheels.csv";
