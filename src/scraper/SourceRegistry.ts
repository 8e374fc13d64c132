import { GITHUB_API_URL, PYPI_API_URL } from "../config";
import { SnapshotMode } from "../types";
import { GitHubClient, PyPiClient } from "./clients";
import type { HttpFetcher } from "./fetcher";
import {
  CommitSourceAdapter,
  LegacyPackageSourceAdapter,
  NightlySourceAdapter,
  ReleaseSourceAdapter,
  ReleaseVersionSourceAdapter,
} from "./sources";
import type { PlannedSource, SourceSelection } from "./types";

export interface SourceRegistryOptions {
  fetcher: HttpFetcher;
  /** Artifact host root, with a trailing slash */
  baseUrl: string;
  /** GitHub repository as `owner/name` */
  repo: string;
  packageName: string;
  githubApiUrl?: string;
  pypiApiUrl?: string;
}

/**
 * Chooses the snapshot's mode label from the selection.
 */
export function resolveSnapshotMode(selection: SourceSelection): SnapshotMode {
  if (selection.commit) {
    return SnapshotMode.SingleCommit;
  }
  if (selection.githubReleases && !selection.allSources) {
    return SnapshotMode.GitHubReleases;
  }
  if (selection.nightly && !selection.allSources) {
    return SnapshotMode.Nightly;
  }
  return selection.legacyMode ? SnapshotMode.Legacy : SnapshotMode.MultiSource;
}

/**
 * Builds the adapters a selection asks for, in run order:
 * legacy packages, releases, nightly, release versions, commits.
 */
export class SourceRegistry {
  private readonly github: GitHubClient;
  private readonly pypi: PyPiClient;

  constructor(private readonly options: SourceRegistryOptions) {
    this.github = new GitHubClient(options.fetcher, {
      repo: options.repo,
      apiUrl: options.githubApiUrl ?? GITHUB_API_URL,
    });
    this.pypi = new PyPiClient(options.fetcher, options.pypiApiUrl ?? PYPI_API_URL);
  }

  getSources(selection: SourceSelection): PlannedSource[] {
    const { fetcher, baseUrl, packageName } = this.options;
    const hostOptions = { baseUrl, packageName };
    const all = selection.allSources ?? false;
    const plan: PlannedSource[] = [];

    if (selection.legacyMode) {
      plan.push({
        adapter: new LegacyPackageSourceAdapter(fetcher, hostOptions),
        limit: Number.POSITIVE_INFINITY,
      });
    }
    if (selection.githubReleases || all) {
      plan.push({
        adapter: new ReleaseSourceAdapter(this.github),
        limit: selection.maxReleases,
      });
    }
    if (selection.nightly || all) {
      plan.push({ adapter: new NightlySourceAdapter(fetcher, hostOptions), limit: 1 });
    }
    if (selection.releaseVersions || all) {
      plan.push({
        adapter: new ReleaseVersionSourceAdapter(fetcher, this.pypi, hostOptions),
        limit: selection.maxVersions,
      });
    }

    const commitsByDefault =
      !selection.legacyMode && !selection.githubReleases && !selection.nightly;
    if (commitsByDefault || all) {
      plan.push({
        adapter: new CommitSourceAdapter(fetcher, this.github, {
          ...hostOptions,
          useGitHub: selection.useGitHub,
          commit: selection.commit,
        }),
        limit: selection.maxCommits,
      });
    }

    return plan;
  }
}
