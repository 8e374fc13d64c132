import type { RawArtifact, SourceKey } from "../../types";
import type { PyPiClient } from "../clients";
import type { HttpFetcher } from "../fetcher";
import { BaseSourceAdapter } from "./BaseSourceAdapter";
import type { SourceAdapterOptions } from "./types";

/**
 * Per-release directories on the artifact host, one per version published on PyPI.
 */
export class ReleaseVersionSourceAdapter extends BaseSourceAdapter {
  readonly name = "release version wheels";
  readonly kind = "version";

  constructor(
    fetcher: HttpFetcher,
    private readonly pypi: PyPiClient,
    options: SourceAdapterOptions,
  ) {
    super(fetcher, options);
  }

  async discover(limit: number): Promise<string[]> {
    const versions = await this.pypi.listVersions(this.packageName);
    return versions.slice(0, limit);
  }

  async listArtifacts(version: string): Promise<RawArtifact[]> {
    return this.scanDirectories(
      [
        this.directoryUrl(`${version}/`),
        this.directoryUrl(`${version}/${this.packageName}/`),
        this.directoryUrl(`v${version}/`),
        this.directoryUrl(`v${version}/${this.packageName}/`),
      ],
      { firstMatch: true },
    );
  }

  toSourceKey(version: string): SourceKey {
    return { kind: "version", version };
  }
}
