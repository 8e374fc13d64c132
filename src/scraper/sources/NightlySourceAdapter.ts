import type { RawArtifact, SourceKey } from "../../types";
import { logger } from "../../utils/logger";
import { BaseSourceAdapter } from "./BaseSourceAdapter";

export const NIGHTLY_CANDIDATE = "nightly";

/**
 * The rolling nightly build, published at a fixed path.
 */
export class NightlySourceAdapter extends BaseSourceAdapter {
  readonly name = "nightly wheels";
  readonly kind = "nightly";

  async discover(): Promise<string[]> {
    return [NIGHTLY_CANDIDATE];
  }

  async listArtifacts(): Promise<RawArtifact[]> {
    const artifacts = await this.scanDirectories(
      [
        this.directoryUrl("nightly/"),
        this.directoryUrl(`nightly/${this.packageName}/`),
        this.directoryUrl(`nightly/simple/${this.packageName}/`),
      ],
      { firstMatch: true },
    );
    if (artifacts.length === 0) {
      logger.info("  No nightly wheels found");
    }
    return artifacts;
  }

  toSourceKey(): SourceKey {
    return { kind: "nightly" };
  }
}
