export type { SourceAdapter, SourceAdapterOptions } from "./types";
export { BaseSourceAdapter, type ScanOptions } from "./BaseSourceAdapter";
export { CommitSourceAdapter, type CommitSourceOptions } from "./CommitSourceAdapter";
export { ReleaseSourceAdapter } from "./ReleaseSourceAdapter";
export { NightlySourceAdapter, NIGHTLY_CANDIDATE } from "./NightlySourceAdapter";
export { ReleaseVersionSourceAdapter } from "./ReleaseVersionSourceAdapter";
export { LegacyPackageSourceAdapter } from "./LegacyPackageSourceAdapter";
