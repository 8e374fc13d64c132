export {
  GitHubClient,
  type GitHubClientOptions,
  type GitHubRelease,
  type GitHubReleaseAsset,
} from "./GitHubClient";
export { PyPiClient, compareVersionsDesc } from "./PyPiClient";
