#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import packageJson from "../package.json";
import {
  DEFAULT_BASE_URL,
  DEFAULT_CSV_PATH,
  DEFAULT_GITHUB_REPO,
  DEFAULT_MAX_COMMITS,
  DEFAULT_MAX_RELEASES,
  DEFAULT_MAX_VERSIONS,
  DEFAULT_PACKAGE_NAME,
  DEFAULT_REQUEST_DELAY_MS,
  DEFAULT_SNAPSHOT_PATH,
  DEFAULT_STATS_PATH,
} from "./config";
import { HttpFetcher } from "./scraper/fetcher";
import { CsvTool, ScrapeTool, StatsTool } from "./tools";
import { logLevelFromFlags, logger, setLogLevel } from "./utils/logger";
import { parseCount, parseLimit } from "./utils/options";

interface ScrapeCommandOptions {
  commit?: string;
  githubReleases: boolean;
  nightly: boolean;
  releaseVersions: boolean;
  allSources: boolean;
  useGithub: boolean;
  legacyMode: boolean;
  maxCommits: number;
  maxReleases: number;
  maxVersions: number;
  output?: string;
  wheelsOnly: boolean;
  latestOnly: boolean;
  verbose: boolean;
  baseUrl: string;
  repo: string;
  package: string;
  requestDelay: number;
}

interface FileCommandOptions {
  input: string;
  output: string;
  baseUrl?: string;
  package?: string;
}

/** Shared `--verbose` / `--silent` switches, read by the preAction hook */
function withLogOptions(command: Command): Command {
  return command
    .option("-v, --verbose", "Enable verbose (debug) logging", false)
    .option("--silent", "Disable all logging except errors", false);
}

async function main() {
  const program = new Command();

  program
    .name("wheel-index")
    .description("Index prebuilt wheels published on an artifact host, GitHub releases and PyPI")
    .version(packageJson.version);

  withLogOptions(
    program
      .command("scrape", { isDefault: true })
      .description("Discover wheels and print a summary, optionally saving a snapshot"),
  )
    .option("--commit <hash>", "Scrape a single commit")
    .option("--github-releases", "Scrape wheels attached to GitHub releases", false)
    .option("--nightly", "Scrape nightly wheels", false)
    .option("--release-versions", "Scrape per-version directories for PyPI releases", false)
    .option("--all-sources", "Scrape commits, releases, nightly and release versions", false)
    .option("--use-github", "Discover commits from GitHub history", false)
    .option("--legacy-mode", "Use package-based discovery for simple-index layouts", false)
    .option("--max-commits <n>", "Maximum commits to check", parseLimit, DEFAULT_MAX_COMMITS)
    .option("--max-releases <n>", "Maximum GitHub releases to check", parseLimit, DEFAULT_MAX_RELEASES)
    .option("--max-versions <n>", "Maximum release versions to check", parseLimit, DEFAULT_MAX_VERSIONS)
    .option("-o, --output <path>", `Save the snapshot (e.g. ${DEFAULT_SNAPSHOT_PATH})`)
    .option("--wheels-only", "Keep only wheel files", false)
    .option("--latest-only", "Show only the latest version of each package (legacy mode)", false)
    .option("--base-url <url>", "Artifact host root", DEFAULT_BASE_URL)
    .option("--repo <owner/name>", "GitHub repository", DEFAULT_GITHUB_REPO)
    .option("--package <name>", "Package name", DEFAULT_PACKAGE_NAME)
    .option(
      "--request-delay <ms>",
      "Pause between HTTP requests",
      parseCount,
      DEFAULT_REQUEST_DELAY_MS,
    )
    .action(async (options: ScrapeCommandOptions) => {
      const fetcher = new HttpFetcher({ requestDelay: options.requestDelay });
      await new ScrapeTool(fetcher).execute({
        selection: {
          commit: options.commit,
          githubReleases: options.githubReleases,
          nightly: options.nightly,
          releaseVersions: options.releaseVersions,
          allSources: options.allSources,
          useGitHub: options.useGithub,
          legacyMode: options.legacyMode,
          maxCommits: options.maxCommits,
          maxReleases: options.maxReleases,
          maxVersions: options.maxVersions,
        },
        baseUrl: options.baseUrl,
        repo: options.repo,
        packageName: options.package,
        output: options.output,
        wheelsOnly: options.wheelsOnly,
        verbose: options.verbose,
        latestOnly: options.latestOnly,
      });
    });

  withLogOptions(
    program.command("stats").description("Generate stats JSON from a saved snapshot"),
  )
    .option("--input <path>", "Snapshot to read", DEFAULT_SNAPSHOT_PATH)
    .option("--output <path>", "Stats file to write", DEFAULT_STATS_PATH)
    .action(async (options: FileCommandOptions) => {
      await new StatsTool().execute({ input: options.input, output: options.output });
    });

  withLogOptions(
    program.command("csv").description("Export the wheels of a saved snapshot as CSV"),
  )
    .option("--input <path>", "Snapshot to read", DEFAULT_SNAPSHOT_PATH)
    .option("--output <path>", "CSV file to write", DEFAULT_CSV_PATH)
    .option("--base-url <url>", "Index root for install commands (default: the snapshot's)")
    .option("--package <name>", "Package name for install commands", DEFAULT_PACKAGE_NAME)
    .action(async (options: FileCommandOptions) => {
      await new CsvTool().execute({
        input: options.input,
        output: options.output,
        baseUrl: options.baseUrl,
        packageName: options.package,
      });
    });

  // Set the log level from the subcommand's switches before its action runs
  program.hook("preAction", (_thisCommand, actionCommand) => {
    const { verbose, silent } = actionCommand.opts<{ verbose?: boolean; silent?: boolean }>();
    setLogLevel(logLevelFromFlags({ verbose, silent }));
  });

  try {
    await program.parseAsync();
  } catch (error) {
    logger.error(`❌ Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
