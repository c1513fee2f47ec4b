import { setTimeout as sleep } from "node:timers/promises";
import * as core from "@actions/core";
import { loadConfig } from "./config.js";
import { runPipeline } from "./pipeline.js";
import { collectTrending } from "./sources/trending.js";
import { collectGitHub } from "./sources/github.js";
import { filterCandidates } from "./filter/keywords.js";
import { dedup } from "./filter/dedup.js";
import { captureReadme, captureSettings } from "./capture/engine.js";
import { deferCatalog } from "./catalog/store.js";
import type { ScoutConfig } from "./config.js";
import type { Candidate } from "./sources/types.js";

async function collect(config: ScoutConfig): Promise<Candidate[]> {
  const candidates: Candidate[] = [];

  candidates.push(...(await collectTrending(config)));
  if (config.discovery.search) {
    candidates.push(...(await collectGitHub(config)));
  }

  return candidates;
}

async function filter(
  candidates: Candidate[],
  config: ScoutConfig
): Promise<Candidate[]> {
  return dedup(filterCandidates(candidates, config));
}

async function run(): Promise<void> {
  try {
    const configPath = core.getInput("config_path");
    const dryRun = core.getInput("dry_run") === "true";

    core.info(`Loading config from ${configPath}`);
    const config = loadConfig(configPath);
    const settings = captureSettings(config);

    // Opened on first write, so a dry run leaves no database behind
    const catalog = deferCatalog(config.catalog.path);
    try {
      const result = await runPipeline(
        config,
        {
          collect,
          filter,
          capture: (candidate) =>
            captureReadme(candidate.url, config.capture.output_dir, settings),
          catalog,
          pause: (ms) => sleep(ms),
        },
        dryRun
      );

      core.setOutput("candidates_found", result.candidatesFound);
      core.setOutput("candidates_filtered", result.candidatesFiltered);
      core.setOutput("screenshots_captured", result.captured);
      core.setOutput("captures_failed", result.failed);
    } finally {
      catalog.close();
    }
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  }
}

void run();
