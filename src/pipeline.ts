import * as core from "@actions/core";
import type { ScoutConfig } from "./config.js";
import type { CatalogStore } from "./catalog/store.js";
import type { CaptureFailureKind, CaptureResult } from "./capture/engine.js";
import type { Candidate } from "./sources/types.js";

export type CandidateOutcome =
  | { url: string; name: string; status: "persisted"; screenshotPath: string }
  | {
      url: string;
      name: string;
      status: "failed";
      kind: CaptureFailureKind;
      message: string;
    };

export interface PipelineResult {
  candidatesFound: number;
  candidatesFiltered: number;
  candidatesRecorded: number;
  captured: number;
  failed: number;
  outcomes: CandidateOutcome[];
}

export interface PipelineDeps {
  collect: (config: ScoutConfig) => Promise<Candidate[]>;
  filter: (
    candidates: Candidate[],
    config: ScoutConfig
  ) => Promise<Candidate[]>;
  capture: (
    candidate: Candidate,
    config: ScoutConfig
  ) => Promise<CaptureResult>;
  catalog: Pick<CatalogStore, "upsertCandidate" | "updateScreenshotPath">;
  pause: (ms: number) => Promise<void>;
}

async function processCandidate(
  candidate: Candidate,
  config: ScoutConfig,
  deps: PipelineDeps
): Promise<CandidateOutcome> {
  const { url, name } = candidate;
  const result = await deps.capture(candidate, config);

  if (result.status === "failed") {
    return { url, name, status: "failed", kind: result.kind, message: result.message };
  }

  // Store errors are not caught here: a half-written catalog ends the run
  deps.catalog.updateScreenshotPath(url, result.path);
  return { url, name, status: "persisted", screenshotPath: result.path };
}

export async function runPipeline(
  config: ScoutConfig,
  deps: PipelineDeps,
  dryRun: boolean
): Promise<PipelineResult> {
  core.info("Stage 1/4: Collecting candidates...");
  const collected = await deps.collect(config);
  core.info(`  Found ${collected.length} candidates`);

  core.info("Stage 2/4: Filtering candidates...");
  const filtered = await deps.filter(collected, config);
  core.info(`  ${filtered.length} candidates after filtering`);

  if (dryRun) {
    core.info("Dry run: skipping catalog and screenshot stages");
    filtered.forEach((c, i) => core.info(`  ${i + 1}. ${c.name}: ${c.url}`));
    return {
      candidatesFound: collected.length,
      candidatesFiltered: filtered.length,
      candidatesRecorded: 0,
      captured: 0,
      failed: 0,
      outcomes: [],
    };
  }

  core.info("Stage 3/4: Recording candidates in catalog...");
  for (const candidate of filtered) {
    deps.catalog.upsertCandidate(candidate);
  }
  core.info(`  ${filtered.length} catalog entries upserted`);

  const toCapture = filtered.slice(0, config.discovery.max_candidates);
  core.info(
    `Stage 4/4: Capturing README screenshots for ${toCapture.length} candidates...`
  );

  const outcomes: CandidateOutcome[] = [];
  for (const [index, candidate] of toCapture.entries()) {
    core.info(
      `--- Processing ${index + 1}/${toCapture.length}: ${candidate.name} ---`
    );
    const outcome = await processCandidate(candidate, config, deps);
    outcomes.push(outcome);

    if (outcome.status === "persisted") {
      core.info(`  ${candidate.name}: saved ${outcome.screenshotPath}`);
    } else {
      core.info(`  ${candidate.name}: failed (${outcome.kind}) ${outcome.message}`);
    }

    if (index < toCapture.length - 1 && config.pipeline.delay_between_ms > 0) {
      core.info(`  Pausing ${config.pipeline.delay_between_ms}ms before next candidate...`);
      await deps.pause(config.pipeline.delay_between_ms);
    }
  }

  const captured = outcomes.filter((o) => o.status === "persisted").length;
  const failed = outcomes.length - captured;
  core.info(
    `Summary: ${collected.length} discovered, ${filtered.length} matched, ${captured} captured, ${failed} failed`
  );

  return {
    candidatesFound: collected.length,
    candidatesFiltered: filtered.length,
    candidatesRecorded: filtered.length,
    captured,
    failed,
    outcomes,
  };
}
