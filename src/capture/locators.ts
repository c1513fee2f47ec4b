import * as core from "@actions/core";
import type { CaptureLocator, CapturePage } from "./browser.js";

/** A named CSS selector for the region to capture. */
export interface LocatorStrategy {
  name: string;
  selector: string;
}

export interface ResolvedRegion {
  strategy: LocatorStrategy;
  locator: CaptureLocator;
}

function firstLine(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.split("\n")[0];
}

/**
 * Try each strategy in declared order, waiting up to `timeoutMs` for its
 * first match to become visible. Later strategies are never touched once
 * one resolves.
 */
export async function firstVisible(
  page: CapturePage,
  strategies: readonly LocatorStrategy[],
  timeoutMs: number
): Promise<ResolvedRegion | undefined> {
  for (const [index, strategy] of strategies.entries()) {
    core.info(
      `  Trying locator ${index + 1}/${strategies.length} "${strategy.name}": ${strategy.selector}`
    );
    const locator = page.locator(strategy.selector).first();

    try {
      await locator.waitFor({ state: "visible", timeout: timeoutMs });
      core.info(`  Region visible via "${strategy.name}"`);
      return { strategy, locator };
    } catch (error) {
      core.info(`  Locator "${strategy.name}" failed: ${firstLine(error)}`);
    }
  }

  return undefined;
}
