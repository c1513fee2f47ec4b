import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import * as core from "@actions/core";
import { errors } from "playwright-core";
import type { AspectRatio, ScoutConfig } from "../config.js";
import { compose, type ComposeFailureKind } from "../image/compositor.js";
import {
  launchChromium,
  withBrowser,
  type BrowserLauncher,
  type CaptureBrowser,
} from "./browser.js";
import { firstVisible, type LocatorStrategy } from "./locators.js";
import { screenshotFileName } from "./slug.js";

export type CaptureFailureKind =
  | "navigation-timeout"
  | "navigation-error"
  | "region-not-found"
  | "browser-error"
  | "write-error"
  | ComposeFailureKind;

export interface CaptureFailure {
  status: "failed";
  kind: CaptureFailureKind;
  message: string;
}

export interface CaptureSuccess {
  status: "captured";
  path: string;
  width: number;
  height: number;
  /** Name of the locator strategy that resolved the region. */
  strategy: string;
}

export type CaptureResult = CaptureSuccess | CaptureFailure;

export interface CaptureSettings {
  navigationTimeoutMs: number;
  selectorTimeoutMs: number;
  settleDelayMs: number;
  viewport: { width: number; height: number };
  locators: readonly LocatorStrategy[];
  paddingPx: number;
  aspectRatio: AspectRatio;
  browserChannel?: string;
}

type Shot =
  | { status: "shot"; bytes: Buffer; strategy: LocatorStrategy }
  | CaptureFailure;

export function captureSettings(config: ScoutConfig): CaptureSettings {
  return {
    navigationTimeoutMs: config.capture.navigation_timeout_ms,
    selectorTimeoutMs: config.capture.selector_timeout_ms,
    settleDelayMs: config.capture.settle_delay_ms,
    viewport: config.capture.viewport,
    locators: config.capture.locators,
    paddingPx: config.composition.padding_px,
    aspectRatio: config.composition.aspect_ratio,
    browserChannel: config.capture.browser_channel,
  };
}

function messageOf(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.split("\n")[0];
}

function failure(kind: CaptureFailureKind, message: string): CaptureFailure {
  core.warning(`  Capture failed (${kind}): ${message}`);
  return { status: "failed", kind, message };
}

async function takeScreenshot(
  browser: CaptureBrowser,
  targetUrl: string,
  settings: CaptureSettings
): Promise<Shot> {
  const page = await browser.newPage({ viewport: settings.viewport });

  core.info(`  Navigating to ${targetUrl} (wait until load)...`);
  try {
    await page.goto(targetUrl, {
      waitUntil: "load",
      timeout: settings.navigationTimeoutMs,
    });
  } catch (error) {
    if (error instanceof errors.TimeoutError) {
      return failure(
        "navigation-timeout",
        `${targetUrl} did not load within ${settings.navigationTimeoutMs}ms`
      );
    }
    return failure("navigation-error", messageOf(error));
  }

  const region = await firstVisible(
    page,
    settings.locators,
    settings.selectorTimeoutMs
  );
  if (!region) {
    return failure(
      "region-not-found",
      `No visible README region on ${targetUrl} (${settings.locators.length} locators tried)`
    );
  }

  // "visible" can fire before the region has finished painting
  if (settings.settleDelayMs > 0) {
    await sleep(settings.settleDelayMs);
  }

  const bytes = await region.locator.screenshot({ type: "png" });
  return { status: "shot", bytes, strategy: region.strategy };
}

async function writeAtomically(path: string, data: Buffer): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    await writeFile(tmpPath, data);
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Screenshot the README region of `targetUrl` and save it, padded and cut
 * to the configured aspect ratio, under `destinationDir`.
 *
 * Never throws: every failure comes back as a `CaptureFailure`.
 */
export async function captureReadme(
  targetUrl: string,
  destinationDir: string,
  settings: CaptureSettings,
  launch: BrowserLauncher = launchChromium({ channel: settings.browserChannel })
): Promise<CaptureResult> {
  const path = join(
    destinationDir,
    screenshotFileName(targetUrl, settings.aspectRatio)
  );
  core.info(`Capturing README screenshot for ${targetUrl}`);

  let shot: Shot;
  try {
    shot = await withBrowser(launch, (browser) =>
      takeScreenshot(browser, targetUrl, settings)
    );
  } catch (error) {
    return failure("browser-error", messageOf(error));
  }
  if (shot.status === "failed") return shot;

  const composed = await compose(shot.bytes, {
    paddingPx: settings.paddingPx,
    aspectRatio: settings.aspectRatio,
  });
  if (!composed.ok) {
    return failure(composed.kind, composed.message);
  }

  const { image } = composed;
  try {
    await writeAtomically(path, image.data);
  } catch (error) {
    return failure("write-error", messageOf(error));
  }

  core.info(`  Screenshot saved to ${path} (${image.width}x${image.height})`);
  return {
    status: "captured",
    path,
    width: image.width,
    height: image.height,
    strategy: shot.strategy.name,
  };
}
