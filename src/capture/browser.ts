import * as core from "@actions/core";
import { chromium } from "playwright-core";

// The slice of Playwright's Browser/Page/Locator API the capture uses.
// Playwright's own types satisfy these structurally.

export interface CaptureLocator {
  first(): CaptureLocator;
  waitFor(options: { state: "visible"; timeout: number }): Promise<void>;
  screenshot(options: { type: "png" }): Promise<Buffer>;
}

export interface CapturePage {
  goto(
    url: string,
    options: { waitUntil: "load"; timeout: number }
  ): Promise<unknown>;
  locator(selector: string): CaptureLocator;
}

export interface CaptureBrowser {
  newPage(options: {
    viewport: { width: number; height: number };
  }): Promise<CapturePage>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<CaptureBrowser>;

export interface LaunchOptions {
  channel?: string;
}

export function launchChromium(options: LaunchOptions = {}): BrowserLauncher {
  return () => chromium.launch({ channel: options.channel, headless: true });
}

/**
 * Run `use` with a freshly launched browser and close it exactly once
 * afterwards, whether `use` resolves or throws.
 */
export async function withBrowser<T>(
  launch: BrowserLauncher,
  use: (browser: CaptureBrowser) => Promise<T>
): Promise<T> {
  const browser = await launch();
  try {
    return await use(browser);
  } finally {
    core.info("  Closing browser...");
    try {
      await browser.close();
    } catch (error) {
      core.warning(
        `Failed to close browser: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
