import * as cheerio from "cheerio";
import * as core from "@actions/core";
import type { ScoutConfig } from "../config.js";
import type { Candidate } from "./types.js";

const GITHUB_ORIGIN = "https://github.com";
const MAX_DESCRIPTION_LENGTH = 1000;
const FETCH_TIMEOUT_MS = 30_000;
const USER_AGENT = "Mozilla/5.0";

export function parseTrendingPage(html: string): Candidate[] {
  const $ = cheerio.load(html);
  const candidates: Candidate[] = [];

  $("article.Box-row").each((_, row) => {
    const href = $(row).find("h2.h3 a").first().attr("href");
    if (!href) {
      core.info("  Skipping trending row without a title link");
      return;
    }

    const path = href.startsWith("/") ? href : `/${href}`;
    const description = $(row)
      .find("p.col-9")
      .first()
      .text()
      .replace(/\s+/g, " ")
      .trim();

    candidates.push({
      name: href.replace(/^\/+|\/+$/g, ""),
      url: `${GITHUB_ORIGIN}${path}`,
      description: description.slice(0, MAX_DESCRIPTION_LENGTH),
      source: "trending",
      metadata: {},
    });
  });

  return candidates;
}

export async function collectTrending(
  config: ScoutConfig,
  fetchFn?: typeof fetch
): Promise<Candidate[]> {
  const fetcher = fetchFn ?? fetch;
  const pageUrl = config.discovery.trending.url;

  core.info(`Fetching trending page: ${pageUrl}`);

  try {
    const response = await fetcher(pageUrl, {
      headers: { "User-Agent": USER_AGENT },
      signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} for ${pageUrl}`);
    }

    const candidates = parseTrendingPage(await response.text());
    if (candidates.length === 0) {
      core.warning(
        `No repositories found on ${pageUrl}; the page markup may have changed`
      );
    } else {
      core.info(`  Found ${candidates.length} repositories on the trending page`);
    }
    return candidates;
  } catch (error) {
    core.warning(
      `Trending page fetch failed: ${error instanceof Error ? error.message : String(error)}`
    );
    return [];
  }
}
