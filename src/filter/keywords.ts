import * as core from "@actions/core";
import type { ScoutConfig } from "../config.js";
import type { Candidate } from "../sources/types.js";

function getKeywords(config: ScoutConfig): string[] {
  return [...new Set(config.discovery.keywords.map((kw) => kw.toLowerCase()))];
}

function matchesAnyKeyword(text: string, keywords: string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((kw) => lower.includes(kw));
}

export function filterCandidates(
  candidates: Candidate[],
  config: ScoutConfig
): Candidate[] {
  const keywords = getKeywords(config);

  if (keywords.length === 0) {
    core.info("No keywords configured, passing all candidates through");
    return candidates;
  }

  const filtered = candidates.filter((c) => {
    const searchText = `${c.name} ${c.description} ${c.metadata.topics?.join(" ") ?? ""}`;
    const matched = matchesAnyKeyword(searchText, keywords);
    if (matched) {
      core.info(`  Keyword match: ${c.name} (${c.url})`);
    }
    return matched;
  });

  core.info(
    `Keyword filter: ${candidates.length} → ${filtered.length} candidates`
  );
  return filtered;
}

export { getKeywords, matchesAnyKeyword };
