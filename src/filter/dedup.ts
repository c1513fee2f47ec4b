import * as core from "@actions/core";
import type { Candidate } from "../sources/types.js";

export function normalizeUrl(url: string): string {
  return url.trim().replace(/\/+$/, "").toLowerCase();
}

// First occurrence wins, so trending rows keep precedence over search hits.
export function dedup(candidates: Candidate[]): Candidate[] {
  const seen = new Set<string>();
  const unique: Candidate[] = [];

  for (const candidate of candidates) {
    const key = normalizeUrl(candidate.url);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(candidate);
  }

  core.info(`Dedup: ${candidates.length} → ${unique.length} candidates`);
  return unique;
}
