import { Octokit } from "@octokit/rest";
import * as core from "@actions/core";
import type { ScoutConfig } from "../config.js";
import type { Candidate } from "./types.js";

const MAX_DESCRIPTION_LENGTH = 1000;

type SearchSource = NonNullable<ScoutConfig["discovery"]["search"]>;

function createdAfterDate(spec: string): string {
  const days = parseInt(spec.replace("d", ""), 10);
  if (Number.isNaN(days)) {
    throw new Error(`Invalid date spec: ${spec}`);
  }
  const date = new Date();
  date.setDate(date.getDate() - days);
  return date.toISOString().split("T")[0];
}

function buildSearchQuery(search: SearchSource): string {
  const parts: string[] = [];

  // Space-separated qualifiers of the same kind are OR-ed by GitHub search
  parts.push(search.topics.map((t) => `topic:${t}`).join(" "));

  if (search.languages) {
    parts.push(search.languages.map((l) => `language:${l}`).join(" "));
  }

  if (search.min_stars > 0) {
    parts.push(`stars:>=${search.min_stars}`);
  }

  parts.push(`created:>=${createdAfterDate(search.created_after)}`);

  return parts.join(" ");
}

export async function collectGitHub(
  config: ScoutConfig,
  octokit?: Octokit
): Promise<Candidate[]> {
  const search = config.discovery.search;
  if (!search) return [];

  const client =
    octokit ?? new Octokit({ auth: core.getInput("github_token") });
  const query = buildSearchQuery(search);

  core.info(`GitHub search query: ${query}`);

  const candidates: Candidate[] = [];

  try {
    // Single page sorted by stars; the capture stage only takes a handful
    const response = await client.search.repos({
      q: query,
      sort: "stars",
      order: "desc",
      per_page: 100,
    });

    for (const repo of response.data.items) {
      candidates.push({
        name: repo.full_name,
        url: repo.html_url,
        description: (repo.description ?? "").slice(0, MAX_DESCRIPTION_LENGTH),
        source: "search",
        metadata: {
          stars: repo.stargazers_count,
          language: repo.language ?? undefined,
          topics: repo.topics ?? [],
        },
      });
    }
  } catch (error) {
    core.warning(
      `GitHub search failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return candidates;
}

export { buildSearchQuery, createdAfterDate };
