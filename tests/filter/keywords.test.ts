import { describe, it, expect, vi } from "vitest";
import {
  filterCandidates,
  getKeywords,
  matchesAnyKeyword,
} from "../../src/filter/keywords.js";
import { parseConfig, type ScoutConfig } from "../../src/config.js";
import type { Candidate } from "../../src/sources/types.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
}));

const baseConfig: ScoutConfig = parseConfig(`
discovery:
  keywords: [LLM, machine learning, llm]
`);

const makeCand = (
  name: string,
  description: string,
  topics?: string[]
): Candidate => ({
  name,
  url: `https://github.com/${name}`,
  description,
  source: "trending",
  metadata: { topics },
});

describe("getKeywords", () => {
  it("lowercases and deduplicates configured keywords", () => {
    expect(getKeywords(baseConfig)).toEqual(["llm", "machine learning"]);
  });
});

describe("matchesAnyKeyword", () => {
  it("matches case-insensitively as a substring", () => {
    expect(matchesAnyKeyword("Fast LLMs on CPU", ["llm"])).toBe(true);
  });

  it("returns false when no keyword occurs", () => {
    expect(matchesAnyKeyword("terminal file manager", ["llm"])).toBe(false);
  });
});

describe("filterCandidates", () => {
  it("keeps candidates matching in name, description, or topics", () => {
    const candidates = [
      makeCand("acme/llm-router", "Routes requests"),
      makeCand("acme/notes", "Machine Learning notebooks"),
      makeCand("acme/dotfiles", "My shell setup"),
      makeCand("acme/misc", "Assorted tools", ["llm"]),
    ];

    const filtered = filterCandidates(candidates, baseConfig);
    expect(filtered.map((c) => c.name)).toEqual([
      "acme/llm-router",
      "acme/notes",
      "acme/misc",
    ]);
  });

  it("passes all candidates through when no keywords configured", () => {
    const config = parseConfig(`
discovery:
  keywords: []
`);
    const candidates = [makeCand("acme/anything", "Goes through")];
    expect(filterCandidates(candidates, config)).toHaveLength(1);
  });
});
