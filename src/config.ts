import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

export const DEFAULT_TRENDING_URL =
  "https://github.com/trending/python?since=daily&spoken_language_code=en";

export const DEFAULT_KEYWORDS = [
  "ai",
  "llm",
  "artificial intelligence",
  "machine learning",
  "deep learning",
  "neural network",
];

const TrendingSourceSchema = z.object({
  url: z.string().url().default(DEFAULT_TRENDING_URL),
});

const SearchSourceSchema = z.object({
  topics: z.array(z.string()).min(1),
  languages: z.array(z.string()).optional(),
  min_stars: z.number().int().nonnegative().default(0),
  created_after: z
    .string()
    .regex(/^\d+d$/, 'Must be in format "Nd" (e.g. "30d")')
    .default("30d"),
});

const DiscoverySchema = z.object({
  trending: TrendingSourceSchema.default({}),
  search: SearchSourceSchema.optional(),
  keywords: z.array(z.string().min(1)).default(DEFAULT_KEYWORDS),
  max_candidates: z.number().int().nonnegative().default(3),
});

const LocatorSchema = z.object({
  name: z.string().min(1),
  selector: z.string().min(1),
});

const CaptureSchema = z.object({
  output_dir: z.string().min(1).default("screenshots"),
  navigation_timeout_ms: z.number().int().positive().default(90_000),
  selector_timeout_ms: z.number().int().positive().default(20_000),
  settle_delay_ms: z.number().int().nonnegative().default(200),
  browser_channel: z.string().optional(),
  viewport: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    })
    .default({ width: 1280, height: 720 }),
  locators: z
    .array(LocatorSchema)
    .min(1)
    .default([
      { name: "readme-article", selector: "#readme article.markdown-body" },
      {
        name: "markdown-article",
        selector: "article.markdown-body[itemprop='text']",
      },
      { name: "markdown-entry", selector: "div.markdown-body.entry-content" },
    ]),
});

const AspectRatioSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

const CompositionSchema = z.object({
  padding_px: z.number().int().nonnegative().default(2),
  aspect_ratio: AspectRatioSchema.default({ width: 4, height: 3 }),
});

const CatalogSchema = z.object({
  path: z.string().min(1).default("trending_repos.db"),
});

const PipelineSchema = z.object({
  delay_between_ms: z.number().int().nonnegative().default(5_000),
});

export const ScoutConfigSchema = z.object({
  discovery: DiscoverySchema.default({}),
  capture: CaptureSchema.default({}),
  composition: CompositionSchema.default({}),
  catalog: CatalogSchema.default({}),
  pipeline: PipelineSchema.default({}),
});

export type ScoutConfig = z.infer<typeof ScoutConfigSchema>;
export type AspectRatio = z.infer<typeof AspectRatioSchema>;

export function parseConfig(yamlContent: string): ScoutConfig {
  // An empty document parses to null; treat it as "all defaults".
  const raw: unknown = parseYaml(yamlContent) ?? {};
  return ScoutConfigSchema.parse(raw);
}

export function loadConfig(filePath: string): ScoutConfig {
  const content = readFileSync(filePath, "utf-8");
  return parseConfig(content);
}
