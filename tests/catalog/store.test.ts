import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  deferCatalog,
  openCatalog,
  StoreError,
  type CatalogStore,
} from "../../src/catalog/store.js";

const repo = {
  name: "acme/llm-studio",
  url: "https://github.com/acme/llm-studio",
  description: "A local playground for LLM prompts",
};

function steppingClock(...isoTimes: string[]): () => Date {
  let index = 0;
  return () => new Date(isoTimes[Math.min(index++, isoTimes.length - 1)]);
}

describe("openCatalog (in memory)", () => {
  let catalog: CatalogStore;

  beforeEach(() => {
    catalog = openCatalog(
      ":memory:",
      steppingClock("2026-01-01T08:00:00.000Z", "2026-01-02T08:00:00.000Z")
    );
    catalog.ensureSchema();
  });

  afterEach(() => {
    catalog.close();
  });

  it("creates the schema idempotently", () => {
    expect(() => catalog.ensureSchema()).not.toThrow();
    expect(catalog.list()).toEqual([]);
  });

  it("inserts a new entry with empty enrichment fields", () => {
    catalog.upsertCandidate(repo);

    expect(catalog.get(repo.url)).toEqual({
      url: repo.url,
      name: "acme/llm-studio",
      descriptionTrendingPage: "A local playground for LLM prompts",
      lastSeenTrending: "2026-01-01T08:00:00.000Z",
      stars: null,
      createdAt: null,
      twitterHandle: null,
      screenshotPath: null,
    });
  });

  it("refreshes discovery fields and keeps a single row on repeat upserts", () => {
    catalog.upsertCandidate(repo);
    catalog.upsertCandidate({ ...repo, description: "Now with agents" });

    const entries = catalog.list();
    expect(entries).toHaveLength(1);
    expect(entries[0].descriptionTrendingPage).toBe("Now with agents");
    expect(entries[0].lastSeenTrending).toBe("2026-01-02T08:00:00.000Z");
  });

  it("returns undefined for an unknown url", () => {
    expect(catalog.get("https://github.com/acme/missing")).toBeUndefined();
  });

  it("sets only the screenshot path", () => {
    catalog.upsertCandidate(repo);

    expect(
      catalog.updateScreenshotPath(repo.url, "screenshots/acme_llm-studio_readme_4x3.png")
    ).toBe(true);

    const entry = catalog.get(repo.url);
    expect(entry?.screenshotPath).toBe("screenshots/acme_llm-studio_readme_4x3.png");
    expect(entry?.lastSeenTrending).toBe("2026-01-01T08:00:00.000Z");
  });

  it("ignores an empty screenshot path", () => {
    catalog.upsertCandidate(repo);
    catalog.updateScreenshotPath(repo.url, "shots/first.png");

    expect(catalog.updateScreenshotPath(repo.url, "")).toBe(false);
    expect(catalog.get(repo.url)?.screenshotPath).toBe("shots/first.png");
  });

  it("does not create a row when updating an unknown url", () => {
    expect(
      catalog.updateScreenshotPath("https://github.com/acme/missing", "x.png")
    ).toBe(false);
    expect(catalog.list()).toEqual([]);
  });
});

describe("openCatalog (on disk)", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "readme-scout-db-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("preserves enrichment fields written by other tooling across upserts", () => {
    const path = join(dir, "catalog.db");
    const catalog = openCatalog(
      path,
      steppingClock("2026-03-01T00:00:00.000Z", "2026-03-02T00:00:00.000Z")
    );
    catalog.ensureSchema();
    catalog.upsertCandidate(repo);
    catalog.updateScreenshotPath(repo.url, "shots/acme.png");

    const enrich = new Database(path);
    enrich
      .prepare(
        "UPDATE repositories SET stars = 1234, created_at = '2025-06-01T00:00:00Z', twitter_handle = '@acme' WHERE url = ?"
      )
      .run(repo.url);
    enrich.close();

    catalog.upsertCandidate({ ...repo, name: "acme/llm-studio-2" });

    expect(catalog.get(repo.url)).toEqual({
      url: repo.url,
      name: "acme/llm-studio-2",
      descriptionTrendingPage: repo.description,
      lastSeenTrending: "2026-03-02T00:00:00.000Z",
      stars: 1234,
      createdAt: "2025-06-01T00:00:00Z",
      twitterHandle: "@acme",
      screenshotPath: "shots/acme.png",
    });
    catalog.close();
  });

  it("reopens an existing catalog", () => {
    const path = join(dir, "catalog.db");
    const writer = openCatalog(path);
    writer.ensureSchema();
    writer.upsertCandidate(repo);
    writer.close();

    const reader = openCatalog(path);
    reader.ensureSchema();
    expect(reader.get(repo.url)?.name).toBe("acme/llm-studio");
    reader.close();
  });

  it("wraps write failures in StoreError", () => {
    const catalog = openCatalog(join(dir, "catalog.db"));
    // No ensureSchema: the table does not exist
    expect(() => catalog.upsertCandidate(repo)).toThrow(StoreError);
    catalog.close();
  });

  it("wraps open failures in StoreError", () => {
    expect(() => openCatalog(join(dir, "missing", "catalog.db"))).toThrow(
      StoreError
    );
  });
});

describe("deferCatalog", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "readme-scout-db-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates no file when closed without being used", () => {
    const path = join(dir, "catalog.db");
    const catalog = deferCatalog(path);

    catalog.close();

    expect(existsSync(path)).toBe(false);
  });

  it("opens the file and creates the schema on the first write", () => {
    const path = join(dir, "catalog.db");
    const catalog = deferCatalog(path, () => new Date("2026-04-01T00:00:00.000Z"));

    catalog.upsertCandidate(repo);
    catalog.close();

    expect(existsSync(path)).toBe(true);
    const reader = openCatalog(path);
    expect(reader.get(repo.url)?.lastSeenTrending).toBe("2026-04-01T00:00:00.000Z");
    reader.close();
  });

  it("surfaces open failures as StoreError on first use", () => {
    const catalog = deferCatalog(join(dir, "missing", "catalog.db"));

    expect(() => catalog.upsertCandidate(repo)).toThrow(StoreError);
    catalog.close();
  });
});
