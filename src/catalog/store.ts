import Database from "better-sqlite3";
import type { Candidate } from "../sources/types.js";

export interface CatalogEntry {
  url: string;
  name: string;
  descriptionTrendingPage: string;
  /** ISO-8601 timestamp of the latest discovery run that saw this repo. */
  lastSeenTrending: string;
  // Enrichment fields: written by other tooling, never by discovery.
  stars: number | null;
  createdAt: string | null;
  twitterHandle: string | null;
  screenshotPath: string | null;
}

export interface CatalogStore {
  ensureSchema(): void;
  upsertCandidate(candidate: Pick<Candidate, "name" | "url" | "description">): void;
  /** Returns false when `path` is empty or no row matches `url`. */
  updateScreenshotPath(url: string, path: string): boolean;
  get(url: string): CatalogEntry | undefined;
  list(): CatalogEntry[];
  close(): void;
}

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

interface CatalogRow {
  url: string;
  name: string;
  description_trending_page: string;
  last_seen_trending: string;
  stars: number | null;
  created_at: string | null;
  twitter_handle: string | null;
  screenshot_path: string | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS repositories (
    url TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    description_trending_page TEXT NOT NULL DEFAULT '',
    last_seen_trending TEXT NOT NULL,
    stars INTEGER,
    created_at TEXT,
    twitter_handle TEXT,
    screenshot_path TEXT
  )
`;

// Not a blind overwrite: on conflict only the discovery columns change and
// the enrichment columns keep whatever the stored row already holds.
const UPSERT = `
  INSERT INTO repositories (url, name, description_trending_page, last_seen_trending)
  VALUES (@url, @name, @description, @seenAt)
  ON CONFLICT(url) DO UPDATE SET
    name = excluded.name,
    description_trending_page = excluded.description_trending_page,
    last_seen_trending = excluded.last_seen_trending
`;

const UPDATE_SCREENSHOT = `
  UPDATE repositories SET screenshot_path = @path WHERE url = @url
`;

const SELECT_ONE = `SELECT * FROM repositories WHERE url = ?`;
const SELECT_ALL = `SELECT * FROM repositories ORDER BY last_seen_trending DESC, url`;

function toEntry(row: CatalogRow): CatalogEntry {
  return {
    url: row.url,
    name: row.name,
    descriptionTrendingPage: row.description_trending_page,
    lastSeenTrending: row.last_seen_trending,
    stars: row.stars,
    createdAt: row.created_at,
    twitterHandle: row.twitter_handle,
    screenshotPath: row.screenshot_path,
  };
}

function guard<T>(action: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof StoreError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new StoreError(`Catalog ${action} failed: ${reason}`, {
      cause: error,
    });
  }
}

/**
 * Open (or create) the SQLite catalog at `path`. `":memory:"` gives a
 * throwaway in-process catalog.
 */
export function openCatalog(
  path: string,
  clock: () => Date = () => new Date()
): CatalogStore {
  const db = guard("open", () => new Database(path));

  return {
    ensureSchema() {
      guard("schema creation", () => db.exec(SCHEMA));
    },

    upsertCandidate(candidate) {
      guard(`upsert of ${candidate.url}`, () => {
        db.prepare(UPSERT).run({
          url: candidate.url,
          name: candidate.name,
          description: candidate.description,
          seenAt: clock().toISOString(),
        });
      });
    },

    updateScreenshotPath(url, path) {
      if (!path) return false;
      return guard(`screenshot update of ${url}`, () => {
        const result = db.prepare(UPDATE_SCREENSHOT).run({ url, path });
        return result.changes > 0;
      });
    },

    get(url) {
      return guard(`read of ${url}`, () => {
        const row = db.prepare<[string], CatalogRow>(SELECT_ONE).get(url);
        return row ? toEntry(row) : undefined;
      });
    },

    list() {
      return guard("listing", () =>
        db.prepare<[], CatalogRow>(SELECT_ALL).all().map(toEntry)
      );
    },

    close() {
      db.close();
    },
  };
}

/**
 * A catalog that opens the database and creates the schema on first use.
 * Closing a catalog that was never used touches nothing on disk.
 */
export function deferCatalog(
  path: string,
  clock: () => Date = () => new Date()
): CatalogStore {
  let store: CatalogStore | undefined;
  const opened = (): CatalogStore => {
    if (!store) {
      store = openCatalog(path, clock);
      store.ensureSchema();
    }
    return store;
  };

  return {
    ensureSchema: () => opened().ensureSchema(),
    upsertCandidate: (candidate) => opened().upsertCandidate(candidate),
    updateScreenshotPath: (url, screenshotPath) =>
      opened().updateScreenshotPath(url, screenshotPath),
    get: (url) => opened().get(url),
    list: () => opened().list(),
    close() {
      store?.close();
      store = undefined;
    },
  };
}
