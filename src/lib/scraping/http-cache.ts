import { createHash } from "crypto";
import type Database from "better-sqlite3";
import { config } from "../config";
import { getDb } from "../db";

export type PageKind = keyof typeof config.cacheTtlMs;

export const PAGE_KINDS: readonly PageKind[] = ["calendar", "detail", "prices"];

function urlHash(url: string): string {
  return createHash("sha256").update(url).digest("hex");
}

/** Fresh body for url, or null. Lifetime comes from the page kind's TTL. */
export function getCachedPage(url: string, kind: PageKind, database: Database.Database = getDb()): string | null {
  const ttl = config.cacheTtlMs[kind];
  if (ttl <= 0) return null;

  const row = database
    .prepare("SELECT body, fetched_at FROM http_cache WHERE url_hash = ? AND kind = ?")
    .get(urlHash(url), kind) as { body: string; fetched_at: number } | undefined;

  if (!row || Date.now() - row.fetched_at > ttl) return null;
  return row.body;
}

export function cachePage(url: string, kind: PageKind, body: string, database: Database.Database = getDb()): void {
  if (config.cacheTtlMs[kind] <= 0) return;
  database
    .prepare(
      `INSERT OR REPLACE INTO http_cache (url_hash, url, kind, body, fetched_at)
       VALUES (?, ?, ?, ?, ?)`
    )
    .run(urlHash(url), url, kind, body, Date.now());
}

/** Delete entries older than their kind's TTL. Returns the number of rows deleted. */
export function pruneHttpCache(database: Database.Database = getDb()): number {
  const now = Date.now();
  const statement = database.prepare("DELETE FROM http_cache WHERE kind = ? AND fetched_at < ?");
  let deleted = 0;
  for (const kind of PAGE_KINDS) {
    deleted += statement.run(kind, now - Math.max(config.cacheTtlMs[kind], 0)).changes;
  }
  if (deleted > 0) {
    console.log(`[cache] pruned ${deleted} expired pages`);
  }
  return deleted;
}
