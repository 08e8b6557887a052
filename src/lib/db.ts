import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { config } from "./config";
import type { ScrapeReport } from "./types";

let db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (db) return db;

  const dbPath = path.resolve(process.cwd(), config.dbPath);
  const dir = path.dirname(dbPath);

  // Ensure directory exists
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  initSchema(db);
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

export function initSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS scrape_runs (
      id TEXT PRIMARY KEY,
      year INTEGER NOT NULL,
      months TEXT NOT NULL,
      attempted INTEGER NOT NULL DEFAULT 0,
      succeeded INTEGER NOT NULL DEFAULT 0,
      failed INTEGER NOT NULL DEFAULT 0,
      unavailable_months TEXT NOT NULL DEFAULT '',
      cancelled INTEGER NOT NULL DEFAULT 0,
      started_at TEXT NOT NULL,
      finished_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS stock_records (
      identifier TEXT PRIMARY KEY,
      run_id TEXT NOT NULL REFERENCES scrape_runs(id),
      year INTEGER NOT NULL,
      month INTEGER NOT NULL,
      name TEXT NOT NULL,
      segment TEXT NOT NULL,
      listing_date TEXT,
      confirmed_price INTEGER,
      detail_json TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS scrape_failures (
      run_id TEXT NOT NULL REFERENCES scrape_runs(id),
      identifier TEXT NOT NULL,
      month INTEGER NOT NULL,
      reason TEXT NOT NULL,
      message TEXT NOT NULL,
      PRIMARY KEY (run_id, identifier)
    );

    CREATE TABLE IF NOT EXISTS http_cache (
      url_hash     TEXT PRIMARY KEY,
      url          TEXT NOT NULL,
      kind         TEXT NOT NULL,
      body         TEXT NOT NULL,
      fetched_at   INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_stock_records_year ON stock_records(year, listing_date);
    CREATE INDEX IF NOT EXISTS idx_http_cache_kind ON http_cache(kind, fetched_at);
  `);
}

/** Persist a report: the run row, enriched records (upserted) and failures. */
export function saveReport(database: Database.Database, report: ScrapeReport): void {
  const insertRun = database.prepare(`
    INSERT OR REPLACE INTO scrape_runs
      (id, year, months, attempted, succeeded, failed, unavailable_months, cancelled, started_at, finished_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const upsertRecord = database.prepare(`
    INSERT INTO stock_records
      (identifier, run_id, year, month, name, segment, listing_date, confirmed_price, detail_json, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(identifier) DO UPDATE SET
      run_id = excluded.run_id,
      year = excluded.year,
      month = excluded.month,
      name = excluded.name,
      segment = excluded.segment,
      listing_date = excluded.listing_date,
      confirmed_price = excluded.confirmed_price,
      detail_json = excluded.detail_json,
      updated_at = excluded.updated_at
  `);
  const insertFailure = database.prepare(`
    INSERT OR REPLACE INTO scrape_failures (run_id, identifier, month, reason, message)
    VALUES (?, ?, ?, ?, ?)
  `);

  const tx = database.transaction(() => {
    const { counters } = report;
    insertRun.run(
      report.runId,
      report.year,
      report.months.join(","),
      counters.attempted,
      counters.succeeded,
      counters.failed,
      report.monthFailures.map((f) => f.month).join(","),
      report.cancelled ? 1 : 0,
      report.startedAt,
      report.finishedAt
    );

    for (const record of report.records) {
      if (!record.detail) continue;
      upsertRecord.run(
        record.identifier,
        report.runId,
        report.year,
        record.month,
        record.detail.name,
        record.segment,
        record.detail.listingDate,
        record.detail.confirmedPrice,
        JSON.stringify(record.detail),
        report.finishedAt
      );
    }

    for (const failure of report.failures) {
      insertFailure.run(report.runId, failure.identifier, failure.month, failure.reason, failure.message);
    }
  });
  tx();
}
