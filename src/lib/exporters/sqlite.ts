import type Database from "better-sqlite3";
import type { ScrapeReport } from "../types";
import type { Exporter, ExportOutcome } from "./types";
import { getDb, saveReport } from "../db";
import { ExportFailure, errorMessage } from "../errors";

/** Stores runs, enriched records and failures in SQLite. */
export class SqliteExporter implements Exporter {
  readonly name = "sqlite";
  private readonly database: Database.Database | null;

  constructor(database?: Database.Database) {
    this.database = database ?? null;
  }

  async export(report: ScrapeReport): Promise<ExportOutcome> {
    try {
      const db = this.database ?? getDb();
      saveReport(db, report);
      return { ok: true, destination: db.name, rows: report.records.length };
    } catch (error) {
      return {
        ok: false,
        error: new ExportFailure(`Failed to save run ${report.runId}: ${errorMessage(error)}`, { cause: error }),
      };
    }
  }
}
