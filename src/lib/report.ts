import { randomUUID } from "crypto";
import {
  EnrichmentStatus,
  type FailureEntry,
  type MonthFailure,
  type ScrapeReport,
  type StockRecord,
} from "./types";
import { ReportFinalizedError } from "./errors";

/**
 * Accumulates one run's outcomes. Enriched records go to the success side,
 * failed records to the failure side; `finalize()` returns a deep-frozen
 * report and closes the builder.
 */
export class ReportBuilder {
  readonly runId: string;
  readonly year: number;
  readonly months: readonly number[];
  readonly startedAt: string;

  private readonly records: StockRecord[] = [];
  private readonly failures: FailureEntry[] = [];
  private readonly monthFailures: MonthFailure[] = [];
  private attempted = 0;
  private cancelled = false;
  private finalized: ScrapeReport | null = null;
  private readonly now: () => Date;

  constructor(year: number, months: readonly number[], options: { runId?: string; now?: () => Date } = {}) {
    this.runId = options.runId ?? randomUUID();
    this.year = year;
    this.months = Object.freeze([...new Set(months)].sort((a, b) => a - b));
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now().toISOString();
  }

  get counters(): { attempted: number; succeeded: number; failed: number } {
    return {
      attempted: this.attempted,
      succeeded: this.records.length,
      failed: this.failures.length,
    };
  }

  get isFinalized(): boolean {
    return this.finalized !== null;
  }

  /** Add a record that has left the pending state. */
  add(record: StockRecord): void {
    this.assertOpen();
    if (record.status === EnrichmentStatus.ENRICHED) {
      this.records.push(record);
    } else if (record.status === EnrichmentStatus.FAILED && record.failure) {
      this.failures.push(
        Object.freeze({
          identifier: record.identifier,
          month: record.month,
          reason: record.failure.reason,
          message: record.failure.message,
        })
      );
    } else {
      throw new Error(`Record ${record.identifier} is still ${record.status}`);
    }
    this.attempted++;
  }

  addMonthFailure(month: number, message: string): void {
    this.assertOpen();
    this.monthFailures.push(Object.freeze({ month, message }));
  }

  markCancelled(): void {
    this.assertOpen();
    this.cancelled = true;
  }

  finalize(): ScrapeReport {
    if (this.finalized) return this.finalized;

    this.finalized = Object.freeze({
      runId: this.runId,
      year: this.year,
      months: this.months,
      records: Object.freeze([...this.records]),
      failures: Object.freeze([...this.failures]),
      monthFailures: Object.freeze([...this.monthFailures]),
      counters: Object.freeze(this.counters),
      cancelled: this.cancelled,
      startedAt: this.startedAt,
      finishedAt: this.now().toISOString(),
    });
    return this.finalized;
  }

  private assertOpen(): void {
    if (this.finalized) throw new ReportFinalizedError();
  }
}
