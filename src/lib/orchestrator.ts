import pLimit from "p-limit";
import { FailureReason, type Identifier, type ScrapeReport, type StockDetail, type StockRecord } from "./types";
import type { CalendarSource, DetailOutcome, DetailSource } from "./sources/types";
import type { MarketDataSource } from "./market-data/types";
import { enrichWithPrices } from "./market-data/prices";
import { ReportBuilder } from "./report";
import { createRecord, markEnriched, markFailed } from "./record";
import { ConfigurationError, SourceUnavailableError, errorMessage } from "./errors";

export type Logger = Pick<Console, "log" | "warn" | "error">;

export const MIN_YEAR = 1900;
export const MAX_YEAR = 9999;

export interface OrchestratorOptions {
  calendar: CalendarSource;
  detail: DetailSource;
  /** Adds listing-day prices to enriched records when given */
  market?: MarketDataSource;
  logger?: Logger;
  /** Max detail fetches in flight within one month (default 1) */
  concurrency?: number;
}

export interface RunOptions {
  signal?: AbortSignal;
  runId?: string;
}

/** Validate run input and return the months in ascending order, de-duplicated. */
export function validateRunInput(year: number, months: Iterable<number>): number[] {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new ConfigurationError(`Invalid year ${year}: expected an integer between ${MIN_YEAR} and ${MAX_YEAR}`);
  }
  const unique = [...new Set(months)];
  if (unique.length === 0) {
    throw new ConfigurationError("At least one month is required");
  }
  for (const month of unique) {
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new ConfigurationError(`Invalid month ${month}: expected an integer between 1 and 12`);
    }
  }
  return unique.sort((a, b) => a - b);
}

function monthLabel(year: number, month: number): string {
  return `${year}-${String(month).padStart(2, "0")}`;
}

export class Orchestrator {
  private readonly calendar: CalendarSource;
  private readonly detail: DetailSource;
  private readonly market: MarketDataSource | null;
  private readonly logger: Logger;
  private readonly concurrency: number;

  constructor(options: OrchestratorOptions) {
    const concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`Invalid concurrency ${concurrency}: expected a positive integer`);
    }
    this.calendar = options.calendar;
    this.detail = options.detail;
    this.market = options.market ?? null;
    this.logger = options.logger ?? console;
    this.concurrency = concurrency;
  }

  async run(year: number, months: Iterable<number>, options: RunOptions = {}): Promise<ScrapeReport> {
    const { signal } = options;
    const sortedMonths = validateRunInput(year, months);
    const builder = new ReportBuilder(year, sortedMonths, { runId: options.runId });
    const seen = new Set<Identifier>();

    this.logger.log(
      `[orchestrator] Run ${builder.runId}: ${year}, months ${sortedMonths.join(",")} (${this.calendar.name} -> ${this.detail.name})`
    );

    for (const month of sortedMonths) {
      if (signal?.aborted) break;

      const listed = await this.listMonth(year, month, builder, signal);
      if (listed === null) continue;

      // First occurrence wins, across months and within one
      const fresh: Identifier[] = [];
      for (const id of listed) {
        if (seen.has(id)) continue;
        seen.add(id);
        fresh.push(id);
      }
      const dropped = listed.length - fresh.length;

      const records = await this.enrichMonth(month, fresh, signal);
      for (const record of records) builder.add(record);

      const succeeded = records.filter((r) => r.failure === null).length;
      this.logger.log(
        `[orchestrator] ${monthLabel(year, month)}: ${listed.length} listed, ${dropped} duplicates dropped, ` +
          `${succeeded} enriched, ${records.length - succeeded} failed`
      );
    }

    if (signal?.aborted) {
      builder.markCancelled();
      this.logger.warn(`[orchestrator] Run ${builder.runId} cancelled, returning partial report`);
    }

    const report = builder.finalize();
    const { attempted, succeeded, failed } = report.counters;
    this.logger.log(
      `[orchestrator] Run ${report.runId} complete: ${attempted} attempted, ${succeeded} succeeded, ` +
        `${failed} failed, ${report.monthFailures.length} months unavailable`
    );
    return report;
  }

  /** Drain one month's calendar. Returns null when the month is unavailable. */
  private async listMonth(
    year: number,
    month: number,
    builder: ReportBuilder,
    signal?: AbortSignal
  ): Promise<Identifier[] | null> {
    const identifiers: Identifier[] = [];
    try {
      for await (const id of this.calendar.listIdentifiers(year, month, signal)) {
        identifiers.push(id);
      }
      return identifiers;
    } catch (error) {
      if (signal?.aborted) return null;
      const message =
        error instanceof SourceUnavailableError
          ? error.message
          : `Unexpected calendar error: ${errorMessage(error)}`;
      this.logger.warn(`[orchestrator] ${monthLabel(year, month)} skipped: ${message}`);
      builder.addMonthFailure(month, message);
      return null;
    }
  }

  /** Enrich a month's identifiers. Results come back in yield order. */
  private async enrichMonth(
    month: number,
    identifiers: Identifier[],
    signal?: AbortSignal
  ): Promise<StockRecord[]> {
    const limit = pLimit(this.concurrency);
    const results: (StockRecord | null)[] = identifiers.map(() => null);

    await Promise.all(
      identifiers.map((id, index) =>
        limit(async () => {
          if (signal?.aborted) return;
          results[index] = await this.enrichOne(id, month, signal);
        })
      )
    );

    return results.filter((r): r is StockRecord => r !== null);
  }

  private async enrichOne(id: Identifier, month: number, signal?: AbortSignal): Promise<StockRecord | null> {
    const pending = createRecord(id, month);

    let outcome: DetailOutcome;
    try {
      outcome = await this.detail.fetchDetail(id, signal);
    } catch (error) {
      outcome = { ok: false, reason: FailureReason.UNKNOWN, message: errorMessage(error) };
    }

    if (outcome.ok) {
      return markEnriched(pending, await this.addPrices(id, outcome.detail, signal));
    }
    // A fetch cut short by cancellation was never really attempted
    if (outcome.reason === FailureReason.TIMEOUT && signal?.aborted) return null;
    return markFailed(pending, outcome.reason, outcome.message);
  }

  private async addPrices(id: Identifier, detail: StockDetail, signal?: AbortSignal): Promise<StockDetail> {
    if (!this.market) return detail;
    const result = await enrichWithPrices(detail, this.market, signal);
    if (!result.ok) {
      this.logger.log(`[orchestrator] ${id}: no listing-day prices (${result.message})`);
      return detail;
    }
    return result.detail;
  }
}
