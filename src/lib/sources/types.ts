import type { FailureReason, Identifier, StockDetail } from "../types";

export type DetailOutcome =
  | { ok: true; detail: StockDetail }
  | { ok: false; reason: FailureReason; message: string };

/**
 * Lists the identifiers published in one month of the calendar.
 * Each call returns a fresh, finite sequence. An unreachable calendar
 * surfaces as a SourceUnavailableError while iterating.
 */
export interface CalendarSource {
  name: string;
  listIdentifiers(year: number, month: number, signal?: AbortSignal): AsyncIterable<Identifier>;
}

/** Fetches one identifier's detail page. Never rejects. */
export interface DetailSource {
  name: string;
  fetchDetail(identifier: Identifier, signal?: AbortSignal): Promise<DetailOutcome>;
}
