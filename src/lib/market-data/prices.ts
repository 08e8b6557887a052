import type { StockDetail } from "../types";
import type { DailyPrices, MarketDataSource } from "./types";
import { errorMessage } from "../errors";

export type PriceOutcome = { ok: true; detail: StockDetail } | { ok: false; message: string };

/** Percent change from the confirmed offering price to the close, 2 decimals. */
export function calculateGrowthRate(close: number, confirmedPrice: number | null): number | null {
  if (confirmedPrice === null || confirmedPrice <= 0) return null;
  return Math.round(((close - confirmedPrice) / confirmedPrice) * 10000) / 100;
}

export function withListingPrices(detail: StockDetail, daily: DailyPrices): StockDetail {
  return {
    ...detail,
    prices: { ...daily, growthRate: calculateGrowthRate(daily.close, detail.confirmedPrice) },
  };
}

/**
 * Look up the listing-day prices for an enriched detail. The detail is left
 * as it was when it has no ticker or listing date, or the market has no data.
 */
export async function enrichWithPrices(
  detail: StockDetail,
  market: MarketDataSource,
  signal?: AbortSignal
): Promise<PriceOutcome> {
  if (!detail.ticker) return { ok: false, message: "no ticker" };
  if (!detail.listingDate) return { ok: false, message: "no listing date" };

  let daily: DailyPrices | null;
  try {
    daily = await market.getDailyPrices(detail.ticker, detail.listingDate, signal);
  } catch (error) {
    return { ok: false, message: `${market.name} failed: ${errorMessage(error)}` };
  }
  if (!daily) return { ok: false, message: `no trading on ${detail.listingDate} for ${detail.ticker}` };

  return { ok: true, detail: withListingPrices(detail, daily) };
}
