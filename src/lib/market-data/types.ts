export interface DailyPrices {
  open: number;
  high: number;
  low: number;
  close: number;
}

/**
 * Daily prices by exchange ticker. Resolves null when there was no trading
 * on that date; rejects only when the data source cannot be reached.
 */
export interface MarketDataSource {
  name: string;
  getDailyPrices(ticker: string, date: string, signal?: AbortSignal): Promise<DailyPrices | null>;
}
