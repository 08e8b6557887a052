import * as cheerio from "cheerio";
import { config } from "../config";
import type { DailyPrices, MarketDataSource } from "./types";
import { fetchPage, fillTemplate } from "../scraping/utils";
import { parseIsoDate } from "../date-range";

const DAY_MS = 24 * 60 * 60 * 1000;
// Calendar days always cover at least as many trading days
const EXTRA_DAYS = 5;

/**
 * Find one day in a daily chart feed:
 * <item data="20240514|12500|16800|12100|15300|1830211" />
 */
export function parseDailyPricesXml(xml: string, date: string): DailyPrices | null {
  const $ = cheerio.load(xml, { xmlMode: true });
  const key = date.replace(/-/g, "");
  let found: DailyPrices | null = null;

  $("item").each((_, el) => {
    const fields = ($(el).attr("data") ?? "").split("|");
    if (fields[0] !== key || fields.length < 5) return;

    const [open, high, low, close] = fields.slice(1, 5).map(Number);
    if (![open, high, low, close].every(Number.isFinite)) return false;
    // Zero open and close means the stock did not trade
    if (open === 0 && close === 0) return false;

    found = { open, high, low, close };
    return false;
  });

  return found;
}

export interface HttpMarketDataSourceOptions {
  urlTemplate?: string;
  now?: () => Date;
}

export class HttpMarketDataSource implements MarketDataSource {
  readonly name = "market:http";
  private readonly urlTemplate: string;
  private readonly now: () => Date;

  constructor(options: HttpMarketDataSourceOptions = {}) {
    this.urlTemplate = options.urlTemplate ?? config.priceUrl;
    this.now = options.now ?? (() => new Date());
  }

  /** Feed URL asking for enough daily bars to reach back to `date`; null for a future date. */
  feedUrl(ticker: string, date: string): string | null {
    const target = parseIsoDate(date);
    if (!target) return null;
    const days = Math.ceil((this.now().getTime() - target.getTime()) / DAY_MS);
    if (days < 0) return null;
    return fillTemplate(this.urlTemplate, { ticker, count: days + EXTRA_DAYS });
  }

  async getDailyPrices(ticker: string, date: string, signal?: AbortSignal): Promise<DailyPrices | null> {
    const url = this.feedUrl(ticker, date);
    if (!url) return null;
    const xml = await fetchPage(url, { signal, cache: "prices" });
    return parseDailyPricesXml(xml, date);
  }
}
