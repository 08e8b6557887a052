import { describe, it, expect, vi, beforeEach } from "vitest";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";

vi.mock("../lib/scraping/http-cache", () => ({
  getCachedPage: vi.fn(),
  cachePage: vi.fn(),
}));

vi.mock("../lib/scraping/utils", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../lib/scraping/utils")>();
  return { ...actual, fetchPage: vi.fn() };
});

import { calculateGrowthRate, enrichWithPrices, withListingPrices } from "../lib/market-data/prices";
import { HttpMarketDataSource, parseDailyPricesXml } from "../lib/market-data/http";
import type { MarketDataSource } from "../lib/market-data/types";
import { fetchPage } from "../lib/scraping/utils";
import type { StockDetail } from "../lib/types";

const FEED = readFileSync(fileURLToPath(new URL("fixtures/daily-prices.xml", import.meta.url)), "utf-8");
const TEMPLATE = "https://prices.test/chart?symbol={ticker}&count={count}";

const DETAIL: StockDetail = {
  name: "한빛테크",
  sourceUrl: "https://detail.test/2101",
  ticker: "123450",
  marketSegment: "코스닥",
  sector: "소프트웨어",
  revenue: 45210,
  profitBeforeTax: 6120,
  netProfit: 5004,
  capital: 2500,
  totalShares: 1500000,
  parValue: 500,
  desiredPriceRange: "10,000 ~ 12,000 원",
  confirmedPrice: 12000,
  offeringAmount: 18000,
  underwriter: "미래증권",
  listingDate: "2024-05-14",
  competitionRate: "1203.45:1",
  employeeShares: 300000,
  institutionalShares: 900000,
  retailShares: 300000,
  tradableShares: "4,200,000 주",
  tradablePercent: "35.5%",
};

function market(getDailyPrices: MarketDataSource["getDailyPrices"]): MarketDataSource {
  return { name: "market:fake", getDailyPrices };
}

describe("calculateGrowthRate", () => {
  it.each([
    [2100, 1500, 40],
    [17250, 12000, 43.75],
    [1000, 3000, -66.67],
    [12000, 12000, 0],
  ])("close %s against %s -> %s%", (close, confirmed, expected) => {
    expect(calculateGrowthRate(close, confirmed)).toBe(expected);
  });

  it("is null without a usable offering price", () => {
    expect(calculateGrowthRate(2100, null)).toBeNull();
    expect(calculateGrowthRate(2100, 0)).toBeNull();
    expect(calculateGrowthRate(2100, -5)).toBeNull();
  });
});

describe("withListingPrices", () => {
  it("copies the detail with prices attached", () => {
    const result = withListingPrices(DETAIL, { open: 15000, high: 18900, low: 14700, close: 17250 });

    expect(result.prices).toEqual({ open: 15000, high: 18900, low: 14700, close: 17250, growthRate: 43.75 });
    expect(DETAIL.prices).toBeUndefined();
  });

  it("keeps prices but no growth rate when the offering price is missing", () => {
    const result = withListingPrices({ ...DETAIL, confirmedPrice: null }, { open: 1, high: 2, low: 1, close: 2 });
    expect(result.prices?.growthRate).toBeNull();
  });
});

describe("enrichWithPrices", () => {
  it("asks the market for the listing date", async () => {
    const getDailyPrices = vi.fn<MarketDataSource["getDailyPrices"]>().mockResolvedValue({
      open: 15000,
      high: 18900,
      low: 14700,
      close: 17250,
    });

    const outcome = await enrichWithPrices(DETAIL, market(getDailyPrices));

    expect(getDailyPrices).toHaveBeenCalledWith("123450", "2024-05-14", undefined);
    expect(outcome.ok && outcome.detail.prices?.close).toBe(17250);
  });

  it("skips a detail without a ticker", async () => {
    const getDailyPrices = vi.fn<MarketDataSource["getDailyPrices"]>();

    expect(await enrichWithPrices({ ...DETAIL, ticker: null }, market(getDailyPrices))).toEqual({
      ok: false,
      message: "no ticker",
    });
    expect(getDailyPrices).not.toHaveBeenCalled();
  });

  it("skips a detail without a listing date", async () => {
    const getDailyPrices = vi.fn<MarketDataSource["getDailyPrices"]>();

    expect(await enrichWithPrices({ ...DETAIL, listingDate: null }, market(getDailyPrices))).toEqual({
      ok: false,
      message: "no listing date",
    });
    expect(getDailyPrices).not.toHaveBeenCalled();
  });

  it("reports a day without trading", async () => {
    const outcome = await enrichWithPrices(DETAIL, market(async () => null));
    expect(outcome).toEqual({ ok: false, message: "no trading on 2024-05-14 for 123450" });
  });

  it("turns a market error into a skip", async () => {
    const outcome = await enrichWithPrices(
      DETAIL,
      market(async () => {
        throw new Error("socket hang up");
      })
    );
    expect(outcome).toEqual({ ok: false, message: "market:fake failed: socket hang up" });
  });
});

describe("parseDailyPricesXml", () => {
  it("finds the requested day", () => {
    expect(parseDailyPricesXml(FEED, "2024-05-14")).toEqual({ open: 15000, high: 18900, low: 14700, close: 17250 });
    expect(parseDailyPricesXml(FEED, "2024-05-17")).toEqual({ open: 16000, high: 16450, low: 15720, close: 16300 });
  });

  it("treats a zero bar as no trading", () => {
    expect(parseDailyPricesXml(FEED, "2024-05-16")).toBeNull();
  });

  it("returns null for a day outside the feed", () => {
    expect(parseDailyPricesXml(FEED, "2024-05-13")).toBeNull();
  });
});

describe("HttpMarketDataSource", () => {
  const mockFetch = fetchPage as ReturnType<typeof vi.fn>;
  const source = new HttpMarketDataSource({ urlTemplate: TEMPLATE, now: () => new Date(2024, 4, 20) });

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("requests enough daily bars to reach the listing date", () => {
    expect(source.feedUrl("123450", "2024-05-14")).toBe("https://prices.test/chart?symbol=123450&count=11");
  });

  it("does not look up a listing date in the future", async () => {
    expect(await source.getDailyPrices("123450", "2024-05-21")).toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("fetches the feed through the prices cache", async () => {
    mockFetch.mockResolvedValue(FEED);

    const prices = await source.getDailyPrices("123450", "2024-05-15");

    expect(prices).toEqual({ open: 17300, high: 17600, low: 15800, close: 16100 });
    expect(mockFetch).toHaveBeenCalledWith("https://prices.test/chart?symbol=123450&count=10", {
      signal: undefined,
      cache: "prices",
    });
  });
});
