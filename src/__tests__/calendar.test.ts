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

import {
  HttpCalendarSource,
  extractTotalPages,
  filterCalendarRows,
  identifierFromHref,
  parseCalendarHtml,
} from "../lib/sources/calendar";
import { fetchPage } from "../lib/scraping/utils";
import { SourceUnavailableError } from "../lib/errors";

function fixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`fixtures/${name}`, import.meta.url)), "utf-8");
}

const PAGE_1 = fixture("calendar-page1.html");
const PAGE_2 = fixture("calendar-page2.html");
const TEMPLATE = "https://calendar.test/ipo?year={year}&month={month}";

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const id of iterable) out.push(id);
  return out;
}

describe("identifierFromHref", () => {
  it("extracts the listing number", () => {
    expect(identifierFromHref("/html/fund/?o=v&no=1843&l=")).toBe("1843");
  });

  it("returns null without a number", () => {
    expect(identifierFromHref("/html/fund/index.htm?o=k")).toBeNull();
  });
});

describe("parseCalendarHtml", () => {
  it("reads every linked row with its first date", () => {
    expect(parseCalendarHtml(PAGE_1)).toEqual([
      { identifier: "2101", name: "한빛테크", date: "2024-05-02" },
      { identifier: "2102", name: "가온제1호스팩", date: "2024-05-07" },
      { identifier: "2103", name: "누리바이오", date: "2024-05-20" },
      { identifier: "2099", name: "다온소재", date: "2024-04-29" },
    ]);
  });

  it("finds the last page from the paging links", () => {
    expect(extractTotalPages(PAGE_1)).toBe(2);
    expect(extractTotalPages(PAGE_2)).toBe(1);
  });
});

describe("filterCalendarRows", () => {
  const rows = parseCalendarHtml(PAGE_1);

  it("drops SPACs and rows from other months", () => {
    expect(filterCalendarRows(rows, 2024, 5).map((r) => r.identifier)).toEqual(["2101", "2103"]);
  });

  it("applies an inclusive window", () => {
    const window = { from: "2024-05-20", to: "2024-05-20" };
    expect(filterCalendarRows(rows, 2024, 5, window).map((r) => r.identifier)).toEqual(["2103"]);
  });

  it("keeps rows without a date", () => {
    const undated = [{ identifier: "9", name: "무일정", date: null }];
    expect(filterCalendarRows(undated, 2024, 5, { to: "2024-05-01" })).toEqual(undated);
  });
});

describe("HttpCalendarSource", () => {
  const mockFetch = fetchPage as ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("walks every page and yields the month's identifiers in page order", async () => {
    mockFetch.mockImplementation(async (url: string) => (url.endsWith("&page=2") ? PAGE_2 : PAGE_1));
    const source = new HttpCalendarSource({ urlTemplate: TEMPLATE });

    const ids = await collect(source.listIdentifiers(2024, 5));

    expect(ids).toEqual(["2101", "2103", "2104"]);
    expect(mockFetch.mock.calls.map((c) => c[0])).toEqual([
      "https://calendar.test/ipo?year=2024&month=5",
      "https://calendar.test/ipo?year=2024&month=5&page=2",
    ]);
    expect(mockFetch.mock.calls[0][1]).toMatchObject({ cache: "calendar" });
  });

  it("stops at the window's upper bound", async () => {
    mockFetch.mockImplementation(async (url: string) => (url.endsWith("&page=2") ? PAGE_2 : PAGE_1));
    const source = new HttpCalendarSource({ urlTemplate: TEMPLATE, window: { to: "2024-05-20" } });

    expect(await collect(source.listIdentifiers(2024, 5))).toEqual(["2101", "2103"]);
  });

  it("raises SourceUnavailableError when a page cannot be fetched", async () => {
    mockFetch.mockRejectedValue(new Error("HTTP 500 for https://calendar.test/ipo?year=2024&month=5"));
    const source = new HttpCalendarSource({ urlTemplate: TEMPLATE });

    const error = await collect(source.listIdentifiers(2024, 5)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({
      year: 2024,
      month: 5,
      message:
        "Calendar https://calendar.test/ipo?year=2024&month=5 unavailable: HTTP 500 for https://calendar.test/ipo?year=2024&month=5",
    });
  });

  it("passes an abort through unwrapped", async () => {
    const controller = new AbortController();
    const abortError = new Error("This operation was aborted");
    abortError.name = "AbortError";
    mockFetch.mockImplementation(async () => {
      controller.abort();
      throw abortError;
    });
    const source = new HttpCalendarSource({ urlTemplate: TEMPLATE });

    const error = await collect(source.listIdentifiers(2024, 5, controller.signal)).catch((e: unknown) => e);

    expect(error).toBe(abortError);
  });
});
