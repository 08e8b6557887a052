import * as cheerio from "cheerio";
import { config } from "../config";
import type { Identifier } from "../types";
import type { CalendarSource } from "./types";
import { fetchPage, fillTemplate, cleanText, normalizeDate } from "../scraping/utils";
import { SourceUnavailableError, errorMessage } from "../errors";

const ROW_SELECTOR = 'table[summary="공모주 청약일정"] tr';
const PAGE_LINK_SELECTOR = 'a[href*="page="]';
const SPAC_MARKER = "스팩";

export interface CalendarRow {
  identifier: Identifier;
  name: string;
  date: string | null; // YYYY-MM-DD, first date in the row
}

/** Inclusive YYYY-MM-DD bounds on a row's date. */
export interface DateWindow {
  from?: string;
  to?: string;
}

/** Listing number from a detail link, e.g. "/html/fund/?o=v&no=1843&l=" -> "1843" */
export function identifierFromHref(href: string): Identifier | null {
  const match = href.match(/[?&]no=(\d+)/);
  return match ? match[1] : null;
}

export function parseCalendarHtml(html: string): CalendarRow[] {
  const $ = cheerio.load(html);
  const rows: CalendarRow[] = [];

  $(ROW_SELECTOR).each((_, el) => {
    const $row = $(el);
    const link = $row.find('a[href*="no="]').first();
    const href = link.attr("href");
    if (!href) return;

    const identifier = identifierFromHref(href);
    if (!identifier) return;

    let date: string | null = null;
    $row.find("td").each((_, td) => {
      const parsed = normalizeDate($(td).text());
      if (parsed) {
        date = parsed;
        return false;
      }
    });

    rows.push({ identifier, name: cleanText(link.text()), date });
  });

  return rows;
}

export function extractTotalPages(html: string): number {
  const $ = cheerio.load(html);
  let maxPage = 1;
  $(PAGE_LINK_SELECTOR).each((_, el) => {
    const match = ($(el).attr("href") ?? "").match(/[?&]page=(\d+)/);
    if (match) {
      const num = parseInt(match[1], 10);
      if (num > maxPage) maxPage = num;
    }
  });
  return maxPage;
}

export function isSpac(name: string): boolean {
  return name.includes(SPAC_MARKER);
}

/**
 * Keep rows that belong to year/month, fall inside the window and are not SPACs.
 * Rows without a date are kept; the page they came from is already scoped to the month.
 */
export function filterCalendarRows(
  rows: CalendarRow[],
  year: number,
  month: number,
  window: DateWindow = {}
): CalendarRow[] {
  const prefix = `${year}-${String(month).padStart(2, "0")}-`;
  return rows.filter((row) => {
    if (isSpac(row.name)) return false;
    if (!row.date) return true;
    if (!row.date.startsWith(prefix)) return false;
    if (window.from && row.date < window.from) return false;
    if (window.to && row.date > window.to) return false;
    return true;
  });
}

function pageUrl(baseUrl: string, page: number): string {
  if (page <= 1) return baseUrl;
  return `${baseUrl}${baseUrl.includes("?") ? "&" : "?"}page=${page}`;
}

export interface HttpCalendarSourceOptions {
  urlTemplate?: string;
  window?: DateWindow;
}

export class HttpCalendarSource implements CalendarSource {
  readonly name = "calendar:http";
  private readonly urlTemplate: string;
  private readonly window: DateWindow;

  constructor(options: HttpCalendarSourceOptions = {}) {
    this.urlTemplate = options.urlTemplate ?? config.calendarUrl;
    this.window = options.window ?? {};
  }

  async *listIdentifiers(year: number, month: number, signal?: AbortSignal): AsyncIterable<Identifier> {
    const baseUrl = fillTemplate(this.urlTemplate, { year, month });

    let rows: CalendarRow[];
    try {
      rows = await this.fetchAllRows(baseUrl, signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new SourceUnavailableError(year, month, `Calendar ${baseUrl} unavailable: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    for (const row of filterCalendarRows(rows, year, month, this.window)) {
      yield row.identifier;
    }
  }

  private async fetchAllRows(baseUrl: string, signal?: AbortSignal): Promise<CalendarRow[]> {
    const page1Html = await fetchPage(baseUrl, { signal, cache: "calendar" });
    const totalPages = extractTotalPages(page1Html);
    const rows = parseCalendarHtml(page1Html);

    for (let page = 2; page <= totalPages; page++) {
      const html = await fetchPage(pageUrl(baseUrl, page), { signal, cache: "calendar" });
      rows.push(...parseCalendarHtml(html));
    }

    return rows;
  }
}
