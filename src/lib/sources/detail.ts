import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { config } from "../config";
import { FailureReason, type Identifier, type StockDetail } from "../types";
import type { DetailOutcome, DetailSource } from "./types";
import {
  fetchPage,
  fillTemplate,
  cleanText,
  parseAmount,
  parseShareCount,
  formatCompetitionRate,
  normalizeDate,
  isAbortError,
} from "../scraping/utils";
import { HttpError, errorMessage } from "../errors";

const COMPANY_TABLE = 'table[summary="기업개요"]';
const OFFERING_TABLE = 'table[summary="공모정보"]';
const SCHEDULE_TABLE = 'table[summary="공모청약일정"]';
const SHAREHOLDER_TABLE = 'table[summary="주주현황"]';

/**
 * Value cell to the right of the label cell in a key/value table.
 * An exact label match wins over a partial one ("순이익" must not pick up
 * "법인세비용차감전순이익").
 */
function getValue($: CheerioAPI, tableSelector: string, label: string): string {
  let partial: string | null = null;
  let exact: string | null = null;

  $(tableSelector)
    .find("td, th")
    .each((_, el) => {
      const cell = $(el);
      const text = cleanText(cell.text());
      if (!text.includes(label)) return;

      const next = cell.nextAll("td").first();
      if (!next.length) return;
      const value = cleanText(next.text());

      if (text === label) {
        exact = value;
        return false;
      }
      if (partial === null) partial = value;
    });

  return exact ?? partial ?? "";
}

function getTradable($: CheerioAPI): { count: string; percent: string } {
  let count = "";
  let percent = "";
  $(SHAREHOLDER_TABLE)
    .find("td, th")
    .each((_, el) => {
      const cell = $(el);
      if (!cleanText(cell.text()).includes("유통가능")) return;
      const values = cell.nextAll("td");
      count = cleanText(values.eq(0).text());
      percent = cleanText(values.eq(1).text());
      return false;
    });
  return { count, percent };
}

function parseTicker(raw: string): string | null {
  const match = raw.match(/\b(\d{6})\b/);
  return match ? match[1] : null;
}

/** Parse a detail page. Returns null when the page has no company overview. */
export function parseDetailHtml(html: string, sourceUrl: string): StockDetail | null {
  const $ = cheerio.load(html);
  if (!$(COMPANY_TABLE).length) return null;

  const name = getValue($, COMPANY_TABLE, "종목명");
  if (!name) return null;

  const listingDate =
    normalizeDate(getValue($, SCHEDULE_TABLE, "신규상장일")) ??
    normalizeDate(getValue($, SCHEDULE_TABLE, "상장일"));
  const tradable = getTradable($);

  return {
    name,
    sourceUrl,
    ticker: parseTicker(getValue($, COMPANY_TABLE, "종목코드")),
    marketSegment: getValue($, COMPANY_TABLE, "시장구분"),
    sector: getValue($, COMPANY_TABLE, "업종"),
    revenue: parseAmount(getValue($, COMPANY_TABLE, "매출액")),
    profitBeforeTax: parseAmount(getValue($, COMPANY_TABLE, "법인세비용차감전")),
    netProfit: parseAmount(getValue($, COMPANY_TABLE, "순이익")),
    capital: parseAmount(getValue($, COMPANY_TABLE, "자본금")),
    totalShares: parseShareCount(getValue($, OFFERING_TABLE, "총공모주식수")),
    parValue: parseAmount(getValue($, OFFERING_TABLE, "액면가")),
    desiredPriceRange: getValue($, OFFERING_TABLE, "희망공모가액"),
    confirmedPrice: parseAmount(getValue($, OFFERING_TABLE, "확정공모가")),
    offeringAmount: parseAmount(getValue($, OFFERING_TABLE, "공모금액")),
    underwriter: getValue($, OFFERING_TABLE, "주간사"),
    listingDate,
    competitionRate: formatCompetitionRate(getValue($, SCHEDULE_TABLE, "기관경쟁률")),
    employeeShares: parseShareCount(getValue($, SCHEDULE_TABLE, "우리사주조합")),
    institutionalShares: parseShareCount(getValue($, SCHEDULE_TABLE, "기관투자자")),
    retailShares: parseShareCount(getValue($, SCHEDULE_TABLE, "일반청약자")),
    tradableShares: tradable.count,
    tradablePercent: tradable.percent,
  };
}

/** Map a fetch error onto a failure reason. */
export function classifyFetchError(error: unknown): { reason: FailureReason; message: string } {
  if (error instanceof HttpError && (error.status === 404 || error.status === 410)) {
    return { reason: FailureReason.NOT_FOUND, message: error.message };
  }
  if (isAbortError(error)) {
    return { reason: FailureReason.TIMEOUT, message: `Timed out: ${errorMessage(error)}` };
  }
  return { reason: FailureReason.UNKNOWN, message: errorMessage(error) };
}

export class HttpDetailSource implements DetailSource {
  readonly name = "detail:http";
  private readonly urlTemplate: string;

  constructor(options: { urlTemplate?: string } = {}) {
    this.urlTemplate = options.urlTemplate ?? config.detailUrl;
  }

  detailUrl(identifier: Identifier): string {
    return fillTemplate(this.urlTemplate, { id: identifier });
  }

  async fetchDetail(identifier: Identifier, signal?: AbortSignal): Promise<DetailOutcome> {
    const url = this.detailUrl(identifier);

    let html: string;
    try {
      html = await fetchPage(url, { signal, cache: "detail" });
    } catch (error) {
      return { ok: false, ...classifyFetchError(error) };
    }

    try {
      const detail = parseDetailHtml(html, url);
      if (!detail) {
        return { ok: false, reason: FailureReason.PARSE_ERROR, message: `No company overview found on ${url}` };
      }
      return { ok: true, detail };
    } catch (error) {
      return { ok: false, reason: FailureReason.PARSE_ERROR, message: errorMessage(error) };
    }
  }
}
