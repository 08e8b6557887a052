import { config } from "../config";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { cachePage, getCachedPage, type PageKind } from "./http-cache";
import { HttpError } from "../errors";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

export interface FetchPageOptions {
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  /** Serve and store the page under this kind's cache lifetime; omitted = never cached */
  cache?: PageKind;
  /** Wait before a real network fetch (skipped on cache hits) */
  politeDelayMs?: number;
  signal?: AbortSignal;
}

/** True for errors raised by an aborted or timed-out fetch. */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const {
    retries = 3,
    retryDelayMs = 2000,
    timeoutMs = config.fetchTimeoutMs,
    cache,
    politeDelayMs = config.scrapeDelayMs,
    signal,
  } = options;

  const cached = cache ? getCachedPage(url, cache) : null;
  if (cached) return cached;

  if (politeDelayMs > 0) await delay(politeDelayMs);

  const dispatcher = getProxyDispatcher();

  for (let attempt = 0; attempt <= retries; attempt++) {
    signal?.throwIfAborted();
    try {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);
      const onAbort = () => controller.abort();
      signal?.addEventListener("abort", onAbort, { once: true });

      const fetchOptions: Parameters<typeof undiciFetch>[1] = {
        headers: {
          "User-Agent": config.getRandomUserAgent(),
          Accept:
            "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7",
        },
        signal: controller.signal,
        dispatcher,
      };

      let response: Awaited<ReturnType<typeof undiciFetch>>;
      try {
        response = await undiciFetch(url, fetchOptions);
      } finally {
        clearTimeout(timeout);
        signal?.removeEventListener("abort", onAbort);
      }

      if (response.status === 429 || response.status === 503) {
        if (attempt < retries) {
          const backoff = retryDelayMs * Math.pow(2, attempt);
          await delay(backoff);
          continue;
        }
        throw new Error(`Rate limited (${response.status}) after ${retries} retries: ${url}`);
      }

      if (!response.ok) {
        throw new HttpError(response.status, url);
      }

      const body = await response.text();
      if (cache) cachePage(url, cache, body);
      return body;
    } catch (error: unknown) {
      if (signal?.aborted) throw error;
      if (attempt < retries && isAbortError(error)) {
        const backoff = retryDelayMs * Math.pow(2, attempt);
        await delay(backoff);
        continue;
      }
      throw error;
    }
  }

  throw new Error(`Failed to fetch ${url} after ${retries} retries`);
}

/** Fill {name} placeholders in a URL template. */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in values ? encodeURIComponent(String(values[key])) : match
  );
}

/** Collapse whitespace (including nbsp) and trim. */
export function cleanText(raw: string | undefined | null): string {
  if (!raw) return "";
  return raw.replace(/\s+/g, " ").trim();
}

/**
 * Parse a number printed with thousands separators and units,
 * e.g. "12,345 백만원" -> 12345, "-1,024" -> -1024. Returns null for "-" or blanks.
 */
export function parseAmount(raw: string): number | null {
  if (!raw) return null;
  const match = raw.replace(/,/g, "").match(/-?\d+(?:\.\d+)?/);
  if (!match) return null;
  const num = parseFloat(match[0]);
  return isNaN(num) ? null : Math.round(num);
}

/** "1,234,567주 (30.5%)" -> 1234567 */
export function parseShareCount(raw: string): number | null {
  if (!raw) return null;
  const match = raw.match(/([\d,]+)\s*주/);
  if (match) return parseAmount(match[1]);
  return parseAmount(raw);
}

/** "1,234.56 : 1" -> "1234.56:1"; anything else is returned cleaned. */
export function formatCompetitionRate(raw: string): string {
  const text = cleanText(raw);
  const match = text.replace(/,/g, "").match(/(\d+(?:\.\d+)?)\s*:\s*(\d+(?:\.\d+)?)/);
  if (!match) return text;
  return `${match[1]}:${match[2]}`;
}

/** "2024.05.03", "2024/5/3" or "2024-05-03" -> "2024-05-03" */
export function normalizeDate(raw: string): string | null {
  const match = cleanText(raw).match(/(\d{4})\s*[./-]\s*(\d{1,2})\s*[./-]\s*(\d{1,2})/);
  if (!match) return null;
  const [, y, m, d] = match;
  return `${y}-${m.padStart(2, "0")}-${d.padStart(2, "0")}`;
}
