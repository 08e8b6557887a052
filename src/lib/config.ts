export const config = {
  dbPath: process.env.DB_PATH || "data/ipo-calendar.db",
  outputDir: process.env.OUTPUT_DIR || "output",
  outputFile: process.env.OUTPUT_FILE || "ipo-calendar.xlsx",
  calendarUrl:
    process.env.CALENDAR_URL ||
    "https://www.38.co.kr/html/fund/index.htm?o=k&year={year}&month={month}",
  detailUrl:
    process.env.DETAIL_URL || "https://www.38.co.kr/html/fund/?o=v&no={id}",
  priceUrl:
    process.env.PRICE_URL ||
    "https://fchart.stock.naver.com/sise.nhn?symbol={ticker}&timeframe=day&count={count}&requestType=0",
  // How long fetched pages stay fresh, per page kind (0 = never cached)
  cacheTtlMs: {
    calendar: parseInt(process.env.CALENDAR_CACHE_TTL_MS || "0", 10),
    detail: parseInt(process.env.DETAIL_CACHE_TTL_MS || String(7 * 24 * 60 * 60 * 1000), 10),
    prices: parseInt(process.env.PRICE_CACHE_TTL_MS || String(12 * 60 * 60 * 1000), 10),
  },
  scrapeDelayMs: parseInt(process.env.SCRAPE_DELAY_MS || "1000", 10),
  fetchTimeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS || "15000", 10),
  detailConcurrency: parseInt(process.env.DETAIL_CONCURRENCY || "1", 10),
  defaultStartYear: parseInt(process.env.START_YEAR || "2020", 10),
  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
