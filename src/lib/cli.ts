import { config } from "./config";
import { ConfigurationError } from "./errors";
import { calculateDateRanges, parseIsoDate, rangeEnd, toIsoDate } from "./date-range";
import type { DateWindow } from "./sources/calendar";

export const USAGE = `Usage:
  crawl run --year <YYYY> --months <1,2,3 | 1-6> [options]
  crawl full [--start-year <YYYY>] [options]
  crawl daily [--date <YYYY-MM-DD>] [options]

Options:
  --concurrency <n>   detail pages fetched in parallel within a month (default ${config.detailConcurrency})
  --no-xlsx           skip the workbook export
  --no-db             skip the SQLite export
  --no-prices         skip the listing-day price lookup
  --fail-on-errors    exit 1 when any identifier failed`;

export interface CrawlOptions {
  concurrency: number;
  xlsx: boolean;
  db: boolean;
  prices: boolean;
  failOnErrors: boolean;
}

export type CrawlCommand =
  | { kind: "run"; year: number; months: number[]; options: CrawlOptions }
  | { kind: "full"; startYear: number; options: CrawlOptions }
  | { kind: "daily"; date: string | null; options: CrawlOptions };

export interface RunPlan {
  year: number;
  months: number[];
  window: DateWindow;
}

function parseInteger(flag: string, raw: string | undefined): number {
  if (raw === undefined) throw new ConfigurationError(`${flag} requires a value`);
  if (!/^-?\d+$/.test(raw)) throw new ConfigurationError(`${flag} expects an integer, got "${raw}"`);
  return parseInt(raw, 10);
}

/** "1,3,5" or "1-3" or "1-3,7" */
export function parseMonths(raw: string | undefined): number[] {
  if (raw === undefined || raw.trim() === "") throw new ConfigurationError("--months requires a value");
  const months: number[] = [];
  for (const part of raw.split(",")) {
    const rangeMatch = part.trim().match(/^(\d+)-(\d+)$/);
    if (rangeMatch) {
      const from = parseInt(rangeMatch[1], 10);
      const to = parseInt(rangeMatch[2], 10);
      if (from > to) throw new ConfigurationError(`Invalid month range "${part}"`);
      for (let m = from; m <= to; m++) months.push(m);
    } else {
      months.push(parseInteger("--months", part.trim()));
    }
  }
  return months;
}

export function parseArgs(argv: string[]): CrawlCommand {
  const [kind, ...args] = argv;
  const options: CrawlOptions = {
    concurrency: config.detailConcurrency,
    xlsx: true,
    db: true,
    prices: true,
    failOnErrors: false,
  };
  const values: Record<string, string | undefined> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--no-xlsx":
        options.xlsx = false;
        break;
      case "--no-db":
        options.db = false;
        break;
      case "--no-prices":
        options.prices = false;
        break;
      case "--fail-on-errors":
        options.failOnErrors = true;
        break;
      case "--year":
      case "--months":
      case "--start-year":
      case "--date":
      case "--concurrency":
        values[arg] = args[i + 1];
        i++;
        break;
      default:
        throw new ConfigurationError(`Unknown argument "${arg}"`);
    }
  }

  if (values["--concurrency"] !== undefined) {
    options.concurrency = parseInteger("--concurrency", values["--concurrency"]);
  }

  switch (kind) {
    case "run":
      return {
        kind,
        year: parseInteger("--year", values["--year"]),
        months: parseMonths(values["--months"]),
        options,
      };
    case "full":
      return {
        kind,
        startYear:
          values["--start-year"] === undefined
            ? config.defaultStartYear
            : parseInteger("--start-year", values["--start-year"]),
        options,
      };
    case "daily": {
      const raw = values["--date"];
      if (raw !== undefined && parseIsoDate(raw) === null) {
        throw new ConfigurationError(`--date expects YYYY-MM-DD, got "${raw}"`);
      }
      return { kind, date: raw ?? null, options };
    }
    default:
      throw new ConfigurationError(kind ? `Unknown command "${kind}"` : "A command is required");
  }
}

/** Expand a command into the orchestrator runs it needs, one per year. */
export function planRuns(command: CrawlCommand, today: Date): RunPlan[] {
  switch (command.kind) {
    case "run":
      return [{ year: command.year, months: command.months, window: {} }];
    case "full":
      return calculateDateRanges(command.startYear, today).map((range) => ({
        year: range.year,
        months: range.months,
        window: { to: rangeEnd(range) },
      }));
    case "daily": {
      const date = (command.date ? parseIsoDate(command.date) : null) ?? today;
      const iso = toIsoDate(date);
      return [{ year: date.getFullYear(), months: [date.getMonth() + 1], window: { from: iso, to: iso } }];
    }
  }
}
