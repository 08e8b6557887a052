// ===== Enums =====

export enum EnrichmentStatus {
  PENDING = "pending",
  ENRICHED = "enriched",
  FAILED = "failed",
}

export enum FailureReason {
  NOT_FOUND = "not_found",
  PARSE_ERROR = "parse_error",
  TIMEOUT = "timeout",
  UNKNOWN = "unknown",
}

/** Listing number from the calendar, e.g. "1843" */
export type Identifier = string;

// ===== Detail page fields =====

/** First trading day prices, with the close measured against the offering price */
export interface ListingPrices {
  open: number;
  high: number;
  low: number;
  close: number;
  growthRate: number | null; // percent, 2 decimals
}

export interface StockDetail {
  name: string;
  sourceUrl: string;
  ticker: string | null; // six-digit exchange code
  // Company overview (amounts in millions of won)
  marketSegment: string;
  sector: string;
  revenue: number | null;
  profitBeforeTax: number | null;
  netProfit: number | null;
  capital: number | null;
  // Offering
  totalShares: number | null;
  parValue: number | null;
  desiredPriceRange: string; // raw band e.g. "9,000~11,000"
  confirmedPrice: number | null;
  offeringAmount: number | null;
  underwriter: string;
  // Subscription schedule
  listingDate: string | null; // YYYY-MM-DD
  competitionRate: string; // e.g. "1234.56:1"
  employeeShares: number | null;
  institutionalShares: number | null;
  retailShares: number | null;
  // Shareholders
  tradableShares: string;
  tradablePercent: string;
  // Added after listing when a market data source is configured
  prices?: ListingPrices;
}

// ===== Record =====

export interface RecordFailure {
  reason: FailureReason;
  message: string;
}

export interface StockRecord {
  readonly identifier: Identifier;
  readonly month: number;
  readonly segment: string;
  readonly status: EnrichmentStatus;
  readonly detail: Readonly<StockDetail> | null;
  readonly failure: Readonly<RecordFailure> | null;
}

// ===== Report =====

export interface FailureEntry {
  readonly identifier: Identifier;
  readonly month: number;
  readonly reason: FailureReason;
  readonly message: string;
}

export interface MonthFailure {
  readonly month: number;
  readonly message: string;
}

export interface ReportCounters {
  readonly attempted: number;
  readonly succeeded: number;
  readonly failed: number;
}

export interface ScrapeReport {
  readonly runId: string;
  readonly year: number;
  readonly months: readonly number[];
  readonly records: readonly StockRecord[];
  readonly failures: readonly FailureEntry[];
  readonly monthFailures: readonly MonthFailure[];
  readonly counters: ReportCounters;
  readonly cancelled: boolean;
  readonly startedAt: string;
  readonly finishedAt: string;
}
