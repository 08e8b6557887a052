import type { StockDetail, StockRecord } from "../types";

export type Cell = string | number | null;
export type Row = Record<string, Cell>;

interface Column {
  header: string;
  value: (record: StockRecord, detail: Readonly<StockDetail>) => Cell;
}

export const ID_HEADER = "ID";
export const LISTING_DATE_HEADER = "Listing Date";

const COLUMNS: Column[] = [
  { header: ID_HEADER, value: (r) => r.identifier },
  { header: "Name", value: (_, d) => d.name },
  { header: "Month", value: (r) => r.month },
  { header: "Market", value: (r) => r.segment },
  { header: "Sector", value: (_, d) => d.sector },
  { header: "Revenue (KRW mn)", value: (_, d) => d.revenue },
  { header: "Pre-tax Profit (KRW mn)", value: (_, d) => d.profitBeforeTax },
  { header: "Net Profit (KRW mn)", value: (_, d) => d.netProfit },
  { header: "Capital (KRW mn)", value: (_, d) => d.capital },
  { header: "Offered Shares", value: (_, d) => d.totalShares },
  { header: "Par Value", value: (_, d) => d.parValue },
  { header: "Desired Price Range", value: (_, d) => d.desiredPriceRange },
  { header: "Confirmed Price", value: (_, d) => d.confirmedPrice },
  { header: "Offering Amount (KRW mn)", value: (_, d) => d.offeringAmount },
  { header: "Underwriter", value: (_, d) => d.underwriter },
  { header: LISTING_DATE_HEADER, value: (_, d) => d.listingDate },
  { header: "Competition Rate", value: (_, d) => d.competitionRate },
  { header: "Employee Shares", value: (_, d) => d.employeeShares },
  { header: "Institutional Shares", value: (_, d) => d.institutionalShares },
  { header: "Retail Shares", value: (_, d) => d.retailShares },
  { header: "Tradable Shares", value: (_, d) => d.tradableShares },
  { header: "Tradable %", value: (_, d) => d.tradablePercent },
  { header: "Open", value: (_, d) => d.prices?.open ?? null },
  { header: "High", value: (_, d) => d.prices?.high ?? null },
  { header: "Low", value: (_, d) => d.prices?.low ?? null },
  { header: "Close", value: (_, d) => d.prices?.close ?? null },
  { header: "Growth %", value: (_, d) => d.prices?.growthRate ?? null },
  { header: "Source URL", value: (_, d) => d.sourceUrl },
];

export const HEADERS: string[] = COLUMNS.map((c) => c.header);

export const FAILURE_HEADERS = ["ID", "Month", "Reason", "Message"];

/** Flatten an enriched record into one spreadsheet row. Null for records without detail. */
export function recordToRow(record: StockRecord): Row | null {
  const { detail } = record;
  if (!detail) return null;
  const row: Row = {};
  for (const column of COLUMNS) {
    row[column.header] = column.value(record, detail);
  }
  return row;
}

function compareRows(a: Row, b: Row): number {
  const da = a[LISTING_DATE_HEADER];
  const db = b[LISTING_DATE_HEADER];
  if (da !== db) {
    if (da === null || da === undefined || da === "") return 1;
    if (db === null || db === undefined || db === "") return -1;
    return String(da) < String(db) ? -1 : 1;
  }
  return String(a[ID_HEADER]).localeCompare(String(b[ID_HEADER]));
}

/**
 * Merge freshly scraped rows into rows already on disk, keyed by ID.
 * New rows replace old ones; the result is sorted by listing date, then ID.
 */
export function mergeRows(existing: Row[], incoming: Row[]): Row[] {
  const byId = new Map<string, Row>();
  for (const row of existing) byId.set(String(row[ID_HEADER]), row);
  for (const row of incoming) byId.set(String(row[ID_HEADER]), row);
  return [...byId.values()].sort(compareRows);
}
