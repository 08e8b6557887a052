export interface DateRange {
  year: number;
  months: number[];
  /** Last calendar day to include in the final month (31 = whole month) */
  dayLimit: number;
}

function range(from: number, to: number): number[] {
  const out: number[] = [];
  for (let i = from; i <= to; i++) out.push(i);
  return out;
}

/**
 * One range per year from startYear through today's year.
 * Past years cover the whole year; the current year stops at today.
 */
export function calculateDateRanges(startYear: number, today: Date): DateRange[] {
  const currentYear = today.getFullYear();
  const ranges: DateRange[] = [];

  for (let year = startYear; year <= currentYear; year++) {
    if (year === currentYear) {
      ranges.push({ year, months: range(1, today.getMonth() + 1), dayLimit: today.getDate() });
    } else {
      ranges.push({ year, months: range(1, 12), dayLimit: 31 });
    }
  }

  return ranges;
}

/** Last day a range covers, as YYYY-MM-DD */
export function rangeEnd(range: DateRange): string {
  const lastMonth = range.months[range.months.length - 1] ?? 12;
  return `${range.year}-${String(lastMonth).padStart(2, "0")}-${String(range.dayLimit).padStart(2, "0")}`;
}

/** Format a local date as YYYY-MM-DD */
export function toIsoDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/** Parse YYYY-MM-DD into a local date, or null when malformed. */
export function parseIsoDate(raw: string): Date | null {
  const match = raw.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return null;
  const [, y, m, d] = match;
  const date = new Date(Number(y), Number(m) - 1, Number(d));
  if (date.getFullYear() !== Number(y) || date.getMonth() !== Number(m) - 1 || date.getDate() !== Number(d)) {
    return null;
  }
  return date;
}
