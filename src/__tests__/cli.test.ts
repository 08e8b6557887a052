import { describe, it, expect } from "vitest";
import { parseArgs, parseMonths, planRuns } from "../lib/cli";
import { ConfigurationError } from "../lib/errors";
import { config } from "../lib/config";

const DEFAULT_OPTIONS = {
  concurrency: config.detailConcurrency,
  xlsx: true,
  db: true,
  prices: true,
  failOnErrors: false,
};

describe("parseMonths", () => {
  it("accepts lists, ranges and both", () => {
    expect(parseMonths("1,3")).toEqual([1, 3]);
    expect(parseMonths("1-3")).toEqual([1, 2, 3]);
    expect(parseMonths("1-2, 7")).toEqual([1, 2, 7]);
  });

  it("rejects bad input", () => {
    expect(() => parseMonths(undefined)).toThrow("--months requires a value");
    expect(() => parseMonths("5-2")).toThrow('Invalid month range "5-2"');
    expect(() => parseMonths("may")).toThrow('--months expects an integer, got "may"');
  });
});

describe("parseArgs", () => {
  it("parses a run command with flags", () => {
    expect(
      parseArgs([
        "run",
        "--year",
        "2024",
        "--months",
        "4-5",
        "--no-db",
        "--no-prices",
        "--fail-on-errors",
        "--concurrency",
        "3",
      ])
    ).toEqual({
      kind: "run",
      year: 2024,
      months: [4, 5],
      options: { concurrency: 3, xlsx: true, db: false, prices: false, failOnErrors: true },
    });
  });

  it("defaults the full crawl's start year", () => {
    expect(parseArgs(["full", "--no-xlsx"])).toEqual({
      kind: "full",
      startYear: config.defaultStartYear,
      options: { ...DEFAULT_OPTIONS, xlsx: false },
    });
    expect(parseArgs(["full", "--start-year", "2021"])).toMatchObject({ startYear: 2021 });
  });

  it("parses a daily command", () => {
    expect(parseArgs(["daily"])).toEqual({ kind: "daily", date: null, options: DEFAULT_OPTIONS });
    expect(parseArgs(["daily", "--date", "2024-05-14"])).toMatchObject({ date: "2024-05-14" });
  });

  it.each([
    [[], "A command is required"],
    [["sync"], 'Unknown command "sync"'],
    [["run", "--verbose"], 'Unknown argument "--verbose"'],
    [["run", "--months", "1"], "--year requires a value"],
    [["run", "--year", "soon", "--months", "1"], '--year expects an integer, got "soon"'],
    [["daily", "--date", "2024-02-30"], '--date expects YYYY-MM-DD, got "2024-02-30"'],
  ])("rejects %j", (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(ConfigurationError);
    expect(() => parseArgs(argv)).toThrow(message);
  });
});

describe("planRuns", () => {
  const today = new Date(2024, 1, 10);

  it("plans a single unbounded run", () => {
    expect(planRuns(parseArgs(["run", "--year", "2023", "--months", "1,2"]), today)).toEqual([
      { year: 2023, months: [1, 2], window: {} },
    ]);
  });

  it("ends each year of a full crawl at its last covered day", () => {
    const plans = planRuns(parseArgs(["full", "--start-year", "2023"]), today);

    expect(plans).toHaveLength(2);
    expect(plans[0]).toEqual({ year: 2023, months: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12], window: { to: "2023-12-31" } });
    expect(plans[1]).toEqual({ year: 2024, months: [1, 2], window: { to: "2024-02-10" } });
  });

  it("restricts a daily run to one day", () => {
    expect(planRuns(parseArgs(["daily", "--date", "2024-05-14"]), today)).toEqual([
      { year: 2024, months: [5], window: { from: "2024-05-14", to: "2024-05-14" } },
    ]);
    expect(planRuns(parseArgs(["daily"]), today)).toEqual([
      { year: 2024, months: [2], window: { from: "2024-02-10", to: "2024-02-10" } },
    ]);
  });
});
