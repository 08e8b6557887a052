import type { ScrapeReport } from "../types";
import type { ExportFailure } from "../errors";

export type ExportOutcome =
  | { ok: true; destination: string; rows: number }
  | { ok: false; error: ExportFailure };

export interface Exporter {
  name: string;
  export(report: ScrapeReport): Promise<ExportOutcome>;
}
