import * as XLSX from "xlsx";
import fs from "fs";
import path from "path";
import { config } from "../config";
import type { ScrapeReport } from "../types";
import type { Exporter, ExportOutcome } from "./types";
import { FAILURE_HEADERS, HEADERS, type Row, mergeRows, recordToRow } from "./columns";
import { ExportFailure, errorMessage } from "../errors";

export interface XlsxExporterOptions {
  outputDir?: string;
  fileName?: string;
}

function setSheet(workbook: XLSX.WorkBook, name: string, sheet: XLSX.WorkSheet): void {
  if (workbook.Sheets[name]) {
    workbook.Sheets[name] = sheet;
  } else {
    XLSX.utils.book_append_sheet(workbook, sheet, name);
  }
}

/**
 * Writes one sheet per year into a single workbook. Re-running a year merges
 * into the existing sheet, so daily runs append to the full history.
 */
export class XlsxExporter implements Exporter {
  readonly name = "xlsx";
  readonly filePath: string;

  constructor(options: XlsxExporterOptions = {}) {
    this.filePath = path.resolve(
      process.cwd(),
      options.outputDir ?? config.outputDir,
      options.fileName ?? config.outputFile
    );
  }

  async export(report: ScrapeReport): Promise<ExportOutcome> {
    try {
      const rows = this.write(report);
      return { ok: true, destination: this.filePath, rows };
    } catch (error) {
      return {
        ok: false,
        error: new ExportFailure(`Failed to write ${this.filePath}: ${errorMessage(error)}`, { cause: error }),
      };
    }
  }

  private readWorkbook(): XLSX.WorkBook {
    if (!fs.existsSync(this.filePath)) return XLSX.utils.book_new();
    return XLSX.read(fs.readFileSync(this.filePath), { type: "buffer" });
  }

  private write(report: ScrapeReport): number {
    const workbook = this.readWorkbook();
    const sheetName = String(report.year);

    const existingSheet = workbook.Sheets[sheetName];
    const existing = existingSheet ? XLSX.utils.sheet_to_json<Row>(existingSheet, { defval: null }) : [];
    const incoming = report.records.map(recordToRow).filter((r): r is Row => r !== null);
    const merged = mergeRows(existing, incoming);
    setSheet(workbook, sheetName, XLSX.utils.json_to_sheet(merged, { header: HEADERS }));

    const failureRows = report.failures.map((f) => ({
      ID: f.identifier,
      Month: f.month,
      Reason: f.reason,
      Message: f.message,
    }));
    setSheet(workbook, `${report.year} failures`, XLSX.utils.json_to_sheet(failureRows, { header: FAILURE_HEADERS }));

    // Year sheets ascending, each followed by its failures sheet
    workbook.SheetNames.sort();

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
    fs.writeFileSync(this.filePath, buffer);

    return merged.length;
  }
}
