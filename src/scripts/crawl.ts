import { Orchestrator } from "../lib/orchestrator";
import { HttpCalendarSource } from "../lib/sources/calendar";
import { HttpDetailSource } from "../lib/sources/detail";
import { HttpMarketDataSource } from "../lib/market-data/http";
import type { Exporter } from "../lib/exporters/types";
import { XlsxExporter } from "../lib/exporters/xlsx";
import { SqliteExporter } from "../lib/exporters/sqlite";
import { type CrawlCommand, USAGE, parseArgs, planRuns } from "../lib/cli";
import { pruneHttpCache } from "../lib/scraping/http-cache";
import { closeDb } from "../lib/db";
import { ConfigurationError, errorMessage } from "../lib/errors";

async function main(): Promise<number> {
  let command: CrawlCommand;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`[crawl] ${errorMessage(err)}\n`);
    console.error(USAGE);
    return 1;
  }

  const { options } = command;
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("[crawl] Interrupted, stopping after the current item");
    controller.abort();
  });

  const exporters: Exporter[] = [];
  if (options.xlsx) exporters.push(new XlsxExporter());
  if (options.db) exporters.push(new SqliteExporter());

  const detail = new HttpDetailSource();
  const market = options.prices ? new HttpMarketDataSource() : undefined;
  const plans = planRuns(command, new Date());
  console.log(`[crawl] ${command.kind}: ${plans.length} run(s), exporters: ${exporters.map((e) => e.name).join(", ") || "none"}`);

  let failedIdentifiers = 0;
  let exportFailed = false;

  for (const plan of plans) {
    if (controller.signal.aborted) break;

    const orchestrator = new Orchestrator({
      calendar: new HttpCalendarSource({ window: plan.window }),
      detail,
      market,
      concurrency: options.concurrency,
    });
    const report = await orchestrator.run(plan.year, plan.months, { signal: controller.signal });
    failedIdentifiers += report.counters.failed;

    for (const failure of report.failures) {
      console.warn(`[crawl] ${failure.identifier} (${failure.reason}): ${failure.message}`);
    }

    for (const exporter of exporters) {
      const outcome = await exporter.export(report);
      if (outcome.ok) {
        console.log(`[crawl] ${exporter.name}: ${outcome.rows} rows -> ${outcome.destination}`);
      } else {
        console.error(`[crawl] ${exporter.name} export failed: ${outcome.error.message}`, outcome.error.cause);
        exportFailed = true;
      }
    }
  }

  pruneHttpCache();
  closeDb();

  if (exportFailed) return 1;
  if (options.failOnErrors && failedIdentifiers > 0) return 1;
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    if (err instanceof ConfigurationError) {
      console.error(`[crawl] ${err.message}`);
    } else {
      console.error("Fatal error:", err);
    }
    closeDb();
    process.exit(1);
  });
