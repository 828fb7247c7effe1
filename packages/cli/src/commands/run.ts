import { Command } from "commander";
import {
  closeWarehouse,
  getEnv,
  getWarehouse,
  PipelineStageError,
  runPipeline,
} from "@repo/pipeline";
import { DIMENSION_TABLES, type RunReport } from "@repo/types";
import { formatTable, logError, logGray, logInfo, logWarn } from "../process/output.js";

export function summarizeReport(report: RunReport): string {
  const counts = formatTable(
    ["metric", "value"],
    [
      ["rows read", report.rowsRead],
      ["rows rejected", report.rowsRejected],
      ["duplicates removed", report.duplicatesRemoved],
      ["orphan trips dropped", report.orphanFacts],
      ["fact rows", report.factRows],
      ["analytics rows", report.analyticsRows],
    ],
  );
  const dimensions = formatTable(
    ["dimension", "rows", "key conflicts"],
    DIMENSION_TABLES.map((table) => [
      table,
      report.dimensionRows[table],
      report.duplicateKeyConflicts[table],
    ]),
  );
  return `${counts}\n\n${dimensions}`;
}

export const runCommand = new Command("run")
  .description("Extract trips, rebuild the star schema and load the warehouse")
  .option("-s, --source <uri>", "Trip CSV location (path, file://, http(s):// or gs://)")
  .option("--dry-run", "Build the star schema in memory without writing anything")
  .action(async (options: { source?: string; dryRun?: boolean }) => {
    try {
      const source = options.source ?? getEnv().TRIP_SOURCE_URI;
      if (!source) {
        logError("No source given. Pass --source or set TRIP_SOURCE_URI.");
        process.exitCode = 1;
        return;
      }

      const report = await runPipeline({
        source,
        dryRun: options.dryRun,
        warehouse: options.dryRun ? undefined : getWarehouse(),
      });
      logInfo(
        report.status === "dry_run"
          ? `Dry run of ${source} finished in ${report.durationMs}ms`
          : `Loaded ${source} in ${report.durationMs}ms`,
      );
      logGray(summarizeReport(report));
      if (report.rowsRejected > 0 || report.orphanFacts > 0) {
        logWarn("Some rows were dropped; see the log for line numbers and keys.");
      }
    } catch (error) {
      if (error instanceof PipelineStageError) {
        logError(`Run failed in the ${error.stage} stage (${error.kind} error)`);
      }
      logError(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    } finally {
      await closeWarehouse();
    }
  });
