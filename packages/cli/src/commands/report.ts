import { Command } from "commander";
import {
  closeWarehouse,
  getWarehouse,
  isReportName,
  REPORTS,
} from "@repo/pipeline";
import { formatTable, logError } from "../process/output.js";

type ReportRow = Record<string, string | number>;

export function renderReport(rows: readonly ReportRow[]): string {
  const [first] = rows;
  if (!first) {
    return "(no rows)";
  }
  const columns = Object.keys(first);
  return formatTable(
    columns,
    rows.map((row) => columns.map((column) => row[column] ?? "")),
  );
}

export const reportCommand = new Command("report")
  .description("Print an analytical report from the loaded warehouse")
  .argument("<name>", `Report to run: ${Object.keys(REPORTS).join(", ")}`)
  .option("-l, --limit <n>", "Maximum rows for ranked reports", "10")
  .action(async (name: string, options: { limit: string }) => {
    if (!isReportName(name)) {
      logError(`Unknown report "${name}". Choose one of: ${Object.keys(REPORTS).join(", ")}`);
      process.exitCode = 1;
      return;
    }

    const limit = Number.parseInt(options.limit, 10);
    if (!Number.isInteger(limit) || limit <= 0) {
      logError("--limit must be a positive integer");
      process.exitCode = 1;
      return;
    }

    try {
      const warehouse = getWarehouse();
      const rows =
        name === "fare-by-hour"
          ? await REPORTS[name](warehouse)
          : await REPORTS[name](warehouse, limit);
      console.log(renderReport(rows));
    } catch (error) {
      logError(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    } finally {
      await closeWarehouse();
    }
  });
