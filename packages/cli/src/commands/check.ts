import { Command } from "commander";
import {
  checkWarehouseHealth,
  closeWarehouse,
  getWarehouse,
  TABLE_DEFINITIONS,
} from "@repo/pipeline";
import { logError, logGray, logInfo } from "../process/output.js";

export const checkCommand = new Command("check")
  .description("Verify the warehouse is reachable and list the pipeline tables it holds")
  .option("--timeout <ms>", "Health check timeout in milliseconds", "5000")
  .action(async (options: { timeout: string }) => {
    try {
      const warehouse = getWarehouse();
      await checkWarehouseHealth(warehouse, Number.parseInt(options.timeout, 10));
      const existing = new Set(
        (await warehouse.db.introspection.getTables()).map((table) => table.name),
      );
      logInfo(`Connected to ${warehouse.dialect} warehouse`);
      for (const table of Object.keys(TABLE_DEFINITIONS)) {
        logGray(`${existing.has(table) ? "present" : "missing"}  ${table}`);
      }
    } catch (error) {
      logError(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    } finally {
      await closeWarehouse();
    }
  });
