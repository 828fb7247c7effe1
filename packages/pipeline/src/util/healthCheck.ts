import { sql } from "kysely";
import type { Warehouse } from "../warehouse/warehouse";
import { logger } from "./logger";

const HEALTHCHECK_TIMEOUT_MS = 5_000;

// BigQuery bills every query, so there is no cheap `select 1` to run against it.
export async function checkWarehouseHealth(
  warehouse: Warehouse,
  timeoutMs: number = HEALTHCHECK_TIMEOUT_MS,
): Promise<void> {
  if (warehouse.dialect === "bigquery") {
    logger.info("Bypassing warehouse health check for BigQuery");
    return;
  }

  const healthCheckPromise = sql`select 1`.execute(warehouse.db).then(() => {
    logger.info("Warehouse is reachable");
  });

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return healthCheckPromise;
  }

  let timer: NodeJS.Timeout | undefined;
  try {
    await Promise.race([
      healthCheckPromise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(
            Object.assign(
              new Error(
                `Warehouse health check timed out after ${timeoutMs}ms (dialect: ${warehouse.dialect})`,
              ),
              { code: "DB_HEALTHCHECK_TIMEOUT" },
            ),
          );
        }, timeoutMs);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}
