import { Kysely, PostgresDialect } from "kysely";
import type { LogEvent, LogConfig } from "kysely";
import { Pool } from "pg";
import type { WarehouseTables } from "@repo/types";
import { getEnv, type PipelineEnv } from "./env";
import { logger } from "./util/logger";
import {
  BigQueryDialect,
  type BigQueryDialectConfig,
} from "./dialects/bigquery";
import type { Warehouse } from "./warehouse/warehouse";

const createLogger = (): LogConfig => (event: LogEvent) => {
  if (event.level === "query") {
    const duration = Math.round(event.queryDurationMillis);
    logger.debug(
      { sql: event.query.sql, duration },
      `Query executed in ${duration}ms`,
    );
    if (event.query.parameters && event.query.parameters.length > 0) {
      logger.debug(
        { params: event.query.parameters.length },
        "Query parameters bound",
      );
    }
  } else if (event.level === "error") {
    logger.error(
      {
        error: event.error,
        sql: event.query?.sql,
      },
      "Query error",
    );
  }
};

export function bigQueryConfigFromEnv(
  env: Extract<PipelineEnv, { WAREHOUSE_DIALECT: "bigquery" }>,
): BigQueryDialectConfig {
  return {
    projectId: env.BIGQUERY_PROJECT_ID,
    dataset: env.BIGQUERY_DATASET,
    location: env.BIGQUERY_LOCATION,
    credentials:
      env.BIGQUERY_CREDENTIALS_JSON ?? env.BIGQUERY_CREDENTIALS_BASE64,
    keyFilename: env.BIGQUERY_KEYFILE,
    maximumBytesBilled: env.BIGQUERY_MAX_BYTES_BILLED,
  };
}

export function createWarehouse(env: PipelineEnv): Warehouse {
  const log = env.NODE_ENV === "development" ? createLogger() : undefined;
  const common = {
    batchSize: env.LOAD_BATCH_SIZE,
    partitioning: env.WAREHOUSE_PARTITIONING,
  };

  if (env.WAREHOUSE_DIALECT === "postgresql") {
    const db = new Kysely<WarehouseTables>({
      dialect: new PostgresDialect({
        pool: new Pool({ connectionString: env.WAREHOUSE_DATABASE_URL }),
      }),
      log,
    });
    return {
      ...common,
      db,
      dialect: "postgresql",
      schema: env.WAREHOUSE_SCHEMA,
    };
  }

  const db = new Kysely<WarehouseTables>({
    dialect: new BigQueryDialect(bigQueryConfigFromEnv(env)),
    log,
  });
  return { ...common, db, dialect: "bigquery" };
}

let cachedWarehouse: Warehouse | undefined;

export function getWarehouse(): Warehouse {
  cachedWarehouse ??= createWarehouse(getEnv());
  return cachedWarehouse;
}

export async function closeWarehouse(): Promise<void> {
  if (cachedWarehouse) {
    await cachedWarehouse.db.destroy();
    cachedWarehouse = undefined;
  }
}
