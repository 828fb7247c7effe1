import type { Kysely } from "kysely";
import type { WarehouseTables } from "@repo/types";
import { IntegrityError } from "../util/errors";
import { executeWithLogging } from "../util/executeWithLogging";
import { logger } from "../util/logger";
import { ensureTable, truncateTable } from "../warehouse/loader";
import { columnNames, TABLE_DEFINITIONS } from "../warehouse/tables";
import {
  scopedDb,
  supportsTransactions,
  type Warehouse,
} from "../warehouse/warehouse";

/**
 * The denormalized trip view. Inner joins throughout: a fact whose key has no
 * dimension row drops out instead of producing nulls.
 */
export function analyticsQuery(db: Kysely<WarehouseTables>) {
  return db
    .selectFrom("fact_table as f")
    .innerJoin("datetime_dim as d", "d.datetime_id", "f.datetime_id")
    .innerJoin(
      "passenger_count_dim as pc",
      "pc.passenger_count_id",
      "f.passenger_count_id",
    )
    .innerJoin(
      "trip_distance_dim as td",
      "td.trip_distance_id",
      "f.trip_distance_id",
    )
    .innerJoin("rate_code_dim as rc", "rc.rate_code_id", "f.rate_code_id")
    .innerJoin(
      "pickup_location_dim as pl",
      "pl.pickup_location_id",
      "f.pickup_location_id",
    )
    .innerJoin(
      "dropoff_location_dim as dl",
      "dl.dropoff_location_id",
      "f.dropoff_location_id",
    )
    .innerJoin(
      "payment_type_dim as pt",
      "pt.payment_type_id",
      "f.payment_type_id",
    )
    .select([
      "f.trip_id",
      "f.VendorID",
      "d.tpep_pickup_datetime",
      "d.tpep_dropoff_datetime",
      "d.pick_hour",
      "d.pick_weekday",
      "pc.passenger_count",
      "td.trip_distance",
      "rc.rate_code_name",
      "pl.pickup_latitude",
      "pl.pickup_longitude",
      "dl.dropoff_latitude",
      "dl.dropoff_longitude",
      "pt.payment_type_name",
      "f.fare_amount",
      "f.extra",
      "f.mta_tax",
      "f.tip_amount",
      "f.tolls_amount",
      "f.improvement_surcharge",
      "f.total_amount",
    ]);
}

async function countRows(
  db: Kysely<WarehouseTables>,
  table: "fact_table" | "tbl_analytics",
): Promise<number> {
  const query = db
    .selectFrom(table)
    .select((eb) => eb.fn.countAll().as("count"));
  const { result } = await executeWithLogging(query, {
    operation: `count:${table}`,
  });
  return Number(result[0]?.count ?? 0);
}

/**
 * Rebuilds tbl_analytics from the loaded star schema and checks that it holds
 * exactly one row per fact.
 */
export async function materializeAnalytics(
  warehouse: Warehouse,
): Promise<number> {
  const definition = TABLE_DEFINITIONS.tbl_analytics;
  await ensureTable(warehouse, definition);

  const rebuild = async (executor: Kysely<WarehouseTables>) => {
    await truncateTable(executor, warehouse, definition.name);
    const db = scopedDb(warehouse, executor);
    const insert = db
      .insertInto("tbl_analytics")
      .columns(columnNames(definition))
      .expression(analyticsQuery(db));
    await executeWithLogging(insert, { operation: "insert:tbl_analytics" });
  };

  if (supportsTransactions(warehouse)) {
    await warehouse.db.transaction().execute(rebuild);
  } else {
    await rebuild(warehouse.db);
  }

  const db = scopedDb(warehouse);
  const analyticsRows = await countRows(db, "tbl_analytics");
  const factRows = await countRows(db, "fact_table");

  if (analyticsRows !== factRows) {
    throw new IntegrityError(
      "analytics_row_mismatch",
      `tbl_analytics has ${analyticsRows} rows but fact_table has ${factRows}`,
      { analyticsRows, factRows },
    );
  }

  logger.info({ rows: analyticsRows }, "Materialized tbl_analytics");
  return analyticsRows;
}
