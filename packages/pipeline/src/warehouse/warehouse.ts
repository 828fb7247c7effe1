import type { Kysely } from "kysely";
import type { WarehouseTableName, WarehouseTables } from "@repo/types";
import type { WarehouseDialect } from "../env";

export interface Warehouse {
  db: Kysely<WarehouseTables>;
  dialect: WarehouseDialect;
  /** PostgreSQL schema holding the tables; BigQuery uses the connection's dataset. */
  schema?: string;
  batchSize: number;
  partitioning: boolean;
}

export function qualifiedTableName(
  warehouse: Warehouse,
  table: WarehouseTableName,
): string {
  return warehouse.schema ? `${warehouse.schema}.${table}` : table;
}

/** Query builder scoped to the warehouse schema, if one is configured. */
export function scopedDb(
  warehouse: Warehouse,
  executor: Kysely<WarehouseTables> = warehouse.db,
): Kysely<WarehouseTables> {
  return warehouse.schema ? executor.withSchema(warehouse.schema) : executor;
}

export function supportsTransactions(warehouse: Warehouse): boolean {
  return warehouse.dialect === "postgresql";
}
