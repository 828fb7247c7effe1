import { sql, type CreateTableBuilder, type Kysely } from "kysely";
import {
  DIMENSION_TABLES,
  type DimensionTableName,
  type TableLoadOutcome,
  type WarehouseTableName,
  type WarehouseTables,
} from "@repo/types";
import { logger } from "../util/logger";
import { LoadError } from "../util/errors";
import {
  bindRawQuery,
  executeWithLogging,
} from "../util/executeWithLogging";
import type { StarSchema } from "../transform/starSchema";
import {
  columnNames,
  columnType,
  TABLE_DEFINITIONS,
  type TableDefinition,
} from "./tables";
import {
  qualifiedTableName,
  supportsTransactions,
  type Warehouse,
} from "./warehouse";

/** Creates the table if absent, plus the partition index on PostgreSQL. */
export async function ensureTable<T extends WarehouseTableName>(
  warehouse: Warehouse,
  definition: TableDefinition<T>,
): Promise<void> {
  const tableName = qualifiedTableName(warehouse, definition.name);
  const operation = `create:${definition.name}`;

  let builder: CreateTableBuilder<string, string> = warehouse.db.schema
    .createTable(tableName)
    .ifNotExists();
  for (const column of columnNames(definition)) {
    const type = sql.raw(
      columnType(warehouse.dialect, definition.columns[column]),
    );
    builder = builder.addColumn(column, type, (col) => {
      const required = col.notNull();
      return column === definition.primaryKey &&
        warehouse.dialect === "postgresql"
        ? required.primaryKey()
        : required;
    });
  }

  const partitionColumn = warehouse.partitioning
    ? definition.partitionBy
    : undefined;

  if (partitionColumn && warehouse.dialect === "bigquery") {
    builder = builder.modifyEnd(
      sql`partition by date(${sql.ref(partitionColumn)})`,
    );
  }

  await executeWithLogging(builder, { operation });

  if (partitionColumn && warehouse.dialect === "postgresql") {
    const index = warehouse.db.schema
      .createIndex(`${definition.name}_${partitionColumn}_idx`)
      .ifNotExists()
      .on(tableName)
      .column<string>(partitionColumn);
    await executeWithLogging(index, { operation });
  }
}

export async function truncateTable(
  executor: Kysely<WarehouseTables>,
  warehouse: Warehouse,
  table: WarehouseTableName,
): Promise<void> {
  const statement = sql`truncate table ${sql.table(
    qualifiedTableName(warehouse, table),
  )}`;
  await executeWithLogging(bindRawQuery(statement, executor), {
    operation: `truncate:${table}`,
  });
}

async function insertRows<T extends WarehouseTableName>(
  executor: Kysely<WarehouseTables>,
  warehouse: Warehouse,
  definition: TableDefinition<T>,
  rows: readonly WarehouseTables[T][],
): Promise<void> {
  const columns = columnNames(definition);
  const target = sql.table(qualifiedTableName(warehouse, definition.name));
  const columnList = sql.join(columns.map((column) => sql.ref(column)));

  for (let start = 0; start < rows.length; start += warehouse.batchSize) {
    const batch = rows.slice(start, start + warehouse.batchSize);
    const values = sql.join(
      batch.map(
        (row) => sql`(${sql.join(columns.map((column) => row[column]))})`,
      ),
    );
    await executeWithLogging(
      bindRawQuery(
        sql`insert into ${target} (${columnList}) values ${values}`,
        executor,
      ),
      { operation: `insert:${definition.name}` },
    );
  }
}

/**
 * Full refresh of one table: create if absent, empty, insert every row.
 * PostgreSQL does the empty-and-insert in one transaction; BigQuery cannot.
 */
export async function loadTable<T extends WarehouseTableName>(
  warehouse: Warehouse,
  definition: TableDefinition<T>,
  rows: readonly WarehouseTables[T][],
): Promise<number> {
  try {
    await ensureTable(warehouse, definition);

    const write = async (executor: Kysely<WarehouseTables>) => {
      await truncateTable(executor, warehouse, definition.name);
      await insertRows(executor, warehouse, definition, rows);
    };

    if (supportsTransactions(warehouse)) {
      await warehouse.db.transaction().execute(write);
    } else {
      await write(warehouse.db);
    }
  } catch (error) {
    throw new LoadError(definition.name, error);
  }

  return rows.length;
}

interface TableLoad {
  table: WarehouseTableName;
  run: () => Promise<number>;
}

function tableLoads(warehouse: Warehouse, model: StarSchema): TableLoad[] {
  const { dimensions } = model;
  const dimensionLoads: Record<DimensionTableName, TableLoad> = {
    datetime_dim: {
      table: "datetime_dim",
      run: () =>
        loadTable(
          warehouse,
          TABLE_DEFINITIONS.datetime_dim,
          dimensions.datetime_dim.rows,
        ),
    },
    passenger_count_dim: {
      table: "passenger_count_dim",
      run: () =>
        loadTable(
          warehouse,
          TABLE_DEFINITIONS.passenger_count_dim,
          dimensions.passenger_count_dim.rows,
        ),
    },
    trip_distance_dim: {
      table: "trip_distance_dim",
      run: () =>
        loadTable(
          warehouse,
          TABLE_DEFINITIONS.trip_distance_dim,
          dimensions.trip_distance_dim.rows,
        ),
    },
    rate_code_dim: {
      table: "rate_code_dim",
      run: () =>
        loadTable(
          warehouse,
          TABLE_DEFINITIONS.rate_code_dim,
          dimensions.rate_code_dim.rows,
        ),
    },
    pickup_location_dim: {
      table: "pickup_location_dim",
      run: () =>
        loadTable(
          warehouse,
          TABLE_DEFINITIONS.pickup_location_dim,
          dimensions.pickup_location_dim.rows,
        ),
    },
    dropoff_location_dim: {
      table: "dropoff_location_dim",
      run: () =>
        loadTable(
          warehouse,
          TABLE_DEFINITIONS.dropoff_location_dim,
          dimensions.dropoff_location_dim.rows,
        ),
    },
    payment_type_dim: {
      table: "payment_type_dim",
      run: () =>
        loadTable(
          warehouse,
          TABLE_DEFINITIONS.payment_type_dim,
          dimensions.payment_type_dim.rows,
        ),
    },
  };

  return [
    ...DIMENSION_TABLES.map((table) => dimensionLoads[table]),
    {
      table: "fact_table",
      run: () => loadTable(warehouse, TABLE_DEFINITIONS.fact_table, model.facts),
    },
  ];
}

/**
 * Loads the seven dimensions and then the fact table, one at a time. A failed
 * table is recorded and the remaining tables still load; nothing is rolled back.
 */
export async function loadStarSchema(
  warehouse: Warehouse,
  model: StarSchema,
): Promise<TableLoadOutcome[]> {
  const outcomes: TableLoadOutcome[] = [];

  for (const { table, run } of tableLoads(warehouse, model)) {
    const startedAt = Date.now();
    try {
      const rows = await run();
      const durationMs = Date.now() - startedAt;
      logger.info({ table, rows, durationMs }, "Loaded table");
      outcomes.push({ table, status: "loaded", rows, durationMs });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ table, error }, "Table load failed");
      outcomes.push({ table, status: "failed", error: message });
    }
  }

  return outcomes;
}
