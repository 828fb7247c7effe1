import type { WarehouseTableName, WarehouseTables } from "@repo/types";
import type { WarehouseDialect } from "../env";

export type LogicalType = "integer" | "float" | "timestamp" | "string";

export type ColumnName<T extends WarehouseTableName> =
  keyof WarehouseTables[T] & string;

export interface TableDefinition<T extends WarehouseTableName> {
  name: T;
  /** Every column of the row type with its logical type, in table order. */
  columns: { [C in ColumnName<T>]: LogicalType };
  primaryKey: ColumnName<T>;
  /** Timestamp column used for partitioning when it is enabled. */
  partitionBy?: ColumnName<T>;
}

const COLUMN_TYPES: Record<WarehouseDialect, Record<LogicalType, string>> = {
  postgresql: {
    integer: "integer",
    float: "double precision",
    // Dates are bound with the host's offset, so keep it
    timestamp: "timestamptz",
    string: "text",
  },
  bigquery: {
    integer: "INT64",
    float: "FLOAT64",
    timestamp: "TIMESTAMP",
    string: "STRING",
  },
};

export function columnType(dialect: WarehouseDialect, type: LogicalType): string {
  return COLUMN_TYPES[dialect][type];
}

export function columnNames<T extends WarehouseTableName>(
  definition: TableDefinition<T>,
): ColumnName<T>[] {
  return Object.keys(definition.columns).filter(
    (column): column is ColumnName<T> => column in definition.columns,
  );
}

const fareColumns = {
  fare_amount: "float",
  extra: "float",
  mta_tax: "float",
  tip_amount: "float",
  tolls_amount: "float",
  improvement_surcharge: "float",
  total_amount: "float",
} as const;

export const TABLE_DEFINITIONS: {
  [T in WarehouseTableName]: TableDefinition<T>;
} = {
  datetime_dim: {
    name: "datetime_dim",
    columns: {
      datetime_id: "integer",
      tpep_pickup_datetime: "timestamp",
      pick_hour: "integer",
      pick_day: "integer",
      pick_month: "integer",
      pick_year: "integer",
      pick_weekday: "integer",
      tpep_dropoff_datetime: "timestamp",
      drop_hour: "integer",
      drop_day: "integer",
      drop_month: "integer",
      drop_year: "integer",
      drop_weekday: "integer",
    },
    primaryKey: "datetime_id",
    partitionBy: "tpep_pickup_datetime",
  },
  passenger_count_dim: {
    name: "passenger_count_dim",
    columns: {
      passenger_count_id: "integer",
      passenger_count: "integer",
    },
    primaryKey: "passenger_count_id",
  },
  trip_distance_dim: {
    name: "trip_distance_dim",
    columns: {
      trip_distance_id: "integer",
      trip_distance: "float",
    },
    primaryKey: "trip_distance_id",
  },
  rate_code_dim: {
    name: "rate_code_dim",
    columns: {
      rate_code_id: "integer",
      RatecodeID: "integer",
      rate_code_name: "string",
    },
    primaryKey: "rate_code_id",
  },
  pickup_location_dim: {
    name: "pickup_location_dim",
    columns: {
      pickup_location_id: "integer",
      pickup_latitude: "float",
      pickup_longitude: "float",
    },
    primaryKey: "pickup_location_id",
  },
  dropoff_location_dim: {
    name: "dropoff_location_dim",
    columns: {
      dropoff_location_id: "integer",
      dropoff_latitude: "float",
      dropoff_longitude: "float",
    },
    primaryKey: "dropoff_location_id",
  },
  payment_type_dim: {
    name: "payment_type_dim",
    columns: {
      payment_type_id: "integer",
      payment_type: "integer",
      payment_type_name: "string",
    },
    primaryKey: "payment_type_id",
  },
  fact_table: {
    name: "fact_table",
    columns: {
      trip_id: "integer",
      VendorID: "integer",
      datetime_id: "integer",
      passenger_count_id: "integer",
      trip_distance_id: "integer",
      rate_code_id: "integer",
      store_and_fwd_flag: "string",
      pickup_location_id: "integer",
      dropoff_location_id: "integer",
      payment_type_id: "integer",
      ...fareColumns,
    },
    primaryKey: "trip_id",
  },
  tbl_analytics: {
    name: "tbl_analytics",
    columns: {
      trip_id: "integer",
      VendorID: "integer",
      tpep_pickup_datetime: "timestamp",
      tpep_dropoff_datetime: "timestamp",
      pick_hour: "integer",
      pick_weekday: "integer",
      passenger_count: "integer",
      trip_distance: "float",
      rate_code_name: "string",
      pickup_latitude: "float",
      pickup_longitude: "float",
      dropoff_latitude: "float",
      dropoff_longitude: "float",
      payment_type_name: "string",
      ...fareColumns,
    },
    primaryKey: "trip_id",
    partitionBy: "tpep_pickup_datetime",
  },
};
