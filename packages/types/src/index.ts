import { z } from "zod";

const TRIP_TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,3}))?$/;

/**
 * Parses a trip timestamp such as `2016-03-01 00:15:42` as UTC.
 * Returns null when the text is not a real calendar instant, or when it
 * carries more than millisecond precision.
 */
export function parseTripTimestamp(value: string): Date | null {
  const match = TRIP_TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1, 7)
    .map((part) => Number.parseInt(part, 10));
  const millis = match[7] ? Number.parseInt(match[7].padEnd(3, "0"), 10) : 0;

  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const date = new Date(
    Date.UTC(year, month - 1, day, hour, minute, second, millis),
  );
  // Date.UTC rolls 2016-02-30 over into March
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

const requiredCell = z
  .string({ required_error: "is missing" })
  .trim()
  .min(1, "is empty");

// plain decimal notation only; Number() would also take "0x10" or "1e3"
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

function numberCell(
  options: { integer?: boolean; min?: number; max?: number } = {},
) {
  let schema = z
    .number({ invalid_type_error: "is not a number" })
    .finite("is not a number");
  if (options.integer) {
    schema = schema.int("is not an integer");
  }
  if (options.min !== undefined) {
    schema = schema.min(options.min, `is below ${options.min}`);
  }
  if (options.max !== undefined) {
    schema = schema.max(options.max, `is above ${options.max}`);
  }
  return requiredCell
    .pipe(z.string().regex(DECIMAL_PATTERN, "is not a number"))
    .transform(Number)
    .pipe(schema);
}

const timestampCell = requiredCell.transform((value, ctx) => {
  const parsed = parseTripTimestamp(value);
  if (!parsed) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `is not a valid timestamp ("${value}")`,
    });
    return z.NEVER;
  }
  return parsed;
});

export const RAW_TRIP_COLUMNS = [
  "VendorID",
  "tpep_pickup_datetime",
  "tpep_dropoff_datetime",
  "passenger_count",
  "trip_distance",
  "pickup_longitude",
  "pickup_latitude",
  "RatecodeID",
  "store_and_fwd_flag",
  "dropoff_longitude",
  "dropoff_latitude",
  "payment_type",
  "fare_amount",
  "extra",
  "mta_tax",
  "tip_amount",
  "tolls_amount",
  "improvement_surcharge",
  "total_amount",
] as const;

export type RawTripColumn = (typeof RAW_TRIP_COLUMNS)[number];

export const rawTripRecordSchema = z
  .object({
    VendorID: numberCell({ integer: true, min: 0 }),
    tpep_pickup_datetime: timestampCell,
    tpep_dropoff_datetime: timestampCell,
    passenger_count: numberCell({ integer: true, min: 0 }),
    trip_distance: numberCell({ min: 0 }),
    pickup_longitude: numberCell({ min: -180, max: 180 }),
    pickup_latitude: numberCell({ min: -90, max: 90 }),
    RatecodeID: numberCell({ integer: true }),
    store_and_fwd_flag: requiredCell.pipe(
      z.enum(["Y", "N"], {
        errorMap: () => ({ message: "must be Y or N" }),
      }),
    ),
    dropoff_longitude: numberCell({ min: -180, max: 180 }),
    dropoff_latitude: numberCell({ min: -90, max: 90 }),
    payment_type: numberCell({ integer: true }),
    fare_amount: numberCell(),
    extra: numberCell(),
    mta_tax: numberCell(),
    tip_amount: numberCell(),
    tolls_amount: numberCell(),
    improvement_surcharge: numberCell(),
    total_amount: numberCell(),
  })
  .superRefine((record, ctx) => {
    // Cells that failed their own checks reach here unparsed.
    const pickup: unknown = record.tpep_pickup_datetime;
    const dropoff: unknown = record.tpep_dropoff_datetime;
    if (
      pickup instanceof Date &&
      dropoff instanceof Date &&
      dropoff.getTime() < pickup.getTime()
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["tpep_dropoff_datetime"],
        message: "is earlier than tpep_pickup_datetime",
      });
    }
  });

export type RawTripRecord = z.output<typeof rawTripRecordSchema>;

/** Values a warehouse column can hold. Nothing in the star schema is nullable. */
export type WarehouseValue = number | string | Date;

export type DatetimeDimRow = {
  datetime_id: number;
  tpep_pickup_datetime: Date;
  pick_hour: number;
  pick_day: number;
  pick_month: number;
  pick_year: number;
  pick_weekday: number;
  tpep_dropoff_datetime: Date;
  drop_hour: number;
  drop_day: number;
  drop_month: number;
  drop_year: number;
  drop_weekday: number;
};

export type PassengerCountDimRow = {
  passenger_count_id: number;
  passenger_count: number;
};

export type TripDistanceDimRow = {
  trip_distance_id: number;
  trip_distance: number;
};

export type RateCodeDimRow = {
  rate_code_id: number;
  RatecodeID: number;
  rate_code_name: string;
};

export type PickupLocationDimRow = {
  pickup_location_id: number;
  pickup_latitude: number;
  pickup_longitude: number;
};

export type DropoffLocationDimRow = {
  dropoff_location_id: number;
  dropoff_latitude: number;
  dropoff_longitude: number;
};

export type PaymentTypeDimRow = {
  payment_type_id: number;
  payment_type: number;
  payment_type_name: string;
};

export type FareMetrics = {
  fare_amount: number;
  extra: number;
  mta_tax: number;
  tip_amount: number;
  tolls_amount: number;
  improvement_surcharge: number;
  total_amount: number;
};

export type FactRow = {
  trip_id: number;
  VendorID: number;
  datetime_id: number;
  passenger_count_id: number;
  trip_distance_id: number;
  rate_code_id: number;
  store_and_fwd_flag: string;
  pickup_location_id: number;
  dropoff_location_id: number;
  payment_type_id: number;
} & FareMetrics;

export type AnalyticsRow = {
  trip_id: number;
  VendorID: number;
  tpep_pickup_datetime: Date;
  tpep_dropoff_datetime: Date;
  pick_hour: number;
  pick_weekday: number;
  passenger_count: number;
  trip_distance: number;
  rate_code_name: string;
  pickup_latitude: number;
  pickup_longitude: number;
  dropoff_latitude: number;
  dropoff_longitude: number;
  payment_type_name: string;
} & FareMetrics;

export type DimensionRows = {
  datetime_dim: DatetimeDimRow;
  passenger_count_dim: PassengerCountDimRow;
  trip_distance_dim: TripDistanceDimRow;
  rate_code_dim: RateCodeDimRow;
  pickup_location_dim: PickupLocationDimRow;
  dropoff_location_dim: DropoffLocationDimRow;
  payment_type_dim: PaymentTypeDimRow;
};

export type DimensionTableName = keyof DimensionRows;

export const DIMENSION_TABLES = [
  "datetime_dim",
  "passenger_count_dim",
  "trip_distance_dim",
  "rate_code_dim",
  "pickup_location_dim",
  "dropoff_location_dim",
  "payment_type_dim",
] as const satisfies readonly DimensionTableName[];

/** Every table the pipeline writes, keyed by name. */
export type WarehouseTables = DimensionRows & {
  fact_table: FactRow;
  tbl_analytics: AnalyticsRow;
};

export type WarehouseTableName = keyof WarehouseTables;

export type PipelineStage = "extract" | "transform" | "load" | "analytics";

export type PipelineErrorKind =
  | "input"
  | "referential"
  | "load"
  | "duplicate_key"
  | "integrity"
  | "configuration";

export type RejectedRow = {
  /** 1-based line in the source file; the header is line 1. */
  line: number;
  reason: string;
};

export type OrphanFact = {
  /** 1-based position of the trip among the deduplicated records. */
  position: number;
  table: DimensionTableName;
  naturalKey: string;
};

export type TableLoadOutcome =
  | {
      table: WarehouseTableName;
      status: "loaded";
      rows: number;
      durationMs: number;
    }
  | {
      table: WarehouseTableName;
      status: "failed";
      error: string;
    };

export type RunReport = {
  status: "succeeded" | "dry_run";
  source: string;
  startedAt: string;
  durationMs: number;
  rowsRead: number;
  rowsRejected: number;
  duplicatesRemoved: number;
  orphanFacts: number;
  factRows: number;
  dimensionRows: Record<DimensionTableName, number>;
  duplicateKeyConflicts: Record<DimensionTableName, number>;
  analyticsRows: number;
  tables: TableLoadOutcome[];
};

export type QueryExecutionErrorDetails = {
  type: "query_execution";
  message: string;
  sql: string;
  params: unknown[];
  operation?: string;
  code?: string;
  detail?: string;
  hint?: string;
};
