import {
  DIMENSION_TABLES,
  RAW_TRIP_COLUMNS,
  type DimensionTableName,
  type FactRow,
  type OrphanFact,
  type RawTripRecord,
} from "@repo/types";
import { logger } from "../util/logger";
import { IntegrityError } from "../util/errors";
import type { Dimension, Dimensions } from "./dimensions";

/** Fact-table column that references each dimension's surrogate key. */
export const FACT_FOREIGN_KEYS = {
  datetime_dim: "datetime_id",
  passenger_count_dim: "passenger_count_id",
  trip_distance_dim: "trip_distance_id",
  rate_code_dim: "rate_code_id",
  pickup_location_dim: "pickup_location_id",
  dropoff_location_dim: "dropoff_location_id",
  payment_type_dim: "payment_type_id",
} as const satisfies Record<DimensionTableName, keyof FactRow>;

const MAX_LOGGED_ORPHANS = 20;

export interface DedupedTrips {
  records: RawTripRecord[];
  duplicatesRemoved: number;
}

/**
 * Drops records identical across every raw column, keeping the first. The
 * source has no trip identifier, so the whole row is the identity.
 */
export function dedupeTrips(records: readonly RawTripRecord[]): DedupedTrips {
  const seen = new Set<string>();
  const kept: RawTripRecord[] = [];

  for (const record of records) {
    const fingerprint = JSON.stringify(
      RAW_TRIP_COLUMNS.map((column) => record[column]),
    );
    if (!seen.has(fingerprint)) {
      seen.add(fingerprint);
      kept.push(record);
    }
  }

  return { records: kept, duplicatesRemoved: records.length - kept.length };
}

export interface FactTable {
  rows: FactRow[];
  orphans: OrphanFact[];
}

function requireKey(
  dimension: Dimension<DimensionTableName>,
  record: RawTripRecord,
): number {
  const key = dimension.keyFor(record);
  if (key === undefined) {
    throw new IntegrityError(
      "unresolved_dimension_key",
      `No ${dimension.table} row for ${dimension.describeKey(record)}`,
    );
  }
  return key;
}

/**
 * One fact row per record, trip ids dense from 1 in record order. A record
 * whose natural key is missing from a dimension is dropped and reported as an
 * orphan rather than given a placeholder key.
 */
export function buildFactTable(
  records: readonly RawTripRecord[],
  dimensions: Dimensions,
): FactTable {
  const rows: FactRow[] = [];
  const orphans: OrphanFact[] = [];

  records.forEach((record, index) => {
    const missing = DIMENSION_TABLES.find(
      (table) => dimensions[table].keyFor(record) === undefined,
    );
    if (missing) {
      orphans.push({
        position: index + 1,
        table: missing,
        naturalKey: dimensions[missing].describeKey(record),
      });
      return;
    }

    rows.push({
      trip_id: rows.length + 1,
      VendorID: record.VendorID,
      datetime_id: requireKey(dimensions.datetime_dim, record),
      passenger_count_id: requireKey(dimensions.passenger_count_dim, record),
      trip_distance_id: requireKey(dimensions.trip_distance_dim, record),
      rate_code_id: requireKey(dimensions.rate_code_dim, record),
      store_and_fwd_flag: record.store_and_fwd_flag,
      pickup_location_id: requireKey(dimensions.pickup_location_dim, record),
      dropoff_location_id: requireKey(dimensions.dropoff_location_dim, record),
      payment_type_id: requireKey(dimensions.payment_type_dim, record),
      fare_amount: record.fare_amount,
      extra: record.extra,
      mta_tax: record.mta_tax,
      tip_amount: record.tip_amount,
      tolls_amount: record.tolls_amount,
      improvement_surcharge: record.improvement_surcharge,
      total_amount: record.total_amount,
    });
  });

  if (orphans.length > 0) {
    logger.warn(
      { orphans: orphans.length, sample: orphans.slice(0, MAX_LOGGED_ORPHANS) },
      "Dropped trips with unresolved dimension keys",
    );
  }

  return { rows, orphans };
}
