import type { RawTripRecord } from "@repo/types";
import type { DimensionDefinition } from "./buildDimension";

const RATE_CODE_NAMES = new Map<number, string>([
  [1, "Standard rate"],
  [2, "JFK"],
  [3, "Newark"],
  [4, "Nassau or Westchester"],
  [5, "Negotiated fare"],
  [6, "Group ride"],
]);

const PAYMENT_TYPE_NAMES = new Map<number, string>([
  [1, "Credit card"],
  [2, "Cash"],
  [3, "No charge"],
  [4, "Dispute"],
  [5, "Unknown"],
  [6, "Voided trip"],
]);

export function rateCodeName(code: number): string {
  return RATE_CODE_NAMES.get(code) ?? "Unknown";
}

export function paymentTypeName(code: number): string {
  return PAYMENT_TYPE_NAMES.get(code) ?? "Unknown";
}

/** Monday is 0, Sunday is 6. */
export function weekdayOf(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

function calendarParts(date: Date) {
  return {
    hour: date.getUTCHours(),
    day: date.getUTCDate(),
    month: date.getUTCMonth() + 1,
    year: date.getUTCFullYear(),
    weekday: weekdayOf(date),
  };
}

function datetimeAttributes(record: RawTripRecord) {
  const pick = calendarParts(record.tpep_pickup_datetime);
  const drop = calendarParts(record.tpep_dropoff_datetime);
  return {
    tpep_pickup_datetime: record.tpep_pickup_datetime,
    pick_hour: pick.hour,
    pick_day: pick.day,
    pick_month: pick.month,
    pick_year: pick.year,
    pick_weekday: pick.weekday,
    tpep_dropoff_datetime: record.tpep_dropoff_datetime,
    drop_hour: drop.hour,
    drop_day: drop.day,
    drop_month: drop.month,
    drop_year: drop.year,
    drop_weekday: drop.weekday,
  };
}

export const datetimeDimension: DimensionDefinition<
  "datetime_dim",
  ReturnType<typeof datetimeAttributes>
> = {
  table: "datetime_dim",
  naturalKey: (record) => [
    record.tpep_pickup_datetime,
    record.tpep_dropoff_datetime,
  ],
  attributes: datetimeAttributes,
  toRow: (key, attributes) => ({ datetime_id: key, ...attributes }),
};

export const passengerCountDimension: DimensionDefinition<
  "passenger_count_dim",
  { passenger_count: number }
> = {
  table: "passenger_count_dim",
  naturalKey: (record) => [record.passenger_count],
  attributes: (record) => ({ passenger_count: record.passenger_count }),
  toRow: (key, attributes) => ({ passenger_count_id: key, ...attributes }),
};

export const tripDistanceDimension: DimensionDefinition<
  "trip_distance_dim",
  { trip_distance: number }
> = {
  table: "trip_distance_dim",
  naturalKey: (record) => [record.trip_distance],
  attributes: (record) => ({ trip_distance: record.trip_distance }),
  toRow: (key, attributes) => ({ trip_distance_id: key, ...attributes }),
};

export const rateCodeDimension: DimensionDefinition<
  "rate_code_dim",
  { RatecodeID: number; rate_code_name: string }
> = {
  table: "rate_code_dim",
  naturalKey: (record) => [record.RatecodeID],
  attributes: (record) => ({
    RatecodeID: record.RatecodeID,
    rate_code_name: rateCodeName(record.RatecodeID),
  }),
  toRow: (key, attributes) => ({ rate_code_id: key, ...attributes }),
};

export const pickupLocationDimension: DimensionDefinition<
  "pickup_location_dim",
  { pickup_latitude: number; pickup_longitude: number }
> = {
  table: "pickup_location_dim",
  naturalKey: (record) => [record.pickup_latitude, record.pickup_longitude],
  attributes: (record) => ({
    pickup_latitude: record.pickup_latitude,
    pickup_longitude: record.pickup_longitude,
  }),
  toRow: (key, attributes) => ({ pickup_location_id: key, ...attributes }),
};

export const dropoffLocationDimension: DimensionDefinition<
  "dropoff_location_dim",
  { dropoff_latitude: number; dropoff_longitude: number }
> = {
  table: "dropoff_location_dim",
  naturalKey: (record) => [record.dropoff_latitude, record.dropoff_longitude],
  attributes: (record) => ({
    dropoff_latitude: record.dropoff_latitude,
    dropoff_longitude: record.dropoff_longitude,
  }),
  toRow: (key, attributes) => ({ dropoff_location_id: key, ...attributes }),
};

export const paymentTypeDimension: DimensionDefinition<
  "payment_type_dim",
  { payment_type: number; payment_type_name: string }
> = {
  table: "payment_type_dim",
  naturalKey: (record) => [record.payment_type],
  attributes: (record) => ({
    payment_type: record.payment_type,
    payment_type_name: paymentTypeName(record.payment_type),
  }),
  toRow: (key, attributes) => ({ payment_type_id: key, ...attributes }),
};
