import { RAW_TRIP_COLUMNS, type RawTripRecord } from "@repo/types";

export const TRIP_HEADER = RAW_TRIP_COLUMNS.join(",");

export function makeTrip(overrides: Partial<RawTripRecord> = {}): RawTripRecord {
  return {
    VendorID: 1,
    tpep_pickup_datetime: new Date("2016-03-01T00:00:00Z"),
    tpep_dropoff_datetime: new Date("2016-03-01T00:07:55Z"),
    passenger_count: 1,
    trip_distance: 2.5,
    pickup_longitude: -73.97,
    pickup_latitude: 40.76,
    RatecodeID: 1,
    store_and_fwd_flag: "N",
    dropoff_longitude: -74,
    dropoff_latitude: 40.74,
    payment_type: 1,
    fare_amount: 9,
    extra: 0.5,
    mta_tax: 0.5,
    tip_amount: 2.05,
    tolls_amount: 0,
    improvement_surcharge: 0.3,
    total_amount: 12.35,
    ...overrides,
  };
}
