import type { Kysely } from "kysely";
import type { WarehouseTables } from "@repo/types";
import { executeWithLogging } from "../util/executeWithLogging";
import { scopedDb, type Warehouse } from "../warehouse/warehouse";

export type TopPickupLocation = {
  pickup_location_id: number;
  pickup_latitude: number;
  pickup_longitude: number;
  trips: number;
};

export type PassengerCountTrips = {
  passenger_count: number;
  total_number_trips: number;
};

export type HourlyAverageFare = {
  pick_hour: number;
  avg_fare_amount: number;
};

const DEFAULT_LIMIT = 10;

export function topPickupLocationsQuery(
  db: Kysely<WarehouseTables>,
  limit = DEFAULT_LIMIT,
) {
  return db
    .selectFrom("pickup_location_dim as a")
    .innerJoin(
      "fact_table as b",
      "a.pickup_location_id",
      "b.pickup_location_id",
    )
    .select((eb) => [
      "a.pickup_location_id",
      "a.pickup_latitude",
      "a.pickup_longitude",
      eb.fn.countAll().as("trips"),
    ])
    .groupBy(["a.pickup_location_id", "a.pickup_latitude", "a.pickup_longitude"])
    .orderBy("trips", "desc")
    .limit(limit);
}

export function tripsByPassengerCountQuery(
  db: Kysely<WarehouseTables>,
  limit = DEFAULT_LIMIT,
) {
  return db
    .selectFrom("passenger_count_dim as a")
    .innerJoin(
      "fact_table as b",
      "a.passenger_count_id",
      "b.passenger_count_id",
    )
    .select((eb) => [
      "a.passenger_count",
      eb.fn.countAll().as("total_number_trips"),
    ])
    .groupBy("a.passenger_count")
    .orderBy("total_number_trips", "desc")
    .limit(limit);
}

export function averageFareByPickupHourQuery(db: Kysely<WarehouseTables>) {
  return db
    .selectFrom("datetime_dim as a")
    .innerJoin("fact_table as b", "a.datetime_id", "b.datetime_id")
    .select((eb) => ["a.pick_hour", eb.fn.avg("b.fare_amount").as("avg_fare_amount")])
    .groupBy("a.pick_hour")
    .orderBy("avg_fare_amount", "desc");
}

export async function topPickupLocations(
  warehouse: Warehouse,
  limit = DEFAULT_LIMIT,
): Promise<TopPickupLocation[]> {
  const { result } = await executeWithLogging(
    topPickupLocationsQuery(scopedDb(warehouse), limit),
    { operation: "report:top-pickups" },
  );
  return result.map((row) => ({
    pickup_location_id: row.pickup_location_id,
    pickup_latitude: row.pickup_latitude,
    pickup_longitude: row.pickup_longitude,
    trips: Number(row.trips),
  }));
}

export async function tripsByPassengerCount(
  warehouse: Warehouse,
  limit = DEFAULT_LIMIT,
): Promise<PassengerCountTrips[]> {
  const { result } = await executeWithLogging(
    tripsByPassengerCountQuery(scopedDb(warehouse), limit),
    { operation: "report:passenger-counts" },
  );
  return result.map((row) => ({
    passenger_count: row.passenger_count,
    total_number_trips: Number(row.total_number_trips),
  }));
}

export async function averageFareByPickupHour(
  warehouse: Warehouse,
): Promise<HourlyAverageFare[]> {
  const { result } = await executeWithLogging(
    averageFareByPickupHourQuery(scopedDb(warehouse)),
    { operation: "report:fare-by-hour" },
  );
  return result.map((row) => ({
    pick_hour: row.pick_hour,
    avg_fare_amount: Number(row.avg_fare_amount),
  }));
}

export const REPORTS = {
  "top-pickups": topPickupLocations,
  "passenger-counts": tripsByPassengerCount,
  "fare-by-hour": averageFareByPickupHour,
} as const;

export type ReportName = keyof typeof REPORTS;

export function isReportName(value: string): value is ReportName {
  return Object.hasOwn(REPORTS, value);
}
