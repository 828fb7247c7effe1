import type { AnalyticsRow } from "@repo/types";
import type { StarSchema } from "../transform/starSchema";

/** In-memory equivalent of analyticsQuery, with the same inner-join semantics. */
export function buildAnalyticsRows(
  model: Pick<StarSchema, "dimensions" | "facts">,
): AnalyticsRow[] {
  const { dimensions } = model;
  const rows: AnalyticsRow[] = [];

  for (const fact of model.facts) {
    const datetime = dimensions.datetime_dim.row(fact.datetime_id);
    const passengers = dimensions.passenger_count_dim.row(
      fact.passenger_count_id,
    );
    const distance = dimensions.trip_distance_dim.row(fact.trip_distance_id);
    const rateCode = dimensions.rate_code_dim.row(fact.rate_code_id);
    const pickup = dimensions.pickup_location_dim.row(fact.pickup_location_id);
    const dropoff = dimensions.dropoff_location_dim.row(
      fact.dropoff_location_id,
    );
    const payment = dimensions.payment_type_dim.row(fact.payment_type_id);

    if (
      !datetime ||
      !passengers ||
      !distance ||
      !rateCode ||
      !pickup ||
      !dropoff ||
      !payment
    ) {
      continue;
    }

    rows.push({
      trip_id: fact.trip_id,
      VendorID: fact.VendorID,
      tpep_pickup_datetime: datetime.tpep_pickup_datetime,
      tpep_dropoff_datetime: datetime.tpep_dropoff_datetime,
      pick_hour: datetime.pick_hour,
      pick_weekday: datetime.pick_weekday,
      passenger_count: passengers.passenger_count,
      trip_distance: distance.trip_distance,
      rate_code_name: rateCode.rate_code_name,
      pickup_latitude: pickup.pickup_latitude,
      pickup_longitude: pickup.pickup_longitude,
      dropoff_latitude: dropoff.dropoff_latitude,
      dropoff_longitude: dropoff.dropoff_longitude,
      payment_type_name: payment.payment_type_name,
      fare_amount: fact.fare_amount,
      extra: fact.extra,
      mta_tax: fact.mta_tax,
      tip_amount: fact.tip_amount,
      tolls_amount: fact.tolls_amount,
      improvement_surcharge: fact.improvement_surcharge,
      total_amount: fact.total_amount,
    });
  }

  return rows;
}
