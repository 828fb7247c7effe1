import type { RawTripRecord } from "@repo/types";
import { buildDimension, type Dimension } from "./buildDimension";
import {
  datetimeDimension,
  dropoffLocationDimension,
  passengerCountDimension,
  paymentTypeDimension,
  pickupLocationDimension,
  rateCodeDimension,
  tripDistanceDimension,
} from "./definitions";

export {
  buildDimension,
  type Dimension,
  type DimensionDefinition,
} from "./buildDimension";
export * from "./definitions";

export type Dimensions = {
  datetime_dim: Dimension<"datetime_dim">;
  passenger_count_dim: Dimension<"passenger_count_dim">;
  trip_distance_dim: Dimension<"trip_distance_dim">;
  rate_code_dim: Dimension<"rate_code_dim">;
  pickup_location_dim: Dimension<"pickup_location_dim">;
  dropoff_location_dim: Dimension<"dropoff_location_dim">;
  payment_type_dim: Dimension<"payment_type_dim">;
};

export function buildDimensions(records: readonly RawTripRecord[]): Dimensions {
  return {
    datetime_dim: buildDimension(records, datetimeDimension),
    passenger_count_dim: buildDimension(records, passengerCountDimension),
    trip_distance_dim: buildDimension(records, tripDistanceDimension),
    rate_code_dim: buildDimension(records, rateCodeDimension),
    pickup_location_dim: buildDimension(records, pickupLocationDimension),
    dropoff_location_dim: buildDimension(records, dropoffLocationDimension),
    payment_type_dim: buildDimension(records, paymentTypeDimension),
  };
}
