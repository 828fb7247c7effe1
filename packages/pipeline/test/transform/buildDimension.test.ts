import { describe, expect, it } from "vitest";
import {
  buildDimension,
  pickupLocationDimension,
  rateCodeDimension,
  tripDistanceDimension,
  type DimensionDefinition,
} from "~/transform/dimensions";
import {
  datetimeDimension,
  paymentTypeName,
  rateCodeName,
  weekdayOf,
} from "~/transform/dimensions/definitions";
import { compareNaturalKeys, encodeNaturalKey } from "~/transform/naturalKey";
import { makeTrip } from "../utils/trips";

describe("buildDimension", () => {
  it("assigns dense keys in natural-key order, not input order", () => {
    const dimension = buildDimension(
      [
        makeTrip({ trip_distance: 7.2 }),
        makeTrip({ trip_distance: 0.4 }),
        makeTrip({ trip_distance: 3 }),
        makeTrip({ trip_distance: 0.4 }),
      ],
      tripDistanceDimension,
    );

    expect(dimension.rows).toEqual([
      { trip_distance_id: 1, trip_distance: 0.4 },
      { trip_distance_id: 2, trip_distance: 3 },
      { trip_distance_id: 3, trip_distance: 7.2 },
    ]);
    expect(dimension.keyFor(makeTrip({ trip_distance: 7.2 }))).toBe(3);
    expect(dimension.keyFor(makeTrip({ trip_distance: 9 }))).toBeUndefined();
  });

  it("gives a new coordinate pair its own row", () => {
    const dimension = buildDimension(
      [
        makeTrip({ pickup_latitude: 40.76, pickup_longitude: -73.97 }),
        makeTrip({ pickup_latitude: 40.76, pickup_longitude: -73.95 }),
        makeTrip({ pickup_latitude: 40.76, pickup_longitude: -73.97 }),
      ],
      pickupLocationDimension,
    );

    expect(dimension.rows).toEqual([
      { pickup_location_id: 1, pickup_latitude: 40.76, pickup_longitude: -73.97 },
      { pickup_location_id: 2, pickup_latitude: 40.76, pickup_longitude: -73.95 },
    ]);
  });

  it("keeps the first occurrence when attributes disagree", () => {
    const vendorLabel: DimensionDefinition<
      "payment_type_dim",
      { payment_type: number; payment_type_name: string }
    > = {
      table: "payment_type_dim",
      naturalKey: (record) => [record.payment_type],
      attributes: (record) => ({
        payment_type: record.payment_type,
        payment_type_name: `vendor ${record.VendorID}`,
      }),
      toRow: (key, attributes) => ({ payment_type_id: key, ...attributes }),
    };

    const dimension = buildDimension(
      [
        makeTrip({ payment_type: 1, VendorID: 2 }),
        makeTrip({ payment_type: 1, VendorID: 1 }),
        makeTrip({ payment_type: 1, VendorID: 2 }),
      ],
      vendorLabel,
    );

    expect(dimension.rows).toEqual([
      { payment_type_id: 1, payment_type: 1, payment_type_name: "vendor 2" },
    ]);
    expect(dimension.conflicts).toBe(1);
  });

  it("looks rows up by surrogate key", () => {
    const dimension = buildDimension(
      [makeTrip({ RatecodeID: 5 }), makeTrip({ RatecodeID: 2 })],
      rateCodeDimension,
    );

    expect(dimension.row(1)).toEqual({
      rate_code_id: 1,
      RatecodeID: 2,
      rate_code_name: "JFK",
    });
    expect(dimension.row(0)).toBeUndefined();
    expect(dimension.row(3)).toBeUndefined();
    expect(dimension.describeKey(makeTrip({ RatecodeID: 5 }))).toBe("[5]");
  });

  it("derives calendar parts of both ends of the trip", () => {
    const dimension = buildDimension(
      [
        makeTrip({
          tpep_pickup_datetime: new Date("2016-03-06T23:50:00Z"),
          tpep_dropoff_datetime: new Date("2016-03-07T00:10:00Z"),
        }),
      ],
      datetimeDimension,
    );

    expect(dimension.rows[0]).toMatchObject({
      datetime_id: 1,
      pick_hour: 23,
      pick_day: 6,
      pick_month: 3,
      pick_year: 2016,
      pick_weekday: 6,
      drop_hour: 0,
      drop_day: 7,
      drop_weekday: 0,
    });
  });
});

describe("code names", () => {
  it("names known rate codes and payment types", () => {
    expect(rateCodeName(1)).toBe("Standard rate");
    expect(rateCodeName(6)).toBe("Group ride");
    expect(paymentTypeName(2)).toBe("Cash");
    expect(paymentTypeName(6)).toBe("Voided trip");
  });

  it("falls back to Unknown", () => {
    expect(rateCodeName(99)).toBe("Unknown");
    expect(paymentTypeName(0)).toBe("Unknown");
  });

  it("numbers weekdays from Monday", () => {
    expect(weekdayOf(new Date("2016-03-07T12:00:00Z"))).toBe(0);
    expect(weekdayOf(new Date("2016-03-01T12:00:00Z"))).toBe(1);
    expect(weekdayOf(new Date("2016-03-06T12:00:00Z"))).toBe(6);
  });
});

describe("natural keys", () => {
  it("orders element by element", () => {
    expect(compareNaturalKeys([40.7, -73.9], [40.7, -74])).toBeGreaterThan(0);
    expect(compareNaturalKeys([1], [1, 0])).toBeLessThan(0);
    expect(
      compareNaturalKeys(
        [new Date("2016-03-01T00:00:00Z")],
        [new Date("2016-03-02T00:00:00Z")],
      ),
    ).toBeLessThan(0);
  });

  it("encodes dates as ISO strings", () => {
    expect(encodeNaturalKey([new Date("2016-03-01T00:00:00Z"), 2])).toBe(
      '["2016-03-01T00:00:00.000Z",2]',
    );
  });
});
