import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { describe, expect, test } from "vitest";
import { parseTripCsv } from "~/extract/parseTrips";
import { InputError } from "~/util/errors";
import { TRIP_HEADER } from "../utils/trips";

const fixture = readFileSync(
  fileURLToPath(new URL("../fixtures/trips.csv", import.meta.url)),
  "utf-8",
);

function captureInputError(text: string): InputError {
  try {
    parseTripCsv(text);
  } catch (error) {
    if (error instanceof InputError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected parseTripCsv to throw");
}

describe("parseTripCsv", () => {
  test("keeps valid rows and rejects malformed ones with their line", () => {
    const { records, rejected } = parseTripCsv(fixture);

    expect(records).toHaveLength(4);
    expect(rejected).toEqual([
      {
        line: 5,
        reason:
          'tpep_pickup_datetime is not a valid timestamp ("2016-03-01 25:00:00")',
      },
      { line: 6, reason: "fare_amount is not a number" },
    ]);
  });

  test("parses cells into typed values", () => {
    const [first] = parseTripCsv(fixture).records;
    expect(first).toMatchObject({
      VendorID: 1,
      passenger_count: 1,
      trip_distance: 2.5,
      pickup_latitude: 40.76,
      pickup_longitude: -73.97,
      store_and_fwd_flag: "N",
      total_amount: 12.35,
    });
    expect(first?.tpep_pickup_datetime).toEqual(
      new Date("2016-03-01T00:00:00.000Z"),
    );
  });

  test("accepts columns in any order", () => {
    const [vendor, ...rest] = TRIP_HEADER.split(",");
    const [firstRow] = fixture.split("\n").slice(1);
    const [vendorCell, ...restCells] = (firstRow ?? "").split(",");
    const text = `${[...rest, vendor].join(",")}\n${[...restCells, vendorCell].join(",")}\n`;

    const { records, rejected } = parseTripCsv(text);
    expect(rejected).toEqual([]);
    expect(records[0]?.VendorID).toBe(1);
  });

  test("lists every missing cell of a short row", () => {
    const { records, rejected } = parseTripCsv(
      `${TRIP_HEADER}\n1,2016-03-01 00:00:00\n`,
    );
    expect(records).toEqual([]);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.line).toBe(2);
    expect(rejected[0]?.reason).toMatch(
      /^tpep_dropoff_datetime is missing; passenger_count is missing;/,
    );
  });

  test("fails when required columns are absent", () => {
    const header = TRIP_HEADER.split(",")
      .filter((column) => column !== "extra" && column !== "total_amount")
      .join(",");
    const error = captureInputError(`${header}\n`);

    expect(error.code).toBe("missing_columns");
    expect(error.message).toBe(
      "Trip file is missing required columns: extra, total_amount",
    );
    expect(error.details).toEqual({ missing: ["extra", "total_amount"] });
  });

  test("fails when a required column appears twice", () => {
    const error = captureInputError(
      `${TRIP_HEADER},fare_amount\n1,2016-03-01 00:00:00\n`,
    );
    expect(error.code).toBe("malformed_csv");
    expect(error.message).toBe("Trip file repeats columns: fare_amount");
    expect(error.details).toEqual({ repeated: ["fare_amount"] });
  });

  test("fails on an empty file", () => {
    const error = captureInputError("");
    expect(error.code).toBe("empty_source");
    expect(error.message).toBe("Trip file has no header row");
  });

  test("fails on structurally broken CSV", () => {
    const error = captureInputError(`${TRIP_HEADER}\n"1,2016-03-01`);
    expect(error.code).toBe("malformed_csv");
    expect(error.message).toMatch(/^Trip file is not valid CSV: /);
  });
});
