import { describe, expect, it } from "vitest";
import type { RunReport } from "@repo/types";
import { formatTable } from "../src/process/output.js";
import { summarizeReport } from "../src/commands/run.js";
import { renderReport } from "../src/commands/report.js";

const report: RunReport = {
  status: "succeeded",
  source: "gs://trip-data/trips.csv",
  startedAt: "2026-01-05T10:00:00.000Z",
  durationMs: 1200,
  rowsRead: 6,
  rowsRejected: 2,
  duplicatesRemoved: 1,
  orphanFacts: 0,
  factRows: 3,
  dimensionRows: {
    datetime_dim: 3,
    passenger_count_dim: 2,
    trip_distance_dim: 3,
    rate_code_dim: 3,
    pickup_location_dim: 2,
    dropoff_location_dim: 3,
    payment_type_dim: 3,
  },
  duplicateKeyConflicts: {
    datetime_dim: 0,
    passenger_count_dim: 0,
    trip_distance_dim: 0,
    rate_code_dim: 0,
    pickup_location_dim: 1,
    dropoff_location_dim: 0,
    payment_type_dim: 0,
  },
  analyticsRows: 3,
  tables: [],
};

describe("formatTable", () => {
  it("left-aligns columns under a dashed rule", () => {
    expect(
      formatTable(
        ["a", "bb"],
        [
          ["x", 1],
          ["yyy", 22],
        ],
      ),
    ).toBe("a    bb\n---  --\nx    1\nyyy  22");
  });

  it("prints only the header for no rows", () => {
    expect(formatTable(["trips"], [])).toBe("trips\n-----");
  });
});

describe("summarizeReport", () => {
  it("lists run counts and per-dimension rows", () => {
    const lines = summarizeReport(report).split("\n");

    expect(lines).toContain(`fact rows${" ".repeat(13)}3`);
    expect(lines).toContain(`rows rejected${" ".repeat(9)}2`);
    expect(lines).toContain(
      `pickup_location_dim${" ".repeat(3)}2${" ".repeat(5)}1`,
    );
  });
});

describe("renderReport", () => {
  it("uses the row keys as headers", () => {
    expect(
      renderReport([
        { passenger_count: 1, total_number_trips: 12 },
        { passenger_count: 2, total_number_trips: 4 },
      ]),
    ).toBe(
      [
        "passenger_count  total_number_trips",
        "---------------  ------------------",
        "1                12",
        "2                4",
      ].join("\n"),
    );
  });

  it("says so when there is nothing to show", () => {
    expect(renderReport([])).toBe("(no rows)");
  });
});
