import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import { runPipeline } from "~/pipeline";
import { PipelineError, PipelineStageError } from "~/util/errors";
import { recordingWarehouse } from "./utils/recordingWarehouse";
import { TRIP_HEADER } from "./utils/trips";

const fixturePath = fileURLToPath(
  new URL("./fixtures/trips.csv", import.meta.url),
);

const expectedDimensionRows = {
  datetime_dim: 3,
  passenger_count_dim: 2,
  trip_distance_dim: 3,
  rate_code_dim: 3,
  pickup_location_dim: 2,
  dropoff_location_dim: 3,
  payment_type_dim: 3,
};

describe("runPipeline", () => {
  it("builds the star schema in memory on a dry run", async () => {
    const report = await runPipeline({ source: fixturePath, dryRun: true });

    expect(report).toMatchObject({
      status: "dry_run",
      source: fixturePath,
      rowsRead: 6,
      rowsRejected: 2,
      duplicatesRemoved: 1,
      orphanFacts: 0,
      factRows: 3,
      analyticsRows: 3,
      tables: [],
      dimensionRows: expectedDimensionRows,
      duplicateKeyConflicts: {
        datetime_dim: 0,
        passenger_count_dim: 0,
        trip_distance_dim: 0,
        rate_code_dim: 0,
        pickup_location_dim: 0,
        dropoff_location_dim: 0,
        payment_type_dim: 0,
      },
    });
  });

  it("loads every table and materializes the analytics view", async () => {
    const { warehouse, recorder } = recordingWarehouse();
    const report = await runPipeline({ source: fixturePath, warehouse });

    expect(report.status).toBe("succeeded");
    expect(report.tables).toHaveLength(8);
    expect(report.tables.map((outcome) => outcome.status)).not.toContain(
      "failed",
    );
    expect(report.dimensionRows).toEqual(expectedDimensionRows);
    expect(recorder.statements).toContain('truncate table "tbl_analytics"');
  });

  it("fails the load stage when a table cannot be written", async () => {
    const { warehouse, recorder } = recordingWarehouse({
      failOn: /^insert into "rate_code_dim"/,
    });

    const error = await runPipeline({ source: fixturePath, warehouse }).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(PipelineStageError);
    expect(error).toMatchObject({ stage: "load", kind: "load" });
    expect(String(error)).toContain(
      "Pipeline failed in load stage (load): 1 of 8 tables failed to load: rate_code_dim",
    );
    expect(
      recorder.statements.some((statement) =>
        statement.startsWith('insert into "fact_table"'),
      ),
    ).toBe(true);
    expect(recorder.statements).not.toContain('truncate table "tbl_analytics"');
  });

  it("fails the extract stage when no row is usable", async () => {
    const error = await runPipeline({
      source: "memory://header-only",
      dryRun: true,
      readSource: async () => `${TRIP_HEADER}\n`,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PipelineStageError);
    expect(error).toMatchObject({
      stage: "extract",
      kind: "input",
      message:
        'Pipeline failed in extract stage (input): Trip source "memory://header-only" contains no valid rows',
    });
  });

  it("needs a warehouse unless it is a dry run", async () => {
    const run = runPipeline({ source: fixturePath });
    await expect(run).rejects.toBeInstanceOf(PipelineError);
    await expect(run).rejects.toMatchObject({
      kind: "configuration",
      code: "missing_warehouse",
      message: "A warehouse is required unless dryRun is set",
    });
  });
});
