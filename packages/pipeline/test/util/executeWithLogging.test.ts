import { sql } from "kysely";
import { describe, expect, it } from "vitest";
import { checkWarehouseHealth } from "~/util/healthCheck";
import { bindRawQuery, executeWithLogging } from "~/util/executeWithLogging";
import { QueryExecutionError } from "~/util/errors";
import { recordingWarehouse } from "../utils/recordingWarehouse";

describe("executeWithLogging", () => {
  it("returns the result together with the compiled query", async () => {
    const { warehouse } = recordingWarehouse();
    const query = warehouse.db
      .selectFrom("fact_table")
      .select("trip_id")
      .where("trip_id", ">", 10);

    const { result, compiled } = await executeWithLogging(query);

    expect(result).toEqual([]);
    expect(compiled.sql).toBe(
      'select "trip_id" from "fact_table" where "trip_id" > $1',
    );
    expect(compiled.parameters).toEqual([10]);
  });

  it("wraps driver failures with the statement and operation", async () => {
    const { warehouse } = recordingWarehouse({ failOn: /^truncate/ });
    const statement = sql`truncate table ${sql.table("fact_table")}`;

    const error = await executeWithLogging(
      bindRawQuery(statement, warehouse.db),
      { operation: "truncate:fact_table" },
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(QueryExecutionError);
    expect(error).toMatchObject({
      details: {
        type: "query_execution",
        sql: 'truncate table "fact_table"',
        params: [],
        operation: "truncate:fact_table",
        message: 'Simulated failure for: truncate table "fact_table"',
      },
    });
  });
});

describe("checkWarehouseHealth", () => {
  it("runs a trivial query against PostgreSQL", async () => {
    const { warehouse, recorder } = recordingWarehouse();
    await checkWarehouseHealth(warehouse);
    expect(recorder.statements).toEqual(["select 1"]);
  });

  it("skips BigQuery", async () => {
    const { warehouse, recorder } = recordingWarehouse({ dialect: "bigquery" });
    await checkWarehouseHealth(warehouse);
    expect(recorder.statements).toEqual([]);
  });

  it("reports an unreachable warehouse", async () => {
    const { warehouse } = recordingWarehouse({ failOn: /select 1/ });
    await expect(checkWarehouseHealth(warehouse, 1_000)).rejects.toThrow(
      "Simulated failure for: select 1",
    );
  });
});
