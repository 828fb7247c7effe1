import type {
  DimensionTableName,
  PipelineStage,
  RunReport,
  TableLoadOutcome,
} from "@repo/types";
import { extractTrips } from "./extract";
import { readSource } from "./extract/readSource";
import {
  buildStarSchema,
  checkReferentialIntegrity,
  type StarSchema,
} from "./transform/starSchema";
import { loadStarSchema } from "./warehouse/loader";
import type { Warehouse } from "./warehouse/warehouse";
import { buildAnalyticsRows } from "./analytics/buildAnalyticsRows";
import { materializeAnalytics } from "./analytics/view";
import {
  IntegrityError,
  PipelineError,
  PipelineStageError,
} from "./util/errors";
import { logger } from "./util/logger";

export interface PipelineOptions {
  source: string;
  /** Required unless dryRun is set. */
  warehouse?: Warehouse;
  dryRun?: boolean;
  readSource?: (uri: string) => Promise<string>;
}

async function runStage<T>(
  stage: PipelineStage,
  fn: () => Promise<T> | T,
): Promise<T> {
  const startedAt = Date.now();
  logger.info({ stage }, "Stage started");
  try {
    const result = await fn();
    logger.info({ stage, durationMs: Date.now() - startedAt }, "Stage finished");
    return result;
  } catch (error) {
    logger.error({ stage, error }, "Stage failed");
    throw new PipelineStageError(stage, error);
  }
}

function perDimension(
  pick: (table: DimensionTableName) => number,
): Record<DimensionTableName, number> {
  return {
    datetime_dim: pick("datetime_dim"),
    passenger_count_dim: pick("passenger_count_dim"),
    trip_distance_dim: pick("trip_distance_dim"),
    rate_code_dim: pick("rate_code_dim"),
    pickup_location_dim: pick("pickup_location_dim"),
    dropoff_location_dim: pick("dropoff_location_dim"),
    payment_type_dim: pick("payment_type_dim"),
  };
}

function transform(records: Parameters<typeof buildStarSchema>[0]): StarSchema {
  const model = buildStarSchema(records);
  const dangling = checkReferentialIntegrity(model);
  if (dangling.length > 0) {
    throw new IntegrityError(
      "dangling_foreign_keys",
      `${dangling.length} fact foreign keys have no dimension row`,
      { sample: dangling.slice(0, 20) },
    );
  }
  return model;
}

type FailedLoad = Extract<TableLoadOutcome, { status: "failed" }>;

function failedLoads(tables: TableLoadOutcome[]): FailedLoad[] {
  return tables.filter(
    (outcome): outcome is FailedLoad => outcome.status === "failed",
  );
}

/**
 * Runs extract, transform, load and analytics in order. Any stage error stops
 * the run; row-level problems are counted in the report instead.
 */
export async function runPipeline(options: PipelineOptions): Promise<RunReport> {
  const startedAt = new Date();
  const { source } = options;
  const warehouse = options.warehouse;
  if (!options.dryRun && !warehouse) {
    throw new PipelineError(
      "configuration",
      "missing_warehouse",
      "A warehouse is required unless dryRun is set",
    );
  }

  const extracted = await runStage("extract", () =>
    extractTrips(source, options.readSource ?? readSource),
  );

  const model = await runStage("transform", () =>
    transform(extracted.records),
  );

  const baseReport = {
    source,
    startedAt: startedAt.toISOString(),
    rowsRead: extracted.records.length + extracted.rejected.length,
    rowsRejected: extracted.rejected.length,
    duplicatesRemoved: model.duplicatesRemoved,
    orphanFacts: model.orphans.length,
    factRows: model.facts.length,
    dimensionRows: perDimension(
      (table) => model.dimensions[table].rows.length,
    ),
    duplicateKeyConflicts: perDimension(
      (table) => model.dimensions[table].conflicts,
    ),
  };

  if (options.dryRun || !warehouse) {
    const report: RunReport = {
      ...baseReport,
      status: "dry_run",
      analyticsRows: buildAnalyticsRows(model).length,
      tables: [],
      durationMs: Date.now() - startedAt.getTime(),
    };
    logger.info(report, "Dry run finished; nothing was written");
    return report;
  }

  const tables = await runStage("load", async () => {
    const outcomes = await loadStarSchema(warehouse, model);
    const failed = failedLoads(outcomes);
    if (failed.length > 0) {
      throw new PipelineError(
        "load",
        "tables_failed",
        `${failed.length} of ${outcomes.length} tables failed to load: ${failed
          .map((outcome) => outcome.table)
          .join(", ")}`,
        { details: { tables: outcomes } },
      );
    }
    return outcomes;
  });

  const analyticsRows = await runStage("analytics", () =>
    materializeAnalytics(warehouse),
  );

  const report: RunReport = {
    ...baseReport,
    status: "succeeded",
    analyticsRows,
    tables,
    durationMs: Date.now() - startedAt.getTime(),
  };
  logger.info(
    {
      facts: report.factRows,
      rejected: report.rowsRejected,
      orphans: report.orphanFacts,
      durationMs: report.durationMs,
    },
    "Pipeline run succeeded",
  );
  return report;
}
