export { runPipeline } from './pipeline';
export type { PipelineOptions } from './pipeline';
export { createPipelineEnv, getEnv } from './env';
export type { PipelineEnv, WarehouseDialect } from './env';
export { createWarehouse, getWarehouse, closeWarehouse } from './dbConnection';
export { BigQueryDialect } from './dialects/bigquery';
export type { BigQueryDialectConfig } from './dialects/bigquery';
export { checkWarehouseHealth } from './util/healthCheck';
export { logger } from './util/logger';

// Stages
export { extractTrips, parseTripCsv, readSource } from './extract';
export {
  buildDimension,
  buildDimensions,
  buildFactTable,
  buildStarSchema,
  checkReferentialIntegrity,
  dedupeTrips,
} from './transform';
export { loadStarSchema, loadTable } from './warehouse/loader';
export { TABLE_DEFINITIONS } from './warehouse/tables';
export type { Warehouse } from './warehouse/warehouse';
export {
  analyticsQuery,
  buildAnalyticsRows,
  materializeAnalytics,
  REPORTS,
  isReportName,
} from './analytics';
export type { ReportName } from './analytics';

export {
  InputError,
  IntegrityError,
  LoadError,
  PipelineError,
  PipelineStageError,
  QueryExecutionError,
} from './util/errors';
