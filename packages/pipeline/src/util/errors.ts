import type {
  PipelineErrorKind,
  PipelineStage,
  QueryExecutionErrorDetails,
  WarehouseTableName,
} from "@repo/types";

export class QueryExecutionError extends Error {
  details: QueryExecutionErrorDetails;

  constructor(details: QueryExecutionErrorDetails, cause?: unknown) {
    super(details.message, { cause });
    this.name = "QueryExecutionError";
    this.details = details;
  }
}

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly code: string;
  readonly details?: unknown;

  constructor(
    kind: PipelineErrorKind,
    code: string,
    message: string,
    options: { details?: unknown; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "PipelineError";
    this.kind = kind;
    this.code = code;
    this.details = options.details;
  }
}

export type InputErrorCode =
  | "source_unreadable"
  | "empty_source"
  | "missing_columns"
  | "malformed_csv"
  | "no_valid_rows";

/** The raw file is missing, unreadable or structurally unusable. */
export class InputError extends PipelineError {
  declare readonly code: InputErrorCode;

  constructor(
    code: InputErrorCode,
    message: string,
    options: { details?: unknown; cause?: unknown } = {},
  ) {
    super("input", code, message, options);
    this.name = "InputError";
  }
}

export class LoadError extends PipelineError {
  readonly table: WarehouseTableName;

  constructor(table: WarehouseTableName, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("load", "table_load_failed", `Failed to load ${table}: ${reason}`, {
      cause,
      details:
        cause instanceof QueryExecutionError ? cause.details : undefined,
    });
    this.name = "LoadError";
    this.table = table;
  }
}

export class IntegrityError extends PipelineError {
  constructor(code: string, message: string, details?: unknown) {
    super("integrity", code, message, { details });
    this.name = "IntegrityError";
  }
}

/** The error that stopped a run, tagged with the stage it escaped from. */
export class PipelineStageError extends Error {
  readonly stage: PipelineStage;
  readonly kind: PipelineErrorKind | "unexpected";

  constructor(stage: PipelineStage, cause: unknown) {
    const kind = cause instanceof PipelineError ? cause.kind : "unexpected";
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Pipeline failed in ${stage} stage (${kind}): ${reason}`, { cause });
    this.name = "PipelineStageError";
    this.stage = stage;
    this.kind = kind;
  }
}
