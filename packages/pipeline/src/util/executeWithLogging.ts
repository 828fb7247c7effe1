import type { CompiledQuery, QueryExecutorProvider, RawBuilder } from "kysely";
import type { QueryExecutionErrorDetails } from "@repo/types";
import { logger } from "./logger";
import { QueryExecutionError } from "./errors";

/**
 * Interface for Kysely query objects that can be both compiled and executed.
 * Select builders resolve to rows, schema builders to void.
 */
export interface ExecutableQuery<R> {
  compile(): CompiledQuery;
  execute(): Promise<R>;
}

export interface QueryExecutionResult<R> {
  result: R;
  compiled: CompiledQuery;
}

/** Binds a raw `sql` template to an executor so it can go through executeWithLogging. */
export function bindRawQuery<T>(
  raw: RawBuilder<T>,
  executor: QueryExecutorProvider,
): ExecutableQuery<T[]> {
  return {
    compile: () => raw.compile(executor),
    execute: async () => (await raw.execute(executor)).rows,
  };
}

function extractDbErrorDetails(error: unknown): {
  code?: string;
  detail?: string;
  hint?: string;
} {
  if (!error || typeof error !== "object") {
    return {};
  }

  const code = "code" in error ? error.code : undefined;
  const detail = "detail" in error ? error.detail : undefined;
  const hint = "hint" in error ? error.hint : undefined;
  return {
    code: typeof code === "string" ? code : undefined,
    detail: typeof detail === "string" ? detail : undefined,
    hint: typeof hint === "string" ? hint : undefined,
  };
}

/**
 * Executes a Kysely query and logs the SQL on error.
 * Compiles the query before execution so we have the SQL available for error logging.
 */
export async function executeWithLogging<R>(
  query: ExecutableQuery<R>,
  context?: { operation?: string },
): Promise<QueryExecutionResult<R>> {
  const compiled = query.compile();

  try {
    const result = await query.execute();
    return { result, compiled };
  } catch (error) {
    logger.error(
      {
        sql: compiled.sql,
        params: compiled.parameters,
        operation: context?.operation,
        error,
      },
      "Query execution failed",
    );
    const message = error instanceof Error ? error.message : String(error);
    const details: QueryExecutionErrorDetails = {
      type: "query_execution",
      message,
      sql: compiled.sql,
      params: Array.from(compiled.parameters),
      operation: context?.operation,
      ...extractDbErrorDetails(error),
    };
    throw new QueryExecutionError(details, error);
  }
}
