import {
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type CompiledQuery,
  type DatabaseConnection,
  type DatabaseIntrospector,
  type Dialect,
  type Driver,
  type QueryResult,
} from "kysely";
import type { WarehouseTables } from "@repo/types";
import { BigQueryDialect } from "~/dialects/bigquery";
import type { WarehouseDialect } from "~/env";
import type { Warehouse } from "~/warehouse/warehouse";

/** Captures every statement sent to the warehouse; optionally fails matching ones. */
export class QueryRecorder {
  readonly statements: string[] = [];
  readonly parameters: (readonly unknown[])[] = [];

  constructor(private readonly failOn?: RegExp) {}

  record(query: CompiledQuery): void {
    this.statements.push(query.sql);
    this.parameters.push(query.parameters);
    if (this.failOn?.test(query.sql)) {
      throw new Error(`Simulated failure for: ${query.sql}`);
    }
  }

  control(statement: string): void {
    this.statements.push(statement);
  }
}

class RecordingConnection implements DatabaseConnection {
  constructor(private readonly recorder: QueryRecorder) {}

  async executeQuery<R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> {
    this.recorder.record(compiledQuery);
    return { rows: [] };
  }

  async *streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {
    throw new Error("Streaming is not supported by the recording driver");
  }
}

class RecordingDriver implements Driver {
  constructor(private readonly recorder: QueryRecorder) {}

  async init(): Promise<void> {}

  async acquireConnection(): Promise<DatabaseConnection> {
    return new RecordingConnection(this.recorder);
  }

  async beginTransaction(): Promise<void> {
    this.recorder.control("begin");
  }

  async commitTransaction(): Promise<void> {
    this.recorder.control("commit");
  }

  async rollbackTransaction(): Promise<void> {
    this.recorder.control("rollback");
  }

  async releaseConnection(): Promise<void> {}

  async destroy(): Promise<void> {}
}

class RecordingPostgresDialect implements Dialect {
  constructor(private readonly recorder: QueryRecorder) {}

  createAdapter() {
    return new PostgresAdapter();
  }

  createDriver(): Driver {
    return new RecordingDriver(this.recorder);
  }

  createQueryCompiler() {
    return new PostgresQueryCompiler();
  }

  createIntrospector(db: Kysely<unknown>): DatabaseIntrospector {
    return new PostgresIntrospector(db);
  }
}

class RecordingBigQueryDialect extends BigQueryDialect {
  constructor(private readonly recorder: QueryRecorder) {
    super({ projectId: "test-project", dataset: "test_dataset" });
  }

  override createDriver(): Driver {
    return new RecordingDriver(this.recorder);
  }
}

export function recordingWarehouse(
  options: {
    dialect?: WarehouseDialect;
    failOn?: RegExp;
    batchSize?: number;
    partitioning?: boolean;
    schema?: string;
  } = {},
): { warehouse: Warehouse; recorder: QueryRecorder } {
  const recorder = new QueryRecorder(options.failOn);
  const dialect = options.dialect ?? "postgresql";
  const db = new Kysely<WarehouseTables>({
    dialect:
      dialect === "bigquery"
        ? new RecordingBigQueryDialect(recorder)
        : new RecordingPostgresDialect(recorder),
  });

  return {
    recorder,
    warehouse: {
      db,
      dialect,
      schema: options.schema,
      batchSize: options.batchSize ?? 500,
      partitioning: options.partitioning ?? true,
    },
  };
}
