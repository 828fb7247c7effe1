import {
  BigQuery,
  type BigQueryOptions,
  type Query,
} from "@google-cloud/bigquery";
import {
  CompiledQuery,
  type DatabaseConnection,
  type DatabaseIntrospector,
  type DatabaseMetadata,
  type DatabaseMetadataOptions,
  type Dialect,
  type Driver,
  type Kysely,
  type QueryCompiler,
  type QueryResult,
  MysqlAdapter,
  MysqlQueryCompiler,
  type TableMetadata,
  type SchemaMetadata,
  type ColumnMetadata,
  type TransactionSettings,
} from "kysely";
import { z } from "zod";

interface BigQueryCredentials {
  client_email?: string;
  private_key?: string;
  [key: string]: unknown;
}

export interface BigQueryDialectConfig {
  /**
   * The project ID where the dataset lives.
   * Used for defaultDataset and INFORMATION_SCHEMA queries.
   */
  projectId: string;
  /**
   * The project ID where jobs should be created.
   * Falls back to the project of the credentials when omitted.
   */
  jobProjectId?: string;
  dataset: string;
  location?: string;
  credentials?: BigQueryCredentials;
  keyFilename?: string;
  maximumBytesBilled?: number | string;
  client?: BigQuery;
  options?: BigQueryOptions;
}

function createClient(config: BigQueryDialectConfig): BigQuery {
  return (
    config.client ??
    new BigQuery({
      projectId: config.jobProjectId,
      credentials: config.credentials,
      keyFilename: config.keyFilename,
      ...config.options,
    })
  );
}

function buildQueryOptions(
  config: BigQueryDialectConfig,
  compiledQuery: CompiledQuery,
): Query {
  return {
    query: compiledQuery.sql,
    params: [...compiledQuery.parameters],
    useLegacySql: false,
    location: config.location,
    maximumBytesBilled:
      config.maximumBytesBilled !== undefined
        ? String(config.maximumBytesBilled)
        : undefined,
    defaultDataset: {
      projectId: config.projectId,
      datasetId: config.dataset,
    },
  };
}

/**
 * Kysely dialect for BigQuery standard SQL. BigQuery quotes identifiers with
 * backticks and binds positional `?` parameters, so the MySQL compiler fits.
 */
export class BigQueryDialect implements Dialect {
  constructor(private readonly config: BigQueryDialectConfig) {}

  createDriver(): Driver {
    return new BigQueryDriver(this.config);
  }

  createAdapter() {
    return new MysqlAdapter();
  }

  createQueryCompiler(): QueryCompiler {
    return new MysqlQueryCompiler();
  }

  createIntrospector(_db: Kysely<unknown>): DatabaseIntrospector {
    return new BigQueryIntrospector(this.config);
  }
}

class BigQueryDriver implements Driver {
  private client: BigQuery | null = null;

  constructor(private readonly config: BigQueryDialectConfig) {}

  async init() {
    this.client = createClient(this.config);
  }

  async acquireConnection(): Promise<DatabaseConnection> {
    if (!this.client) {
      throw new Error("BigQuery driver not initialized");
    }
    return new BigQueryConnection(this.client, this.config);
  }

  async beginTransaction(
    _connection: DatabaseConnection,
    _settings: TransactionSettings,
  ) {
    throw new Error("BigQuery does not support transactions");
  }

  async commitTransaction(_connection: DatabaseConnection) {
    throw new Error("BigQuery does not support transactions");
  }

  async rollbackTransaction(_connection: DatabaseConnection) {
    throw new Error("BigQuery does not support transactions");
  }

  async releaseConnection(_connection: DatabaseConnection) {
    // No persistent connections to release.
  }

  async destroy() {
    this.client = null;
  }
}

class BigQueryConnection implements DatabaseConnection {
  constructor(
    private readonly client: BigQuery,
    private readonly config: BigQueryDialectConfig,
  ) {}

  async executeQuery<O>(compiledQuery: CompiledQuery): Promise<QueryResult<O>> {
    const [job] = await this.client.createQueryJob(
      buildQueryOptions(this.config, compiledQuery),
    );
    const [rows] = await job.getQueryResults();

    const affectedRowsValue =
      job.metadata?.statistics?.query?.numDmlAffectedRows ?? undefined;
    const numAffectedRows =
      affectedRowsValue !== undefined && affectedRowsValue !== null
        ? BigInt(affectedRowsValue)
        : undefined;

    return {
      rows,
      numAffectedRows,
    };
  }

  async *streamQuery<R>(
    compiledQuery: CompiledQuery,
    chunkSize = 1000,
  ): AsyncIterableIterator<QueryResult<R>> {
    const stream = this.client.createQueryStream(
      buildQueryOptions(this.config, compiledQuery),
    );

    let buffer: R[] = [];
    for await (const row of stream) {
      buffer.push(row);
      if (buffer.length >= chunkSize) {
        yield { rows: buffer };
        buffer = [];
      }
    }

    if (buffer.length > 0) {
      yield { rows: buffer };
    }
  }
}

const informationSchemaTableSchema = z.object({
  table_name: z.string(),
  table_type: z.string(),
});

const informationSchemaColumnSchema = z.object({
  table_name: z.string(),
  column_name: z.string(),
  data_type: z.string(),
  is_nullable: z.string(),
});

export class BigQueryIntrospector implements DatabaseIntrospector {
  private readonly client: BigQuery;

  constructor(private readonly config: BigQueryDialectConfig) {
    this.client = createClient(config);
  }

  async getSchemas(): Promise<SchemaMetadata[]> {
    return [{ name: this.config.dataset }];
  }

  async getTables(
    _options: DatabaseMetadataOptions = { withInternalKyselyTables: false },
  ): Promise<TableMetadata[]> {
    const datasetPath = `\`${this.config.projectId}.${this.config.dataset}\``;

    const [tableRows] = await this.client.query({
      query: `SELECT table_name, table_type FROM ${datasetPath}.INFORMATION_SCHEMA.TABLES`,
      useLegacySql: false,
      location: this.config.location,
    });
    const [columnRows] = await this.client.query({
      query: `SELECT table_name, column_name, data_type, is_nullable FROM ${datasetPath}.INFORMATION_SCHEMA.COLUMNS`,
      useLegacySql: false,
      location: this.config.location,
    });

    const tables = z.array(informationSchemaTableSchema).parse(tableRows);
    const columns = z.array(informationSchemaColumnSchema).parse(columnRows);

    const columnsByTable = new Map<string, ColumnMetadata[]>();
    for (const col of columns) {
      const existing = columnsByTable.get(col.table_name) ?? [];
      existing.push({
        name: col.column_name,
        dataType: col.data_type,
        isNullable: col.is_nullable === "YES",
        isAutoIncrementing: false,
        hasDefaultValue: false,
      });
      columnsByTable.set(col.table_name, existing);
    }

    return tables.map((table) => ({
      name: table.table_name,
      isView: table.table_type === "VIEW",
      schema: this.config.dataset,
      columns: columnsByTable.get(table.table_name) ?? [],
    }));
  }

  async getMetadata(
    options?: DatabaseMetadataOptions,
  ): Promise<DatabaseMetadata> {
    return {
      tables: await this.getTables(options),
    };
  }
}
