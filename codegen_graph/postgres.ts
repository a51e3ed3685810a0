import { Pool } from "pg";
import { CodegenError, errorMessage } from "./errors.js";
import type { ColumnDefinition, TableSchema, TableSelection } from "./state.js";

export type TableNameRow = {
  table_name: string;
  table_comment: string | null;
};

export type ColumnRow = {
  column_name: string;
  data_type: string;
  is_nullable: "YES" | "NO";
  column_default: string | null;
  ordinal_position: number;
  character_maximum_length: number | null;
  numeric_precision: number | null;
  numeric_scale: number | null;
  column_comment: string | null;
};

export type PrimaryKeyRow = {
  column_name: string;
  pk_position: number;
};

/** The part of `pg.Pool` the introspector uses. Rows are parsed by the caller. */
export interface SqlPool {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export type DatabaseInfo = {
  host: string;
  port: number;
  database: string;
  user: string;
  connected: boolean;
  version: string | null;
  error: string | null;
};

export interface SchemaIntrospector {
  introspect(params: { selection: TableSelection }): Promise<TableSchema[]>;
}

export function createPostgresPool(sourceDbUrl: string): SqlPool {
  return new Pool({
    connectionString: sourceDbUrl,
    max: 2,
  });
}

export async function closePostgresPool(pool: SqlPool): Promise<void> {
  await pool.end();
}

/** Code-point order, independent of the database collation. */
export function compareTableNames(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Applies the selection policy: exact names for an allow-list, otherwise a
 * literal `startsWith` test against every prefix (no wildcards).
 */
export function selectTables(tableNames: readonly string[], selection: TableSelection): string[] {
  const selected =
    selection.kind === "allowlist"
      ? tableNames.filter((name) => selection.tables.includes(name))
      : tableNames.filter((name) => selection.prefixes.some((prefix) => name.startsWith(prefix)));

  return [...new Set(selected)].sort(compareTableNames);
}

/**
 * Single-column primary keys are kept; composite keys are reported as "no
 * primary key" and no column is flagged.
 */
export function buildTableSchema(params: {
  schema: string;
  table: string;
  comment: string | null;
  columnRows: readonly ColumnRow[];
  primaryKeyRows: readonly PrimaryKeyRow[];
}): TableSchema {
  const primaryKey = params.primaryKeyRows.length === 1 ? params.primaryKeyRows[0].column_name : null;

  const columns: ColumnDefinition[] = [...params.columnRows]
    .sort((left, right) => left.ordinal_position - right.ordinal_position)
    .map((row) =>
      Object.freeze({
        name: row.column_name,
        dataType: row.data_type,
        isNullable: row.is_nullable === "YES",
        isPrimaryKey: row.column_name === primaryKey,
        ordinalPosition: row.ordinal_position,
        columnDefault: row.column_default,
        characterMaximumLength: row.character_maximum_length,
        numericPrecision: row.numeric_precision,
        numericScale: row.numeric_scale,
        comment: row.column_comment,
      }),
    );

  return Object.freeze({
    schema: params.schema,
    table: params.table,
    comment: params.comment,
    columns: Object.freeze(columns),
    primaryKey,
  });
}

// ---------------------------------------------------------------------------
// Row parsing
// ---------------------------------------------------------------------------

function field(row: unknown, key: string): unknown {
  if (typeof row !== "object" || row === null) {
    throw new Error(`Unexpected catalog row: ${String(row)}`);
  }
  return Reflect.get(row, key);
}

function readString(row: unknown, key: string): string {
  const value = field(row, key);
  if (typeof value !== "string") {
    throw new Error(`Catalog column ${key} is not a string`);
  }
  return value;
}

function readNullableString(row: unknown, key: string): string | null {
  const value = field(row, key);
  return value === null || value === undefined ? null : String(value);
}

/** pg returns bigint/numeric catalog values as strings. */
function readNullableNumber(row: unknown, key: string): number | null {
  const value = field(row, key);
  if (value === null || value === undefined) {
    return null;
  }
  const numeric = Number(value);
  return Number.isFinite(numeric) ? numeric : null;
}

function readNumber(row: unknown, key: string): number {
  const value = readNullableNumber(row, key);
  if (value === null) {
    throw new Error(`Catalog column ${key} is not a number`);
  }
  return value;
}

function parseTableNameRow(row: unknown): TableNameRow {
  return {
    table_name: readString(row, "table_name"),
    table_comment: readNullableString(row, "table_comment"),
  };
}

function parseColumnRow(row: unknown): ColumnRow {
  return {
    column_name: readString(row, "column_name"),
    data_type: readString(row, "data_type"),
    is_nullable: readString(row, "is_nullable") === "YES" ? "YES" : "NO",
    column_default: readNullableString(row, "column_default"),
    ordinal_position: readNumber(row, "ordinal_position"),
    character_maximum_length: readNullableNumber(row, "character_maximum_length"),
    numeric_precision: readNullableNumber(row, "numeric_precision"),
    numeric_scale: readNullableNumber(row, "numeric_scale"),
    column_comment: readNullableString(row, "column_comment"),
  };
}

function parsePrimaryKeyRow(row: unknown): PrimaryKeyRow {
  return {
    column_name: readString(row, "column_name"),
    pk_position: readNumber(row, "pk_position"),
  };
}

async function fetchTableNames(pool: SqlPool, sourceSchema: string): Promise<TableNameRow[]> {
  const result = await pool.query(
    `
      SELECT
        t.table_name,
        obj_description(format('%I.%I', t.table_schema, t.table_name)::regclass, 'pg_class') AS table_comment
      FROM information_schema.tables t
      WHERE t.table_schema = $1
        AND t.table_type = 'BASE TABLE'
      ORDER BY t.table_name;
    `,
    [sourceSchema],
  );
  return result.rows.map(parseTableNameRow);
}

async function fetchColumns(pool: SqlPool, sourceSchema: string, table: string): Promise<ColumnRow[]> {
  const result = await pool.query(
    `
      SELECT
        c.column_name,
        c.data_type,
        c.is_nullable,
        c.column_default,
        c.ordinal_position,
        c.character_maximum_length,
        c.numeric_precision,
        c.numeric_scale,
        col_description(format('%I.%I', c.table_schema, c.table_name)::regclass, c.ordinal_position) AS column_comment
      FROM information_schema.columns c
      WHERE c.table_schema = $1
        AND c.table_name = $2
      ORDER BY c.ordinal_position;
    `,
    [sourceSchema, table],
  );
  return result.rows.map(parseColumnRow);
}

async function fetchPrimaryKey(pool: SqlPool, sourceSchema: string, table: string): Promise<PrimaryKeyRow[]> {
  const result = await pool.query(
    `
      SELECT
        kcu.column_name,
        kcu.ordinal_position AS pk_position
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage kcu
        ON tc.constraint_name = kcu.constraint_name
       AND tc.table_schema = kcu.table_schema
       AND tc.table_name = kcu.table_name
      WHERE tc.constraint_type = 'PRIMARY KEY'
        AND tc.table_schema = $1
        AND tc.table_name = $2
      ORDER BY kcu.ordinal_position;
    `,
    [sourceSchema, table],
  );
  return result.rows.map(parsePrimaryKeyRow);
}

export type PostgresIntrospectorOptions = {
  sourceDbUrl: string;
  sourceSchema: string;
  createPool?: (sourceDbUrl: string) => SqlPool;
};

export class PostgresSchemaIntrospector implements SchemaIntrospector {
  private readonly sourceDbUrl: string;
  private readonly sourceSchema: string;
  private readonly createPool: (sourceDbUrl: string) => SqlPool;

  constructor(options: PostgresIntrospectorOptions) {
    this.sourceDbUrl = options.sourceDbUrl;
    this.sourceSchema = options.sourceSchema;
    this.createPool = options.createPool ?? createPostgresPool;
  }

  /**
   * Reads the whole selection in one pass. The pool is closed before this
   * resolves, so no connection is held while code is generated.
   */
  async introspect(params: { selection: TableSelection }): Promise<TableSchema[]> {
    return this.withPool(async (pool) => {
      const tableRows = await fetchTableNames(pool, this.sourceSchema);
      const commentByTable = new Map(tableRows.map((row) => [row.table_name, row.table_comment]));
      const selected = selectTables(
        tableRows.map((row) => row.table_name),
        params.selection,
      );

      const tables: TableSchema[] = [];
      for (const table of selected) {
        const columnRows = await fetchColumns(pool, this.sourceSchema, table);
        const primaryKeyRows = await fetchPrimaryKey(pool, this.sourceSchema, table);
        tables.push(
          buildTableSchema({
            schema: this.sourceSchema,
            table,
            comment: commentByTable.get(table) ?? null,
            columnRows,
            primaryKeyRows,
          }),
        );
      }
      return tables;
    });
  }

  async listTables(prefix = ""): Promise<string[]> {
    return this.withPool(async (pool) => {
      const tableRows = await fetchTableNames(pool, this.sourceSchema);
      return selectTables(
        tableRows.map((row) => row.table_name),
        { kind: "prefix", prefixes: [prefix] },
      );
    });
  }

  async checkConnection(): Promise<boolean> {
    try {
      await this.withPool((pool) => pool.query("SELECT 1"));
      return true;
    } catch (error) {
      if (error instanceof CodegenError && error.kind === "SchemaConnectionFailure") {
        return false;
      }
      throw error;
    }
  }

  async getDatabaseInfo(): Promise<DatabaseInfo> {
    const target = describeConnection(this.sourceDbUrl);
    try {
      const version = await this.withPool(async (pool) => {
        const result = await pool.query("SELECT version() AS version");
        return result.rows.length > 0 ? readNullableString(result.rows[0], "version") : null;
      });
      return { ...target, connected: true, version, error: null };
    } catch (error) {
      return { ...target, connected: false, version: null, error: errorMessage(error) };
    }
  }

  private async withPool<T>(work: (pool: SqlPool) => Promise<T>): Promise<T> {
    let pool: SqlPool | undefined;
    try {
      pool = this.createPool(this.sourceDbUrl);
      return await work(pool);
    } catch (error) {
      throw new CodegenError(
        "SchemaConnectionFailure",
        `Schema introspection failed: ${errorMessage(error)}`,
        { cause: error },
      );
    } finally {
      if (pool) {
        await closePostgresPool(pool);
      }
    }
  }
}

function describeConnection(sourceDbUrl: string): Omit<DatabaseInfo, "connected" | "version" | "error"> {
  try {
    const url = new URL(sourceDbUrl);
    return {
      host: url.hostname,
      port: url.port ? Number(url.port) : 5432,
      database: decodeURIComponent(url.pathname.replace(/^\//, "")),
      user: decodeURIComponent(url.username),
    };
  } catch {
    return { host: "", port: 0, database: "", user: "" };
  }
}
