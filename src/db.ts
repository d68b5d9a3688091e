import type { Pool, PoolClient } from "pg";
import { DataSourceUnavailableError } from "./errors";
import { failedQueryResult } from "./agent/state";
import type { CellValue, QueryResult, Row } from "./agent/types";
import { errorMessage } from "./utils";

export interface StructuredStore {
  schema(): Promise<string>;
  tableNames(): Promise<string[]>;
  execute(query: string): Promise<QueryResult>;
}

export interface SchemaColumn {
  table: string;
  column: string;
  dataType: string;
  primaryKey: boolean;
}

export type ReadOnlyCheck = { ok: true; statement: string } | { ok: false; reason: string };

const WRITE_KEYWORDS = [
  "INSERT",
  "UPDATE",
  "DELETE",
  "DROP",
  "ALTER",
  "CREATE",
  "TRUNCATE",
  "GRANT",
  "REVOKE",
  "MERGE",
  "COPY",
  "VACUUM",
  "INTO"
];

const SCHEMA_SQL = `
  SELECT c.table_name, c.column_name, c.data_type, (pk.column_name IS NOT NULL) AS is_primary_key
  FROM information_schema.columns c
  JOIN information_schema.tables t
    ON t.table_schema = c.table_schema AND t.table_name = c.table_name
  LEFT JOIN (
    SELECT kcu.table_name, kcu.column_name
    FROM information_schema.table_constraints tc
    JOIN information_schema.key_column_usage kcu
      ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
    WHERE tc.constraint_type = 'PRIMARY KEY' AND tc.table_schema = $1
  ) pk ON pk.table_name = c.table_name AND pk.column_name = c.column_name
  WHERE c.table_schema = $1 AND t.table_type = 'BASE TABLE'
  ORDER BY c.table_name, c.ordinal_position
`;

/**
 * Accepts a single SELECT (or WITH ... SELECT) statement. String literals and
 * quoted identifiers are ignored when looking for write keywords.
 */
export function checkReadOnly(query: string): ReadOnlyCheck {
  const statement = query
    .replace(/--.*$/gm, "")
    .replace(/\/\*[\s\S]*?\*\//g, "")
    .trim()
    .replace(/;+\s*$/, "")
    .trim();

  if (!statement) {
    return { ok: false, reason: "Empty query" };
  }

  const unquoted = statement.replace(/'(?:[^']|'')*'/g, "''").replace(/"(?:[^"]|"")*"/g, '""');

  if (!/^(select|with)\b/i.test(unquoted)) {
    return { ok: false, reason: "Only SELECT queries are allowed" };
  }
  if (unquoted.includes(";")) {
    return { ok: false, reason: "Multiple statements are not allowed" };
  }
  const upper = unquoted.toUpperCase();
  const keyword = WRITE_KEYWORDS.find((candidate) => new RegExp(`\\b${candidate}\\b`).test(upper));
  if (keyword) {
    return { ok: false, reason: `Keyword ${keyword} not allowed` };
  }
  return { ok: true, statement };
}

export function formatSchema(columns: SchemaColumn[]): string {
  const tables = new Map<string, SchemaColumn[]>();
  for (const column of columns) {
    const existing = tables.get(column.table) ?? [];
    existing.push(column);
    tables.set(column.table, existing);
  }

  return Array.from(tables.entries())
    .map(([table, tableColumns]) => {
      const definitions = tableColumns.map(
        (column) => `  ${column.column} ${column.dataType}${column.primaryKey ? " PRIMARY KEY" : ""}`
      );
      return `${table}(\n${definitions.join(",\n")}\n)`;
    })
    .join("\n\n");
}

export function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean" || value instanceof Date) {
    return value;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return JSON.stringify(value);
}

/**
 * Read-only adapter over a PostgreSQL pool. Every query runs in its own
 * `READ ONLY` transaction with a statement timeout and is rolled back afterwards.
 */
export class PgStructuredStore implements StructuredStore {
  private constructor(
    private readonly pool: Pool,
    private readonly schemaText: string,
    private readonly tables: string[],
    private readonly statementTimeoutMs: number
  ) {}

  static async connect(
    pool: Pool,
    options: { schemaName?: string; statementTimeoutMs?: number } = {}
  ): Promise<PgStructuredStore> {
    const schemaName = options.schemaName ?? "public";
    try {
      await pool.query("SELECT 1");
      const result = await pool.query<{
        table_name: string;
        column_name: string;
        data_type: string;
        is_primary_key: boolean;
      }>(SCHEMA_SQL, [schemaName]);
      const columns: SchemaColumn[] = result.rows.map((row) => ({
        table: row.table_name,
        column: row.column_name,
        dataType: row.data_type,
        primaryKey: row.is_primary_key
      }));
      const tables = Array.from(new Set(columns.map((column) => column.table)));
      if (tables.length === 0) {
        throw new Error(`schema "${schemaName}" has no tables`);
      }
      return new PgStructuredStore(pool, formatSchema(columns), tables, options.statementTimeoutMs ?? 10_000);
    } catch (error) {
      throw new DataSourceUnavailableError("database", `Structured store unavailable: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }

  async schema(): Promise<string> {
    return this.schemaText;
  }

  async tableNames(): Promise<string[]> {
    return [...this.tables];
  }

  async execute(query: string): Promise<QueryResult> {
    const check = checkReadOnly(query);
    if (!check.ok) {
      return failedQueryResult(check.reason);
    }

    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      return failedQueryResult(`Connection failed: ${errorMessage(error)}`);
    }

    let releaseError: Error | undefined;
    try {
      await client.query("BEGIN READ ONLY");
      await client.query(`SET LOCAL statement_timeout = ${Math.trunc(this.statementTimeoutMs)}`);
      const result = await client.query<unknown[]>({ text: check.statement, rowMode: "array" });
      const rows: Row[] = result.rows.map((row) => row.map(toCell));
      return {
        success: true,
        columns: result.fields.map((field) => field.name),
        rows,
        error: null,
        rowCount: rows.length
      } satisfies QueryResult;
    } catch (error) {
      return failedQueryResult(errorMessage(error));
    } finally {
      try {
        await client.query("ROLLBACK");
      } catch (error) {
        console.warn("Failed to roll back read-only transaction", error);
        releaseError = error instanceof Error ? error : new Error(String(error));
      }
      client.release(releaseError);
    }
  }
}
