import { Pool, PoolClient, PoolConfig } from "pg";
import { POOL_MAX, STATEMENT_TIMEOUT_MS } from "../config";
import { logger } from "../utils/logger";
import { ColumnMeta, ConnectionTarget, ExecutionResult, Row, SchemaAdapter, TableCard } from "./db";

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function poolConfig(target: ConnectionTarget, max = POOL_MAX): PoolConfig {
  if ("url" in target) return { connectionString: target.url, max };
  return {
    host: target.host,
    port: target.port,
    user: target.user,
    password: target.password,
    database: target.database,
    max,
  };
}

export class PostgresAdapter implements SchemaAdapter {
  readonly dialect = "postgresql";

  constructor(
    private pool: Pool,
    readonly schema: string,
    private timeoutMs: number = STATEMENT_TIMEOUT_MS,
  ) {
    // idle clients dropped by the server surface here; the pool replaces them on next checkout
    pool.on("error", (e) => logger.warn("pg_pool_error", { message: e.message }));
  }

  static fromTarget(target: ConnectionTarget): PostgresAdapter {
    return new PostgresAdapter(new Pool(poolConfig(target)), target.schema);
  }

  async testConnection(): Promise<void> {
    await this.withClient((client) => this.query(client, "SELECT 1"));
  }

  async listTables(): Promise<string[]> {
    const sql = `
      SELECT c.relname AS name
      FROM pg_class c
      JOIN pg_namespace n ON n.oid = c.relnamespace
      WHERE n.nspname = $1 AND c.relkind IN ('r','v','m','p')
      ORDER BY 1
    `;
    const { rows } = await this.withClient((client) => this.query(client, sql, [this.schema]));
    return rows.map((r) => String(r.name));
  }

  async describeTable(name: string): Promise<TableCard> {
    const sql = `
      SELECT a.attname AS name,
             pg_catalog.format_type(a.atttypid, a.atttypmod) AS type,
             NOT a.attnotnull AS nullable,
             EXISTS (
               SELECT 1 FROM pg_index i
               WHERE i.indrelid = c.oid AND a.attnum = ANY(i.indkey) AND i.indisprimary
             ) AS pk
      FROM pg_attribute a
      JOIN pg_class c ON c.oid = a.attrelid
      JOIN pg_namespace n ON n.oid = c.relnamespace
      WHERE n.nspname = $1 AND c.relname = $2 AND a.attnum > 0 AND NOT a.attisdropped
      ORDER BY a.attnum
    `;
    const { rows } = await this.withClient((client) => this.query(client, sql, [this.schema, name]));
    const columns: ColumnMeta[] = rows.map((r) => ({
      name: String(r.name),
      type: String(r.type),
      pk: r.pk === true,
      nullable: r.nullable === true,
    }));
    return { name, columns };
  }

  async sampleRows(name: string, limit: number): Promise<ExecutionResult> {
    const sql = `SELECT * FROM ${quoteIdent(this.schema)}.${quoteIdent(name)} LIMIT $1`;
    return this.readOnly((client) => this.query(client, sql, [limit]));
  }

  async runSelect(sql: string): Promise<ExecutionResult> {
    return this.readOnly((client) => this.query(client, sql));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async withClient<T>(fn: (c: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  // Generated SQL only ever runs inside a READ ONLY transaction
  private async readOnly(fn: (c: PoolClient) => Promise<ExecutionResult>): Promise<ExecutionResult> {
    return this.withClient(async (client) => {
      await client.query("BEGIN TRANSACTION READ ONLY");
      try {
        // PostgreSQL does not accept parameter placeholders in SET commands.
        const timeout = Math.max(0, Math.floor(this.timeoutMs)) || 0;
        await client.query(`SET LOCAL statement_timeout TO ${timeout}`);
        await client.query(`SET LOCAL search_path TO ${quoteIdent(this.schema)}`);
        const res = await fn(client);
        await client.query("COMMIT");
        return res;
      } catch (e) {
        await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
          logger.warn("sql_rollback_failed", { message: String(rollbackErr) });
        });
        throw e;
      }
    });
  }

  private async query(client: PoolClient, sql: string, params: unknown[] = []): Promise<ExecutionResult> {
    logger.info("sql_try", { sql, params });
    const result = await client.query<Row>(sql, params);
    return {
      rows: result.rows,
      rowCount: result.rowCount ?? result.rows.length,
      fields: result.fields.map((f) => f.name),
    };
  }
}
