import type { AdapterFactory, ConnectionTarget, ExecutionResult, SchemaAdapter } from "../adapters/db";
import { PostgresAdapter } from "../adapters/postgres";
import { ConfigError, ConnectionError, errorMessage } from "../errors";
import { err, ok, Result } from "../types";
import { logger } from "../utils/logger";
import { buildSchemaContext, SchemaContext } from "./context";

export type ConnectionConfig = {
  url?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  schema?: string;
};

export interface ConnectorHandle {
  readonly context: SchemaContext;
  readonly allowedTables: readonly string[];
  readonly host: string;
  runSelect(sql: string): Promise<ExecutionResult>;
  close(): Promise<void>;
}

export function resolveTarget(config: ConnectionConfig): Result<ConnectionTarget, ConfigError> {
  const schema = config.schema || "public";
  if (config.url) return ok({ url: config.url, schema });

  const missing = (["host", "user", "database"] as const).filter((k) => !config[k]);
  if (missing.length > 0) {
    return err(new ConfigError(`Database configuration incomplete: missing ${missing.join(", ")}`));
  }
  const port = config.port ?? 5432;
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    return err(new ConfigError(`Invalid database port: ${port}`));
  }
  return ok({
    host: config.host ?? "",
    port,
    user: config.user ?? "",
    password: config.password,
    database: config.database ?? "",
    schema,
  });
}

function describeHost(target: ConnectionTarget): string {
  if ("host" in target) return `${target.host}:${target.port}`;
  try {
    const u = new URL(target.url);
    return u.port ? `${u.hostname}:${u.port}` : u.hostname;
  } catch {
    return "unknown";
  }
}

class Connector implements ConnectorHandle {
  constructor(
    private adapter: SchemaAdapter,
    readonly context: SchemaContext,
    readonly allowedTables: readonly string[],
    readonly host: string,
  ) {}

  runSelect(sql: string): Promise<ExecutionResult> {
    return this.adapter.runSelect(sql);
  }

  close(): Promise<void> {
    return this.adapter.close();
  }
}

async function release(adapter: SchemaAdapter) {
  try {
    await adapter.close();
  } catch (e) {
    logger.warn("connector_close_failed", { message: errorMessage(e) });
  }
}

/**
 * Opens the data source and builds the schema context for `allowedTables`,
 * reading at most `sampleRowCount` example rows per table.
 */
export async function connect(
  config: ConnectionConfig,
  allowedTables: string[],
  sampleRowCount: number,
  factory: AdapterFactory = PostgresAdapter.fromTarget,
): Promise<Result<ConnectorHandle, ConfigError | ConnectionError>> {
  const target = resolveTarget(config);
  if (!target.ok) return target;
  const tables = [...new Set(allowedTables.map((t) => t.trim()).filter(Boolean))];
  if (tables.length === 0) return err(new ConfigError("No tables allowed: configure at least one table"));
  if (!Number.isInteger(sampleRowCount) || sampleRowCount < 0) {
    return err(new ConfigError(`Invalid sample row count: ${sampleRowCount}`));
  }

  const adapter = factory(target.value);
  try {
    await adapter.testConnection();
  } catch (e) {
    await release(adapter);
    return err(new ConnectionError(`Database connection failed: ${errorMessage(e)}`, e));
  }

  try {
    const existing = new Set(await adapter.listTables());
    const unknown = tables.filter((t) => !existing.has(t));
    if (unknown.length > 0) {
      await release(adapter);
      return err(new ConfigError(`Tables not found in schema ${adapter.schema}: ${unknown.join(", ")}`));
    }
    const context = await buildSchemaContext(adapter, tables, sampleRowCount);
    return ok(new Connector(adapter, context, Object.freeze(tables), describeHost(target.value)));
  } catch (e) {
    await release(adapter);
    return err(new ConnectionError(`Failed to read schema: ${errorMessage(e)}`, e));
  }
}
