import type { ColumnMeta, ExecutionResult, Row, SchemaAdapter } from "../adapters/db";

export type TableContext = {
  readonly name: string;
  readonly columns: readonly ColumnMeta[];
  readonly sampleRows: readonly Row[];
};

export type SchemaContext = {
  readonly dialect: string;
  readonly schema: string;
  readonly tables: readonly TableContext[];
};

export async function buildSchemaContext(
  adapter: SchemaAdapter,
  allowedTables: string[],
  sampleRowCount: number,
): Promise<SchemaContext> {
  const tables = await Promise.all(
    allowedTables.map(async (name): Promise<TableContext> => {
      const card = await adapter.describeTable(name);
      const sample: ExecutionResult =
        sampleRowCount > 0 ? await adapter.sampleRows(name, sampleRowCount) : { rows: [], rowCount: 0, fields: [] };
      return Object.freeze({
        name: card.name,
        columns: Object.freeze(card.columns.map((c) => Object.freeze({ ...c }))),
        sampleRows: Object.freeze(sample.rows.slice(0, sampleRowCount).map((r) => Object.freeze({ ...r }))),
      });
    }),
  );
  return Object.freeze({ dialect: adapter.dialect, schema: adapter.schema, tables: Object.freeze(tables) });
}

export function formatValue(v: unknown): string {
  if (v === null || v === undefined) return "NULL";
  if (v instanceof Date) return v.toISOString();
  if (typeof v === "object") return JSON.stringify(v);
  return String(v);
}

function renderTable(t: TableContext): string {
  const cols = t.columns.map((c) => {
    const flags = [c.nullable === false ? "NOT NULL" : "", c.pk ? "PRIMARY KEY" : ""].filter(Boolean);
    return `\t${c.name} ${c.type}${flags.length ? " " + flags.join(" ") : ""}`;
  });
  const ddl = `CREATE TABLE ${t.name} (\n${cols.join(",\n")}\n)`;
  if (t.sampleRows.length === 0) return ddl;

  const header = t.columns.map((c) => c.name);
  const lines = t.sampleRows.map((r) => header.map((h) => formatValue(r[h])).join("\t"));
  return `${ddl}\n\n/*\n${t.sampleRows.length} rows from ${t.name} table:\n${header.join("\t")}\n${lines.join("\n")}\n*/`;
}

/** Text handed to the model as the description of the queryable tables. */
export function renderSchemaContext(ctx: SchemaContext): string {
  return ctx.tables.map(renderTable).join("\n\n");
}
