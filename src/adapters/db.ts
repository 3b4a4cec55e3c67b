export type Row = Record<string, unknown>;

export type ColumnMeta = {
  name: string;
  type: string;
  pk?: boolean;
  nullable?: boolean;
};

export type TableCard = {
  name: string;
  columns: ColumnMeta[];
};

export type ExecutionResult = { rows: Row[]; rowCount: number; fields: string[] };

/** Read-only view of one relational schema. */
export interface SchemaAdapter {
  readonly dialect: string;
  readonly schema: string;
  testConnection(): Promise<void>;
  listTables(): Promise<string[]>;
  describeTable(name: string): Promise<TableCard>;
  sampleRows(name: string, limit: number): Promise<ExecutionResult>;
  runSelect(sql: string): Promise<ExecutionResult>;
  close(): Promise<void>;
}

export type ConnectionTarget =
  | { url: string; schema: string }
  | { host: string; port: number; user: string; password?: string; database: string; schema: string };

export type AdapterFactory = (target: ConnectionTarget) => SchemaAdapter;
