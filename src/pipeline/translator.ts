import type { ExecutionResult } from "../adapters/db";
import { MAX_RESULT_ROWS, RETURN_DIRECT, TOP_K } from "../config";
import { TranslationError, errorMessage } from "../errors";
import { cleanSql, disallowedRelations, ensureLimit, isSafeSelect } from "../guards/sqlGuard";
import type { LLM } from "../llm/llm";
import type { ConnectorHandle } from "../schema/connector";
import { formatValue, renderSchemaContext, SchemaContext } from "../schema/context";
import type { QueryResult } from "../types";
import { logger } from "../utils/logger";
import { buildResultPrompt, buildSqlPrompt } from "./prompts";

/** Fixed so repeated questions over the same schema generate the same SQL as far as the model allows. */
export const TRANSLATION_TEMPERATURE = 0;

export type TranslatorOptions = {
  topK?: number;
  maxResultRows?: number;
  /** Hand back the formatted rows instead of a one-sentence statement of them. */
  returnDirect?: boolean;
};

export interface Translator {
  translate(question: string, schemaContext: SchemaContext, handle: ConnectorHandle): Promise<QueryResult>;
}

/** `capped` marks a result cut short by an injected LIMIT, so the true remainder is unknown. */
export function formatRows(result: ExecutionResult, maxRows: number, capped = false): string {
  if (result.rows.length === 0) return "No rows returned.";
  const fields = result.fields.length > 0 ? result.fields : Object.keys(result.rows[0]);
  const shown = result.rows.slice(0, maxRows);
  const lines = shown.map((r) => fields.map((f) => formatValue(r[f])).join(" | "));
  const rest = result.rows.length - shown.length;
  const note = capped ? "... (more rows not shown)" : `... (${rest} more rows)`;
  return [fields.join(" | "), ...lines, ...(rest > 0 ? [note] : [])].join("\n");
}

function parseSql(content: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    // some models ignore the JSON instruction and answer with bare SQL
    return cleanSql(content);
  }
  const sql = typeof parsed === "object" && parsed !== null && "sql" in parsed ? parsed.sql : undefined;
  if (typeof sql !== "string" || !sql.trim()) throw new Error("LLM JSON missing sql");
  return cleanSql(sql);
}

export class QueryTranslator implements Translator {
  private topK: number;
  private maxResultRows: number;
  private returnDirect: boolean;

  constructor(private llm: LLM, opts: TranslatorOptions = {}) {
    this.topK = opts.topK ?? TOP_K;
    this.maxResultRows = opts.maxResultRows ?? MAX_RESULT_ROWS;
    this.returnDirect = opts.returnDirect ?? RETURN_DIRECT;
  }

  async translate(question: string, schemaContext: SchemaContext, handle: ConnectorHandle): Promise<QueryResult> {
    const started = Date.now();
    try {
      const text = await this.run(question, schemaContext, handle);
      logger.info("translate_ok", { durationMs: Date.now() - started });
      return { kind: "rows", text };
    } catch (e) {
      const error = e instanceof TranslationError ? e : new TranslationError(errorMessage(e), e);
      logger.warn("translate_failed", { message: error.message, durationMs: Date.now() - started });
      return { kind: "error", error, text: `Error retrieving data: ${error.message}` };
    }
  }

  private async run(question: string, schemaContext: SchemaContext, handle: ConnectorHandle): Promise<string> {
    const messages = buildSqlPrompt(schemaContext.dialect, renderSchemaContext(schemaContext), question, this.topK);
    const content = await this.llm.complete(messages, { temperature: TRANSLATION_TEMPERATURE, json: true });
    const sql = parseSql(content);

    if (!isSafeSelect(sql)) throw new TranslationError("Generated SQL rejected by guard");
    const outside = disallowedRelations(sql, handle.allowedTables);
    if (outside.length > 0) {
      throw new TranslationError(`Generated SQL references tables outside the allow-list: ${outside.join(", ")}`);
    }

    // one row past what is shown, so a cut result is reported rather than hidden
    const limited = ensureLimit(sql, this.maxResultRows + 1);
    const exec = await handle.runSelect(limited);
    const rowsText = formatRows(exec, this.maxResultRows, limited !== sql);
    if (this.returnDirect) return rowsText;

    const statement = await this.llm.complete(buildResultPrompt(question, limited, rowsText), {
      temperature: TRANSLATION_TEMPERATURE,
    });
    return statement.trim() || rowsText;
  }
}
