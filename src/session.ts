import { randomUUID } from "crypto";
import type { AdapterFactory } from "./adapters/db";
import { ConfigError, errorMessage } from "./errors";
import { ConversationOrchestrator } from "./pipeline/orchestrator";
import { connect, ConnectionConfig } from "./schema/connector";
import type { ChatEntry, Outcome, SessionState } from "./types";
import { logger } from "./utils/logger";

export const SAMPLE_QUESTIONS: readonly string[] = [
  "How many students went to Canada?",
  "Which country has the most students?",
  "Show me migration trends by year",
  "What are the top 5 destinations?",
  "How many students from India?",
  "What is the average age of migrating students?",
  "Which field of study is most popular?",
];

export type SessionOptions = {
  connection: ConnectionConfig;
  allowedTables: string[];
  sampleRowCount: number;
  /** False when no model credential is configured. */
  modelConfigured: boolean;
  adapterFactory?: AdapterFactory;
};

export type DatabaseInfo = {
  connected: boolean;
  dialect?: string;
  schema?: string;
  host?: string;
  tables: string[];
  questionsAsked: number;
};

export function createSessionState(): SessionState {
  return {
    id: randomUUID(),
    connected: false,
    history: [],
    phase: "idle",
    startedAt: new Date(),
  };
}

export class SessionController {
  readonly state: SessionState = createSessionState();

  constructor(private orchestrator: ConversationOrchestrator, private opts: SessionOptions) {}

  /** Connects the session. Failures leave `connected` false with the cause recorded. */
  async initialize(): Promise<boolean> {
    const { state, opts } = this;
    if (!opts.modelConfigured) {
      this.markNotReady(new ConfigError("OpenAI API key not found"));
      return false;
    }
    const res = await connect(opts.connection, opts.allowedTables, opts.sampleRowCount, opts.adapterFactory);
    if (!res.ok) {
      this.markNotReady(res.error);
      return false;
    }
    state.handle = res.value;
    state.connected = true;
    state.connectionError = undefined;
    logger.info("session_init_ok", { session: state.id, tables: [...res.value.allowedTables] });
    return true;
  }

  /** Manual retry: drops any open connection and initializes again. */
  async reconnect(): Promise<boolean> {
    await this.close();
    return this.initialize();
  }

  submitQuestion(text?: string): Promise<Outcome> {
    const question = text ?? this.state.presetQuestion ?? "";
    this.state.presetQuestion = undefined;
    return this.orchestrator.processQuestion(this.state, question);
  }

  clearHistory(): void {
    this.state.history = [];
  }

  getHistory(): ChatEntry[] {
    return this.state.history.map((e) => ({ ...e }));
  }

  getConnectionStatus(): boolean {
    return this.state.connected;
  }

  selectSample(index: number): string | undefined {
    const question = SAMPLE_QUESTIONS[index];
    if (question === undefined || !this.state.connected) return undefined;
    this.state.presetQuestion = question;
    return question;
  }

  describeDatabase(): DatabaseInfo {
    const { handle, connected, history } = this.state;
    return {
      connected,
      dialect: handle?.context.dialect,
      schema: handle?.context.schema,
      host: handle?.host,
      tables: handle ? handle.context.tables.map((t) => t.name) : [],
      questionsAsked: Math.floor(history.length / 2),
    };
  }

  async close(): Promise<void> {
    const handle = this.state.handle;
    this.state.handle = undefined;
    this.state.connected = false;
    if (!handle) return;
    try {
      await handle.close();
    } catch (e) {
      logger.warn("connector_close_failed", { message: errorMessage(e) });
    }
  }

  private markNotReady(error: Error) {
    this.state.connected = false;
    this.state.handle = undefined;
    this.state.connectionError = error.message;
    logger.error("session_init_failed", { session: this.state.id, kind: error.name, message: error.message });
  }
}
