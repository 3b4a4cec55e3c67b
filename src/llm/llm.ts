import { LLM_MODEL, MOCK_LLM, OPENAI_API_KEY, OPENAI_BASE_URL } from "../config";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionOptions {
  temperature: number;
  /** Ask the endpoint for a JSON object response. */
  json?: boolean;
}

export interface LLM {
  readonly model: string;
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

export function extractContent(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices)) return undefined;
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return undefined;
  const content = first.message.content;
  return typeof content === "string" ? content : undefined;
}

export class OpenAILLM implements LLM {
  constructor(
    private apiKey: string = OPENAI_API_KEY,
    readonly model: string = LLM_MODEL,
    private baseUrl: string = OPENAI_BASE_URL,
  ) {}

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    if (!this.apiKey) throw new Error("OPENAI_API_KEY missing");
    const body = {
      model: this.model,
      temperature: options.temperature,
      ...(options.json ? { response_format: { type: "json_object" } } : {}),
      messages,
    };
    const resp = await fetch(`${this.baseUrl.replace(/\/+$/, "")}/chat/completions`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
    });
    if (!resp.ok) {
      const t = await resp.text();
      throw new Error(`LLM error: ${resp.status} ${t}`);
    }
    const content = extractContent(await resp.json());
    if (content === undefined) throw new Error("LLM returned empty content");
    return content;
  }
}

// Deterministic mock for local runs without a model endpoint
export class MockLLM implements LLM {
  readonly model = "mock";

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    const system = messages.find((m) => m.role === "system")?.content ?? "";
    const user = messages.filter((m) => m.role === "user").pop()?.content ?? "";
    if (options.json) {
      const table = system.match(/CREATE TABLE (\S+) \(/);
      if (!table) throw new Error("No tables available");
      return JSON.stringify({ sql: `SELECT COUNT(*) AS total FROM ${table[1]}` });
    }
    const sqlResult = user.match(/SQLResult:\n([\s\S]*?)\n\nAnswer:/);
    if (sqlResult) return `The query returned: ${sqlResult[1].trim()}`;
    const context = user.match(/Context:\n([\s\S]*?)\n\nOutput:/);
    return context ? `Based on the data: ${context[1].trim()}` : "I have no data to answer that.";
  }
}

export function getLLM(): LLM {
  if (MOCK_LLM) return new MockLLM();
  return new OpenAILLM();
}
