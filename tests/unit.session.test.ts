import { describe, it, expect, vi } from "vitest";
import { ConversationOrchestrator } from "../src/pipeline/orchestrator";
import { SAMPLE_QUESTIONS, SessionController, SessionOptions } from "../src/session";
import type { QueryResult } from "../src/types";
import { FakeAdapter } from "./fakes";

function setup(overrides: Partial<SessionOptions> = {}) {
  const translator = {
    translate: vi.fn(async (_question: string): Promise<QueryResult> => ({ kind: "rows", text: "There are 120 students." })),
  };
  const synthesizer = { synthesize: vi.fn(async () => ({ ok: true as const, value: "120 students went there." })) };
  const adapters: FakeAdapter[] = [];
  const session = new SessionController(new ConversationOrchestrator(translator, synthesizer), {
    connection: { host: "db.internal", user: "reader", database: "migration" },
    allowedTables: ["global_student_migration"],
    sampleRowCount: 2,
    modelConfigured: true,
    adapterFactory: () => {
      const a = new FakeAdapter();
      adapters.push(a);
      return a;
    },
    ...overrides,
  });
  return { session, translator, synthesizer, adapters };
}

describe("SessionController", () => {
  it("stays not ready on an unreachable host and rejects questions until reconnected", async () => {
    let reachable = false;
    const { session, translator } = setup({
      connection: { host: "10.255.255.1", user: "reader", database: "migration" },
      adapterFactory: () =>
        new FakeAdapter(undefined, reachable ? {} : { failConnect: new Error("connect ETIMEDOUT 10.255.255.1:5432") }),
    });

    expect(await session.initialize()).toBe(false);
    expect(session.getConnectionStatus()).toBe(false);
    expect(session.state.connectionError).toBe("Database connection failed: connect ETIMEDOUT 10.255.255.1:5432");

    const rejected = await session.submitQuestion("How many students went to Canada?");
    expect(rejected.status).toBe("rejected");
    expect(session.getHistory()).toEqual([]);
    expect(translator.translate).not.toHaveBeenCalled();

    reachable = true;
    expect(await session.reconnect()).toBe(true);
    expect(session.state.connectionError).toBeUndefined();
    const answered = await session.submitQuestion("How many students went to Canada?");
    expect(answered).toEqual({ status: "answered", answer: "120 students went there." });
  });

  it("refuses to start without a model credential", async () => {
    const factory = vi.fn(() => new FakeAdapter());
    const { session } = setup({ modelConfigured: false, adapterFactory: factory });

    expect(await session.initialize()).toBe(false);
    expect(session.state.connectionError).toBe("OpenAI API key not found");
    expect(factory).not.toHaveBeenCalled();
  });

  it("exposes history as a copy and clears it on request", async () => {
    const { session } = setup();
    await session.initialize();
    await session.submitQuestion("How many students went to Canada?");

    const history = session.getHistory();
    history.pop();
    expect(session.getHistory()).toHaveLength(2);

    session.clearHistory();
    expect(session.getHistory()).toEqual([]);
  });

  it("keeps the cleared record empty when a question finishes afterwards", async () => {
    let release: (r: QueryResult) => void = () => {};
    const { session, translator } = setup();
    translator.translate.mockImplementationOnce(() => new Promise<QueryResult>((resolve) => (release = resolve)));
    await session.initialize();

    const pending = session.submitQuestion("How many students went to Canada?");
    await vi.waitFor(() => expect(translator.translate).toHaveBeenCalledTimes(1));
    session.clearHistory();
    release({ kind: "rows", text: "There are 120 students." });

    expect(await pending).toEqual({ status: "answered", answer: "120 students went there." });
    expect(session.getHistory()).toEqual([]);

    await session.submitQuestion("Which country has the most students?");
    expect(session.getHistory().map((e) => e.speaker)).toEqual(["user", "assistant"]);
  });

  it("submits a selected sample question when no text is given", async () => {
    const { session, translator } = setup();
    expect(session.selectSample(0)).toBeUndefined();

    await session.initialize();
    expect(session.selectSample(99)).toBeUndefined();
    expect(session.selectSample(0)).toBe(SAMPLE_QUESTIONS[0]);

    await session.submitQuestion();

    expect(translator.translate.mock.calls[0]?.[0]).toBe("How many students went to Canada?");
    expect(session.state.presetQuestion).toBeUndefined();
  });

  it("describes the connected database and closes it", async () => {
    const { session, adapters } = setup();
    await session.initialize();
    await session.submitQuestion("Which country has the most students?");

    expect(session.describeDatabase()).toEqual({
      connected: true,
      dialect: "postgresql",
      schema: "public",
      host: "db.internal:5432",
      tables: ["global_student_migration"],
      questionsAsked: 1,
    });

    await session.close();
    expect(adapters[0].closed).toBe(true);
    expect(session.getConnectionStatus()).toBe(false);
  });
});
