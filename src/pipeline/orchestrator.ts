import { SynthesisError, TranslationError, errorMessage } from "../errors";
import type { Outcome, QueryResult, Result, SessionState } from "../types";
import { logger } from "../utils/logger";
import { apologize, Synthesizer } from "./synthesizer";
import type { Translator } from "./translator";

export const EXIT_PHRASES: readonly string[] = ["exit", "quit", "bye", "goodbye"];

export const FAREWELL =
  "Thank you for using Student Migration Analytics! Feel free to ask more questions anytime.";

export function isExitPhrase(text: string): boolean {
  return EXIT_PHRASES.includes(text.trim().toLowerCase());
}

/**
 * Runs one question through translate -> synthesize and records both turns.
 *
 * Never throws: every failure ends as an assistant answer or a rejection, and
 * the history keeps strict user/assistant alternation.
 */
export class ConversationOrchestrator {
  constructor(private translator: Translator, private synthesizer: Synthesizer) {}

  async processQuestion(state: SessionState, question: string): Promise<Outcome> {
    const busy = state.phase === "translating" || state.phase === "synthesizing";
    if (isExitPhrase(question)) {
      // an in-flight question keeps its phase; it still has to finish
      if (!busy) state.phase = "terminated";
      return { status: "terminated", message: FAREWELL };
    }
    if (busy) {
      return { status: "rejected", reason: "busy", message: "Still answering the previous question." };
    }
    if (!state.connected || !state.handle) {
      return {
        status: "rejected",
        reason: "not_ready",
        message: `System not ready: ${state.connectionError ?? "database not connected"}`,
      };
    }

    const started = Date.now();
    const record = state.history;
    record.push({ speaker: "user", text: question });
    try {
      state.phase = "translating";
      const queryResult = await this.translate(question, state);

      // Error payloads go forward too so the failure is explained conversationally
      state.phase = "synthesizing";
      const answer = await this.synthesize(question, queryResult);

      // the record may have been cleared while the question was in flight
      if (state.history === record) record.push({ speaker: "assistant", text: answer });
      logger.info("question_answered", {
        session: state.id,
        translated: queryResult.kind === "rows",
        durationMs: Date.now() - started,
      });
      return { status: "answered", answer };
    } finally {
      state.phase = "idle";
    }
  }

  private async translate(question: string, state: SessionState): Promise<QueryResult> {
    try {
      if (!state.handle) throw new TranslationError("database not connected");
      return await this.translator.translate(question, state.handle.context, state.handle);
    } catch (e) {
      const error = e instanceof TranslationError ? e : new TranslationError(errorMessage(e), e);
      return { kind: "error", error, text: `Error retrieving data: ${error.message}` };
    }
  }

  private async synthesize(question: string, queryResult: QueryResult): Promise<string> {
    let result: Result<string, SynthesisError>;
    try {
      result = await this.synthesizer.synthesize(question, queryResult.text);
    } catch (e) {
      result = { ok: false, error: new SynthesisError(errorMessage(e), e) };
    }
    if (result.ok) return result.value;
    logger.warn("synthesize_failed", { message: result.error.message });
    return apologize(result.error);
  }
}
