import express from "express";
import { RequestError } from "./errors";
import { errorHandler } from "./middleware/error";
import { SAMPLE_QUESTIONS, SessionController } from "./session";
import { logger } from "./utils/logger";

type ChatRequest = { question?: string };

function validateChatBody(body: unknown): asserts body is ChatRequest {
  if (typeof body !== "object" || body === null) throw new RequestError("Invalid body");
  if (!("question" in body) || body.question === undefined) return;
  const q = body.question;
  if (typeof q !== "string" || q.length > 2000) throw new RequestError("Invalid question");
}

/** HTTP front for one conversation session. */
export function createApp(session: SessionController) {
  const app = express();
  app.use(express.json({ limit: "64kb" }));

  app.get("/healthz", (_req, res) => res.json({ ok: true }));

  app.get("/status", (_req, res) => {
    const { state } = session;
    res.json({
      connected: session.getConnectionStatus(),
      error: state.connectionError ?? null,
      phase: state.phase,
      questionsAsked: Math.floor(state.history.length / 2),
    });
  });

  app.post("/session/connect", async (_req, res, next) => {
    try {
      const connected = await session.reconnect();
      res.status(connected ? 200 : 503).json({ connected, error: session.state.connectionError ?? null });
    } catch (err) {
      next(err);
    }
  });

  app.post("/chat", async (req, res, next) => {
    const started = Date.now();
    try {
      const body: unknown = req.body;
      validateChatBody(body);
      const question = body.question;
      if (question === undefined && !session.state.presetQuestion) throw new RequestError("Missing question");

      const outcome = await session.submitQuestion(question);
      logger.info("chat_done", { status: outcome.status, durationMs: Date.now() - started });
      if (outcome.status === "rejected") {
        res.status(outcome.reason === "busy" ? 409 : 503).json(outcome);
        return;
      }
      res.json({ ...outcome, history: session.getHistory() });
    } catch (err) {
      next(err);
    }
  });

  app.get("/history", (_req, res) => res.json({ history: session.getHistory() }));

  app.delete("/history", (_req, res) => {
    session.clearHistory();
    res.status(204).end();
  });

  app.get("/samples", (_req, res) => res.json({ samples: SAMPLE_QUESTIONS }));

  app.post("/samples/:index/select", (req, res, next) => {
    const index = Number(req.params.index);
    if (!Number.isInteger(index) || index < 0 || index >= SAMPLE_QUESTIONS.length) {
      next(new RequestError("Unknown sample question", 404));
      return;
    }
    const question = session.selectSample(index);
    if (question === undefined) {
      res.status(503).json({ error: "Database not connected" });
      return;
    }
    res.json({ question });
  });

  app.get("/info", (_req, res) => res.json(session.describeDatabase()));

  app.use(errorHandler);
  return app;
}
