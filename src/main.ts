import "dotenv/config";
import {
  ALLOWED_TABLES,
  MOCK_LLM,
  OPENAI_API_KEY,
  PG_DATABASE,
  PG_HOST,
  PG_PASSWORD,
  PG_PORT,
  PG_SCHEMA,
  PG_URL,
  PG_USER,
  PORT,
  SAMPLE_ROWS,
} from "./config";
import { errorMessage } from "./errors";
import { getLLM } from "./llm/llm";
import { ConversationOrchestrator } from "./pipeline/orchestrator";
import { AnswerSynthesizer } from "./pipeline/synthesizer";
import { QueryTranslator } from "./pipeline/translator";
import { createApp } from "./server";
import { SessionController } from "./session";
import { logger } from "./utils/logger";

async function main() {
  const llm = getLLM();
  const orchestrator = new ConversationOrchestrator(new QueryTranslator(llm), new AnswerSynthesizer(llm));

  const session = new SessionController(orchestrator, {
    connection: {
      url: PG_URL || undefined,
      host: PG_HOST || undefined,
      port: PG_PORT,
      user: PG_USER || undefined,
      password: PG_PASSWORD || undefined,
      database: PG_DATABASE || undefined,
      schema: PG_SCHEMA,
    },
    allowedTables: ALLOWED_TABLES,
    sampleRowCount: SAMPLE_ROWS,
    modelConfigured: MOCK_LLM || Boolean(OPENAI_API_KEY),
  });
  await session.initialize();

  const app = createApp(session);
  const server = app.listen(PORT, () => {
    logger.info("server_listening", { port: PORT, connected: session.getConnectionStatus() });
  });

  const shutdown = () => {
    server.close();
    session.close().then(
      () => process.exit(0),
      () => process.exit(1),
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((e: unknown) => {
  logger.error("startup_failed", { message: errorMessage(e) });
  process.exit(1);
});
