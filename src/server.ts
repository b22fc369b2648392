import "dotenv/config";
import http from "http";
import { createApp } from "./index";
import { loadConfig } from "./config";
import { DatabaseConnector } from "./model/db";
import { MongoQuestionStore } from "./model/question-store";
import { QuestionService } from "./services/question-service";

/**
 * Bootstrap the question service.
 * Owns the one database handle and injects it downward.
 */
async function bootstrap() {
  const config = loadConfig();
  if (!config.token) {
    console.warn("[server] QUESTION_TOKEN is not set; writes and private reads are disabled");
  }

  const connector = new DatabaseConnector();
  const db = await connector.connect(config.mongoUri, config.dbName);

  const service = new QuestionService(new MongoQuestionStore(db));
  const app = createApp({
    service,
    token: config.token,
    bodyLimit: config.bodyLimit,
    corsOrigins: config.corsOrigins,
  });

  const server = http.createServer(app);
  server.listen(config.port, () => {
    console.log(`[server] question service listening on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    server.close(() => {
      db.close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("[server] failed to close db", err);
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap().catch((err: unknown) => {
  console.error("[server] fatal startup error", err);
  process.exit(1);
});
