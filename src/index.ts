import express, { Request, Response, NextFunction } from "express";
import cors from "cors";

import { createQuestionRoutes } from "./routes/question-routes";
import { createQuestionController } from "./controller/question-controller";
import { QuestionService } from "./services/question-service";
import { QUESTIONS_PATH } from "./utils/question-constants";

export type AppDeps = {
  service: QuestionService;
  token?: string;
  bodyLimit: string;
  /** empty → any origin */
  corsOrigins: string[];
};

interface ErrorWithStatus extends Error {
  status?: number;
}

/**
 * App factory
 * - CORS
 * - Route mounting (/api/questions)
 * - Health root
 * - 404 and error handlers
 */
export function createApp({ service, token, bodyLimit, corsOrigins }: AppDeps) {
  const app = express();

  // ─────────────────────────── Core middleware ────────────────────────────────
  app.use(cors(corsOrigins.length ? { origin: corsOrigins } : undefined));

  // ───────────────────────────── Route mounting ───────────────────────────────
  const controller = createQuestionController({ service });
  app.use(QUESTIONS_PATH, createQuestionRoutes({ controller, token, bodyLimit }));

  // ─────────────────────────────── Health root ────────────────────────────────
  app.get("/", (_req, res) => {
    res.json({ ok: true, message: "Hello World from question-service" });
  });

  // ────────────────────────────── 404 passthrough ────────────────────────────
  app.use((_req, _res, next) => {
    const error: ErrorWithStatus = new Error("Route Not Found");
    error.status = 404;
    next(error);
  });

  // ───────────────────────────── Error handler ────────────────────────────────
  app.use(
    (error: ErrorWithStatus, _req: Request, res: Response, _next: NextFunction) => {
      const status = error.status || 500;
      if (status >= 500) console.error("[server] unhandled error", error);
      res.status(status).json({
        error: {
          message: error.message,
        },
      });
    }
  );

  return app;
}
