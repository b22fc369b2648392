import express, { NextFunction, Request, Response, Router } from "express";
import { requireToken, resolveAccess } from "../middleware/access-control";
import { QuestionController } from "../controller/question-controller";
import { QUESTIONS_PATH, RESPONSES } from "../utils/question-constants";

export type QuestionRoutesOptions = {
  controller: QuestionController;
  token?: string;
  bodyLimit: string;
};

/**
 * Routes under prefix: /api/questions  (mounted in index.ts)
 * Everything is addressed through query parameters (?id=, ?token=).
 */
export function createQuestionRoutes({
  controller,
  token,
  bodyLimit,
}: QuestionRoutesOptions) {
  const router = Router();

  // bodies are decoded by the codec, whatever content type the client sent
  const readBody = express.text({ type: () => true, limit: bodyLimit });

  router.use(resolveAccess(token));

  /** GET /api/questions — one question (?id=) or the listing */
  router.get("/", controller.get);

  /** POST /api/questions — create */
  router.post("/", requireToken, readBody, controller.post);

  /** PUT /api/questions?id= — replace content */
  router.put("/", requireToken, readBody, controller.put);

  /** DELETE /api/questions?id= — delete */
  router.delete("/", requireToken, controller.remove);

  // body-parser failures (too large, bad charset, aborted) are bad requests like any other
  router.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
    console.error(`[questions] ${req.method} body rejected: ${error.message}`);
    res.status(400).type("application/json").send(RESPONSES.invalid);
  });

  console.log(`[questions] setup ${QUESTIONS_PATH}`);
  return router;
}
