import type { Response } from "express";
import type { CustomRequest } from "../middleware/access-control";
import type { QuestionService } from "../services/question-service";
import { parseStringParam } from "../utils/query-parser";
import { QUESTIONS_PATH, RESPONSES } from "../utils/question-constants";

/** GET is decided once at the boundary: one question, or the listing */
export type GetQuery =
  | { kind: "byId"; id: string; auth: boolean }
  | { kind: "all"; auth: boolean };

export function parseGetQuery(req: CustomRequest): GetQuery {
  const id = parseStringParam(req.query.id);
  const auth = req.authorized === true;
  return id === undefined ? { kind: "all", auth } : { kind: "byId", id, auth };
}

function send(res: Response, status: number, body: string) {
  res.status(status).type("application/json").send(body);
}

function readBody(req: CustomRequest): string {
  return typeof req.body === "string" ? req.body : "";
}

export type QuestionControllerDeps = {
  service: QuestionService;
};

export function createQuestionController({ service }: QuestionControllerDeps) {
  async function getById(res: Response, id: string, auth: boolean) {
    console.log(`[questions] fetching question ${id}`);

    const question = await service.getByID(id);
    if (!question) return send(res, 400, RESPONSES.invalid);

    if (question.pvt && !auth) {
      console.log(`[questions] private question ${id} requested without token`);
      return send(res, 403, RESPONSES.unauthorized);
    }

    send(res, 200, JSON.stringify(question));
  }

  async function getAll(res: Response, auth: boolean) {
    console.log(`[questions] fetching ${auth ? "all" : "public"} questions`);

    const questions = await service.getAll(auth);
    send(res, 200, JSON.stringify(questions));
  }

  /**
   * @route   GET /api/questions
   * @input   Query: { id?: string, token?: string }
   * @returns 200 question | question[]
   * @errors  400 unknown id
   *          403 private question without a valid token
   */
  async function get(req: CustomRequest, res: Response) {
    const query = parseGetQuery(req);
    try {
      if (query.kind === "byId") {
        await getById(res, query.id, query.auth);
      } else {
        await getAll(res, query.auth);
      }
    } catch (e: unknown) {
      console.error("[questions] get failed", e);
      send(res, 400, RESPONSES.invalid);
    }
  }

  /**
   * @route   POST /api/questions
   * @auth    requireToken
   * @input   Body: question JSON (any id in it is ignored)
   * @notes   Location header points at the stored question.
   * @returns 200 "Ok"
   * @errors  400 malformed body / insert failed
   *          403 bad token
   */
  async function post(req: CustomRequest, res: Response) {
    try {
      const id = await service.create(readBody(req));
      if (!id) {
        console.error("[questions] invalid question payload");
        return send(res, 400, RESPONSES.invalid);
      }

      console.log(`[questions] created question ${id}`);
      res.location(`${QUESTIONS_PATH}?id=${encodeURIComponent(id)}`);
      send(res, 200, RESPONSES.ok);
    } catch (e: unknown) {
      console.error("[questions] create failed", e);
      send(res, 400, RESPONSES.invalid);
    }
  }

  /**
   * @route   PUT /api/questions
   * @auth    requireToken
   * @input   Query: { id: string }  Body: question JSON
   * @notes   Replaces the content; the id stays the same.
   * @returns 200 "Ok"
   * @errors  400 missing/unknown id, malformed body
   *          403 bad token
   */
  async function put(req: CustomRequest, res: Response) {
    const id = parseStringParam(req.query.id);
    try {
      const success = await service.update(id, readBody(req));
      if (!success) {
        console.error(`[questions] update of ${id ?? "<none>"} rejected`);
        return send(res, 400, RESPONSES.invalid);
      }

      console.log(`[questions] updated question ${id}`);
      send(res, 200, RESPONSES.ok);
    } catch (e: unknown) {
      console.error("[questions] update failed", e);
      send(res, 400, RESPONSES.invalid);
    }
  }

  /**
   * @route   DELETE /api/questions
   * @auth    requireToken
   * @input   Query: { id: string }
   * @returns 200 "Ok"
   * @errors  400 missing id / nothing deleted
   *          403 bad token
   */
  async function remove(req: CustomRequest, res: Response) {
    const id = parseStringParam(req.query.id);
    if (id === undefined) return send(res, 400, RESPONSES.invalid);

    try {
      console.log(`[questions] deleting question ${id}`);
      const success = await service.deleteByID(id);
      send(res, success ? 200 : 400, success ? RESPONSES.ok : RESPONSES.invalid);
    } catch (e: unknown) {
      console.error("[questions] delete failed", e);
      send(res, 400, RESPONSES.invalid);
    }
  }

  return { get, post, put, remove };
}

export type QuestionController = ReturnType<typeof createQuestionController>;
