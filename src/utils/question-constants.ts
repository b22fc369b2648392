/** Mount point of the question routes */
export const QUESTIONS_PATH = "/api/questions";

/** Collection holding every question document */
export const QUESTIONS_COLLECTION = "questions";

export const DEFAULT_DB_NAME = "questionbank";
export const DEFAULT_PORT = 7305;
export const DEFAULT_BODY_LIMIT = "100kb";

/** Fixed response bodies, already JSON-encoded */
export const RESPONSES = {
  ok: '"Ok"',
  invalid: '"Invalid request"',
  unauthorized: '"Unauthorized"',
} as const;
