import type {
  QuestionDoc,
  QuestionPayload,
  QuestionRecord,
} from "../model/question-model";

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

/** MongoDB reads `a.b` as a path and `$x` as an operator; neither can be stored as sent */
function hasReservedKey(value: unknown): boolean {
  if (Array.isArray(value)) return value.some(hasReservedKey);
  if (!isPlainObject(value)) return false;
  return Object.entries(value).some(
    ([key, v]) => key.includes(".") || key.startsWith("$") || hasReservedKey(v)
  );
}

/**
 * Parse a request body into a question payload.
 * Returns null when the body is not a JSON object or `pvt` is not a boolean
 * (a missing or null `pvt` reads as public), and for any key, at any depth,
 * that contains a dot or starts with `$`.
 * Identity fields are dropped: ids come from storage only.
 */
export function decodeQuestion(body: string): QuestionPayload | null {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return null;
  }
  if (!isPlainObject(raw) || hasReservedKey(raw)) return null;

  const { id: _id, _id: _mongoId, pvt: rawPvt, ...content } = raw;
  const pvt = rawPvt ?? false;
  if (typeof pvt !== "boolean") return null;

  return { ...content, pvt };
}

/** Stored document → wire record (`_id` becomes `id`) */
export function toQuestionRecord(doc: QuestionDoc): QuestionRecord {
  const { _id, ...rest } = doc;
  return { id: String(_id), ...rest };
}
