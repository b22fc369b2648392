/**
 * Read a single string query parameter.
 * Repeated parameters (?id=a&id=b) resolve to the first value; nested qs
 * objects are not strings and read as absent.
 */
export function parseStringParam(input: unknown): string | undefined {
  if (typeof input === "string") return input;

  if (Array.isArray(input)) {
    const first: unknown = input[0];
    return typeof first === "string" ? first : undefined;
  }

  return undefined;
}
