import { DEFAULT_BODY_LIMIT, DEFAULT_DB_NAME, DEFAULT_PORT } from "./utils/question-constants";

export type ServiceConfig = {
  /** full MongoDB connection string; startup fails without it */
  mongoUri?: string;
  /** shared secret for writes and private reads; unset means nobody is authorized */
  token?: string;
  port: number;
  dbName: string;
  bodyLimit: string;
  /** empty list → any origin */
  corsOrigins: string[];
};

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined) {
  const v = value?.trim();
  return v ? v : undefined;
}

function parsePort(raw: string | undefined): number {
  if (!nonEmpty(raw)) return DEFAULT_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`QUESTION_PORT must be a valid port, got "${raw}"`);
  }
  return port;
}

/**
 * Read the service configuration from the environment.
 * Called once by the entry point; everything downstream receives the values.
 */
export function loadConfig(env: Env = process.env): ServiceConfig {
  return {
    mongoUri: nonEmpty(env.QUESTION_MONGODB_URI),
    // token is compared verbatim, so only an empty value is treated as unset
    token: env.QUESTION_TOKEN ? env.QUESTION_TOKEN : undefined,
    port: parsePort(env.QUESTION_PORT),
    dbName: nonEmpty(env.QUESTION_DB_NAME) ?? DEFAULT_DB_NAME,
    bodyLimit: nonEmpty(env.QUESTION_BODY_LIMIT) ?? DEFAULT_BODY_LIMIT,
    corsOrigins: (env.CORS_ORIGIN ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
  };
}
