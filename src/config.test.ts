import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      mongoUri: undefined,
      token: undefined,
      port: 7305,
      dbName: "questionbank",
      bodyLimit: "100kb",
      corsOrigins: [],
    });
  });

  it("reads every variable", () => {
    const config = loadConfig({
      QUESTION_MONGODB_URI: "mongodb://localhost:27017",
      QUESTION_TOKEN: "test-secret",
      QUESTION_PORT: "8080",
      QUESTION_DB_NAME: "bank",
      QUESTION_BODY_LIMIT: "1mb",
      CORS_ORIGIN: "http://a.test, http://b.test,",
    });

    expect(config).toEqual({
      mongoUri: "mongodb://localhost:27017",
      token: "test-secret",
      port: 8080,
      dbName: "bank",
      bodyLimit: "1mb",
      corsOrigins: ["http://a.test", "http://b.test"],
    });
  });

  it("treats an empty token as unset", () => {
    expect(loadConfig({ QUESTION_TOKEN: "" }).token).toBeUndefined();
  });

  it("rejects a port that is not a number", () => {
    expect(() => loadConfig({ QUESTION_PORT: "http" })).toThrow(
      'QUESTION_PORT must be a valid port, got "http"'
    );
  });
});
