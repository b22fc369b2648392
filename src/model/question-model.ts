import { Schema, Types } from "mongoose";

/** Free-form question payload (statement, options, ...); opaque to the service */
export type QuestionContent = Record<string, unknown>;

/** A question as accepted from clients: content plus visibility, never an id */
export type QuestionPayload = QuestionContent & { pvt: boolean };

/** A question as rendered to clients */
export type QuestionRecord = QuestionPayload & { id: string };

/** A question as stored */
export type QuestionDoc = QuestionPayload & { _id: Types.ObjectId };

/**
 * Question schema
 * - Only `pvt` is declared; every other field is kept as sent (strict: false).
 * - No version key: updates replace content and keep `_id`.
 */
export const QuestionSchema = new Schema<{ pvt: boolean }>(
  {
    pvt: { type: Boolean, default: false, index: true },
  },
  {
    strict: false,
    versionKey: false,
    minimize: false,
  }
);
