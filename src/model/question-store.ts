import { Model, Types, isObjectIdOrHexString } from "mongoose";
import { Database } from "./db";
import {
  QuestionDoc,
  QuestionPayload,
  QuestionRecord,
  QuestionSchema,
} from "./question-model";
import { toQuestionRecord } from "../utils/question-codec";
import { QUESTIONS_COLLECTION } from "../utils/question-constants";

/** Document operations the question service relies on */
export interface QuestionStore {
  findById(id: string): Promise<QuestionRecord | null>;
  findAll(): Promise<QuestionRecord[]>;
  findPublic(): Promise<QuestionRecord[]>;
  /** returns the id assigned by storage */
  insert(payload: QuestionPayload): Promise<string>;
  /** false when no document has this id */
  replaceById(id: string, payload: QuestionPayload): Promise<boolean>;
  /** false when no document has this id */
  deleteById(id: string): Promise<boolean>;
}

/**
 * Mongo-backed store over the `questions` collection.
 * Ids that are not 24-char hex strings cannot match anything, so they short-circuit
 * instead of surfacing a CastError.
 * Writes go to the driver collection so content is stored exactly as decoded;
 * the schema is not applied to it.
 */
export class MongoQuestionStore implements QuestionStore {
  private readonly model: Model<{ pvt: boolean }>;

  constructor(db: Database) {
    this.model = db.getCollection(QUESTIONS_COLLECTION, QuestionSchema);
  }

  async findById(id: string) {
    if (!isObjectIdOrHexString(id)) return null;
    const doc = await this.model.findById(id).lean<QuestionDoc | null>();
    return doc ? toQuestionRecord(doc) : null;
  }

  async findAll() {
    const docs = await this.model.find({}).lean<QuestionDoc[]>();
    return docs.map(toQuestionRecord);
  }

  async findPublic() {
    const docs = await this.model
      .find({ pvt: { $ne: true } })
      .lean<QuestionDoc[]>();
    return docs.map(toQuestionRecord);
  }

  async insert(payload: QuestionPayload) {
    // the driver writes the generated _id back into the object it is given
    const res = await this.model.collection.insertOne({ ...payload });
    return String(res.insertedId);
  }

  async replaceById(id: string, payload: QuestionPayload) {
    if (!isObjectIdOrHexString(id)) return false;
    const res = await this.model.collection.replaceOne(
      { _id: new Types.ObjectId(id) },
      { ...payload }
    );
    return res.matchedCount > 0;
  }

  async deleteById(id: string) {
    if (!isObjectIdOrHexString(id)) return false;
    const res = await this.model.collection.deleteOne({
      _id: new Types.ObjectId(id),
    });
    return res.deletedCount > 0;
  }
}
