import { Types } from "mongoose";
import type { QuestionPayload, QuestionRecord } from "../model/question-model";
import type { QuestionStore } from "../model/question-store";

/** QuestionStore kept in a Map, for tests that should not need MongoDB */
export class InMemoryQuestionStore implements QuestionStore {
  readonly docs = new Map<string, QuestionPayload>();

  private toRecord(id: string, payload: QuestionPayload): QuestionRecord {
    return { id, ...structuredClone(payload) };
  }

  async findById(id: string) {
    const payload = this.docs.get(id);
    return payload ? this.toRecord(id, payload) : null;
  }

  async findAll() {
    return [...this.docs].map(([id, p]) => this.toRecord(id, p));
  }

  async findPublic() {
    return [...this.docs]
      .filter(([, p]) => p.pvt !== true)
      .map(([id, p]) => this.toRecord(id, p));
  }

  async insert(payload: QuestionPayload) {
    const id = new Types.ObjectId().toHexString();
    this.docs.set(id, structuredClone(payload));
    return id;
  }

  async replaceById(id: string, payload: QuestionPayload) {
    if (!this.docs.has(id)) return false;
    this.docs.set(id, structuredClone(payload));
    return true;
  }

  async deleteById(id: string) {
    return this.docs.delete(id);
  }
}
