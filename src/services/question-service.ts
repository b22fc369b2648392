import type { QuestionRecord } from "../model/question-model";
import type { QuestionStore } from "../model/question-store";
import { decodeQuestion } from "../utils/question-codec";

/**
 * CRUD over the question bank.
 * Authorization is the caller's concern; this layer only filters by
 * visibility when asked to.
 */
export class QuestionService {
  constructor(private readonly store: QuestionStore) {}

  getByID(id: string): Promise<QuestionRecord | null> {
    return this.store.findById(id);
  }

  getAll(includePrivate: boolean): Promise<QuestionRecord[]> {
    return includePrivate ? this.store.findAll() : this.store.findPublic();
  }

  /** @returns the new question's id, or null for a malformed body */
  async create(body: string): Promise<string | null> {
    const payload = decodeQuestion(body);
    if (!payload) return null;
    return this.store.insert(payload);
  }

  async update(id: string | undefined, body: string): Promise<boolean> {
    if (!id) return false;
    const payload = decodeQuestion(body);
    if (!payload) return false;
    return this.store.replaceById(id, payload);
  }

  deleteByID(id: string): Promise<boolean> {
    return this.store.deleteById(id);
  }
}
