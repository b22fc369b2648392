import mongoose, { Connection, Model, Schema } from "mongoose";

/**
 * Handle on the application database.
 * Owned by the entry point and passed to whatever needs a collection.
 */
export class Database {
  constructor(private readonly connection: Connection) {}

  /** Model bound to the named collection; registered once per name */
  getCollection<T>(name: string, schema: Schema<T>): Model<T> {
    const existing = this.connection.models[name];
    if (existing) return existing;
    return this.connection.model<T>(name, schema, name);
  }

  get name() {
    return this.connection.name;
  }

  async close() {
    await this.connection.close();
  }
}

/**
 * Opens at most one connection. Callers racing on the first connect share
 * the same pending promise; a failed attempt clears it so startup can retry.
 */
export class DatabaseConnector {
  private pending: Promise<Database> | null = null;

  connect(uri: string | undefined, dbName: string): Promise<Database> {
    if (this.pending) return this.pending;

    if (!uri) {
      return Promise.reject(new Error("MongoDB URI is not provided"));
    }

    this.pending = mongoose
      .createConnection(uri, { dbName })
      .asPromise()
      .then((connection) => {
        console.log(`[db] connected to db '${dbName}'`);
        return new Database(connection);
      })
      .catch((err: unknown) => {
        this.pending = null;
        throw err;
      });

    return this.pending;
  }
}
