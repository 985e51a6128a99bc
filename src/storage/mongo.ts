// ═══════════════════════════════════════════════════════════════════════════════
// MONGO DATABASE — DocumentDatabase backed by the MongoDB driver
// ═══════════════════════════════════════════════════════════════════════════════

import { MongoClient, type Db, type WithId, type Document } from 'mongodb';
import { StorageError } from './errors.js';
import type { DocumentDatabase, DocumentFilter, StoredDocument } from './types.js';

export class MongoDatabase implements DocumentDatabase {
  constructor(private readonly db: Db) {}

  get name(): string {
    return this.db.databaseName;
  }

  async insertOne(collection: string, document: StoredDocument): Promise<string> {
    try {
      const result = await this.db.collection(collection).insertOne({ ...document });
      return result.insertedId.toString();
    } catch (error) {
      throw new StorageError('insert', error, collection);
    }
  }

  async find(collection: string, filter: DocumentFilter, limit?: number): Promise<StoredDocument[]> {
    try {
      let cursor = this.db.collection(collection).find(filter);
      if (limit !== undefined) {
        cursor = cursor.limit(limit);
      }
      const docs = await cursor.toArray();
      return docs.map(serializeDocument);
    } catch (error) {
      throw new StorageError('find', error, collection);
    }
  }

  async countDocuments(collection: string, filter: DocumentFilter): Promise<number> {
    try {
      return await this.db.collection(collection).countDocuments(filter);
    } catch (error) {
      throw new StorageError('count', error, collection);
    }
  }

  async listCollectionNames(): Promise<string[]> {
    try {
      const collections = await this.db.listCollections({}, { nameOnly: true }).toArray();
      return collections.map((c) => c.name);
    } catch (error) {
      throw new StorageError('listCollections', error);
    }
  }
}

/**
 * ObjectIds are rendered as hex strings so documents survive JSON encoding
 * unchanged on the raw read endpoints.
 */
function serializeDocument(doc: WithId<Document>): StoredDocument {
  return { ...doc, _id: doc._id.toString() };
}

/**
 * Select database `name` on a client for `url`. The driver connects lazily on
 * first use and the client lives as long as the process. Throws if the
 * connection string cannot be parsed.
 */
export function createMongoDatabase(url: string, name: string): MongoDatabase {
  return new MongoDatabase(new MongoClient(url).db(name));
}
