// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT STORE — Collection Reads and Writes Over an Optional Database
// ═══════════════════════════════════════════════════════════════════════════════
//
// Wraps the process-wide database handle. When no database is configured
// reads degrade to empty results and writes raise StorageUnavailableError.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../logging/index.js';
import { StorageUnavailableError } from './errors.js';
import type { DocumentDatabase, DocumentFilter, StoredDocument } from './types.js';

const logger = getLogger({ component: 'storage' });

export class DocumentStore {
  constructor(
    private readonly database: DocumentDatabase | null,
    private readonly clock: () => Date = () => new Date()
  ) {}

  get isAvailable(): boolean {
    return this.database !== null;
  }

  get databaseName(): string | null {
    return this.database?.name ?? null;
  }

  /**
   * Persist one document into `collection` and return its identifier.
   * The stored copy carries `created_at` and `updated_at` stamps.
   */
  async createDocument(collection: string, document: StoredDocument): Promise<string> {
    const database = this.requireDatabase();
    const now = this.clock();

    const id = await database.insertOne(collection, {
      ...document,
      created_at: now,
      updated_at: now,
    });

    logger.debug('Document created', { collection, id });
    return id;
  }

  /**
   * Up to `limit` documents of `collection` matching `filter`; 0 means all.
   * Returns [] when the store is unavailable.
   */
  async getDocuments(
    collection: string,
    filter: DocumentFilter = {},
    limit?: number
  ): Promise<StoredDocument[]> {
    if (!this.database) {
      return [];
    }
    return this.database.find(collection, filter, limit);
  }

  async countDocuments(collection: string, filter: DocumentFilter = {}): Promise<number> {
    return this.requireDatabase().countDocuments(collection, filter);
  }

  async listCollectionNames(): Promise<string[]> {
    return this.requireDatabase().listCollectionNames();
  }

  private requireDatabase(): DocumentDatabase {
    if (!this.database) {
      throw new StorageUnavailableError();
    }
    return this.database;
  }
}
