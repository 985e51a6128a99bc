// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE MODULE — Document Store Initialization and Exports
// ═══════════════════════════════════════════════════════════════════════════════

import type { AppConfig } from '../config/index.js';
import { getLogger } from '../logging/index.js';
import { DocumentStore } from './document-store.js';
import { createMongoDatabase } from './mongo.js';

export type { DocumentDatabase, DocumentFilter, StoredDocument } from './types.js';
export { StorageError, StorageUnavailableError } from './errors.js';
export { DocumentStore } from './document-store.js';
export { MemoryDatabase } from './memory.js';
export { MongoDatabase, createMongoDatabase } from './mongo.js';

const logger = getLogger({ component: 'storage' });

/**
 * Build the process-wide document store from config.
 *
 * Missing DATABASE_URL/DATABASE_NAME, or a connection string the driver
 * rejects, yields a store without a database rather than a startup failure.
 */
export function initializeStore(config: AppConfig): DocumentStore {
  const { url, name } = config.database;

  if (!url || !name) {
    logger.warn('Database not configured, running without storage', {
      urlSet: url !== null,
      nameSet: name !== null,
    });
    return new DocumentStore(null);
  }

  try {
    const database = createMongoDatabase(url, name);
    logger.info('Document database initialized', { database: name });
    return new DocumentStore(database);
  } catch (error) {
    logger.error(
      'Failed to initialize document database',
      error instanceof Error ? error : undefined,
      { database: name }
    );
    return new DocumentStore(null);
  }
}
