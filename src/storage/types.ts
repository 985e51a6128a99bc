// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TYPES — Document Database Interface
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A document as it sits in (or comes back from) a collection.
 */
export type StoredDocument = Record<string, unknown>;

/**
 * Exact-match filter: every key must equal the given value. `{}` matches all.
 */
export type DocumentFilter = Record<string, unknown>;

export interface DocumentDatabase {
  readonly name: string;

  /** Insert one document and return its generated identifier. */
  insertOne(collection: string, document: StoredDocument): Promise<string>;

  /** Documents matching `filter`, in store order, at most `limit` of them (0 or absent: all). */
  find(collection: string, filter: DocumentFilter, limit?: number): Promise<StoredDocument[]>;

  countDocuments(collection: string, filter: DocumentFilter): Promise<number>;

  listCollectionNames(): Promise<string[]>;
}
