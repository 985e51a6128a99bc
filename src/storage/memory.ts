// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY DATABASE — In-Memory DocumentDatabase Implementation for Testing
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import type { DocumentDatabase, DocumentFilter, StoredDocument } from './types.js';

export class MemoryDatabase implements DocumentDatabase {
  readonly name: string;
  private collections: Map<string, StoredDocument[]> = new Map();

  constructor(name: string = 'memory') {
    this.name = name;
  }

  async insertOne(collection: string, document: StoredDocument): Promise<string> {
    let docs = this.collections.get(collection);
    if (!docs) {
      docs = [];
      this.collections.set(collection, docs);
    }

    const id = uuidv4().replace(/-/g, '').slice(0, 24);
    docs.push({ ...structuredClone(document), _id: id });
    return id;
  }

  async find(collection: string, filter: DocumentFilter, limit?: number): Promise<StoredDocument[]> {
    const docs = this.collections.get(collection) ?? [];
    const matched = docs.filter((doc) => matches(doc, filter));
    const limited = limit ? matched.slice(0, limit) : matched;
    return limited.map((doc) => structuredClone(doc));
  }

  async countDocuments(collection: string, filter: DocumentFilter): Promise<number> {
    const docs = this.collections.get(collection) ?? [];
    return docs.filter((doc) => matches(doc, filter)).length;
  }

  async listCollectionNames(): Promise<string[]> {
    return [...this.collections.keys()];
  }

  clear(): void {
    this.collections.clear();
  }
}

function matches(doc: StoredDocument, filter: DocumentFilter): boolean {
  return Object.entries(filter).every(([key, value]) => doc[key] === value);
}
