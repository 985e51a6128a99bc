// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TESTS — Document Store, Memory and Mongo Databases
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ObjectId, type Db } from 'mongodb';
import {
  DocumentStore,
  MemoryDatabase,
  MongoDatabase,
  StorageError,
  StorageUnavailableError,
  initializeStore,
} from '../storage/index.js';
import { FIXED_NOW, testConfig } from './helpers.js';

// ─────────────────────────────────────────────────────────────────────────────────
// MEMORY DATABASE TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('MemoryDatabase', () => {
  let database: MemoryDatabase;

  beforeEach(() => {
    database = new MemoryDatabase();
  });

  it('should assign 24-character hex ids', async () => {
    const id = await database.insertOne('question', { text: 'a' });
    expect(id).toMatch(/^[0-9a-f]{24}$/);
  });

  it('should filter by exact field equality', async () => {
    await database.insertOne('question', { mode: 'arts', text: 'a' });
    await database.insertOne('question', { mode: 'child', text: 'b' });
    await database.insertOne('question', { mode: 'arts', text: 'c' });

    const arts = await database.find('question', { mode: 'arts' });
    expect(arts.map((doc) => doc.text)).toEqual(['a', 'c']);
    expect(await database.countDocuments('question', { mode: 'child' })).toBe(1);
  });

  it('should apply the limit after filtering', async () => {
    for (let i = 0; i < 5; i++) {
      await database.insertOne('chatmessage', { n: i });
    }
    const docs = await database.find('chatmessage', {}, 2);
    expect(docs.map((doc) => doc.n)).toEqual([0, 1]);
  });

  it('should treat a limit of 0 as no limit', async () => {
    for (let i = 0; i < 3; i++) {
      await database.insertOne('chatmessage', { n: i });
    }
    const docs = await database.find('chatmessage', {}, 0);
    expect(docs.map((doc) => doc.n)).toEqual([0, 1, 2]);
  });

  it('should isolate stored copies from callers', async () => {
    const document = { tags: ['x'] };
    await database.insertOne('question', document);
    document.tags.push('y');

    const [first] = await database.find('question', {});
    expect(first?.tags).toEqual(['x']);
  });

  it('should return nothing for unknown collections', async () => {
    expect(await database.find('missing', {})).toEqual([]);
    expect(await database.countDocuments('missing', {})).toBe(0);
  });

  it('should list and clear collections', async () => {
    await database.insertOne('mode', {});
    await database.insertOne('pricingplan', {});
    expect(await database.listCollectionNames()).toEqual(['mode', 'pricingplan']);

    database.clear();
    expect(await database.listCollectionNames()).toEqual([]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// DOCUMENT STORE TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('DocumentStore', () => {
  describe('with a database', () => {
    let database: MemoryDatabase;
    let store: DocumentStore;

    beforeEach(() => {
      database = new MemoryDatabase('imagine_test');
      store = new DocumentStore(database, () => FIXED_NOW);
    });

    it('should be available and expose the database name', () => {
      expect(store.isAvailable).toBe(true);
      expect(store.databaseName).toBe('imagine_test');
    });

    it('should stamp creation and update times', async () => {
      const id = await store.createDocument('contactmessage', { name: 'Zawadi' });

      const [stored] = await database.find('contactmessage', {});
      expect(stored).toEqual({
        _id: id,
        name: 'Zawadi',
        created_at: FIXED_NOW,
        updated_at: FIXED_NOW,
      });
    });

    it('should not modify the caller document', async () => {
      const document = { name: 'Zawadi' };
      await store.createDocument('contactmessage', document);
      expect(document).toEqual({ name: 'Zawadi' });
    });

    it('should read with filter and limit', async () => {
      await store.createDocument('answer', { mode: 'arts' });
      await store.createDocument('answer', { mode: 'arts' });
      await store.createDocument('answer', { mode: 'child' });

      expect(await store.getDocuments('answer', { mode: 'arts' }, 1)).toHaveLength(1);
      expect(await store.getDocuments('answer')).toHaveLength(3);
      expect(await store.countDocuments('answer', { mode: 'child' })).toBe(1);
    });

    it('should propagate database failures', async () => {
      vi.spyOn(database, 'find').mockRejectedValue(new StorageError('find', new Error('timeout'), 'answer'));

      await expect(store.getDocuments('answer')).rejects.toThrow('find on answer failed: timeout');
    });
  });

  describe('without a database', () => {
    const store = new DocumentStore(null);

    it('should report unavailability', () => {
      expect(store.isAvailable).toBe(false);
      expect(store.databaseName).toBeNull();
    });

    it('should read as empty', async () => {
      expect(await store.getDocuments('question', { mode: 'arts' }, 10)).toEqual([]);
    });

    it('should refuse writes and metadata calls', async () => {
      await expect(store.createDocument('question', {})).rejects.toBeInstanceOf(StorageUnavailableError);
      await expect(store.countDocuments('question')).rejects.toThrow('Database not configured');
      await expect(store.listCollectionNames()).rejects.toBeInstanceOf(StorageUnavailableError);
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// MONGO DATABASE TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('MongoDatabase', () => {
  function fakeDb(overrides: Record<string, unknown> = {}): Db {
    return { databaseName: 'imagine', ...overrides } as unknown as Db;
  }

  it('should name itself after the database', () => {
    expect(new MongoDatabase(fakeDb()).name).toBe('imagine');
  });

  it('should render ObjectIds as strings', async () => {
    const objectId = new ObjectId('65f0a1b2c3d4e5f601234567');
    const limit = vi.fn();
    const cursor = {
      limit,
      toArray: vi.fn().mockResolvedValue([{ _id: objectId, text: 'hello' }]),
    };
    limit.mockReturnValue(cursor);
    const find = vi.fn().mockReturnValue(cursor);
    const database = new MongoDatabase(fakeDb({ collection: vi.fn().mockReturnValue({ find }) }));

    const docs = await database.find('chatmessage', { mode: 'arts' }, 5);

    expect(find).toHaveBeenCalledWith({ mode: 'arts' });
    expect(limit).toHaveBeenCalledWith(5);
    expect(docs).toEqual([{ _id: '65f0a1b2c3d4e5f601234567', text: 'hello' }]);
  });

  it('should return the inserted id as a string', async () => {
    const insertedId = new ObjectId('65f0a1b2c3d4e5f601234568');
    const insertOne = vi.fn().mockResolvedValue({ acknowledged: true, insertedId });
    const database = new MongoDatabase(fakeDb({ collection: vi.fn().mockReturnValue({ insertOne }) }));

    expect(await database.insertOne('mode', { key: 'arts' })).toBe('65f0a1b2c3d4e5f601234568');
  });

  it('should wrap driver errors', async () => {
    const countDocuments = vi.fn().mockRejectedValue(new Error('connection refused'));
    const database = new MongoDatabase(fakeDb({ collection: vi.fn().mockReturnValue({ countDocuments }) }));

    const failure = database.countDocuments('mode', {});

    await expect(failure).rejects.toBeInstanceOf(StorageError);
    await expect(failure).rejects.toThrow('count on mode failed: connection refused');
  });

  it('should list collection names', async () => {
    const listCollections = vi.fn().mockReturnValue({
      toArray: vi.fn().mockResolvedValue([{ name: 'mode' }, { name: 'question' }]),
    });
    const database = new MongoDatabase(fakeDb({ listCollections }));

    expect(await database.listCollectionNames()).toEqual(['mode', 'question']);
    expect(listCollections).toHaveBeenCalledWith({}, { nameOnly: true });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// INITIALIZATION TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('initializeStore', () => {
  it('should run without a database when settings are missing', () => {
    expect(initializeStore(testConfig({ url: 'mongodb://localhost:27017' })).isAvailable).toBe(false);
    expect(initializeStore(testConfig({ name: 'imagine' })).isAvailable).toBe(false);
  });

  it('should create a lazily connecting database', () => {
    const store = initializeStore(testConfig({ url: 'mongodb://localhost:27017', name: 'imagine' }));

    expect(store.isAvailable).toBe(true);
    expect(store.databaseName).toBe('imagine');
  });

  it('should run without a database when the url is rejected', () => {
    const store = initializeStore(testConfig({ url: 'not-a-connection-string', name: 'imagine' }));
    expect(store.isAvailable).toBe(false);
  });
});
