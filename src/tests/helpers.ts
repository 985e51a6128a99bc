// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS — App and Store Factories
// ═══════════════════════════════════════════════════════════════════════════════

import type { Express } from 'express';
import { createApp } from '../app.js';
import { loadConfig, type AppConfig } from '../config/index.js';
import { DocumentStore, MemoryDatabase } from '../storage/index.js';

export const FIXED_NOW = new Date('2025-03-01T09:00:00.000Z');

export interface TestContext {
  app: Express;
  store: DocumentStore;
  database: MemoryDatabase | null;
}

/**
 * Config with explicit database settings, independent of the process env.
 */
export function testConfig(database: Partial<AppConfig['database']> = {}): AppConfig {
  const base = loadConfig();
  return {
    ...base,
    database: { url: null, name: null, ...database },
  };
}

/**
 * App over an in-memory database.
 */
export function createTestContext(config: AppConfig = testConfig()): TestContext {
  const database = new MemoryDatabase('imagine_test');
  const store = new DocumentStore(database, () => FIXED_NOW);
  return { app: createApp({ store, config }), store, database };
}

/**
 * App with no database configured.
 */
export function createUnconfiguredContext(config: AppConfig = testConfig()): TestContext {
  const store = new DocumentStore(null);
  return { app: createApp({ store, config }), store, database: null };
}
