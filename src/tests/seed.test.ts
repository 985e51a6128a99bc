// ═══════════════════════════════════════════════════════════════════════════════
// SEED TESTS — Reference Data Bootstrap
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import {
  DEFAULT_MODES,
  DEFAULT_PRICING_PLANS,
  defaultModes,
  defaultPricingPlans,
  seedReferenceData,
} from '../services/seed/index.js';
import { DocumentStore, MemoryDatabase, StorageUnavailableError } from '../storage/index.js';
import { FIXED_NOW } from './helpers.js';

describe('seedReferenceData', () => {
  let database: MemoryDatabase;
  let store: DocumentStore;

  beforeEach(() => {
    database = new MemoryDatabase();
    store = new DocumentStore(database, () => FIXED_NOW);
  });

  it('should fill both empty collections', async () => {
    await seedReferenceData(store);

    const modes = await database.find('mode', {});
    expect(modes.map((mode) => mode.key)).toEqual(['child', 'arts', 'creative', 'technology']);
    expect(modes[0]).toMatchObject({ created_at: FIXED_NOW, updated_at: FIXED_NOW });

    const plans = await database.find('pricingplan', {});
    expect(plans.map((plan) => plan.name)).toEqual(['Starter', 'Creator', 'Team']);
  });

  it('should leave populated collections alone', async () => {
    await seedReferenceData(store);
    const firstIds = (await database.find('mode', {})).map((mode) => mode._id);

    await seedReferenceData(store);

    expect((await database.find('mode', {})).map((mode) => mode._id)).toEqual(firstIds);
    expect(await database.countDocuments('mode', {})).toBe(4);
    expect(await database.countDocuments('pricingplan', {})).toBe(3);
  });

  it('should complete a partially seeded database', async () => {
    await store.createDocument('mode', { key: 'music', title: 'Music', description: 'd', color: '#000000' });

    await seedReferenceData(store);

    expect(await database.countDocuments('mode', {})).toBe(1);
    expect(await database.countDocuments('pricingplan', {})).toBe(3);
  });

  it('should require a database', async () => {
    await expect(seedReferenceData(new DocumentStore(null))).rejects.toBeInstanceOf(StorageUnavailableError);
  });
});

describe('default reference data', () => {
  it('should hand out copies', () => {
    const modes = defaultModes();
    const plans = defaultPricingPlans();
    modes[0] = { key: 'x', title: 'x', description: 'x', color: 'x' };
    plans[0]?.features.push('Extra');

    expect(DEFAULT_MODES[0]?.key).toBe('child');
    expect(DEFAULT_PRICING_PLANS[0]?.features).toEqual(['Community play', 'Basic prompts', 'Public chat']);
  });

  it('should price the plans per month and year', () => {
    expect(DEFAULT_PRICING_PLANS.map((plan) => [plan.price_month, plan.price_year])).toEqual([
      [0, 0],
      [4.99, 49],
      [14.99, 149],
    ]);
  });
});
