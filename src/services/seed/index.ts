// ═══════════════════════════════════════════════════════════════════════════════
// SEEDING — Idempotent Bootstrap of Reference Data
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each reference collection is checked and filled independently, so a
// partially seeded database is completed on the next run. Two concurrent
// first runs can both see an empty collection and both insert; that
// duplicate is tolerated.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { COLLECTIONS } from '../../api/schemas/index.js';
import { getLogger } from '../../logging/index.js';
import { StorageUnavailableError, type DocumentStore } from '../../storage/index.js';
import { defaultModes, defaultPricingPlans } from './defaults.js';

export {
  DEFAULT_MODES,
  DEFAULT_PRICING_PLANS,
  defaultModes,
  defaultPricingPlans,
} from './defaults.js';

const logger = getLogger({ component: 'seed' });

/**
 * Insert the default modes and pricing plans into whichever of the two
 * collections is empty.
 *
 * @throws StorageUnavailableError when no database is configured
 */
export async function seedReferenceData(store: DocumentStore): Promise<void> {
  if (!store.isAvailable) {
    throw new StorageUnavailableError();
  }

  let modesInserted = 0;
  let pricingPlansInserted = 0;

  const existingModes = await store.countDocuments(COLLECTIONS.mode);
  if (existingModes === 0) {
    for (const mode of defaultModes()) {
      await store.createDocument(COLLECTIONS.mode, mode);
      modesInserted++;
    }
  }

  const existingPlans = await store.countDocuments(COLLECTIONS.pricingPlan);
  if (existingPlans === 0) {
    for (const plan of defaultPricingPlans()) {
      await store.createDocument(COLLECTIONS.pricingPlan, plan);
      pricingPlansInserted++;
    }
  }

  logger.info('Reference data seeded', { modesInserted, pricingPlansInserted });
}
