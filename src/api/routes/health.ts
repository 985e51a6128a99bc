// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — Liveness Message and Storage Diagnostics
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET /        Liveness message, no storage access
//   GET /test    Storage diagnostics, never fails
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { loadDatabaseConfig } from '../../config/index.js';
import { getLogger } from '../../logging/index.js';
import type { DocumentStore } from '../../storage/index.js';
import { asyncHandler } from '../middleware/error-handler.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface DiagnosticsReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

export const LIVENESS_MESSAGE = 'IMAGINE API running';

const MAX_REPORTED_COLLECTIONS = 10;
const MAX_ERROR_LENGTH = 50;

// ─────────────────────────────────────────────────────────────────────────────────
// DIAGNOSTICS
// ─────────────────────────────────────────────────────────────────────────────────

function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.slice(0, MAX_ERROR_LENGTH);
}

/**
 * Check the store and the database environment. Every failure is folded
 * into the report as a status string. The environment is read fresh on each
 * call and its values are reported as set/not set only.
 */
export async function collectDiagnostics(store: DocumentStore): Promise<DiagnosticsReport> {
  const database = loadDatabaseConfig();
  const report: DiagnosticsReport = {
    backend: '✅ Running',
    database: '❌ Not Available',
    database_url: database.url ? '✅ Set' : '❌ Not Set',
    database_name: database.name ? '✅ Set' : '❌ Not Set',
    connection_status: 'Not Connected',
    collections: [],
  };

  try {
    if (store.isAvailable) {
      report.database = '✅ Available';
      report.connection_status = 'Connected';

      try {
        const collections = await store.listCollectionNames();
        report.collections = collections.slice(0, MAX_REPORTED_COLLECTIONS);
        report.database = '✅ Connected & Working';
      } catch (error) {
        report.database = `⚠️  Connected but Error: ${describeError(error)}`;
      }
    } else {
      report.database = '⚠️  Available but not initialized';
    }
  } catch (error) {
    report.database = `❌ Error: ${describeError(error)}`;
  }

  return report;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

export function createHealthRouter(store: DocumentStore): Router {
  const router = Router();
  const logger = getLogger({ component: 'health' });

  // ─── LIVENESS ───
  router.get('/', (_req: Request, res: Response) => {
    res.json({ message: LIVENESS_MESSAGE });
  });

  // ─── DIAGNOSTICS ───
  router.get(
    '/test',
    asyncHandler(async (_req: Request, res: Response) => {
      const report = await collectDiagnostics(store);

      if (report.connection_status !== 'Connected' || report.database !== '✅ Connected & Working') {
        logger.warn('Storage diagnostics degraded', {
          database: report.database,
          connection: report.connection_status,
        });
      }

      res.json(report);
    })
  );

  return router;
}
