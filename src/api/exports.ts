import { Router, type Request, type Response } from 'express';
import { Logger } from '../crawler/komoot/utils/logger.js';
import {
  buildCollectionCsv,
  buildCollectionXlsx,
} from '../services/collectionManager.js';
import type { ExportServices } from '../services/index.js';
import type { Collection } from '../types/index.js';
import { JobFatalError } from '../utils/errors.js';
import { collectionSlug } from '../utils/slug.js';
import { sendError } from './respond.js';

const logger = new Logger('ExportsAPI');

function matches(collection: Collection, key: string): boolean {
  return collection.id === key || (collection.slug ?? collectionSlug(collection)) === key;
}

/**
 * Looks in the current collection results, then in the user's latest
 * enhanced and basic artifacts when `userId` is given
 */
async function findCollection(services: ExportServices, key: string, userId: string | undefined): Promise<Collection> {
  const current = services.collectionJobs.snapshot().results.find(collection => matches(collection, key));
  if (current) return current;

  if (userId) {
    for (const kind of ['enhanced', 'basic'] as const) {
      try {
        const artifactPath = await services.manager.findLatestArtifact(userId, kind);
        const artifact = await services.manager.loadArtifact(artifactPath);
        const stored = artifact.collections.find(collection => matches(collection, key));
        if (stored) return stored;
      } catch (error) {
        if (!(error instanceof JobFatalError)) throw error;
        logger.debug(`No ${kind} artifact for user ${userId}: ${error.message}`);
      }
    }
  }

  throw new JobFatalError(`Collection ${key} not found`, 404);
}

function exportFilename(collection: Collection, extension: string): string {
  return `${collection.slug ?? collectionSlug(collection)}_${Date.now()}.${extension}`;
}

export function createExportsRouter(services: ExportServices): Router {
  const router = Router();

  /**
   * GET /api/export/collection/:id/csv
   */
  router.get('/export/collection/:id/csv', async (req: Request, res: Response) => {
    try {
      const userId = typeof req.query.userId === 'string' ? req.query.userId : undefined;
      const collection = await findCollection(services, req.params.id, userId);
      const csv = buildCollectionCsv(collection);

      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${exportFilename(collection, 'csv')}"`);
      return res.send(csv);
    } catch (error) {
      return sendError(res, error, logger, 'Error exporting collection CSV');
    }
  });

  /**
   * GET /api/export/collection/:id/xlsx
   */
  router.get('/export/collection/:id/xlsx', async (req: Request, res: Response) => {
    try {
      const userId = typeof req.query.userId === 'string' ? req.query.userId : undefined;
      const collection = await findCollection(services, req.params.id, userId);
      const buffer = await buildCollectionXlsx(collection);

      res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
      res.setHeader('Content-Disposition', `attachment; filename="${exportFilename(collection, 'xlsx')}"`);
      res.setHeader('X-Export-Rows', collection.tours.length.toString());
      return res.send(buffer);
    } catch (error) {
      return sendError(res, error, logger, 'Error exporting collection XLSX');
    }
  });

  return router;
}
