import { Router, type Request, type Response } from 'express';
import { Logger } from '../crawler/komoot/utils/logger.js';
import type { ExportServices } from '../services/index.js';
import { runCollectionDownloadJob } from '../workers/collectionDownloadWorker.js';
import { runCollectionJob, type CollectionJobRequest } from '../workers/collectionWorker.js';
import { runEnhancementJob } from '../workers/enhancementWorker.js';
import {
  credentialsSchema,
  downloadCollectionToursSchema,
  enhanceSchema,
  publicCollectionsSchema,
  toGpxOptions,
} from './requestSchemas.js';
import { sendError } from './respond.js';

const logger = new Logger('CollectionsAPI');

export function createCollectionsRouter(services: ExportServices): Router {
  const router = Router();

  const startCollectionJob = (request: CollectionJobRequest) => {
    const ctx = services.collectionJobs.start();
    logger.info(`Starting ${request.source} collection job ${ctx.jobId}`);
    runCollectionJob(ctx, request, {
      api: services.api,
      crawler: services.crawler,
      manager: services.manager,
      collectionPoolMax: services.config.collectionPoolMax,
    }).catch(error => {
      logger.error('Collection job crashed:', error);
    });
    return ctx.jobId;
  };

  /**
   * POST /api/collections/personal | /api/collections/saved
   */
  for (const source of ['personal', 'saved'] as const) {
    router.post(`/collections/${source}`, (req: Request, res: Response) => {
      try {
        const { email, password } = credentialsSchema.parse(req.body);
        const jobId = startCollectionJob({ source, email, password });
        return res.status(202).json({ status: 'started', job_id: jobId });
      } catch (error) {
        return sendError(res, error, logger, `Error starting ${source} collections job`);
      }
    });
  }

  /**
   * POST /api/collections/public
   * Body: { urls: [...] } or { url }; user collection pages are expanded
   */
  router.post('/collections/public', (req: Request, res: Response) => {
    try {
      const urls = publicCollectionsSchema.parse(req.body);
      const jobId = startCollectionJob({ source: 'public', urls });
      return res.status(202).json({ status: 'started', job_id: jobId });
    } catch (error) {
      return sendError(res, error, logger, 'Error starting public collections job');
    }
  });

  router.get('/collections-status', (_req: Request, res: Response) => {
    res.json(services.collectionJobs.snapshot());
  });

  router.get('/collections-results', (_req: Request, res: Response) => {
    res.json({ collections: services.collectionJobs.snapshot().results });
  });

  router.post('/clear-collections', (_req: Request, res: Response) => {
    if (!services.collectionJobs.clear()) {
      return res.status(409).json({ error: 'A collection job is still running' });
    }
    return res.json({ status: 'cleared' });
  });

  /**
   * POST /api/enhance-collections
   * Enhances the user's latest basic artifact in the background
   */
  router.post('/enhance-collections', async (req: Request, res: Response) => {
    try {
      const { userId } = enhanceSchema.parse(req.body);
      // Fails with 404 before a job is started when there is nothing to enhance
      await services.manager.findLatestArtifact(userId, 'basic');

      const ctx = services.collectionJobs.start();
      logger.info(`Starting enhancement job ${ctx.jobId} for user ${userId}`);
      runEnhancementJob(ctx, userId, {
        manager: services.manager,
        resolver: services.resolver,
        tourPoolMax: services.config.tourPoolMax,
        collectionPoolMax: services.config.collectionPoolMax,
      }).catch(error => {
        logger.error('Enhancement job crashed:', error);
      });

      return res.status(202).json({ status: 'started', job_id: ctx.jobId });
    } catch (error) {
      return sendError(res, error, logger, 'Error starting enhancement');
    }
  });

  /**
   * POST /api/download-collection-tours
   * Writes GPX files for the given collections; reported as a tour job
   */
  router.post('/download-collection-tours', (req: Request, res: Response) => {
    try {
      const body = downloadCollectionToursSchema.parse(req.body);
      const ctx = services.tourJobs.start();
      logger.info(`Starting collection download job ${ctx.jobId}`);

      runCollectionDownloadJob(ctx, {
        collections: body.collections,
        userId: body.userId,
        downloadImages: body.downloadImages,
        gpx: toGpxOptions(body),
      }, {
        api: services.api,
        resolver: services.resolver,
        images: services.http,
        webBaseUrl: services.config.webBaseUrl,
        tourPoolMax: services.config.tourPoolMax,
        collectionPoolMax: services.config.collectionPoolMax,
        manager: services.manager,
      }).catch(error => {
        logger.error('Collection download job crashed:', error);
      });

      return res.status(202).json({ status: 'started', job_id: ctx.jobId });
    } catch (error) {
      return sendError(res, error, logger, 'Error starting collection download');
    }
  });

  return router;
}
