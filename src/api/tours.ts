import { Router, type Request, type Response } from 'express';
import path from 'path';
import { Logger } from '../crawler/komoot/utils/logger.js';
import type { ExportServices } from '../services/index.js';
import { findTourGpx } from '../services/tourFiles.js';
import { runTourJob, signIn } from '../workers/tourWorker.js';
import { credentialsSchema, parseTourSelection, startToursSchema, toGpxOptions } from './requestSchemas.js';
import { sendError } from './respond.js';

const logger = new Logger('ToursAPI');

export function createToursRouter(services: ExportServices): Router {
  const router = Router();

  /**
   * POST /api/start
   * Starts a tour export job, superseding any running one
   */
  router.post('/start', (req: Request, res: Response) => {
    try {
      const body = startToursSchema.parse(req.body);
      const tourIds = parseTourSelection(body.tourSelection);
      if (body.anonymous && tourIds === 'all') {
        return res.status(400).json({ error: 'Anonymous mode needs explicit tour ids' });
      }

      const ctx = services.tourJobs.start();
      logger.info(`Starting tour job ${ctx.jobId} (${tourIds === 'all' ? 'all tours' : `${tourIds.length} tours`})`);

      runTourJob(ctx, {
        anonymous: body.anonymous,
        email: body.email,
        password: body.password,
        tourIds,
        filterType: body.filterType,
        gpx: toGpxOptions(body),
        downloadImages: body.downloadImages,
        chunkSize: body.chunkSize,
        chunkStart: body.chunkStart,
      }, {
        api: services.api,
        resolver: services.resolver,
        images: services.http,
        outputDir: services.config.outputDir,
        webBaseUrl: services.config.webBaseUrl,
        tourPoolMax: services.config.tourPoolMax,
      }).catch(error => {
        logger.error('Tour job crashed:', error);
      });

      return res.status(202).json({ status: 'started', job_id: ctx.jobId });
    } catch (error) {
      return sendError(res, error, logger, 'Error starting tour job');
    }
  });

  router.get('/status', (_req: Request, res: Response) => {
    res.json(services.tourJobs.snapshot());
  });

  router.get('/results', (_req: Request, res: Response) => {
    res.json({ results: services.tourJobs.snapshot().results });
  });

  router.post('/clear', (_req: Request, res: Response) => {
    if (!services.tourJobs.clear()) {
      return res.status(409).json({ error: 'A tour job is still running' });
    }
    return res.json({ status: 'cleared' });
  });

  /**
   * GET /api/download/:tourId
   * Local GPX when the tour was exported, otherwise the service's export
   */
  router.get('/download/:tourId', async (req: Request, res: Response) => {
    const { tourId } = req.params;
    if (!/^\d+$/.test(tourId)) {
      return res.status(400).json({ error: 'Invalid tour id' });
    }

    try {
      const local = await findTourGpx(path.resolve(services.config.outputDir, 'tours'), tourId);
      if (local) {
        return res.download(local, path.basename(local));
      }

      const gpx = await services.api.fetchGpx(tourId);
      res.setHeader('Content-Type', 'application/gpx+xml');
      res.setHeader('Content-Disposition', `attachment; filename="${tourId}.gpx"`);
      return res.send(gpx);
    } catch (error) {
      return sendError(res, error, logger, `Error downloading tour ${tourId}`);
    }
  });

  /**
   * POST /api/tour-counts
   * Number of tours per type for an account
   */
  router.post('/tour-counts', async (req: Request, res: Response) => {
    try {
      const { email, password } = credentialsSchema.parse(req.body);
      const auth = await signIn(services.api, email, password);
      const tours = await services.api.fetchTours(auth, 'all');
      return res.json({
        all: tours.length,
        recorded: tours.filter(tour => tour.type === 'recorded').length,
        planned: tours.filter(tour => tour.type === 'planned').length,
      });
    } catch (error) {
      return sendError(res, error, logger, 'Error counting tours');
    }
  });

  return router;
}
