import express, { type Express } from 'express';
import { createCorsMiddleware } from './middleware/cors.js';
import { createToursRouter } from './api/tours.js';
import { createCollectionsRouter } from './api/collections.js';
import { createExportsRouter } from './api/exports.js';
import type { ExportServices } from './services/index.js';

export function createApp(services: ExportServices): Express {
  const app = express();

  // CORS middleware - MUST be before all routes
  app.use(createCorsMiddleware(services.config.corsAllowedOrigins));

  // Collection payloads for download jobs can be large
  app.use(express.json({ limit: '25mb' }));

  // Tour jobs: start, status, results, clear, single GPX download
  app.use('/api', createToursRouter(services));

  // Collection jobs: fetch, enhance, download tours
  app.use('/api', createCollectionsRouter(services));

  // CSV / XLSX export of a collection
  app.use('/api', createExportsRouter(services));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'tour-export-backend',
      jobs: {
        tours: services.tourJobs.snapshot().status,
        collections: services.collectionJobs.snapshot().status,
      },
      detailed_tour_api: services.config.detailedTourApi,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      node_version: process.version,
    });
  });

  app.get('/', (_req, res) => {
    res.json({
      service: 'tour-export-backend',
      status: 'running',
      endpoints: {
        health: '/health',
        api: '/api',
      },
    });
  });

  return app;
}
