/**
 * Collection Download Worker - writes GPX files (and optionally images)
 * for every tour of the given collections into their slug directories
 */

import path from 'path';
import type { JobContext } from '../jobs/jobStatus.js';
import type { CollectionManager } from '../services/collectionManager.js';
import type { Collection } from '../types/index.js';
import type { GpxOptions, TourResultRow } from '../types/jobs.js';
import { collectionPoolSize, mapPool, tourPoolSize } from '../utils/concurrency.js';
import { dedupeTours } from '../utils/deduplication.js';
import { PersistenceError, errorMessage } from '../utils/errors.js';
import { writeFileAtomic } from '../utils/fileWrite.js';
import { exportTour, type TourWorkerDeps } from './tourWorker.js';

export interface CollectionDownloadRequest {
  collections: Collection[];
  userId?: string;
  downloadImages: boolean;
  gpx: GpxOptions;
}

export interface CollectionDownloadDeps extends Pick<TourWorkerDeps, 'api' | 'resolver' | 'images' | 'webBaseUrl' | 'tourPoolMax'> {
  manager: Pick<CollectionManager, 'collectionDirectory'>;
  collectionPoolMax: number;
}

export interface DownloadSummary {
  collection_id: string | null;
  collection_name: string;
  total: number;
  downloaded: number;
  skipped: number;
  failed: number;
  generated_at: string;
}

export async function runCollectionDownloadJob(
  ctx: JobContext<TourResultRow>,
  request: CollectionDownloadRequest,
  deps: CollectionDownloadDeps
): Promise<void> {
  try {
    const collections = request.collections.map(collection => ({ ...collection, tours: dedupeTours(collection.tours) }));
    const total = collections.reduce((sum, collection) => sum + collection.tours.length, 0);
    ctx.setFound(total);
    ctx.log(`Downloading ${total} tour(s) from ${collections.length} collection(s)`);
    let halted = false;

    await mapPool(collections, collectionPoolSize(collections.length, deps.collectionPoolMax), async (collection) => {
      if (!ctx.active || halted) return;

      const ownerId = request.userId ?? collection.creator?.id ?? 'anonymous';
      const directory = deps.manager.collectionDirectory(ownerId, collection);
      const summary: DownloadSummary = {
        collection_id: collection.id ?? null,
        collection_name: collection.name,
        total: collection.tours.length,
        downloaded: 0,
        skipped: 0,
        failed: 0,
        generated_at: '',
      };

      await mapPool(collection.tours, tourPoolSize(collection.tours.length, deps.tourPoolMax), async (tour) => {
        if (!ctx.active || halted) return;
        try {
          const row = await exportTour(tour.id, { anonymous: true, signal: ctx.signal, seed: tour }, deps, {
            gpxDirectory: directory,
            imageDirectory: request.downloadImages ? path.join(directory, 'images', tour.id) : null,
            gpx: request.gpx,
          });
          if (row.skipped) summary.skipped++;
          else summary.downloaded++;
          ctx.itemDone({
            ...row,
            ...(collection.id ? { collection_id: collection.id } : {}),
            collection_name: collection.name,
          });
        } catch (error) {
          if (error instanceof PersistenceError) {
            halted = true;
            throw error;
          }
          summary.failed++;
          ctx.log(`Tour ${tour.id} in "${collection.name}" failed: ${errorMessage(error)}`);
          ctx.itemDone();
        }
      });

      summary.generated_at = new Date().toISOString();
      await writeFileAtomic(path.join(directory, 'download_summary.json'), JSON.stringify(summary, null, 2));
      ctx.log(`"${collection.name}": ${summary.downloaded} downloaded, ${summary.skipped} skipped, ${summary.failed} failed`);
    });

    if (!ctx.active) return;
    ctx.complete();
  } catch (error) {
    ctx.fail(errorMessage(error));
  }
}
