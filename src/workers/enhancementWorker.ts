/**
 * Enhancement Worker - upgrades basic collections by re-resolving their tours
 *
 * Collections already enhanced are passed through without a single request,
 * so running it again over its own output is a no-op.
 */

import type { JobContext } from '../jobs/jobStatus.js';
import type { CollectionManager } from '../services/collectionManager.js';
import type { TourResolver } from '../services/tourResolver.js';
import type { AuthContext, Collection, Tour } from '../types/index.js';
import { isCollectionEnhanced, isTourEnhanced } from '../utils/classification.js';
import { collectionPoolSize, mapPool, tourPoolSize } from '../utils/concurrency.js';
import { dedupeTours, mergeTours } from '../utils/deduplication.js';
import { errorMessage } from '../utils/errors.js';

export interface EnhancementOptions {
  resolver: Pick<TourResolver, 'resolve'>;
  tourPoolMax: number;
  collectionPoolMax: number;
  auth?: AuthContext;
  signal?: AbortSignal;
  log?: (message: string) => void;
  onCollectionDone?: (collection: Collection) => void;
}

export interface EnhancementStats {
  skippedCollections: number;
  enhancedCollections: number;
  resolvedTours: number;
  failedTours: number;
}

export interface EnhancementResult {
  collections: Collection[];
  stats: EnhancementStats;
}

async function enhanceCollection(
  collection: Collection,
  options: EnhancementOptions,
  stats: EnhancementStats
): Promise<Collection> {
  const log = options.log ?? (() => undefined);
  const tours = dedupeTours(collection.tours);

  if (isCollectionEnhanced(tours)) {
    stats.skippedCollections++;
    log(`"${collection.name}" already enhanced, skipping`);
    return { ...collection, tours, is_enhanced: true };
  }

  const pending = tours.filter(tour => !isTourEnhanced(tour));
  log(`Enhancing "${collection.name}": ${pending.length} of ${tours.length} tours`);

  const upgraded = new Map<string, Tour>();
  await mapPool(pending, tourPoolSize(pending.length, options.tourPoolMax), async (tour) => {
    if (options.signal?.aborted) return;
    try {
      const resolved = await options.resolver.resolve(tour.id, {
        anonymous: options.auth === undefined,
        auth: options.auth,
        signal: options.signal,
        seed: tour,
      });
      upgraded.set(tour.id, mergeTours(tour, resolved.tour));
      stats.resolvedTours++;
    } catch (error) {
      // Tour keeps its earlier data
      stats.failedTours++;
      log(`Tour ${tour.id} in "${collection.name}" failed: ${errorMessage(error)}`);
    }
  });

  const merged = tours.map(tour => upgraded.get(tour.id) ?? tour);
  const isEnhanced = isCollectionEnhanced(merged);
  if (isEnhanced) stats.enhancedCollections++;
  return { ...collection, tours: merged, is_enhanced: isEnhanced };
}

/**
 * Runs the enhancement over every collection, two pools deep:
 * collections in one pool, each collection's tours in another.
 * Output keeps the input order.
 */
export async function enhanceCollections(collections: Collection[], options: EnhancementOptions): Promise<EnhancementResult> {
  const stats: EnhancementStats = { skippedCollections: 0, enhancedCollections: 0, resolvedTours: 0, failedTours: 0 };
  const log = options.log ?? (() => undefined);

  const results = await mapPool(
    collections,
    collectionPoolSize(collections.length, options.collectionPoolMax),
    async (collection) => {
      let result: Collection;
      try {
        result = await enhanceCollection(collection, options, stats);
      } catch (error) {
        log(`Collection "${collection.name}" failed: ${errorMessage(error)}`);
        result = collection;
      }
      options.onCollectionDone?.(result);
      return result;
    }
  );

  return { collections: results, stats };
}

export interface EnhancementJobDeps {
  manager: Pick<CollectionManager, 'findLatestArtifact' | 'loadArtifact' | 'save'>;
  resolver: Pick<TourResolver, 'resolve'>;
  tourPoolMax: number;
  collectionPoolMax: number;
}

/**
 * Enhances the user's latest basic artifact and saves the enhanced one
 */
export async function runEnhancementJob(ctx: JobContext<Collection>, userId: string, deps: EnhancementJobDeps): Promise<void> {
  try {
    const artifactPath = await deps.manager.findLatestArtifact(userId, 'basic');
    ctx.log(`Loading ${artifactPath}`);
    const artifact = await deps.manager.loadArtifact(artifactPath);
    ctx.setFound(artifact.collections.length);

    const { collections, stats } = await enhanceCollections(artifact.collections, {
      resolver: deps.resolver,
      tourPoolMax: deps.tourPoolMax,
      collectionPoolMax: deps.collectionPoolMax,
      signal: ctx.signal,
      log: message => ctx.log(message),
      onCollectionDone: collection => ctx.itemDone(collection),
    });

    if (!ctx.active) return;

    ctx.log(
      `Enhanced ${stats.enhancedCollections}, skipped ${stats.skippedCollections} collection(s); ` +
      `${stats.resolvedTours} tour(s) resolved, ${stats.failedTours} failed`
    );
    const saved = await deps.manager.save(collections, userId, true);
    ctx.log(`Saved enhanced collections to ${saved.aggregatePath}`);
    ctx.complete();
  } catch (error) {
    ctx.fail(errorMessage(error));
  }
}
