/**
 * Collection Worker - fetches personal, saved or public collections
 * and persists them as the basic artifact
 */

import type { KomootApi } from '../crawler/komoot/komootApi.js';
import { userIdFromUrl, type KomootCrawler } from '../crawler/komoot/komootCrawler.js';
import type { CollectionLink } from '../crawler/komoot/komootParser.js';
import type { JobContext } from '../jobs/jobStatus.js';
import type { CollectionManager } from '../services/collectionManager.js';
import type { Collection, Tour } from '../types/index.js';
import { isCollectionEnhanced } from '../utils/classification.js';
import { collectionPoolSize, mapPool } from '../utils/concurrency.js';
import { JobFatalError, errorMessage } from '../utils/errors.js';
import { signIn } from './tourWorker.js';

export type CollectionJobRequest =
  | { source: 'personal' | 'saved'; email: string; password: string }
  | { source: 'public'; urls: string[] };

export interface CollectionWorkerDeps {
  api: Pick<KomootApi, 'login' | 'fetchTours'>;
  crawler: Pick<KomootCrawler, 'fetchCollection' | 'fetchUserCollectionLinks' | 'expandPublicUrl'>;
  manager: Pick<CollectionManager, 'save'>;
  collectionPoolMax: number;
}

/**
 * All / Planned / Recorded collections built from the account's own tours
 */
export function buildVirtualCollections(tours: Tour[], userId: string, displayName?: string): Collection[] {
  const groups: Array<{ key: string; name: string; tours: Tour[] }> = [
    { key: 'all', name: 'All Tours', tours },
    { key: 'planned', name: 'Planned Tours', tours: tours.filter(tour => tour.type === 'planned') },
    { key: 'recorded', name: 'Recorded Tours', tours: tours.filter(tour => tour.type === 'recorded') },
  ];

  return groups
    .filter(group => group.tours.length > 0)
    .map(group => ({
      id: `virtual-${group.key}`,
      slug: `${group.key}-tours`,
      name: group.name,
      type: 'virtual' as const,
      creator: { id: userId, ...(displayName ? { name: displayName } : {}) },
      tours: group.tours,
      is_enhanced: isCollectionEnhanced(group.tours),
    }));
}

async function fetchLinkedCollections(
  ctx: JobContext<Collection>,
  links: CollectionLink[],
  deps: CollectionWorkerDeps,
  options: { ownerId?: string; type: Collection['type'] }
): Promise<Collection[]> {
  const fetched = await mapPool(links, collectionPoolSize(links.length, deps.collectionPoolMax), async (link) => {
    if (!ctx.active) return null;
    try {
      const collection = await deps.crawler.fetchCollection(link.url, {
        signal: ctx.signal,
        ownerId: options.ownerId,
        type: options.type,
      });
      ctx.itemDone(collection);
      ctx.log(`Collection "${collection.name}": ${collection.tours.length} tours`);
      return collection;
    } catch (error) {
      ctx.itemDone();
      ctx.log(`Collection ${link.id} failed: ${errorMessage(error)}`);
      return null;
    }
  });
  return fetched.filter((collection): collection is Collection => collection !== null);
}

export async function runCollectionJob(
  ctx: JobContext<Collection>,
  request: CollectionJobRequest,
  deps: CollectionWorkerDeps
): Promise<void> {
  try {
    let userId: string;
    let collections: Collection[];

    if (request.source === 'public') {
      if (request.urls.length === 0) {
        throw new JobFatalError('At least one collection URL is required', 400);
      }
      userId = request.urls.map(userIdFromUrl).find((id): id is string => id !== undefined) ?? 'public';

      const links = new Map<string, CollectionLink>();
      for (const url of request.urls) {
        try {
          for (const link of await deps.crawler.expandPublicUrl(url, ctx.signal)) {
            if (!links.has(link.id)) links.set(link.id, link);
          }
        } catch (error) {
          ctx.log(`Could not read ${url}: ${errorMessage(error)}`);
        }
      }

      ctx.setFound(links.size);
      ctx.log(`Fetching ${links.size} public collection(s)`);
      collections = await fetchLinkedCollections(ctx, Array.from(links.values()), deps, { ownerId: userId, type: 'public' });
    } else {
      ctx.log('Signing in...');
      const auth = await signIn(deps.api, request.email, request.password, ctx.signal);
      userId = auth.userId;

      const links = await deps.crawler.fetchUserCollectionLinks(userId, request.source, ctx.signal);
      const virtual = request.source === 'personal'
        ? buildVirtualCollections(await deps.api.fetchTours(auth, 'all', ctx.signal), userId, auth.displayName)
        : [];

      ctx.setFound(links.length + virtual.length);
      ctx.log(`Fetching ${links.length} ${request.source} collection(s)`);
      collections = await fetchLinkedCollections(ctx, links, deps, { ownerId: userId, type: request.source });

      for (const collection of virtual) {
        ctx.itemDone(collection);
      }
      collections.push(...virtual);
    }

    if (!ctx.active) return;

    if (collections.length === 0) {
      ctx.log('No collections found');
      ctx.complete();
      return;
    }

    const saved = await deps.manager.save(collections, userId, false);
    ctx.log(`Saved ${collections.length} collection(s) to ${saved.aggregatePath}`);
    ctx.complete();
  } catch (error) {
    ctx.fail(errorMessage(error));
  }
}
