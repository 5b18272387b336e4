import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { enhanceCollections, runEnhancementJob } from '../enhancementWorker.js';
import { CollectionManager } from '../../services/collectionManager.js';
import { JobStatusStore } from '../../jobs/jobStatus.js';
import type { ResolveContext, ResolvedTour } from '../../services/tourResolver.js';
import type { Collection, Tour } from '../../types/index.js';

function basicCollection(id: string, count: number): Collection {
  const tours: Tour[] = Array.from({ length: count }, (_, i) => ({ id: `${id}${i + 1}`, name: `Tour ${id}${i + 1}` }));
  return { id, name: `Collection ${id}`, tours, is_enhanced: false };
}

function fakeResolver(failing: string[] = []) {
  return vi.fn(async (tourId: string, _context: ResolveContext): Promise<ResolvedTour> => {
    if (failing.includes(tourId)) throw new Error('no source');
    return { tour: { id: tourId, name: `Ride ${tourId}`, distance_km: 5 }, source: 'fake', failures: [] };
  });
}

const POOLS = { tourPoolMax: 4, collectionPoolMax: 2 };

describe('enhanceCollections', () => {
  it('keeps failed tours as they were and reclassifies the collection', async () => {
    const resolve = fakeResolver(['a3']);

    const { collections, stats } = await enhanceCollections([basicCollection('a', 5)], { resolver: { resolve }, ...POOLS });

    expect(collections[0].tours.map(t => t.name)).toEqual(['Ride a1', 'Ride a2', 'Tour a3', 'Ride a4', 'Ride a5']);
    expect(collections[0].is_enhanced).toBe(false);
    expect(stats).toEqual({ skippedCollections: 0, enhancedCollections: 0, resolvedTours: 4, failedTours: 1 });
    expect(resolve.mock.calls.every(([, context]) => context.anonymous && context.seed !== undefined)).toBe(true);
  });

  it('makes no requests on a second run over its own output', async () => {
    const first = await enhanceCollections([basicCollection('a', 3), basicCollection('b', 2)], {
      resolver: { resolve: fakeResolver() },
      ...POOLS,
    });
    expect(first.collections.map(c => c.is_enhanced)).toEqual([true, true]);
    expect(first.stats.enhancedCollections).toBe(2);

    const resolve = fakeResolver();
    const second = await enhanceCollections(first.collections, { resolver: { resolve }, ...POOLS });

    expect(resolve).not.toHaveBeenCalled();
    expect(second.stats.skippedCollections).toBe(2);
    expect(second.collections).toEqual(first.collections);
  });

  it('only resolves the tours that are still basic', async () => {
    const collection: Collection = {
      name: 'Mixed',
      tours: [{ id: '1', name: 'Known' }, { id: '2' }, { id: '3', name: 'Tour 3' }],
      is_enhanced: false,
    };
    const resolve = fakeResolver();

    await enhanceCollections([collection], { resolver: { resolve }, ...POOLS });

    expect(resolve.mock.calls.map(([id]) => id).sort()).toEqual(['2', '3']);
  });
});

describe('runEnhancementJob', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'enhance-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads the latest basic artifact and saves an enhanced one', async () => {
    const manager = new CollectionManager(dir);
    await manager.save([basicCollection('a', 2)], 'u1', false);
    const store = new JobStatusStore<Collection>('collections');

    await runEnhancementJob(store.start(), 'u1', { manager, resolver: { resolve: fakeResolver() }, ...POOLS });

    const snapshot = store.snapshot();
    expect(snapshot).toMatchObject({ status: 'completed', found: 1, completed: 1 });
    expect(snapshot.results[0].is_enhanced).toBe(true);

    const artifact = await manager.loadArtifact(await manager.findLatestArtifact('u1', 'enhanced'));
    expect(artifact.kind).toBe('enhanced');
    expect(artifact.collections[0].tours.map(t => t.name)).toEqual(['Ride a1', 'Ride a2']);
  });

  it('fails when the user has no basic artifact', async () => {
    const store = new JobStatusStore<Collection>('collections');

    await runEnhancementJob(store.start(), 'nobody', {
      manager: new CollectionManager(dir),
      resolver: { resolve: fakeResolver() },
      ...POOLS,
    });

    expect(store.snapshot()).toMatchObject({ status: 'error', error: 'No collections directory for user nobody' });
  });
});
