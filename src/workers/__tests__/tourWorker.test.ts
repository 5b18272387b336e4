import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { JobStatusStore } from '../../jobs/jobStatus.js';
import { chunkBounds, runTourJob, signIn, type TourJobRequest, type TourWorkerDeps } from '../tourWorker.js';
import { DEFAULT_GPX_OPTIONS, type TourResultRow } from '../../types/jobs.js';
import type { ResolveContext, ResolvedTour } from '../../services/tourResolver.js';
import type { AuthContext, Tour } from '../../types/index.js';
import { JobFatalError, PersistenceError } from '../../utils/errors.js';
import { writeFileAtomic } from '../../utils/fileWrite.js';

const AUTH: AuthContext = { userId: 'u1', token: 'test-token', displayName: 'Trail Friend' };

function makeDeps(outputDir: string, overrides: Partial<TourWorkerDeps> = {}) {
  const resolve = vi.fn(async (tourId: string, _context: ResolveContext): Promise<ResolvedTour> => ({
    tour: { id: tourId, name: `Ride ${tourId}`, distance_km: 10, track_points: [{ lat: 1, lon: 2 }] },
    source: 'fake',
    failures: [],
  }));
  const login = vi.fn(async (): Promise<AuthContext> => AUTH);
  const fetchTours = vi.fn(async (): Promise<Tour[]> => []);
  const deps: TourWorkerDeps = {
    api: { login, fetchTours, tourUrl: (id: string) => `https://www.komoot.com/tour/${id}` },
    resolver: { resolve },
    images: { getBuffer: async () => Buffer.from('') },
    outputDir,
    webBaseUrl: 'https://www.komoot.com',
    tourPoolMax: 8,
    ...overrides,
  };
  return { deps, resolve, login, fetchTours };
}

function request(overrides: Partial<TourJobRequest> = {}): TourJobRequest {
  return {
    anonymous: true,
    tourIds: [],
    filterType: 'all',
    gpx: DEFAULT_GPX_OPTIONS,
    downloadImages: false,
    chunkSize: 0,
    chunkStart: 0,
    ...overrides,
  };
}

function byId(a: TourResultRow, b: TourResultRow): number {
  return a.id.localeCompare(b.id);
}

describe('chunkBounds', () => {
  it('clamps the chunk to the sequence', () => {
    expect(chunkBounds(100, 30, 90)).toEqual({ start: 90, end: 100 });
    expect(chunkBounds(100, 0, 0)).toEqual({ start: 0, end: 100 });
    expect(chunkBounds(5, 10, 7)).toEqual({ start: 5, end: 5 });
  });
});

describe('signIn', () => {
  it('requires credentials and maps login failures to 401', async () => {
    const login = vi.fn(async (): Promise<AuthContext> => {
      throw new Error('bad credentials');
    });

    await expect(signIn({ login }, undefined, 'test-secret')).rejects.toMatchObject({ statusCode: 400 });
    const error = await signIn({ login }, 'rider@example.test', 'test-secret').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(JobFatalError);
    expect(error).toMatchObject({ statusCode: 401, message: 'Login failed: bad credentials' });
  });
});

describe('runTourJob', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tour-job-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('covers the same tours chunked as in one run', async () => {
    const ids = Array.from({ length: 100 }, (_, i) => String(1000 + i));

    const whole = new JobStatusStore<TourResultRow>('tours');
    await runTourJob(whole.start(), request({ tourIds: ids }), makeDeps(path.join(dir, 'whole')).deps);
    const wholeSnapshot = whole.snapshot();
    expect(wholeSnapshot.status).toBe('completed');
    expect(wholeSnapshot.results).toHaveLength(100);

    const chunked = new JobStatusStore<TourResultRow>('tours');
    const { deps } = makeDeps(path.join(dir, 'chunked'));
    const statuses: string[] = [];
    const rows: TourResultRow[] = [];
    let next: number | null = 0;
    while (next !== null) {
      await runTourJob(chunked.start(), request({ tourIds: ids, chunkSize: 30, chunkStart: next }), deps);
      const snapshot = chunked.snapshot();
      statuses.push(snapshot.status);
      rows.push(...snapshot.results);
      next = snapshot.status === 'chunk_completed' ? snapshot.next_chunk : null;
    }

    expect(statuses).toEqual(['chunk_completed', 'chunk_completed', 'chunk_completed', 'completed']);
    expect(rows.sort(byId)).toEqual([...wholeSnapshot.results].sort(byId));
    expect(rows[0]).toMatchObject({ id: '1000', name: 'Ride 1000', filename: 'Ride-1000-1000.gpx', skipped: false, source: 'fake' });
    await expect(fs.readdir(path.join(dir, 'chunked', 'tours'))).resolves.toHaveLength(100);
  });

  it('counts a tour that fails without failing the job', async () => {
    const { deps, resolve } = makeDeps(dir);
    resolve.mockImplementation(async (tourId: string): Promise<ResolvedTour> => {
      if (tourId === '2') throw new Error('unreachable');
      return { tour: { id: tourId, name: `Ride ${tourId}` }, source: 'fake', failures: [] };
    });
    const store = new JobStatusStore<TourResultRow>('tours');

    await runTourJob(store.start(), request({ tourIds: ['1', '2', '3'] }), deps);

    const snapshot = store.snapshot();
    expect(snapshot).toMatchObject({ status: 'completed', found: 3, completed: 3, progress: 1 });
    expect(snapshot.results.map(r => r.id).sort()).toEqual(['1', '3']);
    expect(snapshot.log.some(line => line.endsWith('Tour 2 failed: unreachable'))).toBe(true);
  });

  it('fails the job on a write error and keeps the rows already written', async () => {
    const { deps } = makeDeps(dir, { tourPoolMax: 1 });
    const blocked = path.join(dir, 'tours', 'Ride-2-2.gpx');
    await fs.mkdir(blocked, { recursive: true });
    const store = new JobStatusStore<TourResultRow>('tours');

    await runTourJob(
      store.start(),
      request({ tourIds: ['1', '2', '3'], gpx: { ...DEFAULT_GPX_OPTIONS, skipExisting: false } }),
      deps
    );

    const snapshot = store.snapshot();
    expect(snapshot.status).toBe('error');
    expect(snapshot.error?.startsWith(`Could not write ${blocked}: `)).toBe(true);
    expect(snapshot.results.map(r => r.id)).toEqual(['1']);
    expect((await fs.readdir(path.join(dir, 'tours'))).sort()).toEqual(['Ride-1-1.gpx', 'Ride-2-2.gpx']);
  });

  it('reports write failures as PersistenceError', async () => {
    const file = path.join(dir, 'plain-file');
    await fs.writeFile(file, 'x');

    const error = await writeFileAtomic(path.join(file, 'nested.gpx'), '<gpx/>').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toBeInstanceOf(JobFatalError);
    expect(error).toMatchObject({ path: file, statusCode: 500 });
  });

  it('lists the account tours and passes them on as seeds', async () => {
    const { deps, resolve, fetchTours } = makeDeps(dir);
    fetchTours.mockResolvedValue([
      { id: '7', name: 'Listed', type: 'recorded' },
      { id: '8', name: 'Other', type: 'recorded' },
    ]);
    const store = new JobStatusStore<TourResultRow>('tours');

    await runTourJob(
      store.start(),
      request({ anonymous: false, email: 'rider@example.test', password: 'test-secret', tourIds: 'all', filterType: 'recorded' }),
      deps
    );

    expect(store.snapshot()).toMatchObject({ status: 'completed', found: 2 });
    const seen = resolve.mock.calls.map(([id, context]) => [id, context.seed?.name, context.auth?.userId, context.requireTrack]);
    expect(seen.sort()).toEqual([
      ['7', 'Listed', 'u1', true],
      ['8', 'Other', 'u1', true],
    ]);
  });

  it('fails the job when anonymous mode has no ids', async () => {
    const store = new JobStatusStore<TourResultRow>('tours');

    await runTourJob(store.start(), request({ tourIds: 'all' }), makeDeps(dir).deps);

    expect(store.snapshot()).toMatchObject({ status: 'error', error: 'Anonymous mode needs explicit tour ids' });
  });

  it('fails the job when login is rejected', async () => {
    const { deps, login } = makeDeps(dir);
    login.mockRejectedValue(new Error('bad credentials'));
    const store = new JobStatusStore<TourResultRow>('tours');

    await runTourJob(store.start(), request({ anonymous: false, email: 'rider@example.test', password: 'test-secret' }), deps);

    expect(store.snapshot()).toMatchObject({ status: 'error', error: 'Login failed: bad credentials' });
  });

  it('completes at once with an empty selection', async () => {
    const store = new JobStatusStore<TourResultRow>('tours');

    await runTourJob(store.start(), request({ tourIds: [] }), makeDeps(dir).deps);

    expect(store.snapshot()).toMatchObject({ status: 'completed', found: 0, results: [] });
  });
});
