/**
 * Tour Worker - exports the tours of a tour job
 *
 * 1. Signs in (unless anonymous) and lists the account's tours
 * 2. Takes the requested chunk of the tour sequence
 * 3. Resolves each tour, writes its GPX file and optionally its images
 * 4. Reports rows into the tour job status, ending in completed or chunk_completed
 */

import path from 'path';
import type { KomootApi } from '../crawler/komoot/komootApi.js';
import type { JobContext } from '../jobs/jobStatus.js';
import { downloadTourImages, writeTourGpx, type ImageFetcher } from '../services/tourFiles.js';
import type { ResolveContext, TourResolver } from '../services/tourResolver.js';
import type { AuthContext, Tour, TourFilter } from '../types/index.js';
import type { GpxOptions, TourResultRow } from '../types/jobs.js';
import { placeholderName } from '../utils/classification.js';
import { mapPool, tourPoolSize } from '../utils/concurrency.js';
import { JobFatalError, PersistenceError, errorMessage } from '../utils/errors.js';

export interface TourJobRequest {
  anonymous: boolean;
  email?: string;
  password?: string;
  tourIds: string[] | 'all';
  filterType: TourFilter;
  gpx: GpxOptions;
  downloadImages: boolean;
  /** 0 processes the whole sequence */
  chunkSize: number;
  chunkStart: number;
}

export interface TourWorkerDeps {
  api: Pick<KomootApi, 'login' | 'fetchTours' | 'tourUrl'>;
  resolver: Pick<TourResolver, 'resolve'>;
  images: ImageFetcher;
  outputDir: string;
  webBaseUrl: string;
  tourPoolMax: number;
}

export interface ChunkBounds {
  start: number;
  end: number;
}

/**
 * [chunkStart, chunkStart + chunkSize) clamped to the sequence
 */
export function chunkBounds(total: number, chunkSize: number, chunkStart: number): ChunkBounds {
  const start = Math.min(Math.max(0, chunkStart), total);
  const end = chunkSize > 0 ? Math.min(total, start + chunkSize) : total;
  return { start, end };
}

export function toResultRow(
  tour: Tour,
  tourUrl: string,
  output: { filename: string | null; skipped: boolean; images: string[]; source: string }
): TourResultRow {
  return {
    id: tour.id,
    name: tour.name ?? placeholderName(tour.id),
    date: tour.date ?? null,
    sport: tour.sport ?? null,
    type: tour.type ?? null,
    distance_km: tour.distance_km ?? null,
    duration: tour.duration ?? null,
    elevation_up: tour.elevation_up ?? null,
    elevation_down: tour.elevation_down ?? null,
    url: tour.url ?? tourUrl,
    filename: output.filename,
    skipped: output.skipped,
    images: output.images,
    source: output.source,
  };
}

export async function signIn(
  api: Pick<KomootApi, 'login'>,
  email: string | undefined,
  password: string | undefined,
  signal?: AbortSignal
): Promise<AuthContext> {
  if (!email || !password) {
    throw new JobFatalError('Email and password are required unless running anonymously', 400);
  }
  try {
    return await api.login(email, password, signal);
  } catch (error) {
    throw new JobFatalError(`Login failed: ${errorMessage(error)}`, 401);
  }
}

/**
 * Resolves one tour and writes its files
 */
export async function exportTour(
  tourId: string,
  resolveContext: ResolveContext,
  deps: Pick<TourWorkerDeps, 'api' | 'resolver' | 'images' | 'webBaseUrl'>,
  target: { gpxDirectory: string; imageDirectory: string | null; gpx: GpxOptions }
): Promise<TourResultRow> {
  const { tour, source } = await deps.resolver.resolve(tourId, { ...resolveContext, requireTrack: true });
  const written = await writeTourGpx(target.gpxDirectory, tour, target.gpx, deps.webBaseUrl);
  const images = target.imageDirectory
    ? await downloadTourImages(deps.images, tour, target.imageDirectory, resolveContext.signal)
    : [];

  return toResultRow(tour, deps.api.tourUrl(tourId), {
    filename: written.filename,
    skipped: written.skipped,
    images,
    source,
  });
}

export async function runTourJob(ctx: JobContext<TourResultRow>, request: TourJobRequest, deps: TourWorkerDeps): Promise<void> {
  try {
    let auth: AuthContext | undefined;
    const seeds = new Map<string, Tour>();
    let sequence: string[] = request.tourIds === 'all' ? [] : request.tourIds;

    if (request.anonymous) {
      if (request.tourIds === 'all') {
        throw new JobFatalError('Anonymous mode needs explicit tour ids', 400);
      }
      ctx.log(`Anonymous mode: ${sequence.length} tour(s) requested`);
    } else {
      ctx.log('Signing in...');
      auth = await signIn(deps.api, request.email, request.password, ctx.signal);
      ctx.log(`Signed in as ${auth.displayName}`);

      const listing = await deps.api.fetchTours(auth, request.filterType, ctx.signal);
      for (const tour of listing) {
        seeds.set(tour.id, tour);
      }
      if (request.tourIds === 'all') {
        sequence = listing.map(tour => tour.id);
      }
      ctx.log(`Account lists ${listing.length} ${request.filterType} tour(s)`);
    }

    const { start, end } = chunkBounds(sequence.length, request.chunkSize, request.chunkStart);
    const slice = sequence.slice(start, end);
    ctx.setFound(slice.length);

    if (slice.length === 0) {
      ctx.log('No tours to process');
      ctx.complete();
      return;
    }

    ctx.log(`Processing tours ${start + 1}-${end} of ${sequence.length}`);
    const gpxDirectory = path.join(deps.outputDir, 'tours');
    let failed = 0;
    let halted = false;

    await mapPool(slice, tourPoolSize(slice.length, deps.tourPoolMax), async (tourId) => {
      if (!ctx.active || halted) return;
      try {
        const row = await exportTour(
          tourId,
          { anonymous: request.anonymous, auth, signal: ctx.signal, seed: seeds.get(tourId) },
          deps,
          {
            gpxDirectory,
            imageDirectory: request.downloadImages ? path.join(deps.outputDir, 'images', tourId) : null,
            gpx: request.gpx,
          }
        );
        ctx.itemDone(row);
        ctx.log(`${row.skipped ? 'Skipped existing' : 'Saved'} ${row.filename} (${row.source})`);
      } catch (error) {
        if (error instanceof PersistenceError) {
          halted = true;
          throw error;
        }
        failed++;
        ctx.log(`Tour ${tourId} failed: ${errorMessage(error)}`);
        ctx.itemDone();
      }
    });

    if (failed > 0) {
      ctx.log(`${failed} tour(s) could not be resolved`);
    }

    if (request.chunkSize > 0 && end < sequence.length) {
      ctx.log(`Chunk done, continue at ${end}`);
      ctx.chunkCompleted(end);
    } else {
      ctx.log('All tours processed');
      ctx.complete();
    }
  } catch (error) {
    ctx.fail(errorMessage(error));
  }
}
