/**
 * Tour file output: GPX tracks and downloaded images
 */

import fs from 'fs/promises';
import path from 'path';
import type { HttpClient } from '../crawler/komoot/utils/httpClient.js';
import { Logger } from '../crawler/komoot/utils/logger.js';
import type { Tour } from '../types/index.js';
import type { GpxOptions } from '../types/jobs.js';
import { placeholderName } from '../utils/classification.js';
import { PersistenceError, errorMessage } from '../utils/errors.js';
import { ensureDirectory, writeFileAtomic, pathExists } from '../utils/fileWrite.js';
import { buildGpx, truncateText } from '../utils/gpx.js';
import { isoDay } from '../utils/timestamp.js';

export type ImageFetcher = Pick<HttpClient, 'getBuffer'>;

export interface WrittenGpx {
  filename: string;
  path: string;
  skipped: boolean;
}

const logger = new Logger('TourFiles');

/**
 * Title fit for a file name: no path or reserved characters, spaces as hyphens
 */
export function sanitizeTitle(title: string): string {
  return title
    .normalize('NFC')
    .replace(/[<>:"/\\|?*\u0000-\u001f]/g, '')
    .replace(/\s+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^[-.]+|[-.]+$/g, '');
}

/**
 * {date_}{title}-{id}.gpx, or {date_}{id}.gpx for id-only naming
 * (idFilename, or maxTitleLength 0)
 */
export function buildTourFilename(tour: Tour, options: Pick<GpxOptions, 'idFilename' | 'addDate' | 'maxTitleLength'>): string {
  const day = options.addDate ? isoDay(tour.date) : null;
  const prefix = day ? `${day}_` : '';

  if (options.idFilename || options.maxTitleLength === 0) {
    return `${prefix}${tour.id}.gpx`;
  }

  const title = truncateText(sanitizeTitle(tour.name ?? placeholderName(tour.id)), options.maxTitleLength).replace(/[-.]+$/, '');
  return title ? `${prefix}${title}-${tour.id}.gpx` : `${prefix}${tour.id}.gpx`;
}

export async function writeTourGpx(
  directory: string,
  tour: Tour,
  options: GpxOptions,
  webBaseUrl?: string
): Promise<WrittenGpx> {
  const filename = buildTourFilename(tour, options);
  const filePath = path.join(directory, filename);

  if (options.skipExisting && (await pathExists(filePath))) {
    logger.debug(`Skipping existing ${filename}`);
    return { filename, path: filePath, skipped: true };
  }

  const gpx = buildGpx(tour, {
    includePoi: options.includePoi,
    maxDescLength: options.maxDescLength,
    webBaseUrl,
  });
  await writeFileAtomic(filePath, gpx);
  return { filename, path: filePath, skipped: false };
}

function imageExtension(url: string): string {
  const match = url.split('?')[0].match(/\.(jpe?g|png|webp|gif)$/i);
  return match ? match[1].toLowerCase() : 'jpg';
}

/**
 * Downloads the tour's images into `directory`. An image that cannot be
 * fetched is logged and skipped; a write failure propagates.
 * Returns the file names written.
 */
export async function downloadTourImages(
  http: ImageFetcher,
  tour: Tour,
  directory: string,
  signal?: AbortSignal
): Promise<string[]> {
  const urls = Array.from(new Set([...(tour.image_url ? [tour.image_url] : []), ...(tour.images ?? [])]));
  if (urls.length === 0) return [];

  await ensureDirectory(directory);
  const written: string[] = [];

  for (const [index, url] of urls.entries()) {
    const filename = `${String(index + 1).padStart(3, '0')}.${imageExtension(url)}`;
    try {
      const data = await http.getBuffer(url, { signal, maxRetries: 2 });
      await writeFileAtomic(path.join(directory, filename), data);
      written.push(filename);
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      logger.warn(`Tour ${tour.id}: image ${url} failed:`, errorMessage(error));
    }
  }

  return written;
}

/**
 * Finds a GPX file previously written for a tour
 */
export async function findTourGpx(directory: string, tourId: string): Promise<string | null> {
  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch {
    return null;
  }
  const match = entries.find(name => name === `${tourId}.gpx` || name.endsWith(`-${tourId}.gpx`) || name.endsWith(`_${tourId}.gpx`));
  return match ? path.join(directory, match) : null;
}
