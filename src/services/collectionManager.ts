/**
 * Collection manager
 *
 * Persists collections per user: one aggregate JSON per save, and per
 * collection a JSON, a CSV and a text summary under the collection's slug.
 * Every file name carries a generation timestamp and a basic/enhanced
 * suffix, so a save never replaces an earlier artifact.
 */

import fs from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import { Logger } from '../crawler/komoot/utils/logger.js';
import type { ArtifactKind, Collection, CollectionArtifact, Tour } from '../types/index.js';
import { countEnhancedTours, isCollectionEnhanced } from '../utils/classification.js';
import { buildCsvContent, type CsvColumn } from '../utils/csv.js';
import { dedupeTours } from '../utils/deduplication.js';
import { JobFatalError, errorMessage } from '../utils/errors.js';
import { writeFileAtomic } from '../utils/fileWrite.js';
import { collectionSlug } from '../utils/slug.js';
import { fileTimestamp } from '../utils/timestamp.js';
import { artifactFileSchema } from './artifactSchema.js';

export const KM_TO_MI = 0.621371;

export const CSV_COLUMNS: CsvColumn[] = [
  { key: 'id', header: 'id' },
  { key: 'timestamp', header: 'timestamp' },
  { key: 'name', header: 'name' },
  { key: 'distance_km', header: 'distance_km' },
  { key: 'distance_mi', header: 'distance_mi' },
  { key: 'duration', header: 'duration' },
  { key: 'unpaved_percentage', header: 'unpaved_percentage' },
  { key: 'singletrack_percentage', header: 'singletrack_percentage' },
  { key: 'rideable_percentage', header: 'rideable_percentage' },
  { key: 'total_ascent', header: 'total_ascent' },
  { key: 'total_descent', header: 'total_descent' },
  { key: 'high_point', header: 'high_point' },
  { key: 'climbing_intensity', header: 'climbing_intensity' },
  { key: 'region', header: 'region' },
  { key: 'collection_name', header: 'collection_name' },
  { key: 'collection_id', header: 'collection_id' },
  { key: 'sport_type', header: 'sport_type' },
  { key: 'description', header: 'description' },
  { key: 'url', header: 'url' },
  { key: 'image_url', header: 'image_url' },
  { key: 'collection_cover_image', header: 'collection_cover_image' },
  { key: 'date_created', header: 'date_created' },
];

const ESSENTIAL_COLUMNS = new Set(['id', 'timestamp', 'name', 'url']);

export interface SavedCollection {
  slug: string;
  directory: string;
  jsonPath: string;
  csvPath: string;
  summaryPath: string;
}

export interface SaveResult {
  aggregatePath: string;
  timestamp: string;
  collections: SavedCollection[];
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function distanceMiles(tour: Tour): number | null {
  return tour.distance_km === undefined ? null : round1(tour.distance_km * KM_TO_MI);
}

/**
 * Metres climbed per km, when both are known and the distance is positive
 */
export function climbingIntensity(tour: Tour): number | null {
  if (tour.elevation_up === undefined || tour.distance_km === undefined || tour.distance_km <= 0) {
    return null;
  }
  return round1(tour.elevation_up / tour.distance_km);
}

/**
 * Flattened CSV/XLSX row; derived fields exist only here
 */
export function tourExportRow(tour: Tour, collection: Collection, timestamp: string): Record<string, unknown> {
  return {
    id: tour.id,
    timestamp,
    name: tour.name ?? null,
    distance_km: tour.distance_km ?? null,
    distance_mi: distanceMiles(tour),
    duration: tour.duration ?? null,
    unpaved_percentage: tour.unpaved_percentage ?? null,
    singletrack_percentage: tour.singletrack_percentage ?? null,
    rideable_percentage: tour.rideable_percentage ?? null,
    total_ascent: tour.elevation_up ?? null,
    total_descent: tour.elevation_down ?? null,
    high_point: tour.high_point ?? null,
    climbing_intensity: climbingIntensity(tour),
    region: tour.region ?? null,
    collection_name: collection.name,
    collection_id: collection.id ?? null,
    sport_type: tour.sport ?? null,
    description: tour.description ?? null,
    url: tour.url ?? null,
    image_url: tour.image_url ?? null,
    collection_cover_image: collection.cover_image ?? null,
    date_created: tour.date ?? null,
  };
}

/**
 * Columns that carry data in at least one row, plus the essential ones
 */
export function columnsWithData(rows: Record<string, unknown>[]): CsvColumn[] {
  return CSV_COLUMNS.filter(col =>
    ESSENTIAL_COLUMNS.has(col.key) || rows.some(row => row[col.key] !== null && row[col.key] !== undefined && row[col.key] !== '')
  );
}

export function buildCollectionCsv(collection: Collection, timestamp: string = new Date().toISOString()): string {
  const rows = dedupeTours(collection.tours).map(tour => tourExportRow(tour, collection, timestamp));
  return buildCsvContent(rows, columnsWithData(rows));
}

export async function buildCollectionXlsx(collection: Collection, timestamp: string = new Date().toISOString()): Promise<Buffer> {
  const rows = dedupeTours(collection.tours).map(tour => tourExportRow(tour, collection, timestamp));
  const columns = columnsWithData(rows);

  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet('Tours');
  worksheet.columns = columns.map(col => ({
    header: col.header,
    key: col.key,
    width: col.key === 'name' || col.key === 'description' ? 40 : 16,
  }));

  worksheet.getRow(1).font = { bold: true };
  worksheet.getRow(1).fill = {
    type: 'pattern',
    pattern: 'solid',
    fgColor: { argb: 'FFE0E0E0' },
  };

  for (const row of rows) {
    worksheet.addRow(row);
  }

  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}

export function buildCollectionSummary(collection: Collection): string {
  const tours = collection.tours;
  const enhanced = countEnhancedTours(tours);
  const totalKm = tours.reduce((sum, tour) => sum + (tour.distance_km ?? 0), 0);
  const totalUp = tours.reduce((sum, tour) => sum + (tour.elevation_up ?? 0), 0);

  const lines = [
    `Collection: ${collection.name}`,
    `ID: ${collection.id ?? 'Unknown'}`,
    `Type: ${collection.type ?? 'Unknown'}`,
    `Tours: ${tours.length}`,
    `Enhanced: ${collection.is_enhanced ? 'yes' : 'no'} (${enhanced}/${tours.length} tours)`,
  ];
  if (collection.url) lines.push(`URL: ${collection.url}`);
  const creator = collection.creator;
  if (creator && (creator.name || creator.id)) {
    lines.push(`Creator: ${creator.name ?? creator.id}`);
  }
  if (collection.description) {
    lines.push('', 'Description:', collection.description);
  }
  lines.push(
    '',
    'Statistics:',
    `- Total distance: ${round1(totalKm)} km (${round1(totalKm * KM_TO_MI)} mi)`,
    `- Total ascent: ${Math.round(totalUp)} m`
  );
  return lines.join('\n') + '\n';
}

export class CollectionManager {
  private outputDir: string;
  private logger: Logger;
  private lastStamp: number;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
    this.logger = new Logger('CollectionManager');
    this.lastStamp = 0;
  }

  userDirectory(userId: string): string {
    return path.join(this.outputDir, 'collections', `user-${userId}`);
  }

  collectionDirectory(userId: string, collection: Collection): string {
    return path.join(this.userDirectory(userId), collection.slug ?? collectionSlug(collection));
  }

  // Strictly increasing within the process, so two saves never share a name
  private nextTimestamp(): { stamp: string; iso: string } {
    const now = Math.max(Date.now(), this.lastStamp + 1);
    this.lastStamp = now;
    const date = new Date(now);
    return { stamp: fileTimestamp(date), iso: date.toISOString() };
  }

  /**
   * Canonical form written to disk: deduplicated tours, slug set,
   * classification recomputed from content
   */
  normalize(collection: Collection): Collection {
    const tours = dedupeTours(collection.tours);
    return {
      ...collection,
      slug: collection.slug ?? collectionSlug(collection),
      tours,
      is_enhanced: isCollectionEnhanced(tours),
    };
  }

  async save(collections: Collection[], userId: string, enhanced: boolean): Promise<SaveResult> {
    const kind: ArtifactKind = enhanced ? 'enhanced' : 'basic';
    const { stamp, iso } = this.nextTimestamp();
    const normalized = this.assignUniqueSlugs(collections.map(collection => this.normalize(collection)));
    const saved: SavedCollection[] = [];

    try {
      for (const collection of normalized) {
        const directory = this.collectionDirectory(userId, collection);
        const base = path.join(directory, `collection_${stamp}_${kind}`);
        const entry: SavedCollection = {
          slug: collection.slug ?? collectionSlug(collection),
          directory,
          jsonPath: `${base}.json`,
          csvPath: `${base}.csv`,
          summaryPath: path.join(directory, 'collection_info.txt'),
        };

        await writeFileAtomic(entry.jsonPath, JSON.stringify(collection, null, 2));
        await writeFileAtomic(entry.csvPath, buildCollectionCsv(collection, iso));
        await writeFileAtomic(entry.summaryPath, buildCollectionSummary(collection));
        saved.push(entry);
      }

      const artifact: CollectionArtifact = {
        user_id: userId,
        kind,
        generated_at: iso,
        collection_count: normalized.length,
        tour_count: normalized.reduce((sum, collection) => sum + collection.tours.length, 0),
        collections: normalized,
      };
      const aggregatePath = path.join(this.userDirectory(userId), `all_collections_${stamp}_${kind}.json`);
      await writeFileAtomic(aggregatePath, JSON.stringify(artifact, null, 2));

      this.logger.success(`Saved ${normalized.length} ${kind} collections for user ${userId}`);
      return { aggregatePath, timestamp: stamp, collections: saved };
    } catch (error) {
      throw new JobFatalError(`Failed to save collections: ${errorMessage(error)}`);
    }
  }

  // Each collection gets its own directory: a repeated slug takes the id, else a counter
  private assignUniqueSlugs(collections: Collection[]): Collection[] {
    const used = new Set<string>();
    return collections.map(collection => {
      const base = collection.slug ?? collectionSlug(collection);
      let slug = base;
      if (used.has(slug) && collection.id !== undefined) {
        slug = `${base}-${collection.id}`;
      }
      for (let n = 2; used.has(slug); n++) {
        slug = `${base}-${n}`;
      }
      used.add(slug);
      return { ...collection, slug };
    });
  }

  /**
   * Newest all_collections_*_{kind}.json for a user
   */
  async findLatestArtifact(userId: string, kind: ArtifactKind = 'basic'): Promise<string> {
    const directory = this.userDirectory(userId);
    let entries: string[];
    try {
      entries = await fs.readdir(directory);
    } catch {
      throw new JobFatalError(`No collections directory for user ${userId}`, 404);
    }

    const pattern = new RegExp(`^all_collections_\\d{8}_\\d{6}_\\d{3}_${kind}\\.json$`);
    const candidates = entries.filter(name => pattern.test(name)).sort();
    if (candidates.length === 0) {
      throw new JobFatalError(`No ${kind} collections file found for user ${userId}`, 404);
    }
    return path.join(directory, candidates[candidates.length - 1]);
  }

  async loadArtifact(filePath: string): Promise<CollectionArtifact> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new JobFatalError(`Cannot read ${filePath}: ${errorMessage(error)}`, 404);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new JobFatalError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`, 400);
    }

    const parsed = artifactFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new JobFatalError(`Invalid collections file ${filePath}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`, 400);
    }

    if (Array.isArray(parsed.data)) {
      const collections = parsed.data;
      return {
        user_id: 'unknown',
        kind: 'basic',
        generated_at: new Date().toISOString(),
        collection_count: collections.length,
        tour_count: collections.reduce((sum, collection) => sum + collection.tours.length, 0),
        collections,
      };
    }
    return parsed.data;
  }
}
