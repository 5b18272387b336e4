// Merge and deduplication of partial tour records

import type { Tour } from '../types/index.js';
import { placeholderName } from './classification.js';

/**
 * JSON with object keys sorted, so equal values always compare equal
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val && typeof val === 'object' && !Array.isArray(val)) {
      return Object.fromEntries(Object.entries(val).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
    }
    return val;
  });
}

function compareText(a: string, b: string): number {
  if (a.length !== b.length) return a.length - b.length;
  return a < b ? -1 : a > b ? 1 : 0;
}

function pickString(a: string | undefined, b: string | undefined): string | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return compareText(a, b) >= 0 ? a : b;
}

function pickNumber(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.max(a, b);
}

function pickArray<T>(a: T[] | undefined, b: T[] | undefined): T[] | undefined {
  if (a === undefined || a.length === 0) return b && b.length > 0 ? b : a ?? b;
  if (b === undefined || b.length === 0) return a;
  if (a.length !== b.length) return a.length > b.length ? a : b;
  return compareText(canonicalJson(a), canonicalJson(b)) >= 0 ? a : b;
}

function pickName(tourId: string, a: string | undefined, b: string | undefined): string | undefined {
  const placeholder = placeholderName(tourId);
  if (a === placeholder && b !== undefined && b !== placeholder) return b;
  if (b === placeholder && a !== undefined && a !== placeholder) return a;
  return pickString(a, b);
}

function pickType(a: Tour['type'], b: Tour['type']): Tour['type'] {
  if (a === undefined) return b;
  if (b === undefined) return a;
  // Evidence of a recording outranks a plan
  return a === 'recorded' || b === 'recorded' ? 'recorded' : 'planned';
}

function setIfPresent<K extends keyof Tour>(target: Tour, key: K, value: Tour[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Merges two records of the same tour, field by field.
 *
 * Each field takes the richer of the two values under a fixed total order:
 * present beats absent, a real name beats the placeholder, longer text and
 * longer lists beat shorter ones, larger numbers beat smaller ones, and
 * remaining ties fall back to canonical JSON. Taking a maximum under a total
 * order makes the merge commutative and associative, so pool completion order
 * never changes the result.
 */
export function mergeTours(a: Tour, b: Tour): Tour {
  if (a.id !== b.id) {
    throw new Error(`Cannot merge tours with different ids (${a.id} / ${b.id})`);
  }

  const merged: Tour = { id: a.id };
  setIfPresent(merged, 'name', pickName(a.id, a.name, b.name));
  setIfPresent(merged, 'url', pickString(a.url, b.url));
  setIfPresent(merged, 'date', pickString(a.date, b.date));
  setIfPresent(merged, 'type', pickType(a.type, b.type));
  setIfPresent(merged, 'sport', pickString(a.sport, b.sport));
  setIfPresent(merged, 'distance_km', pickNumber(a.distance_km, b.distance_km));
  setIfPresent(merged, 'duration', pickNumber(a.duration, b.duration));
  setIfPresent(merged, 'elevation_up', pickNumber(a.elevation_up, b.elevation_up));
  setIfPresent(merged, 'elevation_down', pickNumber(a.elevation_down, b.elevation_down));
  setIfPresent(merged, 'high_point', pickNumber(a.high_point, b.high_point));
  setIfPresent(merged, 'unpaved_percentage', pickNumber(a.unpaved_percentage, b.unpaved_percentage));
  setIfPresent(merged, 'singletrack_percentage', pickNumber(a.singletrack_percentage, b.singletrack_percentage));
  setIfPresent(merged, 'rideable_percentage', pickNumber(a.rideable_percentage, b.rideable_percentage));
  setIfPresent(merged, 'region', pickString(a.region, b.region));
  setIfPresent(merged, 'description', pickString(a.description, b.description));
  setIfPresent(merged, 'image_url', pickString(a.image_url, b.image_url));
  setIfPresent(merged, 'creator', pickString(a.creator, b.creator));
  setIfPresent(merged, 'track_points', pickArray(a.track_points, b.track_points));
  setIfPresent(merged, 'pois', pickArray(a.pois, b.pois));
  setIfPresent(merged, 'highlights', pickArray(a.highlights, b.highlights));
  setIfPresent(merged, 'images', pickArray(a.images, b.images));
  return merged;
}

/**
 * Merges a record into a map keyed by tour id.
 * Returns true when the id was not in the map before.
 */
export function mergeInto(records: Map<string, Tour>, tour: Tour): boolean {
  const existing = records.get(tour.id);
  if (!existing) {
    records.set(tour.id, tour);
    return true;
  }
  records.set(tour.id, mergeTours(existing, tour));
  return false;
}

/**
 * Removes duplicate ids, keeping first-seen order and merging duplicates
 */
export function dedupeTours(tours: Tour[]): Tour[] {
  const records = new Map<string, Tour>();
  for (const tour of tours) {
    mergeInto(records, tour);
  }
  return Array.from(records.values());
}
