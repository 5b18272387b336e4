import type { Tour } from '../types/index.js';

/**
 * Share of enhanced tours above which a collection counts as enhanced.
 * Tolerates a few tours that no source could fill in.
 */
export const ENHANCED_COLLECTION_THRESHOLD = 0.8;

/**
 * Name given to tours discovered without one
 */
export function placeholderName(tourId: string): string {
  return `Tour ${tourId}`;
}

export function hasPlaceholderName(tour: Pick<Tour, 'id' | 'name'>): boolean {
  return tour.name === undefined || tour.name === placeholderName(tour.id);
}

/**
 * A tour is basic while it carries only the placeholder name and no distance.
 * Derived from content on every call, never stored.
 */
export function isTourBasic(tour: Tour): boolean {
  return hasPlaceholderName(tour) && tour.distance_km === undefined;
}

export function isTourEnhanced(tour: Tour): boolean {
  return !isTourBasic(tour);
}

export function countEnhancedTours(tours: Tour[]): number {
  return tours.filter(isTourEnhanced).length;
}

export function isCollectionEnhanced(tours: Tour[]): boolean {
  if (tours.length === 0) return false;
  return countEnhancedTours(tours) / tours.length > ENHANCED_COLLECTION_THRESHOLD;
}
