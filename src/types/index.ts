// Shared record types for tours and collections

export type TourType = 'recorded' | 'planned';

export interface TrackPoint {
  lat: number;
  lon: number;
  elevation?: number;
  timestamp?: string;
}

export interface PointOfInterest {
  id?: string;
  name: string;
  lat: number;
  lon: number;
  category?: string;
  description?: string;
}

export interface Highlight {
  id: string;
  name: string;
  lat?: number;
  lon?: number;
  tips: string[];
  images: string[];
}

/**
 * One recorded or planned route.
 * Every field but `id` is optional: records are built up from partial
 * sources and merged, so "absent" is a normal state, never a sentinel.
 */
export interface Tour {
  id: string;
  name?: string;
  url?: string;
  date?: string;
  type?: TourType;
  sport?: string;
  distance_km?: number;
  /** Total minutes */
  duration?: number;
  elevation_up?: number;
  elevation_down?: number;
  high_point?: number;
  unpaved_percentage?: number;
  singletrack_percentage?: number;
  rideable_percentage?: number;
  region?: string;
  description?: string;
  image_url?: string;
  creator?: string;
  track_points?: TrackPoint[];
  pois?: PointOfInterest[];
  highlights?: Highlight[];
  images?: string[];
}

export interface CreatorRef {
  id?: string;
  name?: string;
}

export type CollectionSource = 'personal' | 'saved' | 'public' | 'virtual';

export interface Collection {
  id?: string;
  slug?: string;
  name: string;
  url?: string;
  description?: string;
  cover_image?: string;
  creator?: CreatorRef;
  type?: CollectionSource;
  expected_tour_count?: number;
  tours: Tour[];
  is_enhanced: boolean;
}

export type ArtifactKind = 'basic' | 'enhanced';

/**
 * Aggregate file written once per save under the user's directory
 */
export interface CollectionArtifact {
  user_id: string;
  kind: ArtifactKind;
  generated_at: string;
  collection_count: number;
  tour_count: number;
  collections: Collection[];
}

export interface AuthContext {
  userId: string;
  token: string;
  displayName: string;
}

export type TourFilter = 'all' | 'recorded' | 'planned';
