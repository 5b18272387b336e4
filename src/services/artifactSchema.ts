// Validation of collection artifacts read back from disk

import { z } from 'zod';

function opt<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const idSchema = z.union([z.string(), z.number()]).transform(String);

const trackPointSchema = z.object({
  lat: z.number(),
  lon: z.number(),
  elevation: opt(z.number()),
  timestamp: opt(z.string()),
});

const poiSchema = z.object({
  id: opt(idSchema),
  name: z.string(),
  lat: z.number(),
  lon: z.number(),
  category: opt(z.string()),
  description: opt(z.string()),
});

const highlightSchema = z.object({
  id: idSchema,
  name: z.string(),
  lat: opt(z.number()),
  lon: opt(z.number()),
  tips: z.array(z.string()).default([]),
  images: z.array(z.string()).default([]),
});

export const tourSchema = z.object({
  id: idSchema,
  name: opt(z.string()),
  url: opt(z.string()),
  date: opt(z.string()),
  type: opt(z.enum(['recorded', 'planned'])),
  sport: opt(z.string()),
  distance_km: opt(z.number()),
  duration: opt(z.number()),
  elevation_up: opt(z.number()),
  elevation_down: opt(z.number()),
  high_point: opt(z.number()),
  unpaved_percentage: opt(z.number()),
  singletrack_percentage: opt(z.number()),
  rideable_percentage: opt(z.number()),
  region: opt(z.string()),
  description: opt(z.string()),
  image_url: opt(z.string()),
  creator: opt(z.string()),
  track_points: opt(z.array(trackPointSchema)),
  pois: opt(z.array(poiSchema)),
  highlights: opt(z.array(highlightSchema)),
  images: opt(z.array(z.string())),
});

export const collectionSchema = z.object({
  id: opt(idSchema),
  slug: opt(z.string()),
  name: z.string(),
  url: opt(z.string()),
  description: opt(z.string()),
  cover_image: opt(z.string()),
  creator: opt(z.object({ id: opt(idSchema), name: opt(z.string()) })),
  type: opt(z.enum(['personal', 'saved', 'public', 'virtual'])),
  expected_tour_count: opt(z.number()),
  tours: z.array(tourSchema).default([]),
  is_enhanced: z.boolean().default(false),
});

export const artifactSchema = z.object({
  user_id: idSchema,
  kind: z.enum(['basic', 'enhanced']),
  generated_at: z.string(),
  collection_count: z.number(),
  tour_count: z.number(),
  collections: z.array(collectionSchema),
});

/**
 * Accepts the aggregate artifact, or a bare array of collections
 */
export const artifactFileSchema = z.union([artifactSchema, z.array(collectionSchema)]);
