// Payload schemas for the komoot JSON API. Unknown fields are ignored.

import { z } from 'zod';

/**
 * Optional field that may also arrive as null; parsed to `undefined`
 */
function opt<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const idSchema = z.union([z.string(), z.number()]).transform(String);

export const loginResponseSchema = z.object({
  username: idSchema,
  password: z.string().min(1),
  user: opt(z.object({ displayname: opt(z.string()) })),
});

export const tourSummarySchema = z.object({
  id: idSchema,
  name: opt(z.string()),
  sport: opt(z.string()),
  type: opt(z.string()),
  date: opt(z.string()),
  distance: opt(z.number()),
  duration: opt(z.number()),
  elevation_up: opt(z.number()),
  elevation_down: opt(z.number()),
});

export const toursPageSchema = z.object({
  _embedded: opt(z.object({ tours: z.array(tourSummarySchema) })),
  page: opt(z.object({
    totalPages: z.number(),
    number: opt(z.number()),
    totalElements: opt(z.number()),
  })),
});

const imageSchema = z.object({ src: z.string() });

const embeddedItems = <T extends z.ZodTypeAny>(item: T) =>
  opt(z.object({ _embedded: opt(z.object({ items: z.array(item) })) }));

const locationSchema = z.object({ lat: z.number(), lng: z.number() });

const timelineReferenceSchema = z.object({
  id: opt(idSchema),
  name: opt(z.string()),
  category: opt(z.string()),
  location: opt(locationSchema),
  mid_point: opt(locationSchema),
  front_image: opt(imageSchema),
  _embedded: opt(z.object({
    tips: embeddedItems(z.object({ text: opt(z.string()) })),
    images: embeddedItems(imageSchema),
    front_image: opt(imageSchema),
  })),
});

const timelineItemSchema = z.object({
  type: z.string(),
  _embedded: opt(z.object({ reference: opt(timelineReferenceSchema) })),
});

const amountItemSchema = z.object({ type: z.string(), amount: z.number() });

export const tourDetailSchema = tourSummarySchema.extend({
  map_image: opt(imageSchema),
  _embedded: opt(z.object({
    coordinates: opt(z.object({
      items: z.array(z.object({
        lat: z.number(),
        lng: z.number(),
        alt: opt(z.number()),
        t: opt(z.number()),
      })),
    })),
    timeline: embeddedItems(timelineItemSchema),
    surfaces: opt(z.object({ items: z.array(amountItemSchema) })),
    way_types: opt(z.object({ items: z.array(amountItemSchema) })),
    creator: opt(z.object({ display_name: opt(z.string()) })),
  })),
});

export type TourSummaryPayload = z.infer<typeof tourSummarySchema>;
export type TourDetailPayload = z.infer<typeof tourDetailSchema>;
export type TimelineReference = z.infer<typeof timelineReferenceSchema>;
