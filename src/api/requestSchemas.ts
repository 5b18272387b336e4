// Request body schemas shared by the API routers

import { z } from 'zod';
import { collectionSchema } from '../services/artifactSchema.js';
import type { GpxOptions } from '../types/jobs.js';

const emptyToUndefined = (value: unknown) => (value === '' || value === null ? undefined : value);

const optionalEmail = z.preprocess(emptyToUndefined, z.string().email('Invalid email address').optional());
const optionalPassword = z.preprocess(emptyToUndefined, z.string().optional());

export const credentialsSchema = z.object({
  email: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

const gpxOptionFields = {
  noPoi: z.boolean().default(false),
  skipExisting: z.boolean().default(true),
  idFilename: z.boolean().default(false),
  addDate: z.boolean().default(false),
  maxTitleLength: z.coerce.number().int().min(-1).default(-1),
  maxDescLength: z.coerce.number().int().min(-1).default(-1),
  downloadImages: z.boolean().default(false),
};

export const startToursSchema = z
  .object({
    anonymous: z.boolean().default(false),
    email: optionalEmail,
    password: optionalPassword,
    tourSelection: z.union([z.string(), z.array(z.union([z.string(), z.number()]))]).default('all'),
    filterType: z.enum(['all', 'recorded', 'planned']).default('all'),
    chunkSize: z.coerce.number().int().min(0).default(0),
    chunkStart: z.coerce.number().int().min(0).default(0),
    ...gpxOptionFields,
  })
  .superRefine((body, ctx) => {
    if (body.anonymous && (body.email || body.password)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Anonymous mode does not take credentials' });
    }
    if (!body.anonymous && (!body.email || !body.password)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Email and password are required unless running anonymously' });
    }
  });

export const publicCollectionsSchema = z
  .object({
    urls: z.array(z.string().url('Invalid collection URL')).optional(),
    url: z.string().url('Invalid collection URL').optional(),
  })
  .transform(body => [...(body.urls ?? []), ...(body.url ? [body.url] : [])])
  .refine(urls => urls.length > 0, { message: 'At least one collection URL is required' });

export const enhanceSchema = z.object({
  userId: z.union([z.string().min(1), z.number()]).transform(String),
});

export const downloadCollectionToursSchema = z.object({
  collections: z.array(collectionSchema).min(1, 'At least one collection is required'),
  userId: z.union([z.string().min(1), z.number()]).transform(String).optional(),
  ...gpxOptionFields,
});

export function toGpxOptions(body: {
  noPoi: boolean;
  skipExisting: boolean;
  idFilename: boolean;
  addDate: boolean;
  maxTitleLength: number;
  maxDescLength: number;
}): GpxOptions {
  return {
    includePoi: !body.noPoi,
    skipExisting: body.skipExisting,
    idFilename: body.idFilename,
    addDate: body.addDate,
    maxTitleLength: body.maxTitleLength,
    maxDescLength: body.maxDescLength,
  };
}

/**
 * "all", or tour ids / tour URLs separated by commas or whitespace.
 * Keeps the supplied order, drops repeats.
 */
export function parseTourSelection(selection: string | Array<string | number>): string[] | 'all' {
  const tokens = typeof selection === 'string'
    ? selection.split(/[\s,;]+/).filter(token => token.length > 0)
    : selection.map(String);

  if (tokens.length === 0 || (tokens.length === 1 && tokens[0].toLowerCase() === 'all')) {
    return 'all';
  }

  const ids: string[] = [];
  for (const token of tokens) {
    const id = /^\d+$/.test(token) ? token : token.match(/\/tour\/(\d+)/)?.[1];
    if (!id) {
      throw new z.ZodError([{ code: z.ZodIssueCode.custom, path: ['tourSelection'], message: `Invalid tour id: ${token}` }]);
    }
    if (!ids.includes(id)) ids.push(id);
  }
  return ids;
}
