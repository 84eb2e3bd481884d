import { z } from 'zod';
import { DEFAULT_TIMEOUT } from '../core/client.js';

/** Base endpoint of the public API. */
export const DEFAULT_BASE_URL = 'https://api.shipthis.co/api/v3/';

/** Upper bound on copies made by a single `createItem`. */
export const MAX_REPLICATE_COUNT = 100;

const collection = z
  .string()
  .min(3, 'must be at least 3 characters')
  .regex(/^[A-Za-z0-9_-]+$/, 'may only contain letters, digits, "_" and "-"');

const documentId = z.string().min(3, 'must be at least 3 characters');

const segment = z.string().min(1, 'cannot be empty');

const searchQuery = z.string().trim().min(1, 'cannot be empty');

const positiveInt = z.number().int('must be an integer').min(1, 'must be at least 1');

const actionIndex = z.number().int('must be an integer').min(0, 'must not be negative');

const sortField = z.object({
  field: segment,
  order: z.enum(['asc', 'desc']),
});

/** Settings accepted by the client constructor, defaults applied. */
export const clientPropsSchema = z.object({
  organisation: z.string().trim().min(1, 'is required'),
  apiKey: z.string().nullish(),
  userType: z.string().min(1, 'cannot be empty').default('employee'),
  regionId: z.string().nullish(),
  locationId: z.string().nullish(),
  timeout: positiveInt.default(DEFAULT_TIMEOUT),
  baseUrl: z.string().url('must be a valid URL').default(DEFAULT_BASE_URL),
});

/** Settings accepted by `config()`; nothing is defaulted. */
export const clientConfigSchema = clientPropsSchema.omit({ organisation: true, baseUrl: true }).partial();

export const documentArgs = z.object({ collection, id: documentId });

export const getOneItemArgs = z.object({ collection, id: documentId.optional() });

export const getListArgs = z.object({
  collection,
  page: positiveInt,
  count: positiveInt,
  searchQuery: searchQuery.optional(),
  sort: z.array(sortField).optional(),
});

export const searchArgs = z.object({ collection, query: searchQuery, page: positiveInt, count: positiveInt });

export const createItemArgs = z.object({
  collection,
  replicateCount: z
    .number()
    .int('must be an integer')
    .min(0, 'must not be negative')
    .transform((count) => Math.min(count, MAX_REPLICATE_COUNT)),
});

export const jobStatusArgs = documentArgs.extend({ actionIndex });

export const workflowArgs = z.object({ id: documentId });

export const reportViewArgs = z.object({
  reportName: segment,
  startDate: z.union([segment, z.number()]),
  endDate: z.union([segment, z.number()]),
});

export const exchangeRateArgs = z.object({
  source: segment,
  target: segment,
  date: z.number().int('must be an integer').nonnegative('must not be negative'),
});

export const referenceArgs = z.object({ reference: segment });

export const placeQueryArgs = z.object({ query: searchQuery });

export const placeDetailsArgs = z.object({ placeId: segment });

export const conversationArgs = z.object({ viewName: collection, documentId });

export const conversationListArgs = conversationArgs.extend({
  messageType: segment,
  page: positiveInt,
  count: positiveInt,
});

export const bulkEditArgs = z.object({
  collection,
  ids: z.array(documentId).min(1, 'must list at least one id'),
});

export const primaryWorkflowArgs = documentArgs.extend({
  workflowId: segment,
  actionIndex,
  intendedStateId: segment,
  startStateId: segment.optional(),
});

export const secondaryWorkflowArgs = documentArgs.extend({
  workflowId: segment,
  targetState: segment,
});

/** Payload of `user-auth/info`; the organisation itself is left unchecked. */
export const infoSchema = z.object({ organisation: z.record(z.unknown()) }).passthrough();

/** First region `connect()` reads; mistyped fields read as absent. */
export const regionSchema = z
  .object({
    region_id: z.string().nullish().catch(null),
    locations: z.array(z.unknown()).nullish().catch(null),
  })
  .passthrough();

/** First location of the selected region. */
export const locationSchema = z.object({ location_id: z.string().nullish().catch(null) }).passthrough();
