/**
 * Type definitions for the helpdesk REST API.
 *
 * Wire envelopes are declared as zod schemas and validated at the
 * transport boundary; resource bodies stay open-ended.
 */

import { z } from 'zod';

// =============================================================================
// Authentication
// =============================================================================

/**
 * Response of POST /oauth/token (client_credentials grant).
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('Bearer'),
  expires_in: z.coerce.number().positive(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

/**
 * Cached bearer token.
 */
export interface Token {
  accessToken: string;
  tokenType: string;
  /** Epoch milliseconds when the token was received */
  issuedAt: number;
  /** Lifetime in seconds, from expires_in */
  expiresIn: number;
}

// =============================================================================
// Requests
// =============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;

/**
 * One logical request, immutable across attempts.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  /** Path below the base URL, starting with '/' */
  readonly path: string;
  readonly query?: Readonly<Record<string, QueryValue>>;
  readonly body?: unknown;
}

/**
 * Successful transport response.
 */
export interface HttpResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON body, undefined when the body was empty */
  body: unknown;
}

// =============================================================================
// Error envelope
// =============================================================================

/**
 * Error body: { error: { code, message, details?, requestId?, retryAfter? } }
 *
 * A field with an unexpected type (null, an array of details) is dropped on
 * its own; the rest of the envelope is kept.
 */
export const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string().optional().catch(undefined),
    message: z.string().optional().catch(undefined),
    details: z.record(z.unknown()).optional().catch(undefined),
    requestId: z.string().optional().catch(undefined),
    retryAfter: z.number().nonnegative().optional().catch(undefined),
  }),
});

export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;

// =============================================================================
// Resources
// =============================================================================

/**
 * Server-assigned fields present on every resource; the rest passes through.
 */
export const ResourceRecordSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    createDate: z.string().optional(),
    lastModifiedDate: z.string().optional(),
  })
  .passthrough();

export type ResourceRecord = z.infer<typeof ResourceRecordSchema>;

/**
 * Any zod schema producing T from an unknown JSON value.
 */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type ResourceId = string | number;

/**
 * Pagination block of a list response.
 */
export const PageDetailsSchema = z.object({
  count: z.number().int().nonnegative(),
  requestCount: z.number().int().nonnegative(),
  prevPage: z.number().int().positive().nullable().optional().transform((v) => v ?? null),
  nextPage: z.number().int().positive().nullable().optional().transform((v) => v ?? null),
});

export type PageDetails = z.infer<typeof PageDetailsSchema>;

/**
 * List envelope: { items: [...], pageDetails: {...} }. Items are validated
 * one by one against the resource schema.
 */
export const ListEnvelopeSchema = z.object({
  items: z.array(z.unknown()),
  pageDetails: PageDetailsSchema,
});

export interface ListResult<T> {
  items: T[];
  pageDetails: PageDetails;
}

// =============================================================================
// List parameters
// =============================================================================

export const FILTER_OPERATORS = [
  'eq',
  'ne',
  'gt',
  'lt',
  'ge',
  'le',
  'contains',
  'startswith',
  'endswith',
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export const FilterConditionSchema = z.object({
  field: z.string().regex(/^[A-Za-z_][A-Za-z0-9_.]*$/, 'field must be an identifier'),
  op: z.enum(FILTER_OPERATORS),
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
});

/**
 * One `field op value` term. Terms are combined with `and`.
 */
export type FilterCondition = z.infer<typeof FilterConditionSchema>;

export const DEFAULT_PAGE_SIZE = 25;
export const MAX_PAGE_SIZE = 100;

/**
 * Query parameters accepted by list endpoints.
 */
export const ListParamsSchema = z.object({
  search: z.string().optional(),
  active: z.boolean().optional(),
  page: z.number().int().min(1, 'page must be at least 1').optional(),
  pageSize: z
    .number()
    .int()
    .min(1, 'pageSize must be at least 1')
    .max(MAX_PAGE_SIZE, `pageSize cannot exceed ${MAX_PAGE_SIZE}`)
    .default(DEFAULT_PAGE_SIZE),
  filter: z.union([z.string(), z.array(FilterConditionSchema)]).optional(),
  sort: z.string().optional(),
  order: z.enum(['asc', 'desc']).optional(),
  fields: z.array(z.string().min(1)).optional(),
});

export type ListParams = z.input<typeof ListParamsSchema>;
