/**
 * Generic CRUD and list operations on one helpdesk resource collection
 * (Tickets, Companies, Contacts, ...).
 */

import { logger } from '../../lib/logger.js';
import { ApiError } from './errors.js';
import { toListQuery } from './filters.js';
import type { HelpdeskClient } from './client.js';
import {
  ListEnvelopeSchema,
  type ListParams,
  type ListResult,
  type ResourceId,
  type Schema,
} from './types.js';

const RESOURCE_NAME = /^[A-Za-z][A-Za-z0-9_]*$/;

const DEFAULT_MAX_PAGES = 50;

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ListAllOptions extends CallOptions {
  /** Stop after this many pages even if more are available (default 50) */
  maxPages?: number;
}

/**
 * Validates a payload against a schema.
 *
 * @throws ApiError (Unknown, INVALID_RESPONSE) on mismatch
 */
export function parsePayload<T>(schema: Schema<T>, payload: unknown, path: string): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const details: Record<string, unknown> = {};
    for (const issue of result.error.errors) {
      details[issue.path.join('.') || 'body'] = issue.message;
    }
    logger.error('Helpdesk API response failed validation', { path, details });
    throw new ApiError({
      kind: 'Unknown',
      code: 'INVALID_RESPONSE',
      message: `Unexpected response shape from ${path}`,
      details,
    });
  }
  return result.data;
}

/**
 * Typed access to one resource collection.
 *
 * Obtain instances through `HelpdeskClient.resource()`.
 */
export class ResourceClient<T> {
  readonly name: string;
  private readonly client: HelpdeskClient;
  private readonly schema: Schema<T>;

  constructor(client: HelpdeskClient, name: string, schema: Schema<T>) {
    if (!RESOURCE_NAME.test(name)) {
      throw new ApiError({
        kind: 'Validation',
        code: 'INVALID_RESOURCE',
        message: `Invalid resource name: ${JSON.stringify(name)}`,
      });
    }
    this.client = client;
    this.name = name;
    this.schema = schema;
  }

  /**
   * Lists one page of records.
   *
   * @throws ApiError (Validation, INVALID_PARAMS) before any request when
   *   `page` or `pageSize` is out of range
   */
  async list(params: ListParams = {}, options: CallOptions = {}): Promise<ListResult<T>> {
    const query = toListQuery(params);
    const path = this.collectionPath();

    const envelope = await this.client.request(
      { method: 'GET', path, query },
      { signal: options.signal, schema: ListEnvelopeSchema }
    );

    return {
      items: envelope.items.map((item, index) =>
        parsePayload(this.schema, item, `${path}[${index}]`)
      ),
      pageDetails: envelope.pageDetails,
    };
  }

  /**
   * Follows `pageDetails.nextPage` from `params.page` (default 1) and
   * concatenates the items.
   */
  async listAll(params: ListParams = {}, options: ListAllOptions = {}): Promise<T[]> {
    const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    const items: T[] = [];
    let page: number | null = params.page ?? 1;
    let pagesRead = 0;

    while (page !== null && pagesRead < maxPages) {
      const result: ListResult<T> = await this.list(
        { ...params, page },
        { signal: options.signal }
      );
      items.push(...result.items);
      pagesRead++;
      page = result.pageDetails.nextPage;
    }

    if (page !== null) {
      logger.warn('listAll stopped at page limit', {
        resource: this.name,
        maxPages,
        nextPage: page,
      });
    }

    return items;
  }

  async get(id: ResourceId, options: CallOptions = {}): Promise<T> {
    return this.client.request(
      { method: 'GET', path: this.recordPath(id) },
      { signal: options.signal, schema: this.schema }
    );
  }

  async create(body: Record<string, unknown>, options: CallOptions = {}): Promise<T> {
    return this.client.request(
      { method: 'POST', path: this.collectionPath(), body },
      { signal: options.signal, schema: this.schema }
    );
  }

  /**
   * Partially updates a record (PATCH); only the given fields change.
   */
  async update(
    id: ResourceId,
    patch: Record<string, unknown>,
    options: CallOptions = {}
  ): Promise<T> {
    return this.client.request(
      { method: 'PATCH', path: this.recordPath(id), body: patch },
      { signal: options.signal, schema: this.schema }
    );
  }

  async delete(id: ResourceId, options: CallOptions = {}): Promise<void> {
    await this.client.request(
      { method: 'DELETE', path: this.recordPath(id) },
      { signal: options.signal }
    );
  }

  private collectionPath(): string {
    return `/${this.name}`;
  }

  private recordPath(id: ResourceId): string {
    return `/${this.name}/${encodeURIComponent(String(id))}`;
  }
}
