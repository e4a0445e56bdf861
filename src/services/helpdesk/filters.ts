/**
 * Query-string helpers for list endpoints.
 *
 * Filters are transported, never evaluated: conditions are rendered to the
 * API's `field op value [and ...]` syntax and sent as the `filter` parameter.
 */

import {
  ListParamsSchema,
  type FilterCondition,
  type ListParams,
  type QueryValue,
} from './types.js';
import { ApiError } from './errors.js';

function formatValue(value: FilterCondition['value']): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'string') {
    return `'${value.replace(/'/g, "''")}'`;
  }
  return String(value);
}

/**
 * Renders conditions as `field op value` terms joined by ` and `.
 *
 * @example
 *   buildFilter([{ field: 'status', op: 'eq', value: 'Open' }, { field: 'priority', op: 'gt', value: 2 }])
 *   // "status eq 'Open' and priority gt 2"
 */
export function buildFilter(conditions: readonly FilterCondition[]): string {
  return conditions
    .map((condition) => `${condition.field} ${condition.op} ${formatValue(condition.value)}`)
    .join(' and ');
}

/**
 * Validates list parameters and converts them to query values.
 *
 * @throws ApiError (Validation, INVALID_PARAMS) when a parameter is out of range
 */
export function toListQuery(params: ListParams = {}): Record<string, QueryValue> {
  const result = ListParamsSchema.safeParse(params);

  if (!result.success) {
    const details: Record<string, unknown> = {};
    for (const issue of result.error.errors) {
      details[issue.path.join('.') || 'params'] = issue.message;
    }
    throw new ApiError({
      kind: 'Validation',
      code: 'INVALID_PARAMS',
      message: `Invalid list parameters: ${result.error.errors.map((e) => e.message).join('; ')}`,
      details,
    });
  }

  const { filter, fields, ...rest } = result.data;

  return {
    ...rest,
    filter: Array.isArray(filter) ? buildFilter(filter) || undefined : filter,
    fields: fields && fields.length > 0 ? fields.join(',') : undefined,
  };
}
