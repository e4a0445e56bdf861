/**
 * MCP Tools: Helpdesk Records
 *
 * Generic tools over any resource collection (Tickets, Companies, Contacts, ...):
 * - List with search, filters and pagination
 * - Get a single record by id
 * - Create, update and delete (preview unless confirm=true)
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  FILTER_OPERATORS,
  MAX_PAGE_SIZE,
  type HelpdeskClient,
} from '../../services/helpdesk/index.js';
import { logger } from '../../lib/logger.js';
import { handleToolError } from './error-handler.js';

const resourceParam = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_]*$/, 'resource must be a collection name such as "Tickets"')
  .describe('Resource collection, e.g. "Tickets", "Companies", "Contacts"');

const idParam = z.union([z.string().min(1), z.number().int()]).describe('Record ID');

const dataParam = z
  .record(z.unknown())
  .describe('Record fields as a JSON object');

const confirmParam = (action: string) =>
  z
    .boolean()
    .default(false)
    .describe(`Set to true to ${action}. False returns a preview.`);

function jsonResult(value: unknown): { content: { type: 'text'; text: string }[] } {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(value),
      },
    ],
  };
}

function singular(resource: string): string {
  return resource.endsWith('s') ? resource.slice(0, -1) : resource;
}

/**
 * Registers record MCP tools with the server.
 *
 * @param server - The MCP server instance
 * @param client - The helpdesk API client
 */
export function registerRecordTools(server: McpServer, client: HelpdeskClient): void {
  // helpdesk_list_records
  server.tool(
    'helpdesk_list_records',
    'List records of a resource collection with optional full-text search, filter conditions, sorting and pagination. Returns items and pageDetails (count, nextPage).',
    {
      resource: resourceParam,
      search: z.string().optional().describe('Full-text search term'),
      active: z.boolean().optional().describe('Only active (true) or inactive (false) records'),
      filter: z
        .string()
        .optional()
        .describe('Raw filter expression, e.g. "status eq \'Open\'". Ignored when conditions is set.'),
      conditions: z
        .array(
          z.object({
            field: z.string(),
            op: z.enum(FILTER_OPERATORS),
            value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
          })
        )
        .optional()
        .describe('Filter conditions combined with "and"'),
      sort: z.string().optional().describe('Field to sort by'),
      order: z.enum(['asc', 'desc']).optional().describe('Sort order'),
      fields: z.array(z.string()).optional().describe('Fields to return'),
      page: z.number().int().optional().describe('Page number (starts at 1)'),
      page_size: z
        .number()
        .int()
        .optional()
        .describe(`Records per page (1-${MAX_PAGE_SIZE}, default 25)`),
    },
    async (params) => {
      logger.debug('helpdesk_list_records tool called', { params });

      try {
        const result = await client.resource(params.resource).list({
          search: params.search,
          active: params.active,
          filter: params.conditions ?? params.filter,
          sort: params.sort,
          order: params.order,
          fields: params.fields,
          page: params.page,
          pageSize: params.page_size,
        });

        return jsonResult({
          resource: params.resource,
          items: result.items,
          pageDetails: result.pageDetails,
        });
      } catch (error) {
        return handleToolError(error, 'helpdesk_list_records', params.resource);
      }
    }
  );

  // helpdesk_get_record
  server.tool(
    'helpdesk_get_record',
    'Get a single record of a resource collection by ID.',
    {
      resource: resourceParam,
      id: idParam,
    },
    async (params) => {
      logger.debug('helpdesk_get_record tool called', { params });

      try {
        const record = await client.resource(params.resource).get(params.id);
        return jsonResult(record);
      } catch (error) {
        return handleToolError(
          error,
          'helpdesk_get_record',
          `${singular(params.resource)} ${params.id}`
        );
      }
    }
  );

  // helpdesk_create_record
  server.tool(
    'helpdesk_create_record',
    'Create a record in a resource collection. Use confirm=true to execute, otherwise returns preview.',
    {
      resource: resourceParam,
      data: dataParam,
      confirm: confirmParam('create the record'),
    },
    async (params) => {
      logger.debug('helpdesk_create_record tool called', { resource: params.resource });

      try {
        if (!params.confirm) {
          return jsonResult({
            preview: true,
            message: 'This is a preview. Set confirm=true to create the record.',
            resource: params.resource,
            data: params.data,
          });
        }

        const record = await client.resource(params.resource).create(params.data);
        return jsonResult({
          success: true,
          message: `${singular(params.resource)} ${record.id} created successfully.`,
          record,
        });
      } catch (error) {
        return handleToolError(error, 'helpdesk_create_record', params.resource);
      }
    }
  );

  // helpdesk_update_record
  server.tool(
    'helpdesk_update_record',
    'Update fields of an existing record (only the given fields change). Use confirm=true to execute, otherwise returns preview.',
    {
      resource: resourceParam,
      id: idParam,
      data: dataParam,
      confirm: confirmParam('update the record'),
    },
    async (params) => {
      logger.debug('helpdesk_update_record tool called', {
        resource: params.resource,
        id: params.id,
      });

      try {
        if (!params.confirm) {
          return jsonResult({
            preview: true,
            message: 'This is a preview. Set confirm=true to update the record.',
            resource: params.resource,
            id: params.id,
            updates: params.data,
          });
        }

        const record = await client.resource(params.resource).update(params.id, params.data);
        return jsonResult({
          success: true,
          message: `${singular(params.resource)} ${params.id} updated successfully.`,
          record,
        });
      } catch (error) {
        return handleToolError(
          error,
          'helpdesk_update_record',
          `${singular(params.resource)} ${params.id}`
        );
      }
    }
  );

  // helpdesk_delete_record
  server.tool(
    'helpdesk_delete_record',
    'Delete a record by ID. Use confirm=true to execute, otherwise returns preview.',
    {
      resource: resourceParam,
      id: idParam,
      confirm: confirmParam('delete the record'),
    },
    async (params) => {
      logger.debug('helpdesk_delete_record tool called', {
        resource: params.resource,
        id: params.id,
      });

      try {
        if (!params.confirm) {
          return jsonResult({
            preview: true,
            message: 'This is a preview. Set confirm=true to delete the record.',
            resource: params.resource,
            id: params.id,
          });
        }

        await client.resource(params.resource).delete(params.id);
        return jsonResult({
          success: true,
          message: `${singular(params.resource)} ${params.id} deleted successfully.`,
        });
      } catch (error) {
        return handleToolError(
          error,
          'helpdesk_delete_record',
          `${singular(params.resource)} ${params.id}`
        );
      }
    }
  );

  logger.info('Record tools registered');
}
