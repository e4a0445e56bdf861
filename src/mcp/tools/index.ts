/**
 * MCP Tool Registration
 *
 * Creates and configures the McpServer instance with registered tools.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from '../../lib/logger.js';
import { createHelpdeskClient } from '../../services/helpdesk/index.js';
import { registerRecordTools } from './records.js';

export const SERVER_NAME = 'helpdesk-mcp';
export const SERVER_VERSION = '0.1.0';

export const INSTRUCTIONS_URI = 'helpdesk://instructions';

/**
 * Brief server description shown during initialization.
 */
const SERVER_DESCRIPTION =
  'Helpdesk integration for tickets, companies, contacts and other resource collections. List, read, create, update and delete records. Read the helpdesk://instructions resource for usage guide.';

/**
 * Detailed instructions for LLMs, served as a resource.
 */
const INSTRUCTIONS_RESOURCE = `# Helpdesk MCP Server Instructions

This server gives access to the helpdesk REST API. Every tool works on a
resource collection named by the \`resource\` argument (for example
\`Tickets\`, \`Companies\`, \`Contacts\`, \`Resources\`).

## Available Tools

- **helpdesk_list_records**: List records with search, filters, sorting and pagination.
- **helpdesk_get_record**: Get one record by ID.
- **helpdesk_create_record**: Create a record from a JSON object.
- **helpdesk_update_record**: Change some fields of a record.
- **helpdesk_delete_record**: Delete a record.
- **helpdesk_ping**: Connectivity check.

## Filters

Pass \`conditions\` as a list of \`{ field, op, value }\` objects; they are
combined with "and". Operators: eq, ne, gt, lt, ge, le, contains,
startswith, endswith. String values are quoted for you.

Alternatively pass a raw \`filter\` string such as \`status eq 'Open'\`.

## Best Practices

1. **Write tools require confirm=true**: create/update/delete return a preview by default.
2. **Pagination**: page starts at 1; page_size is 1-100 (default 25). Follow pageDetails.nextPage.
3. **Rate limits**: the API allows 600 requests per minute and 3 at a time. The server queues
   and retries for you; a rate-limit error means the budget is exhausted, so wait before retrying.
`;

/**
 * Creates and returns a configured McpServer instance.
 *
 * The server is configured with:
 * - Server name and version for identification
 * - Instructions resource with detailed usage guide
 * - Ping tool for connectivity testing
 * - Record tools (list/get/create/update/delete)
 */
export function createMcpServer(): McpServer {
  logger.info('Creating MCP server instance');

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    description: SERVER_DESCRIPTION,
  });

  const client = createHelpdeskClient();

  server.resource(
    'instructions',
    INSTRUCTIONS_URI,
    {
      description: 'Usage guide for the helpdesk MCP server. Read this to understand available tools and filters.',
      mimeType: 'text/markdown',
    },
    async () => ({
      contents: [
        {
          uri: INSTRUCTIONS_URI,
          mimeType: 'text/markdown',
          text: INSTRUCTIONS_RESOURCE,
        },
      ],
    })
  );

  server.tool(
    'helpdesk_ping',
    'Test tool to verify MCP server is working. Returns "pong" with client statistics.',
    {},
    async () => {
      logger.debug('Ping tool called');
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({ pong: true, stats: client.getStats() }),
          },
        ],
      };
    }
  );

  registerRecordTools(server, client);

  logger.info('MCP server created with all tools registered');
  return server;
}
