/**
 * Integration tests for the record MCP tools.
 *
 * Tests the following tools:
 * - helpdesk_list_records
 * - helpdesk_get_record
 * - helpdesk_create_record / helpdesk_update_record / helpdesk_delete_record
 *   (preview and confirm modes)
 * - helpdesk_ping
 *
 * Uses vitest-fetch-mock for both the token endpoint and the helpdesk API.
 */

// Set fake environment variables before importing app
process.env.HELPDESK_CLIENT_ID = 'test-client';
process.env.HELPDESK_CLIENT_SECRET = 'test-secret';
process.env.HELPDESK_BASE_URL = 'https://api.helpdesk.test/v1';
process.env.HELPDESK_MAX_RETRIES = '1';

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import createFetchMock from 'vitest-fetch-mock';
import request from 'supertest';
import { app, transports } from '../../app.js';
import { resetHelpdeskClient } from '../../services/helpdesk/index.js';

const fetchMocker = createFetchMock(vi);
const MCP_ACCEPT_HEADER = 'application/json, text/event-stream';
const BASE_URL = 'https://api.helpdesk.test/v1';

const TOKEN_BODY = JSON.stringify({
  access_token: 'token-1',
  token_type: 'Bearer',
  expires_in: 3600,
});

/**
 * Parse SSE (Server-Sent Events) response text to extract JSON data.
 * SSE format: "event: message\ndata: {...}\n\n"
 */
function parseSSEResponse(text: string): Record<string, unknown> | null {
  const lines = text.split('\n');
  for (const line of lines) {
    if (line.startsWith('data: ')) {
      try {
        return JSON.parse(line.slice(6));
      } catch {
        return null;
      }
    }
  }
  return null;
}

/**
 * Helper to initialize an MCP session and return the session ID.
 */
async function initializeSession(): Promise<string> {
  await request(app)
    .post('/mcp')
    .set('Accept', MCP_ACCEPT_HEADER)
    .send({
      jsonrpc: '2.0',
      method: 'initialize',
      params: {
        protocolVersion: '2025-03-26',
        capabilities: {},
        clientInfo: {
          name: 'test-client',
          version: '1.0.0',
        },
      },
      id: 1,
    });

  // Wait a tick for async session initialization
  await new Promise((resolve) => setTimeout(resolve, 10));

  const sessionIds = Array.from(transports.keys());
  return sessionIds[sessionIds.length - 1];
}

/**
 * Helper to call an MCP tool and return the parsed result.
 * Returns { result, isError } where isError indicates if the tool returned an error response.
 */
async function callTool(
  sessionId: string,
  toolName: string,
  args: Record<string, unknown>
): Promise<{ result?: unknown; isError?: boolean; error?: unknown }> {
  // Send initialized notification
  await request(app)
    .post('/mcp')
    .set('Accept', MCP_ACCEPT_HEADER)
    .set('mcp-session-id', sessionId)
    .send({
      jsonrpc: '2.0',
      method: 'notifications/initialized',
    });

  const response = await request(app)
    .post('/mcp')
    .set('Accept', MCP_ACCEPT_HEADER)
    .set('mcp-session-id', sessionId)
    .send({
      jsonrpc: '2.0',
      method: 'tools/call',
      params: {
        name: toolName,
        arguments: args,
      },
      id: 2,
    });

  const data = parseSSEResponse(response.text);
  if (!data) {
    return { error: 'Failed to parse SSE response' };
  }

  if (data.error) {
    return { error: data.error };
  }

  const result = data.result as Record<string, unknown>;
  if (result?.content) {
    const content = result.content as Array<{ type: string; text: string }>;
    const isError = result.isError === true;
    if (content[0]?.text) {
      try {
        return { result: JSON.parse(content[0].text), isError };
      } catch {
        // Error messages are plain text, not JSON
        return { result: content[0].text, isError };
      }
    }
  }

  return { result };
}

function urlOf(index: number): string {
  return String(fetchMocker.mock.calls[index][0]);
}

describe('Record Tools', () => {
  beforeEach(() => {
    fetchMocker.enableMocks();
    fetchMocker.resetMocks();
    transports.clear();
    resetHelpdeskClient();
  });

  afterEach(() => {
    fetchMocker.disableMocks();
  });

  describe('helpdesk_ping', () => {
    it('returns pong with client statistics', async () => {
      const sessionId = await initializeSession();
      const { result } = await callTool(sessionId, 'helpdesk_ping', {});

      expect(result).toEqual({
        pong: true,
        stats: { requests: 0, retries: 0, tokenRefreshes: 0, inFlight: 0, queued: 0 },
      });
      expect(fetchMocker.mock.calls).toHaveLength(0);
    });
  });

  describe('helpdesk_list_records', () => {
    it('lists records with conditions and page size', async () => {
      fetchMocker.mockResponseOnce(TOKEN_BODY);
      fetchMocker.mockResponseOnce(
        JSON.stringify({
          items: [
            { id: 1, title: 'Printer on fire', status: 'Open' },
            { id: 2, title: 'VPN down', status: 'Open' },
          ],
          pageDetails: { count: 12, requestCount: 2, nextPage: 2 },
        })
      );

      const sessionId = await initializeSession();
      const { result, isError } = await callTool(sessionId, 'helpdesk_list_records', {
        resource: 'Tickets',
        conditions: [{ field: 'status', op: 'eq', value: 'Open' }],
        page_size: 10,
      });

      expect(isError).toBe(false);
      expect(result).toEqual({
        resource: 'Tickets',
        items: [
          { id: 1, title: 'Printer on fire', status: 'Open' },
          { id: 2, title: 'VPN down', status: 'Open' },
        ],
        pageDetails: { count: 12, requestCount: 2, prevPage: null, nextPage: 2 },
      });
      expect(urlOf(0)).toBe(`${BASE_URL}/oauth/token`);
      expect(urlOf(1)).toBe(`${BASE_URL}/Tickets?pageSize=10&filter=status+eq+%27Open%27`);
      expect(new Headers(fetchMocker.mock.calls[1][1]?.headers).get('authorization')).toBe(
        'Bearer token-1'
      );
    });

    it('passes a raw filter string through', async () => {
      fetchMocker.mockResponseOnce(TOKEN_BODY);
      fetchMocker.mockResponseOnce(
        JSON.stringify({ items: [], pageDetails: { count: 0, requestCount: 0 } })
      );

      const sessionId = await initializeSession();
      await callTool(sessionId, 'helpdesk_list_records', {
        resource: 'Companies',
        filter: "name startswith 'Acme'",
        search: 'acme',
      });

      expect(urlOf(1)).toBe(
        `${BASE_URL}/Companies?search=acme&pageSize=25&filter=name+startswith+%27Acme%27`
      );
    });

    it('rejects an oversized page without calling the API', async () => {
      const sessionId = await initializeSession();
      const { result, isError } = await callTool(sessionId, 'helpdesk_list_records', {
        resource: 'Tickets',
        page_size: 500,
      });

      expect(isError).toBe(true);
      expect(result).toContain('pageSize cannot exceed 100');
      expect(fetchMocker.mock.calls).toHaveLength(0);
    });
  });

  describe('helpdesk_get_record', () => {
    it('returns the record', async () => {
      fetchMocker.mockResponseOnce(TOKEN_BODY);
      fetchMocker.mockResponseOnce(JSON.stringify({ id: 7, title: 'Printer on fire' }));

      const sessionId = await initializeSession();
      const { result } = await callTool(sessionId, 'helpdesk_get_record', {
        resource: 'Tickets',
        id: 7,
      });

      expect(result).toEqual({ id: 7, title: 'Printer on fire' });
      expect(urlOf(1)).toBe(`${BASE_URL}/Tickets/7`);
    });

    it('returns a not-found message for 404', async () => {
      fetchMocker.mockResponseOnce(TOKEN_BODY);
      fetchMocker.mockResponseOnce(
        JSON.stringify({ error: { code: 'NOT_FOUND', message: 'Ticket 7 not found' } }),
        { status: 404 }
      );

      const sessionId = await initializeSession();
      const { result, isError } = await callTool(sessionId, 'helpdesk_get_record', {
        resource: 'Tickets',
        id: 7,
      });

      expect(isError).toBe(true);
      expect(result).toBe(
        'The Ticket 7 was not found.\n\nSuggestion: Verify the ID or search criteria is correct.'
      );
    });

    it('reports rejected credentials', async () => {
      fetchMocker.mockResponseOnce(
        JSON.stringify({ error: { code: 'invalid_client', message: 'Unknown client' } }),
        { status: 401 }
      );

      const sessionId = await initializeSession();
      const { result, isError } = await callTool(sessionId, 'helpdesk_get_record', {
        resource: 'Tickets',
        id: 7,
      });

      expect(isError).toBe(true);
      expect(result).toContain('HELPDESK_CLIENT_ID and HELPDESK_CLIENT_SECRET');
      expect(fetchMocker.mock.calls).toHaveLength(1);
    });
  });

  describe('helpdesk_create_record', () => {
    it('returns a preview without calling the API by default', async () => {
      const sessionId = await initializeSession();
      const { result } = await callTool(sessionId, 'helpdesk_create_record', {
        resource: 'Tickets',
        data: { title: 'New laptop' },
      });

      expect(result).toEqual({
        preview: true,
        message: 'This is a preview. Set confirm=true to create the record.',
        resource: 'Tickets',
        data: { title: 'New laptop' },
      });
      expect(fetchMocker.mock.calls).toHaveLength(0);
    });

    it('creates the record with confirm=true', async () => {
      fetchMocker.mockResponseOnce(TOKEN_BODY);
      fetchMocker.mockResponseOnce(JSON.stringify({ id: 9, title: 'New laptop' }), {
        status: 201,
      });

      const sessionId = await initializeSession();
      const { result } = await callTool(sessionId, 'helpdesk_create_record', {
        resource: 'Tickets',
        data: { title: 'New laptop' },
        confirm: true,
      });

      expect(result).toEqual({
        success: true,
        message: 'Ticket 9 created successfully.',
        record: { id: 9, title: 'New laptop' },
      });
      const [input, init] = fetchMocker.mock.calls[1];
      expect(String(input)).toBe(`${BASE_URL}/Tickets`);
      expect(init?.method).toBe('POST');
      expect(JSON.parse(String(init?.body))).toEqual({ title: 'New laptop' });
    });

    it('surfaces API validation details', async () => {
      fetchMocker.mockResponseOnce(TOKEN_BODY);
      fetchMocker.mockResponseOnce(
        JSON.stringify({
          error: {
            code: 'FIELD_INVALID',
            message: 'Validation failed',
            details: { title: 'is required' },
          },
        }),
        { status: 422 }
      );

      const sessionId = await initializeSession();
      const { result, isError } = await callTool(sessionId, 'helpdesk_create_record', {
        resource: 'Tickets',
        data: {},
        confirm: true,
      });

      expect(isError).toBe(true);
      expect(result).toBe(
        'The helpdesk API rejected the request: Validation failed (title: is required)' +
          '\n\nSuggestion: Correct the request parameters and try again.'
      );
    });
  });

  describe('helpdesk_update_record', () => {
    it('previews the updates by default', async () => {
      const sessionId = await initializeSession();
      const { result } = await callTool(sessionId, 'helpdesk_update_record', {
        resource: 'Tickets',
        id: 9,
        data: { status: 'Closed' },
      });

      expect(result).toEqual({
        preview: true,
        message: 'This is a preview. Set confirm=true to update the record.',
        resource: 'Tickets',
        id: 9,
        updates: { status: 'Closed' },
      });
      expect(fetchMocker.mock.calls).toHaveLength(0);
    });

    it('sends a PATCH with confirm=true', async () => {
      fetchMocker.mockResponseOnce(TOKEN_BODY);
      fetchMocker.mockResponseOnce(JSON.stringify({ id: 9, status: 'Closed' }));

      const sessionId = await initializeSession();
      const { result } = await callTool(sessionId, 'helpdesk_update_record', {
        resource: 'Tickets',
        id: 9,
        data: { status: 'Closed' },
        confirm: true,
      });

      expect(result).toEqual({
        success: true,
        message: 'Ticket 9 updated successfully.',
        record: { id: 9, status: 'Closed' },
      });
      expect(fetchMocker.mock.calls[1][1]?.method).toBe('PATCH');
      expect(urlOf(1)).toBe(`${BASE_URL}/Tickets/9`);
    });
  });

  describe('helpdesk_delete_record', () => {
    it('previews the deletion by default', async () => {
      const sessionId = await initializeSession();
      const { result } = await callTool(sessionId, 'helpdesk_delete_record', {
        resource: 'Contacts',
        id: 'c-12',
      });

      expect(result).toEqual({
        preview: true,
        message: 'This is a preview. Set confirm=true to delete the record.',
        resource: 'Contacts',
        id: 'c-12',
      });
      expect(fetchMocker.mock.calls).toHaveLength(0);
    });

    it('deletes with confirm=true', async () => {
      fetchMocker.mockResponseOnce(TOKEN_BODY);
      fetchMocker.mockResponseOnce('');

      const sessionId = await initializeSession();
      const { result } = await callTool(sessionId, 'helpdesk_delete_record', {
        resource: 'Contacts',
        id: 'c-12',
        confirm: true,
      });

      expect(result).toEqual({
        success: true,
        message: 'Contact c-12 deleted successfully.',
      });
      expect(fetchMocker.mock.calls[1][1]?.method).toBe('DELETE');
      expect(urlOf(1)).toBe(`${BASE_URL}/Contacts/c-12`);
    });
  });
});
