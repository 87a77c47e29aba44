/**
 * fritzlog — MCP Query Tool
 *
 * Read-only access to the persisted event log.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { EventLogStore } from '../../store/types.js';

export function registerQueryTool(server: McpServer, store: EventLogStore): void {
  server.tool(
    'query_event_log',
    'Query persisted router event log entries (oldest first). All filters are optional.',
    {
      since: z.number().int().optional().describe('Only entries at or after this epoch second'),
      until: z.number().int().optional().describe('Only entries at or before this epoch second'),
      contains: z.string().optional().describe('Substring the message must contain'),
      code: z.string().optional().describe('Exact event code'),
      limit: z.number().int().min(1).optional().describe('Return only the newest N matches'),
    },
    async ({ since, until, contains, code, limit }) => {
      try {
        const entries = store.query({ since, until, contains, code, limit });
        return { content: [{ type: 'text', text: JSON.stringify(entries, null, 2) }] };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { content: [{ type: 'text', text: `Query failed: ${message}` }], isError: true };
      }
    },
  );
}
