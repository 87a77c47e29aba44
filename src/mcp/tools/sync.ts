/**
 * fritzlog — MCP Sync Tool
 *
 * Logs in to the router and appends new event log entries to the store.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { describeSyncError, syncEventLog } from '../../engine/sync.js';
import type { McpServerDeps } from '../server.js';

export function registerSyncTool(server: McpServer, deps: McpServerDeps): void {
  server.tool(
    'sync_event_log',
    'Log in to the router, fetch its event log and append entries newer than the last persisted one',
    async () => {
      const result = await syncEventLog(deps.config, {
        transport: deps.transport,
        store: deps.store,
        clock: deps.clock,
        logger: deps.logger,
      });

      if (result.isErr()) {
        return {
          content: [{ type: 'text', text: `Sync failed: ${describeSyncError(result.error)}` }],
          isError: true,
        };
      }

      const { fetched, appended, lastTimestamp } = result.value;
      const summary = [
        `Fetched ${fetched} entries from ${deps.config.url}`,
        `Appended ${appended} new entries to the ${deps.store.kind} store`,
        `Last timestamp: ${lastTimestamp}`,
      ].join('\n');
      return { content: [{ type: 'text', text: summary }] };
    },
  );
}
