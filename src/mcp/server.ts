/**
 * fritzlog — MCP Server
 *
 * Creates and configures the MCP server with the event log tools.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { HttpTransport } from '../http/transport.js';
import type { Clock } from '../engine/clock.js';
import type { SyncConfig } from '../engine/sync.js';
import type { Logger } from '../logger.js';
import type { EventLogStore } from '../store/types.js';
import { registerSyncTool } from './tools/sync.js';
import { registerQueryTool } from './tools/query.js';

export interface McpServerDeps {
  config: SyncConfig;
  transport: HttpTransport;
  store: EventLogStore;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Create a fully configured MCP server with all fritzlog tools.
 *
 * @param deps - Router configuration, transport and the opened store
 * @returns Configured McpServer instance
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const server = new McpServer({
    name: 'fritzlog',
    version: '0.1.0',
  });

  registerSyncTool(server, deps);
  registerQueryTool(server, deps.store);

  return server;
}
