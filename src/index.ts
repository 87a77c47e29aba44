#!/usr/bin/env node
/**
 * fritzlog — FRITZ!Box event log exporter
 *
 * エントリポイント。
 *   fritzlog        ログインしてイベントログを 1 回同期する
 *   fritzlog serve  MCP サーバーを stdio トランスポートで起動する
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { AppConfig } from './config.js';
import { ConfigError, loadConfig } from './config.js';
import { describeSyncError, syncEventLog } from './engine/sync.js';
import { FetchTransport } from './http/transport.js';
import { createLogger } from './logger.js';
import { createMcpServer } from './mcp/server.js';
import type { EventLogStore } from './store/index.js';
import { openStore, StoreError } from './store/index.js';

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    // 設定が読めないので既定のロガーで出す
    createLogger({ level: 'info' }).error(e.message);
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });
  if (config.settingsFile === undefined) {
    logger.warn('No settings.json found; using environment variables and defaults');
  }

  let store: EventLogStore;
  try {
    store = openStore(config, logger);
  } catch (e) {
    if (!(e instanceof StoreError)) throw e;
    logger.error({ err: e.cause }, e.message);
    process.exitCode = 1;
    return;
  }

  const transport = new FetchTransport({ timeoutMs: config.timeoutMs });

  if (process.argv[2] === 'serve') {
    const server = createMcpServer({ config, transport, store, logger });
    await server.connect(new StdioServerTransport());
    logger.info({ store: store.kind, logpath: config.logpath }, 'MCP server listening on stdio');
    return;
  }

  try {
    const result = await syncEventLog(config, { transport, store, logger });
    if (result.isErr()) {
      logger.error({ kind: result.error.type }, describeSyncError(result.error));
      process.exitCode = 1;
    }
  } finally {
    store.close();
  }
}

await main();
