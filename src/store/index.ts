/**
 * fritzlog — Store selection
 */

import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { toError } from '../http/transport.js';
import { CsvEventStore } from './csv-store.js';
import { SqliteEventStore } from './sqlite-store.js';
import type { EventLogStore } from './types.js';
import { StoreError } from './types.js';

export type { EventLogStore, StoreKind } from './types.js';
export { StoreError } from './types.js';

/** 設定の store 種別に応じて logpath のストアを開く。 */
export function openStore(
  config: Pick<AppConfig, 'store' | 'logpath'>,
  logger?: Logger,
): EventLogStore {
  switch (config.store) {
    case 'csv':
      return new CsvEventStore(config.logpath, { logger });
    case 'sqlite':
      try {
        return SqliteEventStore.open(config.logpath, logger);
      } catch (e) {
        const cause = toError(e);
        throw new StoreError(`Cannot open SQLite store ${config.logpath}: ${cause.message}`, {
          cause,
        });
      }
    default: {
      const _exhaustive: never = config.store;
      throw new StoreError(`Unknown store: ${String(_exhaustive)}`);
    }
  }
}
