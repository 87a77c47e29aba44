/**
 * fritzlog — Logger
 *
 * pino ロガーの生成。MCP の stdio トランスポートが stdout を使うため、
 * ログは常に stderr に出す。
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  level: LogLevel;
  /** pino-pretty で整形する (開発用) */
  pretty?: boolean;
}

/** Create a pino logger writing to stderr. */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    level: config.level,
    base: { service: 'fritzlog' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
        },
      },
    });
  }

  return pino(options, pino.destination({ dest: 2, sync: true }));
}

/** ロガー未指定時に使う何も出力しないロガー */
export const silentLogger: Logger = pino({ level: 'silent' });

/** SID やチャレンジレスポンスをログに出すときに末尾 4 文字だけ残す。 */
export function redact(value: string): string {
  return value.length <= 4 ? '****' : `****${value.slice(-4)}`;
}
