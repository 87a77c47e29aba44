/**
 * fritzlog — Configuration
 *
 * 優先度 (低 → 高): デフォルト値 < 設定ファイル (JSON) < 環境変数
 *
 * 設定ファイルは FRITZLOG_SETTINGS、未指定ならカレントディレクトリの settings.json。
 * 明示指定したファイルが存在しない場合はエラー。デフォルトの settings.json がない場合は
 * FRITZLOG_USERNAME / FRITZLOG_PASSWORD のどちらかが必要。
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';
import type { ExclusionRule } from './types/entities.js';

export const DEFAULT_SETTINGS_FILE = 'settings.json';

const exclusionRuleSchema = z.union([
  z.string().min(1),
  z.array(z.string().min(1)).min(1, 'conjunction rules need at least one substring'),
]);

const settingsSchema = z.object({
  url: z.string().url().default('http://fritz.box'),
  username: z.string().default(''),
  password: z.string().default(''),
  exclude: z.array(exclusionRuleSchema).default([]),
  logpath: z.string().min(1).default('fritzLog.csv'),
  store: z.enum(['csv', 'sqlite']).default('csv'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  logPretty: z.boolean().default(false),
  timeoutMs: z.number().int().positive().default(10_000),
});

export interface AppConfig {
  readonly url: string;
  readonly username: string;
  readonly password: string;
  readonly exclude: readonly ExclusionRule[];
  readonly logpath: string;
  readonly store: 'csv' | 'sqlite';
  readonly logLevel: (typeof LOG_LEVELS)[number];
  readonly logPretty: boolean;
  readonly timeoutMs: number;
  /** 読み込んだ設定ファイル (なければ undefined) */
  readonly settingsFile?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSettingsFile(file: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Cannot read settings file ${file}: ${detail}`);
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Settings file ${file} must contain a JSON object`);
  }
  return raw;
}

function parseBoolean(value: string, name: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${value}"`);
}

function parseInteger(value: string, name: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  return Number(value.trim());
}

/** 環境変数から設定値の上書きを取り出す。 */
function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const strings: Array<[string, string]> = [
    ['FRITZLOG_URL', 'url'],
    ['FRITZLOG_USERNAME', 'username'],
    ['FRITZLOG_PASSWORD', 'password'],
    ['FRITZLOG_LOGPATH', 'logpath'],
    ['FRITZLOG_STORE', 'store'],
    ['FRITZLOG_LOG_LEVEL', 'logLevel'],
  ];
  for (const [name, key] of strings) {
    const value = env[name];
    if (value !== undefined) overrides[key] = value;
  }

  const pretty = env['FRITZLOG_LOG_PRETTY'];
  if (pretty !== undefined) overrides['logPretty'] = parseBoolean(pretty, 'FRITZLOG_LOG_PRETTY');

  const timeout = env['FRITZLOG_TIMEOUT_MS'];
  if (timeout !== undefined) overrides['timeoutMs'] = parseInteger(timeout, 'FRITZLOG_TIMEOUT_MS');

  return overrides;
}

/**
 * 設定を読み込み、検証済みの不変オブジェクトを返す。
 *
 * @throws ConfigError 設定ファイルが読めない・値が不正・認証情報の出どころがない場合
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const explicitFile = env['FRITZLOG_SETTINGS'];
  const settingsFile = path.resolve(cwd, explicitFile ?? DEFAULT_SETTINGS_FILE);

  let fromFile: Record<string, unknown> = {};
  let loadedFile: string | undefined;
  if (fs.existsSync(settingsFile)) {
    fromFile = readSettingsFile(settingsFile);
    loadedFile = settingsFile;
  } else if (explicitFile !== undefined) {
    throw new ConfigError(`Settings file not found: ${settingsFile}`);
  }

  const result = settingsSchema.safeParse({ ...fromFile, ...envOverrides(env) });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  // 設定ファイルも認証情報の環境変数もなければ起動しない
  if (
    loadedFile === undefined &&
    env['FRITZLOG_USERNAME'] === undefined &&
    env['FRITZLOG_PASSWORD'] === undefined
  ) {
    throw new ConfigError(
      `No ${DEFAULT_SETTINGS_FILE} found in ${cwd}: copy settings.example.json to ${DEFAULT_SETTINGS_FILE} ` +
        'or set FRITZLOG_USERNAME and FRITZLOG_PASSWORD',
    );
  }

  const config: AppConfig = {
    ...result.data,
    exclude: Object.freeze(
      result.data.exclude.map((rule) => (typeof rule === 'string' ? rule : Object.freeze(rule))),
    ),
    ...(loadedFile !== undefined ? { settingsFile: loadedFile } : {}),
  };
  return Object.freeze(config);
}
