/**
 * fritzlog — Login state fetcher
 *
 * login_sid.lua に GET してチャレンジとブロック時間を取得する。
 */

import { err, ok, type Result } from 'neverthrow';
import type { HttpResponse, HttpTransport } from '../http/transport.js';
import { isSuccess, toError } from '../http/transport.js';
import { parseSessionInfoXml } from '../parser/session-info-parser.js';
import type { SessionInfo } from '../parser/session-info-parser.js';
import type { ChallengeFetchError, LoginState } from '../types/engine.js';

export const LOGIN_SID_ROUTE = '/login_sid.lua?version=2';

const BLOCKTIME_REGEX = /^\d+$/;

/** ベース URL からログインエンドポイントの URL を組み立てる。末尾のスラッシュは除去する。 */
export function loginUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '') + LOGIN_SID_ROUTE;
}

function fetchFailed(message: string, cause?: Error): ChallengeFetchError {
  return cause !== undefined
    ? { type: 'challenge_fetch_failed', message, cause }
    : { type: 'challenge_fetch_failed', message };
}

/**
 * SessionInfo XML から LoginState を組み立てる。
 * Challenge が空・BlockTime が非負整数でない場合は失敗する。
 */
export function toLoginState(xml: string): Result<LoginState, ChallengeFetchError> {
  let info: SessionInfo;
  try {
    info = parseSessionInfoXml(xml);
  } catch (e) {
    const cause = toError(e);
    return err(fetchFailed(cause.message, cause));
  }

  const challenge = info.Challenge;
  if (challenge === undefined || challenge.length === 0) {
    return err(fetchFailed('SessionInfo has no Challenge'));
  }

  const blockTimeText = info.BlockTime;
  if (blockTimeText === undefined || !BLOCKTIME_REGEX.test(blockTimeText)) {
    return err(fetchFailed(`SessionInfo has no valid BlockTime: ${String(blockTimeText)}`));
  }

  const state: LoginState = {
    challenge,
    blocktime: Number(blockTimeText),
    algorithm: challenge.startsWith('2$') ? 'pbkdf2' : 'md5',
  };
  return ok(state);
}

/**
 * ルーターから現在のチャレンジとブロック時間を取得する。
 *
 * @param baseUrl   - ルーターのベース URL (例: http://fritz.box)
 * @param transport - HTTP トランスポート
 */
export async function fetchLoginState(
  baseUrl: string,
  transport: HttpTransport,
): Promise<Result<LoginState, ChallengeFetchError>> {
  const url = loginUrl(baseUrl);

  let response: HttpResponse;
  try {
    response = await transport.get(url);
  } catch (e) {
    const cause = toError(e);
    return err(fetchFailed(`GET ${url} failed: ${cause.message}`, cause));
  }

  if (!isSuccess(response.status)) {
    return err(fetchFailed(`GET ${url} returned HTTP ${response.status}`));
  }

  return toLoginState(response.body);
}
