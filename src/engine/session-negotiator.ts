/**
 * fritzlog — Session Negotiator
 *
 * login_sid.lua のチャレンジレスポンス認証を行い、SID を取得する。
 *
 * 状態遷移 (分岐ループ・リトライなし):
 *   Start → Challenged → Responded → Waited → Submitted → Authenticated
 *
 * どの段階で失敗しても AuthError を返して終了する。リトライは呼び出し側の責務。
 */

import { err, ok, type Result } from 'neverthrow';
import type { HttpResponse, HttpTransport } from '../http/transport.js';
import { isSuccess, toError } from '../http/transport.js';
import type { Logger } from '../logger.js';
import { redact, silentLogger } from '../logger.js';
import { parseSessionInfoXml } from '../parser/session-info-parser.js';
import type { SessionInfo } from '../parser/session-info-parser.js';
import type { AuthError, RouterCredentials } from '../types/engine.js';
import { INVALID_SID } from '../types/engine.js';
import { parseChallenge, respondTo } from './challenge-responder.js';
import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import { fetchLoginState, loginUrl } from './login-state.js';

const SID_REGEX = /^[0-9a-fA-F]{16}$/;

export type NegotiationState =
  | 'start'
  | 'challenged'
  | 'responded'
  | 'waited'
  | 'submitted'
  | 'authenticated';

export interface SessionNegotiatorDeps {
  transport: HttpTransport;
  clock?: Clock;
  logger?: Logger;
}

/**
 * 1 回のログイン試行を表す。設定は構築時に受け取り、以降変更しない。
 */
export class SessionNegotiator {
  private readonly credentials: RouterCredentials;
  private readonly transport: HttpTransport;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(credentials: RouterCredentials, deps: SessionNegotiatorDeps) {
    this.credentials = credentials;
    this.transport = deps.transport;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
  }

  /** ログインして SID を返す。 */
  async negotiate(): Promise<Result<string, AuthError>> {
    const { url, username, password } = this.credentials;
    this.enter('start');

    // --- Start → Challenged ---
    const state = await fetchLoginState(url, this.transport);
    if (state.isErr()) {
      return err(state.error);
    }
    this.enter('challenged');

    // --- Challenged → Responded ---
    const parsed = parseChallenge(state.value.challenge);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    if (parsed.value.kind === 'pbkdf2') {
      this.logger.info('PBKDF2 supported');
    } else {
      this.logger.info('Falling back to MD5');
    }
    const response = respondTo(parsed.value, password);
    this.enter('responded');

    // --- Responded → Waited ---
    await this.waitOutBlocktime(state.value.blocktime);
    this.enter('waited');

    // --- Waited → Submitted ---
    const sid = await this.submitResponse(url, username, response);
    if (sid.isErr()) {
      return err(sid.error);
    }
    this.enter('submitted');

    // --- Submitted → Authenticated ---
    if (sid.value === INVALID_SID) {
      return err({ type: 'invalid_credentials', message: 'Wrong username or password' });
    }
    this.enter('authenticated');
    this.logger.info({ username, sid: redact(sid.value) }, 'Login succeeded');
    return ok(sid.value);
  }

  /**
   * ルーターが要求するブロック時間だけ待機する。
   * blocktime が 0 の場合は待機しない。
   */
  private async waitOutBlocktime(blocktime: number): Promise<void> {
    if (blocktime <= 0) {
      return;
    }
    this.logger.info(`Waiting for ${blocktime} seconds...`);
    await this.clock.sleepSeconds(blocktime);
  }

  /** ユーザー名とチャレンジレスポンスを POST し、SID を取り出す。 */
  private async submitResponse(
    baseUrl: string,
    username: string,
    challengeResponse: string,
  ): Promise<Result<string, AuthError>> {
    const url = loginUrl(baseUrl);
    const body = new URLSearchParams({ username, response: challengeResponse }).toString();

    let response: HttpResponse;
    try {
      response = await this.transport.post(url, body, {
        'Content-Type': 'application/x-www-form-urlencoded',
      });
    } catch (e) {
      const cause = toError(e);
      return err({ type: 'submission_failed', message: `POST ${url} failed: ${cause.message}`, cause });
    }

    if (!isSuccess(response.status)) {
      return err({
        type: 'submission_failed',
        message: `POST ${url} returned HTTP ${response.status}`,
      });
    }

    let info: SessionInfo;
    try {
      info = parseSessionInfoXml(response.body);
    } catch (e) {
      const cause = toError(e);
      return err({ type: 'submission_failed', message: cause.message, cause });
    }

    const sid = info.SID;
    if (sid === undefined || !SID_REGEX.test(sid)) {
      return err({
        type: 'submission_failed',
        message: `SessionInfo has no valid SID: ${String(sid)}`,
      });
    }
    return ok(sid);
  }

  private enter(state: NegotiationState): void {
    this.logger.debug({ state }, 'login state');
  }
}
