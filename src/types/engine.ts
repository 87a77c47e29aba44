/**
 * fritzlog — Engine layer type definitions
 *
 * ログイン処理・イベントログ取得・同期パイプラインの入出力型とエラー型。
 * エラーは neverthrow の Result で返すため、type で判別できるタグ付きオブジェクトにする。
 */

// ============================================================
// Challenge / Login
// ============================================================

/** ルーターが返すチャレンジの解析結果。 */
export type ParsedChallenge =
  | { kind: 'md5'; challenge: string }
  | {
      kind: 'pbkdf2';
      iter1: number;
      salt1: Buffer;
      iter2: number;
      salt2: Buffer;
      /** 受信したままの salt2 (hex)。レスポンスの先頭にそのまま使う */
      salt2Hex: string;
    };

export type ChallengeAlgorithm = ParsedChallenge['kind'];

/** login_sid.lua の GET で得られるログイン状態。1 回のログイン試行でのみ使う。 */
export interface LoginState {
  readonly challenge: string;
  /** 秒。0 の場合は待機不要 */
  readonly blocktime: number;
  readonly algorithm: ChallengeAlgorithm;
}

/** 認証失敗を表す SID。有効な SID として扱ってはならない。 */
export const INVALID_SID = '0000000000000000';

/** ログインに使う資格情報。 */
export interface RouterCredentials {
  readonly url: string;
  readonly username: string;
  readonly password: string;
}

// ============================================================
// Errors
// ============================================================

export interface MalformedChallengeError {
  type: 'malformed_challenge';
  message: string;
}

export interface ChallengeFetchError {
  type: 'challenge_fetch_failed';
  message: string;
  cause?: Error;
}

export type AuthError =
  | ChallengeFetchError
  | MalformedChallengeError
  | { type: 'submission_failed'; message: string; cause?: Error }
  | { type: 'invalid_credentials'; message: string };

export interface MalformedTimestampError {
  type: 'malformed_timestamp';
  message: string;
}

export type EventLogError =
  | { type: 'request_failed'; message: string; cause?: Error }
  | { type: 'retrieval_failed'; statusCode: number; message: string }
  | { type: 'malformed_response'; message: string }
  | MalformedTimestampError;

export type SyncError =
  | AuthError
  | EventLogError
  | { type: 'persist_failed'; message: string; cause?: Error };

// ============================================================
// Sync
// ============================================================

/** syncEventLog() の戻り値。 */
export interface SyncSummary {
  /** 除外フィルタ後に取得できた件数 */
  fetched: number;
  /** ストアに新規追記された件数 */
  appended: number;
  /** 同期後のストアの最終タイムスタンプ */
  lastTimestamp: number;
}
