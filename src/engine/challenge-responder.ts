/**
 * fritzlog — Challenge Responder
 *
 * login_sid.lua のチャレンジに対するレスポンスを計算する。
 *
 * - `2$<iter1>$<salt1>$<iter2>$<salt2>` 形式: PBKDF2-HMAC-SHA256 を 2 段で適用
 * - それ以外: 旧方式。UTF-16LE にエンコードした `challenge-password` の MD5
 *
 * 形式判定は parseChallenge() で一度だけ行い、以降はタグ付きユニオンで分岐する。
 */

import crypto from 'node:crypto';
import { err, ok, type Result } from 'neverthrow';
import type { MalformedChallengeError, ParsedChallenge } from '../types/engine.js';

const PBKDF2_PREFIX = '2$';
const PBKDF2_KEY_LENGTH = 32;
const HEX_REGEX = /^(?:[0-9a-fA-F]{2})+$/;
const ITERATION_REGEX = /^[1-9]\d*$/;

function malformed(message: string): MalformedChallengeError {
  return { type: 'malformed_challenge', message };
}

function parseIterations(field: string, name: string): Result<number, MalformedChallengeError> {
  if (!ITERATION_REGEX.test(field)) {
    return err(malformed(`${name} must be a positive integer, got "${field}"`));
  }
  const n = Number(field);
  if (!Number.isSafeInteger(n)) {
    return err(malformed(`${name} is out of range: ${field}`));
  }
  return ok(n);
}

function parseSalt(field: string, name: string): Result<Buffer, MalformedChallengeError> {
  if (!HEX_REGEX.test(field)) {
    return err(malformed(`${name} must be a non-empty hex string, got "${field}"`));
  }
  return ok(Buffer.from(field, 'hex'));
}

/**
 * チャレンジ文字列を解析する。
 *
 * PBKDF2 形式でフィールドが欠けている・数値でない場合は失敗する。
 * 旧方式のチャレンジは空でなければそのまま受け付ける。
 */
export function parseChallenge(challenge: string): Result<ParsedChallenge, MalformedChallengeError> {
  if (challenge.length === 0) {
    return err(malformed('challenge is empty'));
  }

  if (!challenge.startsWith(PBKDF2_PREFIX)) {
    const parsed: ParsedChallenge = { kind: 'md5', challenge };
    return ok(parsed);
  }

  const parts = challenge.split('$');
  if (parts.length !== 5) {
    return err(
      malformed(`PBKDF2 challenge must have 5 "$"-separated fields, got ${parts.length}`),
    );
  }

  const [, iter1Field, salt1Field, iter2Field, salt2Field] = parts;

  const iter1 = parseIterations(iter1Field, 'iter1');
  if (iter1.isErr()) return err(iter1.error);
  const salt1 = parseSalt(salt1Field, 'salt1');
  if (salt1.isErr()) return err(salt1.error);
  const iter2 = parseIterations(iter2Field, 'iter2');
  if (iter2.isErr()) return err(iter2.error);
  const salt2 = parseSalt(salt2Field, 'salt2');
  if (salt2.isErr()) return err(salt2.error);

  const parsed: ParsedChallenge = {
    kind: 'pbkdf2',
    iter1: iter1.value,
    salt1: salt1.value,
    iter2: iter2.value,
    salt2: salt2.value,
    salt2Hex: salt2Field,
  };
  return ok(parsed);
}

/** PBKDF2 方式のレスポンス `<salt2>$<hex(hash2)>` を計算する。 */
function pbkdf2Response(
  parsed: Extract<ParsedChallenge, { kind: 'pbkdf2' }>,
  password: string,
): string {
  // 1 段目は固定 salt、2 段目は毎回変わる salt
  const hash1 = crypto.pbkdf2Sync(
    Buffer.from(password, 'utf8'),
    parsed.salt1,
    parsed.iter1,
    PBKDF2_KEY_LENGTH,
    'sha256',
  );
  const hash2 = crypto.pbkdf2Sync(hash1, parsed.salt2, parsed.iter2, PBKDF2_KEY_LENGTH, 'sha256');
  return `${parsed.salt2Hex}$${hash2.toString('hex')}`;
}

/** 旧方式のレスポンス `<challenge>-<md5>` を計算する。 */
function md5Response(challenge: string, password: string): string {
  const plain = Buffer.from(`${challenge}-${password}`, 'utf16le');
  const digest = crypto.createHash('md5').update(plain).digest('hex');
  return `${challenge}-${digest}`;
}

/** 解析済みチャレンジに対するレスポンスを計算する。 */
export function respondTo(parsed: ParsedChallenge, password: string): string {
  switch (parsed.kind) {
    case 'pbkdf2':
      return pbkdf2Response(parsed, password);
    case 'md5':
      return md5Response(parsed.challenge, password);
    default: {
      const _exhaustive: never = parsed;
      throw new Error(`Unknown challenge kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * チャレンジ文字列とパスワードからチャレンジレスポンスを計算する。
 *
 * @param challenge - login_sid.lua が返した Challenge 要素の値
 * @param password  - ルーターのパスワード (正規化せず UTF-8 / UTF-16LE でエンコードする)
 */
export function computeResponse(
  challenge: string,
  password: string,
): Result<string, MalformedChallengeError> {
  return parseChallenge(challenge).map((parsed) => respondTo(parsed, password));
}
