import { describe, it, expect } from 'vitest';
import { fetchLoginState, loginUrl, toLoginState } from '../../src/engine/login-state.js';
import { FakeTransport, challengeXml } from '../helpers/fakes.js';

describe('loginUrl', () => {
  it('ベース URL に login_sid.lua?version=2 を付ける', () => {
    expect(loginUrl('http://fritz.box')).toBe('http://fritz.box/login_sid.lua?version=2');
  });

  it('末尾のスラッシュを除去する', () => {
    expect(loginUrl('http://192.168.178.1/')).toBe(
      'http://192.168.178.1/login_sid.lua?version=2',
    );
  });
});

describe('toLoginState', () => {
  it('PBKDF2 チャレンジの LoginState を返す', () => {
    const state = toLoginState(challengeXml('2$60000$7a1b2c$6000$0f0e0d0c', 5));

    expect(state._unsafeUnwrap()).toEqual({
      challenge: '2$60000$7a1b2c$6000$0f0e0d0c',
      blocktime: 5,
      algorithm: 'pbkdf2',
    });
  });

  it('旧方式のチャレンジは md5', () => {
    const state = toLoginState(challengeXml('1234567z'));

    expect(state._unsafeUnwrap().algorithm).toBe('md5');
    expect(state._unsafeUnwrap().blocktime).toBe(0);
  });

  it('Challenge がない場合は challenge_fetch_failed', () => {
    const state = toLoginState('<SessionInfo><BlockTime>0</BlockTime></SessionInfo>');

    expect(state._unsafeUnwrapErr()).toEqual({
      type: 'challenge_fetch_failed',
      message: 'SessionInfo has no Challenge',
    });
  });

  it('BlockTime がない場合は challenge_fetch_failed', () => {
    const state = toLoginState('<SessionInfo><Challenge>1234567z</Challenge></SessionInfo>');

    expect(state._unsafeUnwrapErr()).toEqual({
      type: 'challenge_fetch_failed',
      message: 'SessionInfo has no valid BlockTime: undefined',
    });
  });

  it('BlockTime が負数の場合は challenge_fetch_failed', () => {
    const state = toLoginState(challengeXml('1234567z', -1));

    expect(state._unsafeUnwrapErr().message).toBe('SessionInfo has no valid BlockTime: -1');
  });

  it('XML として不正な場合は challenge_fetch_failed', () => {
    const state = toLoginState('not xml at all <');

    expect(state._unsafeUnwrapErr().type).toBe('challenge_fetch_failed');
  });
});

describe('fetchLoginState', () => {
  it('ログインエンドポイントに 1 回 GET する', async () => {
    const transport = new FakeTransport().reply(200, challengeXml('1234567z'));

    const state = await fetchLoginState('http://fritz.box', transport);

    expect(state.isOk()).toBe(true);
    expect(transport.requests).toEqual([
      { method: 'GET', url: 'http://fritz.box/login_sid.lua?version=2' },
    ]);
  });

  it('通信エラーは challenge_fetch_failed (cause 付き)', async () => {
    const cause = new Error('connect ECONNREFUSED 192.168.178.1:80');
    const transport = new FakeTransport().fail(cause);

    const state = await fetchLoginState('http://192.168.178.1', transport);
    const error = state._unsafeUnwrapErr();

    expect(error.type).toBe('challenge_fetch_failed');
    expect(error.message).toBe(
      'GET http://192.168.178.1/login_sid.lua?version=2 failed: connect ECONNREFUSED 192.168.178.1:80',
    );
    expect(error.cause).toBe(cause);
  });

  it('2xx 以外は challenge_fetch_failed', async () => {
    const transport = new FakeTransport().reply(503, 'busy');

    const state = await fetchLoginState('http://fritz.box', transport);

    expect(state._unsafeUnwrapErr().message).toBe(
      'GET http://fritz.box/login_sid.lua?version=2 returned HTTP 503',
    );
  });
});
