/**
 * テスト用のインプロセス HttpTransport / Clock
 */

import type { HttpResponse, HttpTransport } from '../../src/http/transport.js';
import type { Clock } from '../../src/engine/clock.js';

export interface RecordedRequest {
  method: 'GET' | 'POST';
  url: string;
  body?: string;
  headers?: Record<string, string>;
}

type Handler = (request: RecordedRequest) => HttpResponse | Promise<HttpResponse>;

/** 登録した順にレスポンスを返し、受け取ったリクエストを記録する。 */
export class FakeTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  private readonly handlers: Handler[] = [];

  /** 次のリクエストに対するレスポンスを登録する */
  reply(status: number, body: string): this {
    this.handlers.push(() => ({ status, body }));
    return this;
  }

  /** 次のリクエストで例外を投げる */
  fail(error: Error): this {
    this.handlers.push(() => {
      throw error;
    });
    return this;
  }

  async get(url: string): Promise<HttpResponse> {
    return this.handle({ method: 'GET', url });
  }

  async post(url: string, body: string, headers: Record<string, string>): Promise<HttpResponse> {
    return this.handle({ method: 'POST', url, body, headers });
  }

  private async handle(request: RecordedRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const handler = this.handlers.shift();
    if (handler === undefined) {
      throw new Error(`Unexpected ${request.method} ${request.url}`);
    }
    return handler(request);
  }
}

/** sleepSeconds() の呼び出しを記録するだけの Clock。onSleep は待機開始時に呼ばれる。 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private readonly onSleep?: (seconds: number) => void;

  constructor(onSleep?: (seconds: number) => void) {
    this.onSleep = onSleep;
  }

  async sleepSeconds(seconds: number): Promise<void> {
    this.sleeps.push(seconds);
    this.onSleep?.(seconds);
  }
}

/** login_sid.lua の GET 応答 */
export function challengeXml(challenge: string, blockTime = 0): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<SessionInfo>
  <SID>0000000000000000</SID>
  <Challenge>${challenge}</Challenge>
  <BlockTime>${blockTime}</BlockTime>
  <Rights></Rights>
  <Users><User last="1">fritz1234</User></Users>
</SessionInfo>`;
}

/** login_sid.lua の POST 応答 */
export function sidXml(sid: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<SessionInfo>
  <SID>${sid}</SID>
  <Challenge>2$60000$7a1b2c$6000$0f0e0d0c</Challenge>
  <BlockTime>0</BlockTime>
  <Rights><Name>Dial</Name><Access>2</Access></Rights>
</SessionInfo>`;
}

/** data.lua の page=log 応答 (rows は新しい順) */
export function eventLogJson(rows: Array<[string, string, string, string | number]>): string {
  return JSON.stringify({ pid: 'log', data: { log: rows, filter: '0' }, sid: 'ignored' });
}
