/**
 * fritzlog — HTTP transport
 *
 * ルーターとの通信はこのインターフェース越しに行う。
 * リトライは行わない。ネットワークエラーは例外として呼び出し元に伝わる。
 */

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpTransport {
  get(url: string): Promise<HttpResponse>;
  post(url: string, body: string, headers: Record<string, string>): Promise<HttpResponse>;
}

export interface FetchTransportOptions {
  /** リクエスト全体のタイムアウト (ms) */
  timeoutMs: number;
}

/** Node.js 組み込みの fetch を使う HttpTransport 実装。 */
export class FetchTransport implements HttpTransport {
  private readonly timeoutMs: number;

  constructor(options: FetchTransportOptions) {
    this.timeoutMs = options.timeoutMs;
  }

  async get(url: string): Promise<HttpResponse> {
    return this.send(url, { method: 'GET' });
  }

  async post(url: string, body: string, headers: Record<string, string>): Promise<HttpResponse> {
    return this.send(url, { method: 'POST', body, headers });
  }

  private async send(url: string, init: RequestInit): Promise<HttpResponse> {
    try {
      const response = await fetch(url, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return { status: response.status, body: await response.text() };
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new Error(`Request to ${url} timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw error;
    }
  }
}

/** 2xx かどうか */
export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/** unknown な例外値を Error に正規化する */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
