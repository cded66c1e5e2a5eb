import type { QueryParams, Transport, TransportResponse } from '../types.js';

export interface FetchTransportOptions {
  /** Aborts a request that has not answered in time. No timeout by default. */
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/** Appends params to any query string the URL already carries; array values repeat the key. */
export function buildUrl(url: string, params: QueryParams): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === 'string') {
      target.searchParams.append(key, value);
    } else {
      for (const item of value) target.searchParams.append(key, item);
    }
  }
  return target.toString();
}

export class FetchTransport implements Transport {
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number | undefined;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.timeoutMs = options.timeoutMs;
  }

  async get(url: string, params: QueryParams, headers: Readonly<Record<string, string>>): Promise<TransportResponse> {
    const response = await this.fetchImpl(buildUrl(url, params), {
      method: 'GET',
      headers,
      ...(this.timeoutMs !== undefined ? { signal: AbortSignal.timeout(this.timeoutMs) } : {}),
    });
    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      responseHeaders[name.toLowerCase()] = value;
    });
    return {
      status: response.status,
      body: await response.text(),
      headers: responseHeaders,
    };
  }
}
