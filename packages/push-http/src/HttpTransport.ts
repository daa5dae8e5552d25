import type { Transport, TransportResponse } from '@pushlane/core';
import { fetch as undiciFetch } from 'undici';
import { assertDuration } from './durations';
import { TransportTimeoutError } from './errors';

type FetchFn = typeof fetch;

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface HttpTransportOptions {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class HttpTransport implements Transport {
  readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;
  private readonly headerMap: Record<string, string>;

  constructor(options: HttpTransportOptions = {}) {
    this.timeoutMs = assertDuration('client timeout', options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    const fetchCandidate =
      options.fetchImpl ??
      (typeof fetch === 'function' ? fetch : undefined) ??
      ((undiciFetch as unknown) as typeof fetch);
    this.fetchImpl = fetchCandidate;
    this.headerMap = {
      'content-type': 'application/json',
      accept: 'application/json',
      ...options.headers
    };
  }

  get headers(): Readonly<Record<string, string>> {
    return this.headerMap;
  }

  set(name: string, value: string): this {
    this.headerMap[name] = value;
    return this;
  }

  clone(): HttpTransport {
    return this.withTimeout(this.timeoutMs);
  }

  /** A fresh handle with the same fetch and headers and a new timeout. */
  withTimeout(timeoutMs: number): HttpTransport {
    return new HttpTransport({
      timeoutMs,
      fetchImpl: this.fetchImpl,
      headers: { ...this.headerMap }
    });
  }

  async post(url: string | URL, body: unknown, signal?: AbortSignal): Promise<TransportResponse> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }
    const timer =
      this.timeoutMs > 0
        ? setTimeout(() => controller.abort(new TransportTimeoutError(this.timeoutMs)), this.timeoutMs)
        : undefined;

    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { ...this.headerMap },
        body: JSON.stringify(body),
        signal: controller.signal
      });
      const text = await response.text();
      return {
        status: response.status,
        statusText: response.statusText,
        ok: response.status >= 200 && response.status < 300,
        body: text
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw controller.signal.reason;
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
