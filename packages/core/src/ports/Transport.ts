export interface TransportResponse {
  status: number;
  statusText: string;
  ok: boolean;
  body: string;
}

/**
 * A request handle. Handles are cloned from a shared template, so headers set
 * on one never leak into another.
 */
export interface Transport {
  readonly timeoutMs: number;
  readonly headers: Readonly<Record<string, string>>;
  set(name: string, value: string): this;
  clone(): Transport;
  post(url: string | URL, body: unknown, signal?: AbortSignal): Promise<TransportResponse>;
}
