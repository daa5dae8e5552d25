import type { Transport } from '@pushlane/core';
import { FixedWindowLimiter } from './FixedWindowLimiter';
import type { HttpTransport } from './HttpTransport';

export interface ClientIdentity {
  baseUrl: URL;
  orgName: string;
  appName: string;
  clientId: string;
  clientSecret: string;
}

export interface TokenSnapshot {
  token: string;
  expiresAt: number;
}

export interface LimiterConfig {
  rate: number;
  intervalMs: number;
}

/**
 * Shared state of one push API client.
 *
 * Every method is synchronous, so each call runs to completion on the event
 * loop without interleaving: that is the exclusion guard. Methods tagged
 * `shared` only read; methods tagged `exclusive` mutate. No caller holds a
 * section across an `await`.
 */
export class ClientState {
  readonly limiter: FixedWindowLimiter;
  private readonly identity: ClientIdentity;
  private transport: HttpTransport;
  private limiterConfig: LimiterConfig;
  private token = '';
  private tokenExpiresAt = 0;
  private closed = false;

  constructor(identity: ClientIdentity, transport: HttpTransport, limiterConfig: LimiterConfig) {
    this.identity = identity;
    this.transport = transport;
    this.limiterConfig = { ...limiterConfig };
    this.limiter = new FixedWindowLimiter(limiterConfig.rate);
  }

  /** shared */
  get isClosed(): boolean {
    return this.closed;
  }

  /** shared */
  get limiterSettings(): Readonly<LimiterConfig> {
    return this.limiterConfig;
  }

  /** shared */
  get timeoutMs(): number {
    return this.transport.timeoutMs;
  }

  /** shared */
  credentials(): { clientId: string; clientSecret: string } {
    return { clientId: this.identity.clientId, clientSecret: this.identity.clientSecret };
  }

  /** shared */
  url(subPath: string): URL {
    const segments = [this.identity.orgName, this.identity.appName, ...subPath.split('/')]
      .filter(segment => segment.length > 0);
    return new URL(segments.join('/'), this.identity.baseUrl);
  }

  /** shared: a handle cloned from the template, safe to mutate. */
  cloneTransport(): Transport {
    return this.transport.clone();
  }

  /** shared */
  tokenSnapshot(): TokenSnapshot {
    return { token: this.token, expiresAt: this.tokenExpiresAt };
  }

  /** shared: an empty token always counts as expired. */
  hasValidToken(now: number): boolean {
    return this.token.length > 0 && this.tokenExpiresAt > now;
  }

  /** exclusive */
  installToken(token: string, expiresAt: number): void {
    this.token = token;
    this.tokenExpiresAt = expiresAt;
  }

  /** exclusive */
  setTimeout(timeoutMs: number): void {
    this.transport = this.transport.withTimeout(timeoutMs);
  }

  /** exclusive: installs an empty pool of the new capacity. */
  setLimiter(config: LimiterConfig): void {
    this.limiter.resize(config.rate);
    this.limiterConfig = { ...config };
  }

  /** exclusive */
  close(): void {
    this.closed = true;
    this.limiter.close();
  }
}
