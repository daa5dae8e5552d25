import {
  TokenResponseSchema,
  type ClientLogger,
  type Transport,
  type TransportResponse
} from '@pushlane/core';
import { ClientState } from './ClientState';
import { assertDuration } from './durations';
import { PushApiError, wrapError } from './errors';
import { HttpTransport } from './HttpTransport';
import { ResetClock } from './ResetClock';
import { parseBody } from './responses';
import { TokenCache, type IssuedToken } from './TokenCache';

export const DEFAULT_RATE = 1;
export const DEFAULT_INTERVAL_MS = 1000;

export interface PushApiClientOptions {
  /** Vendor host, with or without scheme; a bare host gets `https://`. */
  baseUrl: string;
  orgName: string;
  appName: string;
  clientId: string;
  clientSecret: string;
  /** Permits per window. */
  rate?: number;
  /** Window length; 0 disables resets. */
  intervalMs?: number;
  timeoutMs?: number;
  /** ttl sent with token requests; 0 asks for a token that never expires. */
  tokenTtlSeconds?: number;
  fetchImpl?: typeof fetch;
  logger?: ClientLogger;
  now?: () => number;
}

const REQUIRED_FIELDS = ['baseUrl', 'orgName', 'appName', 'clientId', 'clientSecret'] as const;

/**
 * Request-execution substrate shared by every push call: a fixed-window
 * limiter, a lazily refreshed bearer token and a transport template that can
 * be reconfigured while requests are in flight.
 *
 * Call `shutdown` exactly once when done.
 */
export class PushApiClient {
  private readonly state: ClientState;
  private readonly clock: ResetClock;
  private readonly tokens: TokenCache;
  private readonly logger?: ClientLogger;

  constructor(options: PushApiClientOptions) {
    for (const field of REQUIRED_FIELDS) {
      if (!options[field]) {
        throw new PushApiError('construct', `${field} is required`);
      }
    }

    this.logger = options.logger;
    const transport = new HttpTransport({
      timeoutMs: options.timeoutMs,
      fetchImpl: options.fetchImpl
    });
    const limiterConfig = {
      rate: options.rate ?? DEFAULT_RATE,
      intervalMs: options.intervalMs ?? DEFAULT_INTERVAL_MS
    };
    assertLimiterConfig(limiterConfig.rate, limiterConfig.intervalMs);

    this.state = new ClientState(
      {
        baseUrl: normalizeBaseUrl(options.baseUrl),
        orgName: options.orgName,
        appName: options.appName,
        clientId: options.clientId,
        clientSecret: options.clientSecret
      },
      transport,
      limiterConfig
    );
    this.tokens = new TokenCache(
      this.state,
      (signal, ttlSeconds) => this.exchangeCredentials(signal, ttlSeconds),
      {
        defaultTtlSeconds: options.tokenTtlSeconds,
        now: options.now,
        logger: options.logger
      }
    );
    this.clock = new ResetClock(() => this.state.limiter.reset(), options.logger);
    this.clock.start(limiterConfig.intervalMs);
  }

  get isClosed(): boolean {
    return this.state.isClosed;
  }

  get limiterInUse(): number {
    return this.state.limiter.inUse;
  }

  get limiterCapacity(): number {
    return this.state.limiter.size;
  }

  get limiterIntervalMs(): number {
    return this.state.limiterSettings.intervalMs;
  }

  get resetClockRunning(): boolean {
    return this.clock.running;
  }

  get timeoutMs(): number {
    return this.state.timeoutMs;
  }

  currentToken(): string {
    return this.tokens.currentToken();
  }

  url(subPath: string): URL {
    return this.state.url(subPath);
  }

  /** Admission, then a credential-free handle. Used by the token exchange itself. */
  async acquireUnauthorized(signal?: AbortSignal): Promise<Transport> {
    await this.state.limiter.acquire(signal);
    return this.state.cloneTransport();
  }

  /**
   * Admission, then a valid token (refreshing it when empty or expired), then
   * a handle carrying `Authorization: Bearer <token>`. A refresh takes a
   * second permit for its own request.
   */
  async acquireAuthorized(signal?: AbortSignal): Promise<Transport> {
    await this.state.limiter.acquire(signal);
    await this.tokens.ensureValid(signal);
    return this.state.cloneTransport().set('authorization', `Bearer ${this.tokens.currentToken()}`);
  }

  async refreshToken(signal?: AbortSignal, ttlSeconds?: number): Promise<void> {
    await this.tokens.refresh(signal, ttlSeconds);
  }

  setLimiter(rate: number, intervalMs: number): void {
    assertLimiterConfig(rate, intervalMs);
    this.assertOpen('set limiter');
    // The retired loop is cleared before the new pool exists.
    this.clock.stop();
    this.state.setLimiter({ rate, intervalMs });
    this.clock.start(intervalMs);
    this.logger?.debug('Rate limiter reconfigured', { rate, intervalMs });
  }

  setClientTimeout(timeoutMs: number): void {
    this.state.setTimeout(assertDuration('client timeout', timeoutMs));
  }

  shutdown(): void {
    this.assertOpen('shutdown');
    this.clock.stop();
    this.state.close();
    this.logger?.debug('Push API client shut down');
  }

  private async exchangeCredentials(
    signal: AbortSignal | undefined,
    ttlSeconds: number
  ): Promise<IssuedToken> {
    const transport = await this.acquireUnauthorized(signal);
    const { clientId, clientSecret } = this.state.credentials();

    let response: TransportResponse;
    try {
      response = await transport.post(
        this.url('token'),
        {
          grant_type: 'client_credentials',
          client_id: clientId,
          client_secret: clientSecret,
          ttl: ttlSeconds
        },
        signal
      );
    } catch (error) {
      throw wrapError('refresh token', error);
    }

    if (!response.ok) {
      throw PushApiError.fromResponse('refresh token', response);
    }

    const payload = parseBody('refresh token', response.body, TokenResponseSchema);
    if (payload.access_token.trim().length === 0) {
      throw new PushApiError('refresh token', 'access token is empty', { body: response.body });
    }

    return { accessToken: payload.access_token, expiresIn: payload.expires_in };
  }

  private assertOpen(operation: string): void {
    if (this.state.isClosed) {
      throw new PushApiError(operation, 'client is already shut down');
    }
  }
}

function assertLimiterConfig(rate: number, intervalMs: number): void {
  if (!Number.isInteger(rate) || rate < 0) {
    throw new RangeError(`limiter rate must be a non-negative integer, got ${rate}`);
  }
  assertDuration('limiter interval', intervalMs);
}

function normalizeBaseUrl(value: string): URL {
  const url = new URL(/^[a-z][a-z0-9+.-]*:\/\//i.test(value) ? value : `https://${value}`);
  if (!url.pathname.endsWith('/')) {
    url.pathname = `${url.pathname}/`;
  }
  return url;
}
