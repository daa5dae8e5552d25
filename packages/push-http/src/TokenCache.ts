import type { ClientLogger } from '@pushlane/core';
import type { ClientState } from './ClientState';

export interface IssuedToken {
  accessToken: string;
  /** Seconds; 0 means the token never expires. */
  expiresIn: number;
}

export type CredentialExchange = (
  signal: AbortSignal | undefined,
  ttlSeconds: number
) => Promise<IssuedToken>;

export interface TokenCacheOptions {
  defaultTtlSeconds?: number;
  now?: () => number;
  logger?: ClientLogger;
}

/**
 * Bearer token held in the client state, refreshed on demand.
 *
 * Refreshes are not de-duplicated: callers that all see an expired token each
 * run an exchange, and the last one to finish wins.
 */
export class TokenCache {
  private readonly defaultTtlSeconds: number;
  private readonly now: () => number;

  constructor(
    private readonly state: ClientState,
    private readonly exchange: CredentialExchange,
    private readonly options: TokenCacheOptions = {}
  ) {
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? 0;
    this.now = options.now ?? (() => Date.now());
  }

  currentToken(): string {
    return this.state.tokenSnapshot().token;
  }

  async ensureValid(signal?: AbortSignal): Promise<void> {
    if (this.state.hasValidToken(this.now())) {
      return;
    }
    await this.refresh(signal);
  }

  /** Runs one exchange and installs its token; the cache is untouched on failure. */
  async refresh(signal?: AbortSignal, ttlSeconds = this.defaultTtlSeconds): Promise<void> {
    const issued = await this.exchange(signal, ttlSeconds);
    const refreshedAt = this.now();
    const expiresAt =
      issued.expiresIn > 0 ? refreshedAt + issued.expiresIn * 1000 : Number.POSITIVE_INFINITY;
    this.state.installToken(issued.accessToken, expiresAt);
    this.options.logger?.debug('Access token refreshed', {
      expiresIn: issued.expiresIn,
      expiresAt: Number.isFinite(expiresAt) ? new Date(expiresAt).toISOString() : 'never'
    });
  }
}
