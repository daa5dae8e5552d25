export interface RateLimiter {
  /**
   * Resolves once a permit is granted. Rejects with the signal's reason when
   * it aborts first; an aborted caller holds no permit.
   */
  acquire(signal?: AbortSignal): Promise<void>;
}
