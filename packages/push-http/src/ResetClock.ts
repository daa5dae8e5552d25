import type { ClientLogger } from '@pushlane/core';
import { assertDuration } from './durations';

/**
 * Owns the periodic reset loop. At most one timer is live per clock, and
 * `stop` clears it synchronously so no tick of a retired loop can fire after.
 */
export class ResetClock {
  private timer: ReturnType<typeof setInterval> | undefined;
  private period = 0;

  constructor(
    private readonly onTick: () => void,
    private readonly logger?: ClientLogger
  ) {}

  get running(): boolean {
    return this.timer !== undefined;
  }

  get intervalMs(): number {
    return this.period;
  }

  start(intervalMs: number): void {
    if (this.timer !== undefined) {
      throw new Error('reset clock is already running');
    }
    this.period = assertDuration('limiter interval', intervalMs);
    // A zero interval means the window never resets.
    if (intervalMs === 0) {
      return;
    }
    this.timer = setInterval(() => this.tick(), intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private tick(): void {
    try {
      this.onTick();
    } catch (error) {
      this.stop();
      this.logger?.error('Limiter reset failed; reset clock stopped', {
        error: error instanceof Error ? error.message : String(error),
        intervalMs: this.period
      });
    }
  }
}
