/** Largest delay Node's timers honour; anything longer fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function assertDuration(label: string, value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > MAX_TIMER_DELAY_MS) {
    throw new RangeError(
      `${label} must be a duration between 0 and ${MAX_TIMER_DELAY_MS}ms, got ${value}`
    );
  }
  return value;
}
