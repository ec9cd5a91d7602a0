/**
 * Token bucket: holds at most `burst` tokens and refills at `rate` tokens per second.
 *
 * Time is passed in by the caller (milliseconds) so one bucket can be shared by code
 * running on a real clock and tests running on a manual one.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefillAt: number;

  public constructor(
    private readonly rate: number,
    private readonly burst: number,
    nowMs: number,
  ) {
    if (!(rate > 0)) {
      throw new RangeError(`Token bucket rate must be greater than 0, got ${rate}.`);
    }
    if (!(burst > 0)) {
      throw new RangeError(`Token bucket burst must be greater than 0, got ${burst}.`);
    }

    this.tokens = burst;
    this.lastRefillAt = nowMs;
  }

  /**
   * Refills for the time elapsed since the last call, then takes `count` tokens if that
   * many are available. A denied call leaves the balance at its refilled value.
   */
  public tryConsume(nowMs: number, count = 1): boolean {
    this.refill(nowMs);

    if (this.tokens >= count) {
      this.tokens -= count;
      return true;
    }

    return false;
  }

  /**
   * Milliseconds until `count` tokens will be available, 0 when they already are.
   */
  public msUntilAvailable(nowMs: number, count = 1): number {
    this.refill(nowMs);
    const missing = count - this.tokens;
    if (missing <= 0) {
      return 0;
    }
    return Math.ceil((missing / this.rate) * 1_000);
  }

  public available(nowMs: number): number {
    this.refill(nowMs);
    return this.tokens;
  }

  private refill(nowMs: number): void {
    // A clock that steps backwards must not mint tokens.
    const elapsedMs = Math.max(0, nowMs - this.lastRefillAt);
    this.tokens = Math.min(this.burst, this.tokens + (elapsedMs * this.rate) / 1_000);
    this.lastRefillAt = Math.max(this.lastRefillAt, nowMs);
  }
}
