/**
 * Sliding one-second window. Rejected attempts are not counted.
 */
export class RateLimiter {
  private timestamps: number[] = [];

  constructor(
    private readonly limit: number,
    private readonly windowMs = 1000,
  ) {}

  tryAcquire(now: number): boolean {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < this.timestamps.length && this.timestamps[expired] <= cutoff) {
      expired++;
    }
    if (expired > 0) this.timestamps = this.timestamps.slice(expired);

    if (this.timestamps.length >= this.limit) return false;
    this.timestamps.push(now);
    return true;
  }

  get used(): number {
    return this.timestamps.length;
  }
}
