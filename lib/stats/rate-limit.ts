import { systemClock, type Clock } from "./clock";

// Keeps at least minIntervalMs between the starts of consecutive requests.
export class RateLimiter {
  private last: number | null = null;

  constructor(
    readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  async acquire(): Promise<void> {
    if (this.last !== null && this.minIntervalMs > 0) {
      const elapsed = this.clock.now() - this.last;
      if (elapsed < this.minIntervalMs) await this.clock.sleep(this.minIntervalMs - elapsed);
    }
    this.last = this.clock.now();
  }
}
