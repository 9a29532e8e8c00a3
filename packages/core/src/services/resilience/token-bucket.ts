/**
 * Token bucket rate limiter
 *
 * Tokens refill continuously at `requestsPerSecond`. Callers queue in arrival
 * order, so a burst of acquires is spread out rather than released together.
 */

import { systemClock, type Clock } from "../../utils/clock";

export class TokenBucket {
  readonly capacity: number;
  private tokens: number;
  private lastRefill: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly requestsPerSecond: number,
    private readonly clock: Clock = systemClock
  ) {
    if (requestsPerSecond <= 0) {
      throw new RangeError("requestsPerSecond must be positive");
    }
    this.capacity = Math.max(1, Math.floor(requestsPerSecond));
    this.tokens = this.capacity;
    this.lastRefill = clock.now();
  }

  /**
   * Resolve once a token has been taken
   */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(() => this.take(signal));
    // Keep the queue moving if a sleep rejects; the caller still sees the rejection
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    if (elapsedSeconds > 0) {
      this.tokens = Math.min(
        this.capacity,
        this.tokens + elapsedSeconds * this.requestsPerSecond
      );
      this.lastRefill = now;
    }
  }

  private async take(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.refill();
    if (this.tokens < 1) {
      const waitMs = Math.ceil(((1 - this.tokens) / this.requestsPerSecond) * 1000);
      await this.clock.sleep(waitMs, signal);
      this.refill();
    }
    this.tokens = Math.max(0, this.tokens - 1);
  }

  get availableTokens(): number {
    this.refill();
    return this.tokens;
  }
}
