import { systemClock, type Clock } from '../ports/Clock';

export class TokenBucket {
  private tokens: number;
  private lastRefillAt: number;

  constructor(
    readonly capacity: number,
    readonly refillRatePerSecond: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isFinite(capacity) || capacity <= 0) {
      throw new Error('capacity must be a positive number');
    }
    if (!Number.isFinite(refillRatePerSecond) || refillRatePerSecond <= 0) {
      throw new Error('refillRatePerSecond must be a positive number');
    }

    this.tokens = capacity;
    this.lastRefillAt = clock.now();
  }

  static perMinute(tokensPerMinute: number, clock?: Clock): TokenBucket {
    return new TokenBucket(tokensPerMinute, tokensPerMinute / 60, clock);
  }

  get availableTokens(): number {
    this.refill();
    return this.tokens;
  }

  tryConsume(amount: number): boolean {
    assertAmount(amount);
    this.refill();

    if (amount > this.tokens) {
      return false;
    }

    this.tokens -= amount;
    return true;
  }

  timeUntilAvailable(amount: number): number {
    assertAmount(amount);
    this.refill();

    if (amount <= this.tokens) {
      return 0;
    }

    return (amount - this.tokens) / this.refillRatePerSecond;
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefillAt) / 1_000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRatePerSecond);
    this.lastRefillAt = now;
  }
}

function assertAmount(amount: number): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new RangeError(`Token amount must be a non-negative number, got ${amount}`);
  }
}
