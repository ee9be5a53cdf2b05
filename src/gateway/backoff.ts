export interface BackoffOptions {
  initialMs: number;
  maxMs: number;
  /** Growth factor per consecutive failure, default 2 */
  multiplier?: number;
  /** Fraction of the delay randomly added or removed, 0-1 */
  jitter?: number;
  random?: () => number;
}

/** Exponential delay that grows per consecutive failure and resets on success */
export class Backoff {
  private failures = 0;

  constructor(private readonly opts: BackoffOptions) {}

  get attempts(): number {
    return this.failures;
  }

  next(): number {
    const { initialMs, maxMs, multiplier = 2, jitter = 0, random = Math.random } = this.opts;
    const base = Math.min(maxMs, initialMs * multiplier ** this.failures);
    this.failures++;
    if (jitter <= 0) return base;

    const spread = base * jitter * (random() * 2 - 1);
    return Math.max(0, Math.min(maxMs, Math.round(base + spread)));
  }

  reset(): void {
    this.failures = 0;
  }
}
