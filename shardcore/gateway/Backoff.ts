//shardcore/gateway/Backoff.ts

export interface BackoffOptions {
  minMs: number;
  maxMs: number;
  multiplier?: number;
  /** Extra random share of the delay, 0..1. */
  jitter?: number;
}

/** Exponential reconnect delay with jitter, capped at `maxMs`. */
export class Backoff {
  private attempt = 0;

  constructor(
    private readonly options: BackoffOptions,
    private readonly random: () => number = Math.random,
  ) {
    if (options.minMs < 0 || options.maxMs < options.minMs) {
      throw new RangeError(`invalid backoff range ${options.minMs}..${options.maxMs}`);
    }
  }

  /** Delays handed out since the last reset. */
  get attempts(): number {
    return this.attempt;
  }

  next(): number {
    const multiplier = this.options.multiplier ?? 2;
    const jitter = this.options.jitter ?? 0.3;

    const base = Math.min(this.options.minMs * Math.pow(multiplier, this.attempt), this.options.maxMs);
    this.attempt++;

    return Math.min(Math.round(base + base * jitter * this.random()), this.options.maxMs);
  }

  reset(): void {
    this.attempt = 0;
  }
}
