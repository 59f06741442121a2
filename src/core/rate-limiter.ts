import { USER_AGENTS, sleep } from "./utils";

export interface RateLimiterOptions {
  minDelayMs: number;
  maxDelayMs: number;
  userAgents?: readonly string[];
  /** Returns a float in [0, 1); defaults to Math.random */
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Politeness gate run before every page fetch: waits a random
 * duration in [minDelayMs, maxDelayMs] and hands out a User-Agent.
 */
export class RateLimiter {
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly userAgents: readonly string[];
  private readonly random: () => number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: RateLimiterOptions) {
    if (options.minDelayMs < 0 || options.maxDelayMs < options.minDelayMs) {
      throw new RangeError(
        `Invalid delay range [${options.minDelayMs}, ${options.maxDelayMs}]`
      );
    }
    const userAgents = options.userAgents ?? USER_AGENTS;
    if (userAgents.length === 0) {
      throw new RangeError("User-Agent pool is empty");
    }
    this.minDelayMs = options.minDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.userAgents = userAgents;
    this.random = options.random ?? Math.random;
    this.wait = options.sleep ?? sleep;
  }

  /** Draw the next delay, uniformly from the configured range. */
  nextDelayMs(): number {
    const span = this.maxDelayMs - this.minDelayMs;
    return Math.min(this.maxDelayMs, this.minDelayMs + this.random() * span);
  }

  /** Pick a User-Agent string from the pool. */
  nextUserAgent(): string {
    const idx = Math.min(
      this.userAgents.length - 1,
      Math.floor(this.random() * this.userAgents.length)
    );
    return this.userAgents[idx];
  }

  /**
   * Wait out the politeness delay.
   * @returns The User-Agent to send with the upcoming request
   */
  async beforeRequest(): Promise<string> {
    await this.wait(this.nextDelayMs());
    return this.nextUserAgent();
  }
}
