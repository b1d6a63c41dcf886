import Bottleneck from 'bottleneck';
import { RateLimiter } from '../../domain/contracts';
import { componentLogger, Logger } from '../../logging/logger';

export interface SlidingWindowRateLimiterOptions {
  maxCalls: number;
  windowMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const DEFAULT_WINDOW_MS = 60_000;

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Caps upstream calls at `maxCalls` per rolling window. When the log is full the
 * caller waits for the oldest entry to leave the window and the log is cleared,
 * a coarse reset rather than a precise leaky bucket.
 *
 * Acquisitions are queued through a single-slot Bottleneck, which serialises
 * every read and write of the timestamp log.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly calls: number[] = [];
  private readonly gate = new Bottleneck({ maxConcurrent: 1 });
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(private readonly options: SlidingWindowRateLimiterOptions) {
    if (!Number.isInteger(options.maxCalls) || options.maxCalls < 1) {
      throw new Error(`maxCalls must be a positive integer, got ${options.maxCalls}`);
    }
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = componentLogger(options.logger, 'rate-limiter');
  }

  acquire(): Promise<void> {
    return this.gate.schedule(() => this.reserveSlot());
  }

  /** Calls logged inside the current window. */
  inWindow(): number {
    const cutoff = this.now() - this.windowMs;
    return this.calls.filter((timestamp) => timestamp > cutoff).length;
  }

  private async reserveSlot(): Promise<void> {
    this.prune(this.now());

    if (this.calls.length >= this.options.maxCalls) {
      const waitMs = this.calls[0] + this.windowMs - this.now();
      if (waitMs > 0) {
        this.logger.info({ waitMs, maxCalls: this.options.maxCalls }, 'rate limit reached, waiting');
        await this.sleep(waitMs);
      }
      this.calls.length = 0;
    }

    this.calls.push(this.now());
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.calls.length > 0 && this.calls[0] <= cutoff) {
      this.calls.shift();
    }
  }
}
