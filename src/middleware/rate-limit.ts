/**
 * Rate limiting — sliding window over outbound platform actions.
 *
 * Every send the broadcaster makes asks `canProceed()` first. The limiter
 * owns its timestamp history; callers never touch it.
 *
 * Defaults:
 * - 300 requests per 180 minutes
 */

import { logger } from './logger.js';

const DEFAULT_MAX_REQUESTS = 300;
const DEFAULT_WINDOW_MS = 180 * 60 * 1000; // 180 minutes

export interface RateLimiterOptions {
  maxRequests?: number;
  windowMs?: number;
  /** When false every check is admitted. */
  enabled?: boolean;
  /** Clock source, overridable for tests. */
  now?: () => number;
}

export class RateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  readonly enabled: boolean;
  private readonly now: () => number;
  /** Timestamps of admitted requests, oldest first */
  private requests: number[] = [];

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? DEFAULT_MAX_REQUESTS;
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? Date.now;
  }

  /**
   * Admission check. Records the request and returns true when the window
   * has room, otherwise returns false without recording anything.
   */
  canProceed(): boolean {
    if (!this.enabled) return true;

    const now = this.now();
    this.prune(now);

    if (this.requests.length >= this.maxRequests) {
      logger.warn({ count: this.requests.length, limit: this.maxRequests }, 'Rate limit reached');
      return false;
    }

    this.requests.push(now);
    return true;
  }

  /** Admissions left in the current window. */
  remaining(): number {
    if (!this.enabled) return this.maxRequests;
    this.prune(this.now());
    return this.maxRequests - this.requests.length;
  }

  reset(): void {
    this.requests = [];
  }

  /** Drop timestamps that have left the window */
  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    // Find first index that's still within the window
    let i = 0;
    while (i < this.requests.length && this.requests[i] <= cutoff) i++;
    if (i > 0) this.requests = this.requests.slice(i);
  }
}
