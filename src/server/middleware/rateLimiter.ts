/**
 * Per-client rate limiting for the API
 * Each client keeps the timestamps of its accepted requests over a sliding window.
 */

import type { Context, Next } from "hono";
import { getConnInfo } from "@hono/node-server/conninfo";
import { SECURITY_CONSTANTS } from "../../config/constants.ts";
import { env } from "../../config/env.ts";

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  /** Epoch ms at which the oldest request in the window leaves it */
  resetAt: number;
}

export interface RateLimitStats {
  clients: number;
  requestsInWindow: number;
}

export class RateLimiter {
  private readonly clients = new Map<string, number[]>();
  private readonly windowMs: number;
  readonly limit: number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(windowMs: number, limit: number) {
    this.windowMs = windowMs;
    this.limit = limit;
  }

  private recent(client: string, now: number): number[] {
    const since = now - this.windowMs;
    return (this.clients.get(client) ?? []).filter((timestamp) => timestamp > since);
  }

  /**
   * Records the request when it fits in the window. Rejected requests are not recorded.
   */
  check(client: string): RateLimitDecision {
    const now = Date.now();
    const timestamps = this.recent(client, now);

    if (timestamps.length >= this.limit) {
      this.clients.set(client, timestamps);
      return { allowed: false, remaining: 0, resetAt: timestamps[0] + this.windowMs };
    }

    timestamps.push(now);
    this.clients.set(client, timestamps);
    return { allowed: true, remaining: this.limit - timestamps.length, resetAt: timestamps[0] + this.windowMs };
  }

  /**
   * Forgets clients with no request left in the window
   */
  sweep(): void {
    const now = Date.now();
    for (const client of [...this.clients.keys()]) {
      const timestamps = this.recent(client, now);
      if (timestamps.length === 0) {
        this.clients.delete(client);
      } else {
        this.clients.set(client, timestamps);
      }
    }
  }

  getStats(): RateLimitStats {
    const now = Date.now();
    let requestsInWindow = 0;
    for (const client of this.clients.keys()) {
      requestsInWindow += this.recent(client, now).length;
    }
    return { clients: this.clients.size, requestsInWindow };
  }

  reset(): void {
    this.clients.clear();
  }

  startSweeping(intervalMs: number): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeping(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}

export const rateLimiter = new RateLimiter(
  SECURITY_CONSTANTS.RATE_LIMIT_WINDOW_MS,
  SECURITY_CONSTANTS.RATE_LIMIT_MAX_REQUESTS
);

rateLimiter.startSweeping(SECURITY_CONSTANTS.RATE_LIMIT_CLEANUP_INTERVAL_MS);

/**
 * The TCP peer address, or the first X-Forwarded-For entry when TRUST_PROXY is set
 */
export function getClientIp(c: Context, trustProxy: boolean = env.trustProxy): string {
  if (trustProxy) {
    const forwarded = c.req.header("X-Forwarded-For")?.split(",")[0]?.trim();
    if (forwarded) return forwarded;
  }
  return getConnInfo(c).remote.address ?? "unknown";
}

export function createRateLimitMiddleware(bypassPaths: readonly string[] = [], limiter: RateLimiter = rateLimiter) {
  return async (c: Context, next: Next) => {
    if (bypassPaths.includes(c.req.path)) {
      await next();
      return;
    }

    const decision = limiter.check(getClientIp(c));
    c.header("X-RateLimit-Limit", String(limiter.limit));
    c.header("X-RateLimit-Remaining", String(decision.remaining));
    c.header("X-RateLimit-Reset", String(Math.ceil(decision.resetAt / 1000)));

    if (!decision.allowed) {
      const retryAfter = Math.max(1, Math.ceil((decision.resetAt - Date.now()) / 1000));
      c.header("Retry-After", String(retryAfter));
      c.header("X-Error-Code", "RateLimitExceeded");
      return c.json({ error: "Rate limit exceeded.", retryAfter }, 429);
    }

    await next();
  };
}
