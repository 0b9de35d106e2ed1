/**
 * Sliding-window rate limiting for the public auth endpoints.
 *
 * Each key may make `maxRequests` requests per window, plus up to
 * `burstAllowance` extra ones; the burst refills only after the key has
 * gone a full window without requests.
 */

import type { Request, Response, NextFunction } from "express";
import { log } from "./logger.js";

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  burstAllowance: number;
  keyOf?: (req: Request) => string;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  resetIn: number;
}

const DEFAULTS: RateLimitOptions = {
  windowMs: 300000,
  maxRequests: 10,
  burstAllowance: 5,
};

/** Keys auth requests on caller and phone number, so neither can be cycled to dodge the limit. */
export function authRateLimitKey(req: Request): string {
  const body: unknown = req.body;
  const phone = typeof body === "object" && body !== null && "phoneNumber" in body && typeof body.phoneNumber === "string"
    ? body.phoneNumber.trim()
    : "-";
  return `${req.ip ?? "unknown"}|${phone}`;
}

class Window {
  private hits: number[] = [];
  private burstUsed = 0;

  /** Drops hits at or before `since`; returns true when none remain. */
  expire(since: number): boolean {
    this.hits = this.hits.filter(at => at > since);
    if (this.hits.length === 0) this.burstUsed = 0;
    return this.hits.length === 0;
  }

  get count(): number {
    return this.hits.length;
  }

  get oldest(): number | undefined {
    return this.hits[0];
  }

  limit(options: RateLimitOptions): number {
    return options.maxRequests + Math.max(0, options.burstAllowance - this.burstUsed);
  }

  record(at: number, options: RateLimitOptions): void {
    if (this.hits.length >= options.maxRequests) this.burstUsed++;
    this.hits.push(at);
  }
}

export class RateLimiter {
  private readonly options: RateLimitOptions;
  private readonly windows = new Map<string, Window>();
  private sweeper: NodeJS.Timeout | null;

  constructor(options: Partial<RateLimitOptions> = {}, private readonly now: () => number = Date.now) {
    this.options = { ...DEFAULTS, ...options };
    this.sweeper = setInterval(() => this.sweep(), this.options.windowMs);
    this.sweeper.unref();
  }

  private sweep(): void {
    const since = this.now() - this.options.windowMs;
    for (const [key, window] of this.windows) {
      if (window.expire(since)) this.windows.delete(key);
    }
  }

  stop(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  check(key: string): RateLimitDecision {
    const now = this.now();
    let window = this.windows.get(key);
    if (!window) {
      window = new Window();
      this.windows.set(key, window);
    }
    window.expire(now - this.options.windowMs);

    const used = window.count;
    const limit = window.limit(this.options);
    if (used >= limit) {
      log(`Rate limit exceeded for ${key} (${used}/${limit})`, "rate-limit");
      return {
        allowed: false,
        remaining: 0,
        resetIn: Math.max(0, (window.oldest ?? now) + this.options.windowMs - now),
      };
    }

    window.record(now, this.options);
    return { allowed: true, remaining: limit - used - 1, resetIn: this.options.windowMs };
  }

  reset(key: string): void {
    this.windows.delete(key);
  }

  middleware() {
    return (req: Request, res: Response, next: NextFunction) => {
      const key = this.options.keyOf ? this.options.keyOf(req) : req.ip ?? "unknown";
      const decision = this.check(key);
      res.setHeader("X-RateLimit-Remaining", String(decision.remaining));
      if (!decision.allowed) {
        res.setHeader("Retry-After", String(Math.ceil(decision.resetIn / 1000)));
        return res.status(429).json({ status: 429, message: "Too many requests, try again later" });
      }
      next();
    };
  }
}
