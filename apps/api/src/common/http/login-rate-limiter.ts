import { NextFunction, Request, Response } from "express";
import type { IncomingHttpHeaders } from "node:http";

export interface RateLimitOptions {
  max: number;
  windowMs: number;
  /** Expired buckets are swept once this many clients are tracked. */
  sweepAt?: number;
  now?: () => number;
}

export type RateLimitDecision =
  | { allowed: true }
  | { allowed: false; retryAfterSeconds: number };

interface Bucket {
  count: number;
  resetAt: number;
}

/** Counts hits per key in fixed windows of `windowMs`. */
export class FixedWindowRateLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private readonly sweepAt: number;
  private readonly now: () => number;

  constructor(private readonly options: RateLimitOptions) {
    this.sweepAt = options.sweepAt ?? 5000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.buckets.size;
  }

  hit(key: string): RateLimitDecision {
    const nowMs = this.now();
    if (this.buckets.size >= this.sweepAt) {
      this.sweep(nowMs);
    }

    const bucket = this.buckets.get(key);
    if (!bucket || bucket.resetAt <= nowMs) {
      this.buckets.set(key, { count: 1, resetAt: nowMs + this.options.windowMs });
      return { allowed: true };
    }

    bucket.count += 1;
    if (bucket.count <= this.options.max) {
      return { allowed: true };
    }
    return {
      allowed: false,
      retryAfterSeconds: Math.max(1, Math.ceil((bucket.resetAt - nowMs) / 1000)),
    };
  }

  private sweep(nowMs: number): void {
    for (const [key, bucket] of this.buckets) {
      if (bucket.resetAt <= nowMs) this.buckets.delete(key);
    }
  }
}

export interface ClientAddressSource {
  headers: IncomingHttpHeaders;
  ip?: string;
  socket: { remoteAddress?: string };
}

export function clientIpOf(request: ClientAddressSource): string {
  const forwarded = request.headers["x-forwarded-for"];
  if (typeof forwarded === "string" && forwarded.trim()) {
    return forwarded.split(",")[0]?.trim() || "unknown";
  }
  return request.ip || request.socket.remoteAddress || "unknown";
}

/** Express middleware limiting POSTs to the login route per client IP. */
export function createLoginRateLimiter(limiter: FixedWindowRateLimiter) {
  return (request: Request, response: Response, next: NextFunction): void => {
    if (request.method !== "POST") {
      next();
      return;
    }

    const decision = limiter.hit(`auth-login:${clientIpOf(request)}`);
    if (decision.allowed) {
      next();
      return;
    }

    response.setHeader("Retry-After", String(decision.retryAfterSeconds));
    response.status(429).json({ message: "Too many requests. Please try again later." });
  };
}
