import { RateLimitError } from "@shortexec/core";
import type { Request, Response, NextFunction } from "express";
import { actorOf, type RequestWithActor } from "./auth-middleware";

type RateLimitRecord = {
  count: number;
  resetAtMs: number;
};

export type RateLimitMiddleware = ((req: Request, res: Response, next: NextFunction) => void) & {
  close: () => void;
};

function rateLimitKey(keyPrefix: string, req: RequestWithActor): string {
  const actor = actorOf(req);
  const subject = actor.id ? `actor:${actor.id}` : `ip:${req.ip || "unknown"}`;
  return `${keyPrefix}:${subject}`;
}

function setLimitHeaders(res: Response, limit: number, used: number, resetAtMs: number): void {
  res.setHeader("x-ratelimit-limit", String(limit));
  res.setHeader("x-ratelimit-remaining", String(Math.max(0, limit - used)));
  res.setHeader("x-ratelimit-reset", String(Math.ceil(resetAtMs / 1000)));
}

/**
 * Fixed-window limiter keyed by the resolved actor, falling back to the client IP for anonymous callers.
 * Mount it after `attachActor`.
 */
export function createRateLimitMiddleware(input: {
  limit: number;
  windowMs: number;
  keyPrefix: string;
  now?: () => number;
}): RateLimitMiddleware {
  const now = input.now ?? Date.now;
  const records = new Map<string, RateLimitRecord>();
  const sweepIntervalMs = Math.max(1000, Math.floor(input.windowMs / 2));
  const sweepTimer = setInterval(() => {
    const current = now();
    for (const [key, record] of records.entries()) {
      if (record.resetAtMs <= current) {
        records.delete(key);
      }
    }
  }, sweepIntervalMs);
  sweepTimer.unref?.();

  const handle = (req: RequestWithActor, res: Response, next: NextFunction): void => {
    const current = now();
    const key = rateLimitKey(input.keyPrefix, req);
    const existing = records.get(key);

    if (!existing || current > existing.resetAtMs) {
      const resetAtMs = current + input.windowMs;
      records.set(key, { count: 1, resetAtMs });
      setLimitHeaders(res, input.limit, 1, resetAtMs);
      next();
      return;
    }

    if (existing.count >= input.limit) {
      const retryAfterSeconds = Math.max(1, Math.ceil((existing.resetAtMs - current) / 1000));
      res.setHeader("retry-after", String(retryAfterSeconds));
      next(new RateLimitError());
      return;
    }

    existing.count += 1;
    setLimitHeaders(res, input.limit, existing.count, existing.resetAtMs);
    next();
  };

  return Object.assign(handle, {
    close: () => {
      clearInterval(sweepTimer);
    }
  });
}
