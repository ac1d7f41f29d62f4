import rateLimit from "express-rate-limit";
import type { Request, Response } from "express";

/**
 * Rate Limiting for dataset loads (upload and sample generation)
 *
 * Parsing and generation are synchronous and block the event loop, so loads
 * are limited per window.
 *
 * Rate-Key Strategy:
 * - Established session (has loaded a dataset before) → session id
 * - Otherwise → IP address. A client that drops its cookie gets a fresh
 *   session id on every request, so only the IP identifies it.
 *
 * DEFAULT: 20 loads per minute (UPLOAD_RATE_LIMIT_PER_MINUTE)
 */

const WINDOW_MS = 60 * 1000; // 1 minute window

/** The parts of a request the key is derived from */
export interface RateLimitKeySource {
  sessionID: string;
  ip?: string;
  session?: { datasetLoadedAt?: string };
}

export function rateLimitKey(req: RateLimitKeySource): string {
  if (req.session?.datasetLoadedAt) {
    return `session:${req.sessionID}`;
  }
  return `ip:${req.ip}`;
}

export function createDatasetRateLimiter(limitPerMinute: number) {
  return rateLimit({
    windowMs: WINDOW_MS,
    limit: limitPerMinute,
    keyGenerator: rateLimitKey,
    standardHeaders: true,
    legacyHeaders: false,
    validate: { xForwardedForHeader: false },
    handler: (_req: Request, res: Response) => {
      res.status(429).json({
        error: "Too many requests",
        message: `Rate limit exceeded. Max ${limitPerMinute} dataset loads per minute.`,
        code: "RATE_LIMITED",
      });
    },
  });
}
