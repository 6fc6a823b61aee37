/**
 * Rate Limiting Middleware
 *
 * Limits /query requests per client IP. Every question costs two model
 * calls, so the limit protects the model quota as much as the server.
 * Clients are keyed by `req.ip`, which honours X-Forwarded-For only for
 * the proxy hops the app's `trust proxy` setting allows.
 */

import rateLimit from "express-rate-limit";
import type { Request, Response, RequestHandler } from "express";
import { metrics } from "../monitoring/metrics.js";

export interface RateLimitConfig {
  /** Time window in milliseconds (default: 60000 = 1 minute) */
  windowMs?: number;
  /** Max requests per window (default: 100) */
  maxRequests?: number;
  /** Message to return when rate limited */
  message?: string;
}

/**
 * Creates rate limiting middleware for the query endpoint
 */
export function createQueryRateLimiter(config: RateLimitConfig = {}): RequestHandler {
  const {
    windowMs = 60000,
    maxRequests = 100,
    message = "Too many requests. Please wait before trying again.",
  } = config;

  return rateLimit({
    windowMs,
    limit: maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      console.warn(`[RATE_LIMIT] IP ${req.ip ?? "unknown"} exceeded rate limit`);
      metrics.recordRateLimitHit(req.path);
      res.status(429).json({
        error: "Rate limited",
        message,
        retryAfter: Math.ceil(windowMs / 1000),
      });
    },
  });
}
