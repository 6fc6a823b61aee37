/**
 * API key check for the question endpoint
 *
 * Clients send AGENT_API_KEY as `Authorization: Bearer <key>` or in the
 * `x-api-key` header. Without a configured key the gateway is open,
 * except in production where it refuses questions.
 */

import { timingSafeEqual } from "crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";

export interface AuthConfig {
  /** Key clients must present */
  apiKey?: string;
}

/**
 * Reachable without a key
 */
export const PUBLIC_PATHS: ReadonlySet<string> = new Set(["/", "/health", "/metrics"]);

const BEARER_PREFIX = "Bearer ";

export function createAuthMiddleware(config: AuthConfig = {}): RequestHandler {
  const expected = config.apiKey ? Buffer.from(config.apiKey) : undefined;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (PUBLIC_PATHS.has(req.path)) {
      next();
      return;
    }

    if (!expected) {
      if (process.env.NODE_ENV === "production") {
        console.error("[Auth] AGENT_API_KEY not configured - rejecting request");
        res.status(503).json({
          error: "Service unavailable",
          message: "API authentication not configured",
        });
        return;
      }
      next();
      return;
    }

    const provided = readApiKey(req);
    if (provided === undefined) {
      res.status(401).json({
        error: "Unauthorized",
        message: "Missing API key. Provide via Authorization: Bearer <key> or x-api-key header",
      });
      return;
    }

    if (!keysMatch(provided, expected)) {
      res.status(403).json({ error: "Forbidden", message: "Invalid API key" });
      return;
    }

    next();
  };
}

function readApiKey(req: Request): string | undefined {
  const authorization = req.headers.authorization;
  if (authorization?.startsWith(BEARER_PREFIX)) {
    return authorization.slice(BEARER_PREFIX.length);
  }

  const header = req.headers["x-api-key"];
  return typeof header === "string" && header.length > 0 ? header : undefined;
}

// timingSafeEqual throws on unequal lengths
function keysMatch(provided: string, expected: Buffer): boolean {
  const candidate = Buffer.from(provided);
  return candidate.length === expected.length && timingSafeEqual(candidate, expected);
}
