/**
 * Rate Limiting Middleware
 *
 * Tiers:
 * - Login: 10/min per IP
 * - AI planning: 20/min per IP
 * - General API: 100/min per IP
 */

import rateLimit from "express-rate-limit";
import type { Request } from "express";

// ============================================================================
// RATE LIMITERS
// ============================================================================

/**
 * Login rate limiter
 * 10 attempts per minute per IP
 */
export const loginRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 10,
  message: {
    error: "Too many login attempts. Please wait before trying again.",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

/**
 * AI planning rate limiter
 * 20 requests per minute per IP
 */
export const aiRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 20,
  message: {
    error: "Too many AI requests. Please wait before trying again.",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

/**
 * General API rate limiter (fallback)
 * 100 requests per minute per IP
 */
export const generalRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 100,
  message: {
    error: "Too many requests. Please slow down.",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Get client IP address, handling proxies
 */
function getClientIP(req: Request): string {
  // Trust X-Forwarded-For from reverse proxies
  const forwarded = req.headers["x-forwarded-for"];
  if (forwarded) {
    const ips = typeof forwarded === "string" ? forwarded : forwarded[0];
    return ips.split(",")[0].trim();
  }

  // Fall back to direct connection
  return req.ip || req.socket.remoteAddress || "unknown";
}
