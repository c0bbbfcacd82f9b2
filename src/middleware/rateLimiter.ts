/**
 * Rate limiting middleware using express-rate-limit.
 *
 * Two tiers:
 *   - generalLimiter — configurable via RATE_LIMIT_MAX / RATE_LIMIT_WINDOW_MS
 *   - createLimiter  — CREATE_RATE_LIMIT_MAX paste creations per minute (POST /pastes only)
 *
 * Both use the default in-memory store, which is per process. Behind a proxy
 * set TRUST_PROXY=true so req.ip comes from X-Forwarded-For.
 */

import rateLimit, { ipKeyGenerator } from "express-rate-limit";
import { Request } from "express";
import { env } from "../config/env";

const isTest = env.NODE_ENV === "test";

/** In test mode, set limits high enough to avoid interfering with test suites. */
const testMax = 10000;

/**
 * General API rate limiter, applied to every /api route.
 * ipKeyGenerator collapses IPv6 addresses to /56 subnets to prevent bypass.
 */
export const generalLimiter = rateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  max: isTest ? testMax : env.RATE_LIMIT_MAX,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req: Request) => ipKeyGenerator(req.ip || "unknown"),
  message: {
    error: {
      message: "Too many requests, please try again later.",
      code: "RATE_LIMIT_EXCEEDED",
    },
  },
});

/**
 * Paste creation limiter. Separate budget from the general limiter.
 */
export const createLimiter = rateLimit({
  windowMs: 1 * 60 * 1000,
  max: isTest ? testMax : env.CREATE_RATE_LIMIT_MAX,
  standardHeaders: true,
  legacyHeaders: false,
  message: {
    error: {
      message: "Too many pastes created, please try again later.",
      code: "CREATE_RATE_LIMIT_EXCEEDED",
    },
  },
});
