/**
 * Rate limiting middleware using express-rate-limit.
 *
 * One per-IP limiter in front of the /v1 API, configured through
 * RATE_LIMIT_MAX / RATE_LIMIT_WINDOW_MS. Generation itself is serialized by
 * the generation queue; this only bounds how many requests a single client
 * can pile up behind it.
 *
 * Uses the default in-memory store, which suits a single-process deployment.
 */

import rateLimit, { ipKeyGenerator } from "express-rate-limit";
import { Request } from "express";
import { env } from "../config/env";

const isTest = process.env.NODE_ENV === "test";

/** In test mode, set limits high enough to avoid interfering with test suites. */
const testMax = 10000;

export const apiLimiter = rateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  limit: isTest ? testMax : env.RATE_LIMIT_MAX,
  standardHeaders: true,
  legacyHeaders: false,
  // ipKeyGenerator collapses IPv6 addresses to /56 subnets to prevent bypass.
  keyGenerator: (req: Request) => ipKeyGenerator(req.ip || "unknown"),
  message: {
    error: {
      message: "Too many requests, please try again later.",
      code: "RATE_LIMIT_EXCEEDED",
    },
  },
});
