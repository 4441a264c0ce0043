/**
 * Rate limiting middleware using express-rate-limit.
 *
 * Three tiers, each keyed per client IP:
 *   - general  — RATE_LIMIT_MAX requests per RATE_LIMIT_WINDOW_MS
 *   - login    — 10 requests per minute (POST /auth/login)
 *   - register — 5 requests per minute  (POST /auth/register)
 *
 * Login and register are separate instances so their budgets are
 * independent. All use the default in-memory store, which keeps counters per
 * process. With TRUST_PROXY enabled req.ip comes from X-Forwarded-For.
 */

import rateLimit, { ipKeyGenerator } from "express-rate-limit";
import type { Request, RequestHandler } from "express";
import type { EnvConfig } from "../config/env";

/** Under NODE_ENV=test the ceilings are raised so suites never trip them. */
const TEST_MAX = 10_000;

const ONE_MINUTE_MS = 60 * 1000;

interface RateLimiters {
  general: RequestHandler;
  login: RequestHandler;
  register: RequestHandler;
}

function limiter(windowMs: number, max: number, message: string, code: string): RequestHandler {
  return rateLimit({
    windowMs,
    limit: max,
    standardHeaders: true,
    legacyHeaders: false,
    // ipKeyGenerator collapses IPv6 addresses to /56 subnets to prevent bypass.
    keyGenerator: (req: Request) => ipKeyGenerator(req.ip || "unknown"),
    message: { error: message, code },
  });
}

function createRateLimiters(config: Pick<EnvConfig, "NODE_ENV" | "RATE_LIMIT_WINDOW_MS" | "RATE_LIMIT_MAX">): RateLimiters {
  const isTest = config.NODE_ENV === "test";

  return {
    general: limiter(
      config.RATE_LIMIT_WINDOW_MS,
      isTest ? TEST_MAX : config.RATE_LIMIT_MAX,
      "Too many requests, please try again later.",
      "RATE_LIMIT_EXCEEDED"
    ),
    login: limiter(
      ONE_MINUTE_MS,
      isTest ? TEST_MAX : 10,
      "Too many login attempts, please try again later.",
      "LOGIN_RATE_LIMIT_EXCEEDED"
    ),
    register: limiter(
      ONE_MINUTE_MS,
      isTest ? TEST_MAX : 5,
      "Too many registration attempts, please try again later.",
      "REGISTER_RATE_LIMIT_EXCEEDED"
    ),
  };
}

export { createRateLimiters };
export type { RateLimiters };
