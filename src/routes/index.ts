/**
 * Route index.
 *
 * ┌──────────────────┬───────────┬─────────────────────────────────────────┐
 * │ Endpoint         │ Method    │ Description                             │
 * ├──────────────────┼───────────┼─────────────────────────────────────────┤
 * │ /health          │ GET       │ Health check with DB connectivity       │
 * ├──────────────────┼───────────┼─────────────────────────────────────────┤
 * │ /auth/register   │ POST      │ Create a user account                   │
 * │ /auth/login      │ POST      │ Username or email + password; token     │
 * │ /auth/me         │ GET       │ Current user (auth)                     │
 * │ /auth/is-admin   │ GET       │ Whether the current user is admin (auth)│
 * ├──────────────────┼───────────┼─────────────────────────────────────────┤
 * │ /products        │ GET       │ List products                           │
 * │ /products        │ POST      │ Create a product (auth)                 │
 * │ /products/:id    │ GET       │ Fetch a product                         │
 * │ /products/:id    │ PUT/PATCH │ Partial update (auth)                   │
 * │ /products/:id    │ DELETE    │ Delete a product (auth + admin)         │
 * └──────────────────┴───────────┴─────────────────────────────────────────┘
 *
 * Auth: Authorization: Bearer <token>.
 * Error responses follow the shape: { error: <message>, code, details? }
 */

import { Router } from "express";
import type { AppContext } from "../context";
import type { RateLimiters } from "../middleware/rateLimiter";
import { createHealthRouter } from "./health";
import { createAuthRouter } from "./auth";
import { createProductsRouter } from "./products";

export function createRouter(ctx: AppContext, limiters: RateLimiters): Router {
  const router = Router();

  router.use("/health", createHealthRouter(ctx));

  // Rate limiting for login/register is applied per-endpoint in auth.ts
  router.use("/auth", createAuthRouter(ctx, limiters));

  router.use("/products", createProductsRouter(ctx));

  return router;
}
