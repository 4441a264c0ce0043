/**
 * Authentication routes.
 * POST /auth/register — create a new user account.
 * POST /auth/login    — authenticate with username or email; returns a token.
 * GET  /auth/me       — return the current user (requires auth).
 * GET  /auth/is-admin — whether the current user is an admin (requires auth).
 */

import { Router } from "express";
import type { Request, Response, NextFunction, CookieOptions } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import type { RateLimiters } from "../middleware/rateLimiter";
import { requireAuth } from "../middleware/auth";
import { toPublicUser } from "../models/user";
import type { UserRow } from "../models/user";
import {
  ACCESS_TOKEN_TTL_SECONDS,
  hashPassword,
  isAdmin,
  signAccessToken,
  verifyPassword,
} from "../services/authService";
import { DuplicateUserError } from "../services/userStore";
import { logger } from "../config/logger";
import { sanitizeBody } from "../middleware/sanitize";
import { sendValidationError } from "./validation";

/** Cookie that carries the access token alongside the JSON response. */
const ACCESS_TOKEN_COOKIE = "access_token_cookie";

const MIN_PASSWORD_LENGTH = 8;
const MAX_PASSWORD_LENGTH = 128;

/** Column widths of users.username and users.email. */
const MAX_USERNAME_LENGTH = 80;
const MAX_EMAIL_LENGTH = 120;

// ---------------------------------------------------------------------------
// Request shapes
// ---------------------------------------------------------------------------

const emailField = z
  .string({ required_error: "Email is required", invalid_type_error: "Email must be a string" })
  .email("Invalid email format")
  .max(MAX_EMAIL_LENGTH, `Email must be at most ${MAX_EMAIL_LENGTH} characters`)
  .transform((email) => email.toLowerCase());

const usernameField = z
  .string({ invalid_type_error: "Username must be a string" })
  .min(1, "Username must not be empty")
  .max(MAX_USERNAME_LENGTH, `Username must be at most ${MAX_USERNAME_LENGTH} characters`);

// `name` is accepted as an older spelling of `username`; username wins when both are sent.
const registerSchema = z
  .object({
    username: usernameField.optional(),
    name: usernameField.optional(),
    email: emailField,
    password: z
      .string({ required_error: "Password is required", invalid_type_error: "Password must be a string" })
      .min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`)
      .max(MAX_PASSWORD_LENGTH, `Password must be at most ${MAX_PASSWORD_LENGTH} characters`),
    is_admin: z.boolean({ invalid_type_error: "is_admin must be a boolean" }).optional(),
  })
  .transform(({ name, ...rest }) => ({ ...rest, username: rest.username ?? name }));

const loginSchema = z
  .object({
    username: z.string({ invalid_type_error: "Username must be a string" }).min(1).optional(),
    email: z
      .string({ invalid_type_error: "Email must be a string" })
      .min(1)
      .transform((email) => email.toLowerCase())
      .optional(),
    password: z
      .string({ required_error: "Password is required", invalid_type_error: "Password must be a string" })
      .min(1, "Password is required"),
  })
  .refine((body) => body.username !== undefined || body.email !== undefined, {
    message: "Username or email is required",
    path: ["username"],
  });

type RegisterInput = z.infer<typeof registerSchema>;
type LoginInput = z.infer<typeof loginSchema>;

function duplicateResponse(res: Response, field: "email" | "username"): void {
  res.status(400).json({
    error: field === "email" ? "Email already exists" : "Username already exists",
    code: field === "email" ? "DUPLICATE_EMAIL" : "DUPLICATE_USERNAME",
  });
}

/** Username match wins; email is only consulted when it finds nobody. */
async function findLoginUser(ctx: AppContext, input: LoginInput): Promise<UserRow | null> {
  const byUsername = input.username !== undefined ? await ctx.users.findByUsername(input.username) : null;
  if (byUsername) {
    return byUsername;
  }
  return input.email !== undefined ? ctx.users.findByEmail(input.email) : null;
}

function tokenCookieOptions(nodeEnv: string): CookieOptions {
  return {
    httpOnly: true,
    sameSite: "lax",
    secure: nodeEnv === "production",
    maxAge: ACCESS_TOKEN_TTL_SECONDS * 1000,
  };
}

export function createAuthRouter(ctx: AppContext, limiters: Pick<RateLimiters, "login" | "register">): Router {
  const authRouter = Router();
  const authenticate = requireAuth(ctx.config);

  authRouter.use(sanitizeBody);

  // -------------------------------------------------------------------------
  // POST /register
  // -------------------------------------------------------------------------

  authRouter.post(
    "/register",
    limiters.register,
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      const parsed = registerSchema.safeParse(req.body);
      if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
      }
      const input: RegisterInput = parsed.data;

      try {
        if (input.username !== undefined && (await ctx.users.findByUsername(input.username))) {
          duplicateResponse(res, "username");
          return;
        }

        if (await ctx.users.findByEmail(input.email)) {
          duplicateResponse(res, "email");
          return;
        }

        const user = await ctx.users.create({
          username: input.username ?? null,
          email: input.email,
          password_hash: await hashPassword(input.password, ctx.config.BCRYPT_SALT_ROUNDS),
          is_admin: ctx.config.ALLOW_ADMIN_REGISTRATION ? input.is_admin ?? false : false,
        });

        logger.info("auth", "User registered", { userId: user.id, isAdmin: user.is_admin });
        res.status(201).json({ user: toPublicUser(user) });
      } catch (err: unknown) {
        // A concurrent registration can still win the race past the pre-checks
        if (err instanceof DuplicateUserError) {
          duplicateResponse(res, err.field);
          return;
        }
        next(err);
      }
    }
  );

  // -------------------------------------------------------------------------
  // POST /login
  // -------------------------------------------------------------------------

  authRouter.post(
    "/login",
    limiters.login,
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      const parsed = loginSchema.safeParse(req.body);
      if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
      }

      try {
        const user = await findLoginUser(ctx, parsed.data);

        // Same answer for unknown account and wrong password
        if (!user || !(await verifyPassword(parsed.data.password, user.password_hash))) {
          res.status(401).json({ error: "Invalid credentials", code: "INVALID_CREDENTIALS" });
          return;
        }

        const token = signAccessToken(user.id, ctx.config.JWT_SECRET);

        res.cookie(ACCESS_TOKEN_COOKIE, token, tokenCookieOptions(ctx.config.NODE_ENV));
        res.status(200).json({ token, email: user.email, is_admin: user.is_admin });
      } catch (err: unknown) {
        next(err);
      }
    }
  );

  // -------------------------------------------------------------------------
  // GET /me  (protected)
  // -------------------------------------------------------------------------

  authRouter.get("/me", authenticate, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = req.user ? await ctx.users.findById(req.user.userId) : null;

      if (!user) {
        res.status(404).json({ error: "User not found", code: "USER_NOT_FOUND" });
        return;
      }

      res.status(200).json({ user: toPublicUser(user) });
    } catch (err: unknown) {
      next(err);
    }
  });

  // -------------------------------------------------------------------------
  // GET /is-admin  (protected)
  // -------------------------------------------------------------------------

  authRouter.get("/is-admin", authenticate, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const admin = req.user ? await isAdmin(ctx.users, req.user.userId) : false;
      res.status(200).json({ is_admin: admin });
    } catch (err: unknown) {
      next(err);
    }
  });

  return authRouter;
}
