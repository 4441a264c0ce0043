/**
 * Bearer-token authentication and admin authorization middleware.
 *
 * - `requireAuth`  — rejects requests without a valid access token (401).
 * - `requireAdmin` — must follow requireAuth; reloads the caller's user row
 *                    and rejects non-admins (403).
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { EnvConfig } from "../config/env";
import { isAdmin, verifyAccessToken } from "../services/authService";
import type { UserStore } from "../services/userStore";

/**
 * Extract Bearer token from the Authorization header.
 * Returns null when the header is missing or malformed.
 */
function extractToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !header.startsWith("Bearer ")) {
    return null;
  }
  const token = header.slice(7).trim(); // strip "Bearer "
  return token.length > 0 ? token : null;
}

function requireAuth(config: Pick<EnvConfig, "JWT_SECRET">): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = extractToken(req);

    if (!token) {
      res.status(401).json({ error: "Unauthorized", code: "AUTH_REQUIRED" });
      return;
    }

    const user = verifyAccessToken(token, config.JWT_SECRET);

    if (!user) {
      res.status(401).json({ error: "Unauthorized", code: "INVALID_TOKEN" });
      return;
    }

    req.user = user;
    next();
  };
}

function requireAdmin(users: UserStore, message = "Admin access required"): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      if (!req.user || !(await isAdmin(users, req.user.userId))) {
        res.status(403).json({ error: message, code: "FORBIDDEN" });
        return;
      }
      next();
    } catch (err: unknown) {
      next(err);
    }
  };
}

export { requireAuth, requireAdmin };
