/**
 * Password hashing, access tokens and the admin check.
 *
 * Tokens are stateless HS256 JWTs whose `sub` claim is the user id. They are
 * valid for exactly one day and cannot be revoked early.
 */

import bcrypt from "bcrypt";
import jwt from "jsonwebtoken";
import type { AuthUser } from "../types/express";
import type { UserStore } from "./userStore";

/** Access token lifetime in seconds (one day). */
export const ACCESS_TOKEN_TTL_SECONDS = 24 * 60 * 60;

const USER_ID_RE = /^[1-9]\d*$/;

export async function hashPassword(plaintext: string, saltRounds: number): Promise<string> {
  return bcrypt.hash(plaintext, saltRounds);
}

export async function verifyPassword(plaintext: string, hash: string): Promise<boolean> {
  return bcrypt.compare(plaintext, hash);
}

export function signAccessToken(userId: number, secret: string): string {
  return jwt.sign({}, secret, {
    algorithm: "HS256",
    subject: String(userId),
    expiresIn: ACCESS_TOKEN_TTL_SECONDS,
  });
}

/**
 * Verify signature and expiry and read the user id from `sub`.
 * Returns null for any token that fails either check or carries no usable id.
 */
export function verifyAccessToken(token: string, secret: string): AuthUser | null {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: ["HS256"] });
  } catch {
    return null;
  }

  if (typeof decoded === "string" || typeof decoded.sub !== "string" || !USER_ID_RE.test(decoded.sub)) {
    return null;
  }

  return { userId: Number(decoded.sub) };
}

/**
 * True only when the user still exists and carries the admin flag.
 * A deleted account is simply not an admin.
 */
export async function isAdmin(users: UserStore, userId: number): Promise<boolean> {
  const user = await users.findById(userId);
  return user !== null && user.is_admin;
}
