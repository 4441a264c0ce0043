/**
 * User model types.
 * Defines the database row shape and the safe public shape (no password_hash).
 */

import { z } from "zod";

/** Full user row as stored in PostgreSQL. */
export const userRowSchema = z.object({
  id: z.number().int(),
  username: z.string().nullable(),
  email: z.string(),
  password_hash: z.string(),
  is_admin: z.boolean(),
});

export type UserRow = z.infer<typeof userRowSchema>;

/** Fields needed to insert a user; id is assigned by the database. */
export interface NewUser {
  username: string | null;
  email: string;
  password_hash: string;
  is_admin: boolean;
}

/** Public user object returned by API responses (never includes password_hash). */
export interface PublicUser {
  id: number;
  username: string | null;
  email: string;
  is_admin: boolean;
}

export function toPublicUser(row: UserRow): PublicUser {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    is_admin: row.is_admin,
  };
}
