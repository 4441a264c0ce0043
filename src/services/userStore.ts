/**
 * User store — all database interactions for the users table go through here.
 * Email normalisation and password hashing happen before a value reaches the
 * store; it only reads and writes rows.
 */

import type { Queryable } from "../config/database";
import { userRowSchema } from "../models/user";
import type { NewUser, UserRow } from "../models/user";

/** PostgreSQL error code for unique_violation. */
const UNIQUE_VIOLATION = "23505";

const USER_COLUMNS = "id, username, email, password_hash, is_admin";

type UniqueField = "email" | "username";

/** Raised when an insert collides with an existing email or username. */
export class DuplicateUserError extends Error {
  constructor(readonly field: UniqueField) {
    super(`User with this ${field} already exists`);
    this.name = "DuplicateUserError";
  }
}

export interface UserStore {
  findById(id: number): Promise<UserRow | null>;
  findByEmail(email: string): Promise<UserRow | null>;
  findByUsername(username: string): Promise<UserRow | null>;
  /** @throws DuplicateUserError when email or username is taken */
  create(user: NewUser): Promise<UserRow>;
}

interface PgUniqueViolation {
  code: string;
  constraint?: string;
  detail?: string;
}

function isUniqueViolation(err: unknown): err is PgUniqueViolation {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === UNIQUE_VIOLATION
  );
}

function violatedField(err: PgUniqueViolation): UniqueField {
  const source = `${err.constraint ?? ""} ${err.detail ?? ""}`;
  return source.includes("username") ? "username" : "email";
}

export class PgUserStore implements UserStore {
  constructor(private readonly db: Queryable) {}

  async findById(id: number): Promise<UserRow | null> {
    return this.findOne("id", id);
  }

  async findByEmail(email: string): Promise<UserRow | null> {
    return this.findOne("email", email);
  }

  async findByUsername(username: string): Promise<UserRow | null> {
    return this.findOne("username", username);
  }

  async create(user: NewUser): Promise<UserRow> {
    try {
      const result = await this.db.query(
        `INSERT INTO users (username, email, password_hash, is_admin)
         VALUES ($1, $2, $3, $4)
         RETURNING ${USER_COLUMNS}`,
        [user.username, user.email, user.password_hash, user.is_admin]
      );
      return userRowSchema.parse(result.rows[0]);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new DuplicateUserError(violatedField(err));
      }
      throw err;
    }
  }

  private async findOne(column: "id" | "email" | "username", value: number | string): Promise<UserRow | null> {
    const result = await this.db.query(
      `SELECT ${USER_COLUMNS} FROM users WHERE ${column} = $1`,
      [value]
    );
    const row = result.rows[0];
    return row === undefined ? null : userRowSchema.parse(row);
  }
}
