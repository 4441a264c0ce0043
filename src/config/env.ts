/**
 * Centralized environment configuration.
 * Validates required environment variables and returns a typed config object.
 * The server calls `loadEnvConfig()` once at startup and hands the result to
 * the application context; nothing re-reads it afterwards.
 */

import dotenv from "dotenv";
import * as path from "path";
import { isLogLevel } from "./logger";
import type { LogLevel } from "./logger";

// Auto-load .env from the project root
dotenv.config({ path: path.resolve(__dirname, "../../.env") });

interface EnvConfig {
  /** PostgreSQL connection string */
  DATABASE_URL: string;
  /** Secret key for signing access tokens */
  JWT_SECRET: string;
  /** Server port (default: 3001) */
  PORT: number;
  /** Node environment (default: development) */
  NODE_ENV: string;
  /** CORS origin for the frontend (default: http://localhost:5173) */
  CORS_ORIGIN: string;
  /** Minimum log level: debug, info, warn, error (default: info) */
  LOG_LEVEL: LogLevel;
  /** Whether to trust proxy headers (e.g. X-Forwarded-For) behind a load balancer (default: false) */
  TRUST_PROXY: boolean;
  /** Rate limit window duration in milliseconds (default: 900000 = 15 minutes) */
  RATE_LIMIT_WINDOW_MS: number;
  /** Maximum number of requests per window per IP (default: 300) */
  RATE_LIMIT_MAX: number;
  /** bcrypt cost factor for new password hashes (default: 10) */
  BCRYPT_SALT_ROUNDS: number;
  /** Whether registration may set `is_admin` from the request body (default: false) */
  ALLOW_ADMIN_REGISTRATION: boolean;
}

type EnvSource = Record<string, string | undefined>;

/**
 * Required environment variables that must be set for the server to start.
 */
const REQUIRED_VARS = ["DATABASE_URL", "JWT_SECRET"] as const;

function missingVars(source: EnvSource): string[] {
  return REQUIRED_VARS.filter((name) => (source[name] ?? "").trim() === "");
}

function readFlag(value: string | undefined): boolean {
  return value === "true" || value === "1";
}

function readLogLevel(value: string | undefined): LogLevel {
  const level = (value || "info").toLowerCase();
  return isLogLevel(level) ? level : "info";
}

function readInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Load and validate environment configuration.
 * Throws a descriptive error listing every missing required variable.
 */
function loadEnvConfig(source: EnvSource = process.env): EnvConfig {
  const missing = missingVars(source);

  if (missing.length > 0) {
    const message = [
      "",
      "=== Missing Required Environment Variables ===",
      "",
      ...missing.map((v) => `  - ${v}`),
      "",
      "Please set these variables in your .env file or environment.",
      "See .env.example for reference.",
      "",
    ].join("\n");

    throw new Error(message);
  }

  return {
    DATABASE_URL: source.DATABASE_URL ?? "",
    JWT_SECRET: source.JWT_SECRET ?? "",
    PORT: readInt(source.PORT, 3001),
    NODE_ENV: source.NODE_ENV || "development",
    CORS_ORIGIN: source.CORS_ORIGIN || "http://localhost:5173",
    LOG_LEVEL: readLogLevel(source.LOG_LEVEL),
    TRUST_PROXY: readFlag(source.TRUST_PROXY),
    RATE_LIMIT_WINDOW_MS: readInt(source.RATE_LIMIT_WINDOW_MS, 900_000),
    RATE_LIMIT_MAX: readInt(source.RATE_LIMIT_MAX, 300),
    BCRYPT_SALT_ROUNDS: readInt(source.BCRYPT_SALT_ROUNDS, 10),
    ALLOW_ADMIN_REGISTRATION: readFlag(source.ALLOW_ADMIN_REGISTRATION),
  };
}

export { loadEnvConfig };
export type { EnvConfig, EnvSource };
