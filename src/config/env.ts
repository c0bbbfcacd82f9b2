/**
 * Centralized environment configuration.
 * Validates required environment variables at startup and exports typed config.
 * Import this module early to fail fast on missing configuration.
 */

import dotenv from "dotenv";
import * as path from "path";

// Auto-load .env from the project root
dotenv.config({ path: path.resolve(__dirname, "../../.env") });

type StoreProvider = "postgres" | "memory";

interface EnvConfig {
  /** Paste storage backend (default: postgres) */
  STORE_PROVIDER: StoreProvider;
  /** PostgreSQL connection string (required when STORE_PROVIDER=postgres) */
  DATABASE_URL: string;
  /** Server port (default: 8097) */
  PORT: number;
  /** Node environment (default: development) */
  NODE_ENV: string;
  /** Minimum log level: debug, info, warn, error (default: info) */
  LOG_LEVEL: string;
  /** CORS origin allowed to call the API (default: *) */
  CORS_ORIGIN: string;
  /** Whether to trust proxy headers (e.g. X-Forwarded-For) when behind nginx/load balancer (default: false) */
  TRUST_PROXY: boolean;
  /** Rate limit window duration in milliseconds (default: 900000 = 15 minutes) */
  RATE_LIMIT_WINDOW_MS: number;
  /** Maximum number of requests per window per IP (default: 300) */
  RATE_LIMIT_MAX: number;
  /** Maximum paste creations per minute per IP (default: 30) */
  CREATE_RATE_LIMIT_MAX: number;
  /** bcrypt cost factor for paste passwords (default: 12) */
  BCRYPT_SALT_ROUNDS: number;
  /** How often expired pastes are swept, in minutes (default: 60) */
  SWEEP_INTERVAL_MINUTES: number;
  /** Public base URL handed to clients for building share links, without trailing slash */
  BASE_URL: string;
  /** Display name handed to clients (default: Pastebin) */
  APP_NAME: string;
  /** Secret key for admin API access. If set, admin routes require X-Admin-Key header. */
  ADMIN_API_KEY: string;
}

function parseStoreProvider(raw: string | undefined): StoreProvider {
  const value = (raw || "postgres").toLowerCase();
  if (value === "postgres" || value === "memory") {
    return value;
  }
  throw new Error(
    `Unknown STORE_PROVIDER: "${raw}". Supported providers: postgres, memory`
  );
}

function stripTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

/**
 * Returns the names of required environment variables that are missing.
 * DATABASE_URL is only required for the postgres store.
 */
function findMissingVars(provider: StoreProvider): string[] {
  const required = provider === "postgres" ? ["DATABASE_URL"] : [];
  return required.filter((name) => {
    const value = process.env[name];
    return value === undefined || value.trim() === "";
  });
}

/**
 * Load and validate environment configuration.
 * Throws a descriptive error listing all missing variables.
 */
function loadEnvConfig(): EnvConfig {
  const provider = parseStoreProvider(process.env.STORE_PROVIDER);
  const missing = findMissingVars(provider);

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
    STORE_PROVIDER: provider,
    DATABASE_URL: process.env.DATABASE_URL || "",
    PORT: parseInt(process.env.PORT || "8097", 10),
    NODE_ENV: process.env.NODE_ENV || "development",
    LOG_LEVEL: (process.env.LOG_LEVEL || "info").toLowerCase(),
    CORS_ORIGIN: process.env.CORS_ORIGIN || "*",
    TRUST_PROXY:
      process.env.TRUST_PROXY === "true" || process.env.TRUST_PROXY === "1",
    RATE_LIMIT_WINDOW_MS: parseInt(
      process.env.RATE_LIMIT_WINDOW_MS || "900000",
      10
    ),
    RATE_LIMIT_MAX: parseInt(process.env.RATE_LIMIT_MAX || "300", 10),
    CREATE_RATE_LIMIT_MAX: parseInt(
      process.env.CREATE_RATE_LIMIT_MAX || "30",
      10
    ),
    BCRYPT_SALT_ROUNDS: parseInt(process.env.BCRYPT_SALT_ROUNDS || "12", 10),
    SWEEP_INTERVAL_MINUTES: parseFloat(
      process.env.SWEEP_INTERVAL_MINUTES || "60"
    ),
    BASE_URL: stripTrailingSlash(
      process.env.BASE_URL || "http://localhost:8097"
    ),
    APP_NAME: process.env.APP_NAME || "Pastebin",
    ADMIN_API_KEY: process.env.ADMIN_API_KEY || "",
  };
}

// Validate and export config as a singleton
const env = loadEnvConfig();

export { env };
export type { EnvConfig, StoreProvider };
