/**
 * Configuration loading for the todo service.
 * Reads environment variables and validates them with Zod.
 * @module config
 */

import { z } from "zod";
import { MEMORY_DATABASE } from "./db/connection.js";

// ============================================
// Types
// ============================================

/** Log levels understood by the logger (npm levels). */
export const LOG_LEVELS = [
  "error",
  "warn",
  "info",
  "http",
  "verbose",
  "debug",
  "silly",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Listen address.
 */
export interface BindAddress {
  host: string;
  port: number;
}

/**
 * Resolved service configuration.
 */
export interface ServiceConfig {
  /** Address the HTTP server listens on */
  bind: BindAddress;
  /** Store connection string as given */
  databaseUrl: string;
  /** SQLite filename derived from databaseUrl */
  databasePath: string;
  /** Diagnostic verbosity */
  logLevel: LogLevel;
  /** Answer CORS pre-flights and add permissive CORS headers */
  cors: boolean;
}

// ============================================
// Defaults
// ============================================

export const DEFAULT_BIND_ADDR = "127.0.0.1:3000";
export const DEFAULT_DATABASE_URL = "sqlite:db.sqlite";
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

// ============================================
// Parsers
// ============================================

const portSchema = z.coerce.number().int().min(0).max(65535);

/**
 * Parse `host:port` or `[ipv6]:port`.
 *
 * @throws {Error} If the address has no port or the port is out of range
 */
export function parseBindAddr(value: string): BindAddress {
  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d+)$/.exec(value.trim());
  const host = match?.[1] ?? match?.[2];
  const port = portSchema.safeParse(match?.[3]);

  if (!host || !port.success) {
    throw new Error(
      `Invalid BIND_ADDR "${value}": expected host:port, e.g. ${DEFAULT_BIND_ADDR}`,
    );
  }

  return { host, port: port.data };
}

/**
 * Resolve a SQLite connection string to a filename.
 *
 * Accepts `sqlite:<path>`, `sqlite://<path>`, `sqlite::memory:` and a
 * bare path. Query strings (`?mode=rwc`) are ignored.
 *
 * @throws {Error} If the URL names another database scheme
 */
export function resolveDatabasePath(url: string): string {
  const trimmed = url.trim();
  const schemeMatch = /^([a-z][a-z0-9+.-]*):(?!\\)/i.exec(trimmed);

  if (!schemeMatch || schemeMatch[1]?.length === 1) {
    // bare path, including Windows drive letters
    return stripQuery(trimmed);
  }

  if (schemeMatch[1]?.toLowerCase() !== "sqlite") {
    throw new Error(
      `Invalid DATABASE_URL "${url}": only sqlite: URLs are supported`,
    );
  }

  const rest = stripQuery(trimmed.slice(schemeMatch[0].length));
  if (rest === MEMORY_DATABASE) {
    return MEMORY_DATABASE;
  }

  const path = rest.startsWith("//") ? rest.slice(2) : rest;
  if (path.length === 0) {
    throw new Error(`Invalid DATABASE_URL "${url}": missing database path`);
  }
  return path;
}

function stripQuery(value: string): string {
  const index = value.indexOf("?");
  return index === -1 ? value : value.slice(0, index);
}

// ============================================
// Zod Schema
// ============================================

const envSchema = z.object({
  BIND_ADDR: z.string().min(1).default(DEFAULT_BIND_ADDR),
  DATABASE_URL: z.string().min(1).default(DEFAULT_DATABASE_URL),
  LOG_LEVEL: z
    .string()
    .transform((level) => level.trim().toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .default(DEFAULT_LOG_LEVEL),
  CORS_ENABLED: z
    .enum(["true", "false", "1", "0"])
    .transform((flag) => flag === "true" || flag === "1")
    .default("false"),
});

// ============================================
// Public API
// ============================================

/**
 * Load configuration from environment variables.
 *
 * Empty variables are treated as unset.
 *
 * @param env - Environment to read (default: process.env)
 * @throws {Error} Naming every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const config = loadConfig({ BIND_ADDR: "0.0.0.0:8080" });
 * ```
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ServiceConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      present[key] = value;
    }
  }

  const parseResult = envSchema.safeParse(present);
  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const parsed = parseResult.data;
  return {
    bind: parseBindAddr(parsed.BIND_ADDR),
    databaseUrl: parsed.DATABASE_URL,
    databasePath: resolveDatabasePath(parsed.DATABASE_URL),
    logLevel: parsed.LOG_LEVEL,
    cors: parsed.CORS_ENABLED,
  };
}
