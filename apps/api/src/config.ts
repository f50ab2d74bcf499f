/**
 * Configuration Module
 *
 * Loads configuration from environment variables.
 * No validation libraries - just simple parsing with defaults.
 */

import { LINK_CONFIG, SHORTCODE_CONFIG } from "@shortlink/shared";
import { DEFAULT_GEO_TIMEOUT_MS } from "@shortlink/analytics";
import type { Logger, LogLevel } from "@shortlink/logger";
import type { Config } from "./types.js";

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function optionalBool(env: Env, name: string, defaultValue: boolean): boolean {
  const value = env[name];
  if (!value) return defaultValue;
  return !["false", "0", "no", "off"].includes(value.toLowerCase());
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load configuration from environment.
 * Call once at startup.
 */
export function loadConfig(env: Env = process.env): Config {
  const port = optionalInt(env, "PORT", 8000);

  return {
    env: parseEnv(optional(env, "NODE_ENV", "development")),

    // Server
    port,
    host: optional(env, "HOST", "0.0.0.0"),
    shortUrlBase: optional(env, "SHORT_URL_BASE", `http://localhost:${port}`).replace(/\/+$/, ""),
    trustProxy: optionalBool(env, "TRUST_PROXY", true),
    corsOrigin: env.CORS_ORIGIN || true,

    // Links
    defaultValidityMinutes: optionalInt(
      env,
      "DEFAULT_VALIDITY_MINUTES",
      LINK_CONFIG.DEFAULT_VALIDITY_MINUTES
    ),
    shortcodeLength: optionalInt(env, "SHORTCODE_LENGTH", SHORTCODE_CONFIG.DEFAULT_LENGTH),

    // Analytics
    geoTimeoutMs: optionalInt(env, "GEO_TIMEOUT_MS", DEFAULT_GEO_TIMEOUT_MS),

    // Logging
    logLevel: parseLogLevel(optional(env, "LOG_LEVEL", "info")),
  };
}

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function parseLogLevel(level: string): LogLevel {
  const normalized = level.toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === normalized) ?? "info";
}

function parseEnv(value: string): Config["env"] {
  if (value === "production" || value === "test") {
    return value;
  }
  return "development";
}

/**
 * Validate configuration at runtime.
 * Logs warnings for suboptimal settings and returns a corrected copy.
 */
export function validateConfig(config: Config, log: Logger): Config {
  const fixed = { ...config };

  if (fixed.shortcodeLength < SHORTCODE_CONFIG.MIN_LENGTH) {
    log.warn(
      `[config] SHORTCODE_LENGTH=${fixed.shortcodeLength} is below ${SHORTCODE_CONFIG.MIN_LENGTH}. Using ${SHORTCODE_CONFIG.MIN_LENGTH}.`
    );
    fixed.shortcodeLength = SHORTCODE_CONFIG.MIN_LENGTH;
  }

  if (
    fixed.defaultValidityMinutes <= 0 ||
    fixed.defaultValidityMinutes > LINK_CONFIG.MAX_VALIDITY_MINUTES
  ) {
    log.warn(
      `[config] DEFAULT_VALIDITY_MINUTES=${fixed.defaultValidityMinutes} is outside 1..${LINK_CONFIG.MAX_VALIDITY_MINUTES}. Using ${LINK_CONFIG.DEFAULT_VALIDITY_MINUTES}.`
    );
    fixed.defaultValidityMinutes = LINK_CONFIG.DEFAULT_VALIDITY_MINUTES;
  }

  if (fixed.geoTimeoutMs > 200) {
    log.warn(
      `[config] GEO_TIMEOUT_MS=${fixed.geoTimeoutMs}ms is high. Slow lookups delay every redirect.`
    );
  }

  return fixed;
}
