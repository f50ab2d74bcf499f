/**
 * API Service Type Definitions
 */

import type { LogLevel } from "@shortlink/logger";

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Service configuration loaded from environment
 */
export interface Config {
  /** Environment name (development, test, production) */
  env: "development" | "test" | "production";

  /** HTTP server port */
  port: number;

  /** HTTP server host */
  host: string;

  /** Base URL short links are rendered against (no trailing slash) */
  shortUrlBase: string;

  /** Validity applied when a create request has none (minutes) */
  defaultValidityMinutes: number;

  /** Length of generated short codes */
  shortcodeLength: number;

  /** Upper bound on a single geo lookup (ms) */
  geoTimeoutMs: number;

  /** Honour X-Forwarded-For when deriving the client IP */
  trustProxy: boolean;

  /** Allowed CORS origin; true reflects any origin */
  corsOrigin: string | true;

  /** Log level */
  logLevel: LogLevel;
}

// =============================================================================
// Response Types
// =============================================================================

export interface CreateShortUrlResponse {
  shortLink: string;
  expiry: string;
}

export interface ClickData {
  timestamp: string;
  source: string;
  user_agent: string;
  ip: string;
  geographical_info: string;
}

export interface ShortUrlStatsResponse {
  shortcode: string;
  original_url: string;
  total_clicks: number;
  created_at: string;
  expiry: string;
  clicks_data: ClickData[];
  is_expired: boolean;
}

export interface ErrorResponse {
  success: false;
  error: string;
  errorCode: string;
  details?: Record<string, string[] | undefined>;
}

/**
 * Liveness probe response
 */
export interface LivenessResponse {
  status: "ok";
  timestamp: string;
  total_urls: number;
}
