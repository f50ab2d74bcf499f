/**
 * Shared Type Definitions
 */

// =============================================================================
// Link Types
// =============================================================================

/**
 * A short code and everything recorded against it.
 *
 * Records are never deleted; once `expiresAt` has passed the record stops
 * redirecting but stays available for analytics.
 */
export interface LinkRecord {
  /** Unique short code (4+ alphanumeric characters) */
  shortcode: string;

  /** Absolute destination URL */
  originalUrl: string;

  /** Creation timestamp */
  createdAt: Date;

  /** createdAt + validityMinutes */
  expiresAt: Date;

  /** Lifetime the link was created with */
  validityMinutes: number;

  /** Click log, in the order clicks were recorded */
  clicks: ClickEvent[];
}

/**
 * One recorded redirect.
 */
export interface ClickEvent {
  /** Time of the redirect */
  timestamp: Date;

  /** Referer header, or "direct" */
  source: string;

  /** User-Agent header, empty when the client sent none */
  userAgent: string;

  /** Client address as observed by the HTTP layer */
  ip: string;

  /** Coarse location derived from ip */
  geo: string;
}

/** A click before it is stamped and appended */
export type ClickDetails = Omit<ClickEvent, "timestamp">;

/**
 * Link creation request, after HTTP-level validation.
 */
export interface CreateLinkInput {
  url: string;

  /** Minutes until expiry; null/undefined selects the default */
  validityMinutes?: number | null;

  /** Caller-chosen short code */
  shortcode?: string | null;
}

/**
 * Aggregated view of a link returned by the analytics reporter.
 */
export interface LinkStats {
  shortcode: string;
  originalUrl: string;
  createdAt: Date;
  expiresAt: Date;
  totalClicks: number;
  clicks: ClickEvent[];
  isExpired: boolean;
}

// =============================================================================
// Request Context
// =============================================================================

/**
 * Request metadata the redirect path turns into a ClickEvent.
 * Extracted by the HTTP layer; every field may be missing.
 */
export interface RequestContext {
  referer?: string;
  userAgent?: string;
  ip?: string;
}

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Time source. Injected so expiry can be tested without waiting.
 */
export type Clock = () => Date;
