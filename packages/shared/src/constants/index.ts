/**
 * Short Code Configuration Constants
 *
 * Single source of truth for short code generation and validation.
 */
export const SHORTCODE_CONFIG = {
  /**
   * Default length for auto-generated short codes.
   * 6 chars = 62^6 = ~56.8 billion combinations.
   */
  DEFAULT_LENGTH: 6,

  /**
   * Base62 alphabet: 0-9A-Za-z
   * URL-safe, case-sensitive, 62 characters total.
   */
  ALPHABET: "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz",

  /**
   * Consecutive collisions tolerated at one length before the
   * generator moves on to a code one character longer.
   */
  MAX_RETRIES_PER_LENGTH: 5,

  /** Minimum length of a caller-requested short code */
  MIN_LENGTH: 4,

  /** Requested codes: alphanumeric only */
  PATTERN: /^[A-Za-z0-9]+$/,
} as const;

/**
 * Link Lifetime Constants
 */
export const LINK_CONFIG = {
  /** Validity applied when the caller does not supply one (minutes) */
  DEFAULT_VALIDITY_MINUTES: 30,

  /**
   * Longest accepted validity: 100 years (minutes).
   * Keeps createdAt + validity well inside the Date range.
   */
  MAX_VALIDITY_MINUTES: 52_560_000,
} as const;

/**
 * URL Validation Constants
 */
export const URL_CONFIG = {
  /** Maximum URL length to store */
  MAX_LENGTH: 2048,

  /** Allowed protocols */
  ALLOWED_PROTOCOLS: ["http:", "https:"] as const,
} as const;

/**
 * Click Metadata Defaults
 */
export const CLICK_DEFAULTS = {
  /** Source recorded when no Referer header was sent */
  DIRECT_SOURCE: "direct",

  /** Address recorded when the HTTP layer could not observe one */
  UNKNOWN_IP: "unknown",

  /** Location recorded when geo lookup fails or times out */
  UNKNOWN_LOCATION: "Unknown Location",

  /** Location recorded for loopback clients */
  LOCALHOST: "Localhost",

  /** User-Agent values are truncated to this many characters */
  MAX_USER_AGENT_LENGTH: 512,

  /** Referer values are truncated to this many characters */
  MAX_SOURCE_LENGTH: 2048,
} as const;
