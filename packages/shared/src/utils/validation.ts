/**
 * Link Input Validation
 *
 * Rules applied at the registry boundary. The HTTP layer checks the same
 * constraints with zod first; these functions are the authoritative copy.
 */

import { LINK_CONFIG, URL_CONFIG } from "../constants/index.js";
import type { ValidationResult } from "./shortcode.js";

/**
 * Validate a destination URL.
 *
 * Rules:
 * - Parses as an absolute URL
 * - Protocol is http: or https:
 * - Has a host
 * - At most URL_CONFIG.MAX_LENGTH characters
 */
export function validateUrl(url: string): ValidationResult {
  if (url.length > URL_CONFIG.MAX_LENGTH) {
    return {
      valid: false,
      error: `URL too long (max ${URL_CONFIG.MAX_LENGTH} characters)`,
    };
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { valid: false, error: "Invalid URL format" };
  }

  const protocols: readonly string[] = URL_CONFIG.ALLOWED_PROTOCOLS;
  if (!protocols.includes(parsed.protocol)) {
    return { valid: false, error: "URL must use http or https" };
  }

  if (!parsed.hostname) {
    return { valid: false, error: "URL must include a host" };
  }

  return { valid: true };
}

/**
 * Resolve the validity to apply to a new link.
 *
 * `undefined` and `null` select the default; anything else must be a
 * positive integer number of minutes, at most LINK_CONFIG.MAX_VALIDITY_MINUTES.
 *
 * @returns the minutes to apply, or null when the value is invalid
 */
export function resolveValidity(
  validityMinutes: number | null | undefined,
  defaultMinutes: number = LINK_CONFIG.DEFAULT_VALIDITY_MINUTES
): number | null {
  if (validityMinutes === undefined || validityMinutes === null) {
    return defaultMinutes;
  }

  if (
    !Number.isInteger(validityMinutes) ||
    validityMinutes <= 0 ||
    validityMinutes > LINK_CONFIG.MAX_VALIDITY_MINUTES
  ) {
    return null;
  }

  return validityMinutes;
}
