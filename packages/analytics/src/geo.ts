/**
 * Geo Lookup
 *
 * Best-effort coarse location for a client address. No provider is part of
 * the service contract: the default locator resolves nothing and every
 * click outside loopback is recorded as "Unknown Location".
 *
 * A real provider plugs in through GeoLocator. Lookups are raced against a
 * timeout so a slow provider can never stall a redirect.
 */

import { CLICK_DEFAULTS } from "@shortlink/shared";

// =============================================================================
// Types
// =============================================================================

export interface GeoLocator {
  /**
   * Resolve an address to a human-readable location,
   * or null when the provider has no answer.
   */
  locate(ip: string): Promise<string | null>;
}

/** Default timeout for a single lookup (ms) */
export const DEFAULT_GEO_TIMEOUT_MS = 50;

const LOOPBACK_ADDRESSES: ReadonlySet<string> = new Set([
  "127.0.0.1",
  "::1",
  "::ffff:127.0.0.1",
  "localhost",
]);

// =============================================================================
// Locators
// =============================================================================

/**
 * Locator that knows no locations.
 */
export class StaticGeoLocator implements GeoLocator {
  async locate(_ip: string): Promise<string | null> {
    return null;
  }
}

// =============================================================================
// Lookup
// =============================================================================

export function isLoopback(ip: string): boolean {
  return LOOPBACK_ADDRESSES.has(ip);
}

/**
 * Resolve a location for a click. Never throws.
 *
 * - loopback → "Localhost"
 * - provider answer within timeoutMs → that answer
 * - null, rejection or timeout → "Unknown Location"
 */
export async function resolveLocation(
  ip: string,
  locator: GeoLocator,
  timeoutMs: number = DEFAULT_GEO_TIMEOUT_MS
): Promise<string> {
  if (isLoopback(ip)) {
    return CLICK_DEFAULTS.LOCALHOST;
  }

  try {
    const location = await withTimeout(locator.locate(ip), timeoutMs);
    return location || CLICK_DEFAULTS.UNKNOWN_LOCATION;
  } catch {
    return CLICK_DEFAULTS.UNKNOWN_LOCATION;
  }
}

/**
 * Wrap a promise with a timeout.
 * Returns null on timeout instead of throwing.
 */
async function withTimeout<T>(
  promise: Promise<T>,
  ms: number
): Promise<T | null> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<null>((resolve) => {
    timeoutId = setTimeout(() => resolve(null), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
