/**
 * Click Event Construction
 *
 * Turns the request metadata extracted by the HTTP layer into the fields of
 * a ClickEvent. The timestamp is left to the caller, which stamps the click
 * in the same tick it appends it to the log.
 */

import { CLICK_DEFAULTS, type ClickDetails, type RequestContext } from "@shortlink/shared";
import { resolveLocation, DEFAULT_GEO_TIMEOUT_MS, type GeoLocator } from "../geo.js";

export interface BuildClickDetailsOptions {
  locator: GeoLocator;
  geoTimeoutMs?: number;
}

/**
 * Build the details of a click.
 *
 * - source: Referer header, "direct" when missing or blank
 * - userAgent: truncated to 512 chars, "" when missing
 * - ip: "unknown" when the HTTP layer saw none
 * - geo: best-effort lookup, see resolveLocation()
 */
export async function buildClickDetails(
  context: RequestContext,
  options: BuildClickDetailsOptions
): Promise<ClickDetails> {
  const ip = context.ip?.trim() || CLICK_DEFAULTS.UNKNOWN_IP;
  const referer = context.referer?.trim();

  const geo = await resolveLocation(
    ip,
    options.locator,
    options.geoTimeoutMs ?? DEFAULT_GEO_TIMEOUT_MS
  );

  return {
    source: referer ? referer.slice(0, CLICK_DEFAULTS.MAX_SOURCE_LENGTH) : CLICK_DEFAULTS.DIRECT_SOURCE,
    userAgent: (context.userAgent ?? "").slice(0, CLICK_DEFAULTS.MAX_USER_AGENT_LENGTH),
    ip,
    geo,
  };
}
