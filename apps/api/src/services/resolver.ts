/**
 * Redirect Resolver
 *
 * Flow:
 * 1. Look up the record (NOT_FOUND)
 * 2. Reject expired records (EXPIRED)
 * 3. Build the click details (time-bounded geo lookup)
 * 4. Stamp the click and append it to the record's click log in one tick,
 *    so the log is in timestamp order
 * 5. Return the destination URL
 *
 * The click is recorded before resolve() settles. If recording fails the
 * failure is logged and the URL is still returned.
 */

import { ErrorCode, ShortLinkError, type RequestContext } from "@shortlink/shared";
import type { LinkRegistry } from "@shortlink/registry";
import {
  buildClickDetails,
  DEFAULT_GEO_TIMEOUT_MS,
  StaticGeoLocator,
  type GeoLocator,
} from "@shortlink/analytics";
import { createLogger, logEvent, type Logger } from "@shortlink/logger";

export interface ResolverOptions {
  locator?: GeoLocator;
  geoTimeoutMs?: number;
  logger?: Logger;
}

export class RedirectResolver {
  private readonly registry: LinkRegistry;
  private readonly locator: GeoLocator;
  private readonly geoTimeoutMs: number;
  private readonly log: Logger;

  constructor(registry: LinkRegistry, options: ResolverOptions = {}) {
    this.registry = registry;
    this.locator = options.locator ?? new StaticGeoLocator();
    this.geoTimeoutMs = options.geoTimeoutMs ?? DEFAULT_GEO_TIMEOUT_MS;
    this.log = options.logger ?? createLogger("resolver");
  }

  /**
   * Resolve a short code to its destination and record the click.
   *
   * @throws ShortLinkError NOT_FOUND | EXPIRED
   */
  async resolve(code: string, context: RequestContext): Promise<string> {
    if (!this.registry.has(code)) {
      logEvent(this.log, "SHORTCODE_NOT_FOUND", { shortcode: code }, "debug");
      throw new ShortLinkError(ErrorCode.NOT_FOUND, "Short URL not found");
    }

    const record = this.registry.target(code);

    if (this.registry.isExpired(record)) {
      logEvent(this.log, "URL_EXPIRED", { shortcode: code }, "debug");
      throw new ShortLinkError(ErrorCode.EXPIRED, "Short URL has expired");
    }

    try {
      const details = await buildClickDetails(context, {
        locator: this.locator,
        geoTimeoutMs: this.geoTimeoutMs,
      });
      this.registry.recordClick(code, { ...details, timestamp: this.registry.now() });
    } catch (err) {
      logEvent(this.log, "CLICK_RECORD_FAILED", { shortcode: code, err }, "warn");
    }

    logEvent(this.log, "URL_REDIRECT", {
      shortcode: code,
      destination: record.originalUrl,
      clientIp: context.ip,
    });

    return record.originalUrl;
  }
}
