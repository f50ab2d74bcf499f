/**
 * Analytics Reporter
 *
 * Read-only view of a link and its click log. Expiry is evaluated at call
 * time against the registry clock, so expired links still report.
 *
 * The full click list is returned; there is no pagination or cap.
 */

import type { LinkStats } from "@shortlink/shared";
import type { LinkRegistry } from "@shortlink/registry";
import { createLogger, logEvent, type Logger } from "@shortlink/logger";

export interface ReporterOptions {
  logger?: Logger;
}

export class AnalyticsReporter {
  private readonly registry: LinkRegistry;
  private readonly log: Logger;

  constructor(registry: LinkRegistry, options: ReporterOptions = {}) {
    this.registry = registry;
    this.log = options.logger ?? createLogger("analytics");
  }

  /**
   * @throws ShortLinkError NOT_FOUND
   */
  report(code: string): LinkStats {
    const record = this.registry.get(code);
    const isExpired = this.registry.isExpired(record);

    logEvent(
      this.log,
      "STATS_ACCESSED",
      { shortcode: code, totalClicks: record.clicks.length, isExpired },
      "debug"
    );

    return {
      shortcode: record.shortcode,
      originalUrl: record.originalUrl,
      createdAt: record.createdAt,
      expiresAt: record.expiresAt,
      totalClicks: record.clicks.length,
      clicks: record.clicks,
      isExpired,
    };
  }
}

/**
 * Create an AnalyticsReporter bound to a registry
 */
export function createReporter(
  registry: LinkRegistry,
  options: ReporterOptions = {}
): AnalyticsReporter {
  return new AnalyticsReporter(registry, options);
}
