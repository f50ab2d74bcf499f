/**
 * API Services
 *
 * Business logic layer wired around one shared registry instance.
 */

import type { LinkRegistry } from "@shortlink/registry";
import { AnalyticsReporter, type GeoLocator } from "@shortlink/analytics";
import { LinkService } from "./links.js";
import { RedirectResolver } from "./resolver.js";

export { LinkService } from "./links.js";
export type { CreateLinkResult } from "./links.js";
export { RedirectResolver } from "./resolver.js";
export type { ResolverOptions } from "./resolver.js";

// ============================================================================
// Service Container
// ============================================================================

export interface Services {
  registry: LinkRegistry;
  links: LinkService;
  resolver: RedirectResolver;
  reporter: AnalyticsReporter;
}

export interface ServicesOptions {
  /** Public base URL short links are rendered against */
  baseUrl: string;
  locator?: GeoLocator;
  geoTimeoutMs?: number;
}

/**
 * Build every service on top of one registry.
 */
export function createServices(registry: LinkRegistry, options: ServicesOptions): Services {
  return {
    registry,
    links: new LinkService(registry, options.baseUrl),
    resolver: new RedirectResolver(registry, {
      locator: options.locator,
      geoTimeoutMs: options.geoTimeoutMs,
    }),
    reporter: new AnalyticsReporter(registry),
  };
}
