/**
 * @shortlink/analytics - Click analytics
 *
 * Features:
 * - Click event construction from request metadata
 * - Best-effort, time-bounded geo lookup
 * - Per-link reports (totals, click log, expiry status)
 *
 * Usage:
 * ```ts
 * import { buildClickDetails, createReporter, StaticGeoLocator } from "@shortlink/analytics";
 * ```
 */

export { AnalyticsReporter, createReporter } from "./reporter.js";
export type { ReporterOptions } from "./reporter.js";

export { buildClickDetails } from "./events/click.js";
export type { BuildClickDetailsOptions } from "./events/click.js";

export {
  StaticGeoLocator,
  resolveLocation,
  isLoopback,
  DEFAULT_GEO_TIMEOUT_MS,
} from "./geo.js";
export type { GeoLocator } from "./geo.js";
