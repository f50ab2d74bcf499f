/**
 * @shortlink/shared - Shared Package Exports
 *
 * Central export point for shared types, utilities, constants and errors.
 *
 * ```ts
 * import { generateUniqueCode, ShortLinkError, ErrorCode } from "@shortlink/shared";
 * ```
 */

// Types (LinkRecord, ClickEvent, LinkStats, etc.)
export * from "./types/index.js";

// Utilities (short code generation, code/URL/validity validation)
export * from "./utils/index.js";

// Constants (SHORTCODE_CONFIG, LINK_CONFIG, URL_CONFIG, CLICK_DEFAULTS)
export * from "./constants/index.js";

// Error taxonomy
export * from "./errors.js";
