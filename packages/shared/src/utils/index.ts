/**
 * Shared Utility Functions
 */

// Generation functions
export {
  generateRandomCode,
  generateUniqueCode,
} from "./shortcode.js";

// Validation functions
export { validateShortCode } from "./shortcode.js";
export { validateUrl, resolveValidity } from "./validation.js";

// Types
export type {
  ValidationResult,
  ExistsChecker,
} from "./shortcode.js";
