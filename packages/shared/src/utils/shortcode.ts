/**
 * Short Code Generation Module
 *
 * Strategy: Random Base62
 * - Length: 6 characters by default (62^6 = ~56.8 billion combinations)
 * - Alphabet: 0-9A-Za-z (62 URL-safe characters)
 * - Collision handling: existence check → retry, growing the code by one
 *   character after every MAX_RETRIES_PER_LENGTH consecutive collisions
 *
 * The generator never gives up. Uniqueness is guaranteed by the
 * loop-and-check against the store, not by the odds of a collision.
 */

import { webcrypto } from "node:crypto";
import { SHORTCODE_CONFIG } from "../constants/index.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Result of a validation operation
 */
export interface ValidationResult {
  /** Whether the input is valid */
  valid: boolean;
  /** Human-readable error message if invalid */
  error?: string;
}

/**
 * Function signature for checking whether a code is already in use.
 *
 * Must be synchronous: the registry runs check and insert in the same tick.
 */
export type ExistsChecker = (code: string) => boolean;

// =============================================================================
// SECTION 1: GENERATION
// =============================================================================

/**
 * Generate a random Base62 short code.
 *
 * Uses `crypto.getRandomValues()` so codes cannot be enumerated.
 *
 * @example
 * ```ts
 * const code = generateRandomCode();    // "aB3xY9"
 * const longer = generateRandomCode(10); // "aB3xY9kM2p"
 * ```
 */
export function generateRandomCode(length: number = SHORTCODE_CONFIG.DEFAULT_LENGTH): string {
  const bytes = new Uint8Array(length);
  webcrypto.getRandomValues(bytes);

  let code = "";
  for (let i = 0; i < length; i++) {
    // Note: Slight bias (256 % 62 = 8) is acceptable for URL shortening
    const index = bytes[i] % SHORTCODE_CONFIG.ALPHABET.length;
    code += SHORTCODE_CONFIG.ALPHABET[index];
  }

  return code;
}

/**
 * Generate a short code that `exists` reports as unused.
 *
 * Collision Handling Flow:
 * 1. Generate random code at the current length
 * 2. Check existence → if taken, retry
 * 3. After MAX_RETRIES_PER_LENGTH misses, grow the length by one
 *
 * @param exists - Returns true when the code is already taken
 * @param length - Starting code length
 *
 * @example
 * ```ts
 * const code = generateUniqueCode((code) => records.has(code));
 * ```
 */
export function generateUniqueCode(
  exists: ExistsChecker,
  length: number = SHORTCODE_CONFIG.DEFAULT_LENGTH
): string {
  let currentLength = length;
  let misses = 0;

  for (;;) {
    const code = generateRandomCode(currentLength);
    if (!exists(code)) {
      return code;
    }

    misses++;
    if (misses >= SHORTCODE_CONFIG.MAX_RETRIES_PER_LENGTH) {
      currentLength++;
      misses = 0;
    }
  }
}

// =============================================================================
// SECTION 2: VALIDATION
// =============================================================================

/**
 * Validate a caller-requested short code.
 *
 * Rules:
 * - At least MIN_LENGTH (4) characters
 * - Alphanumeric only (a-z, A-Z, 0-9)
 *
 * @example
 * ```ts
 * validateShortCode("abcd")  // { valid: true }
 * validateShortCode("ab-c")  // { valid: false, error: "..." }
 * ```
 */
export function validateShortCode(code: string): ValidationResult {
  const { MIN_LENGTH, PATTERN } = SHORTCODE_CONFIG;

  if (code.length < MIN_LENGTH) {
    return {
      valid: false,
      error: `Shortcode must be at least ${MIN_LENGTH} characters long`,
    };
  }

  if (!PATTERN.test(code)) {
    return {
      valid: false,
      error: "Shortcode can only contain alphanumeric characters",
    };
  }

  return { valid: true };
}
