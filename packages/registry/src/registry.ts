/**
 * In-Memory Link Registry
 *
 * The authoritative store of short code → link record mappings.
 *
 * Concurrency model:
 *   Every public method is synchronous and never awaits. On the Node.js
 *   event loop each call therefore runs to completion before any other
 *   request handler can observe or mutate the store:
 *   - create(): existence check + insert happen in one tick, so two
 *     concurrent requests for the same code cannot both succeed
 *   - recordClick(): the append to a record's click log is a single
 *     push, so no click is lost and clicks land in call order
 *   Records for different codes are independent objects; no operation
 *   touches more than one record.
 *
 * Expiry is computed on read against the injected clock. Records are never
 * deleted, so an expired code is never handed out again.
 */

import {
  ErrorCode,
  LINK_CONFIG,
  SHORTCODE_CONFIG,
  ShortLinkError,
  generateUniqueCode,
  resolveValidity,
  validateShortCode,
  validateUrl,
  type ClickEvent,
  type Clock,
  type LinkRecord,
} from "@shortlink/shared";
import { createLogger, logEvent, type Logger } from "@shortlink/logger";

// =============================================================================
// Types
// =============================================================================

export interface RegistryOptions {
  /** Time source (default: wall clock) */
  clock?: Clock;

  /** Length of generated short codes */
  codeLength?: number;

  /** Validity applied when create() is called without one (minutes) */
  defaultValidityMinutes?: number;

  logger?: Logger;
}

export type LinkTarget = Pick<LinkRecord, "shortcode" | "originalUrl" | "expiresAt">;

const MS_PER_MINUTE = 60_000;

// =============================================================================
// Registry
// =============================================================================

export class LinkRegistry {
  private readonly records = new Map<string, LinkRecord>();
  private readonly clock: Clock;
  private readonly codeLength: number;
  private readonly defaultValidityMinutes: number;
  private readonly log: Logger;

  constructor(options: RegistryOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.codeLength = options.codeLength ?? SHORTCODE_CONFIG.DEFAULT_LENGTH;
    this.defaultValidityMinutes =
      options.defaultValidityMinutes ?? LINK_CONFIG.DEFAULT_VALIDITY_MINUTES;
    this.log = options.logger ?? createLogger("registry");
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  /**
   * Register a new link.
   *
   * Validation order: url, validity, requested code.
   *
   * @throws ShortLinkError INVALID_URL | INVALID_VALIDITY | INVALID_CODE | CODE_TAKEN
   */
  create(
    url: string,
    validityMinutes?: number | null,
    requestedCode?: string | null
  ): LinkRecord {
    const urlCheck = validateUrl(url);
    if (!urlCheck.valid) {
      throw new ShortLinkError(ErrorCode.INVALID_URL, urlCheck.error ?? "Invalid URL");
    }

    const validity = resolveValidity(validityMinutes, this.defaultValidityMinutes);
    if (validity === null) {
      throw new ShortLinkError(
        ErrorCode.INVALID_VALIDITY,
        `Validity must be a whole number of minutes between 1 and ${LINK_CONFIG.MAX_VALIDITY_MINUTES}`
      );
    }

    let shortcode: string;
    if (requestedCode !== undefined && requestedCode !== null) {
      const codeCheck = validateShortCode(requestedCode);
      if (!codeCheck.valid) {
        throw new ShortLinkError(ErrorCode.INVALID_CODE, codeCheck.error ?? "Invalid shortcode");
      }
      if (this.records.has(requestedCode)) {
        logEvent(this.log, "SHORTCODE_EXISTS", { shortcode: requestedCode }, "warn");
        throw new ShortLinkError(ErrorCode.CODE_TAKEN, "Shortcode already exists");
      }
      shortcode = requestedCode;
    } else {
      shortcode = generateUniqueCode((code) => this.records.has(code), this.codeLength);
    }

    const createdAt = new Date(this.clock().getTime());
    const expiresAt = new Date(createdAt.getTime() + validity * MS_PER_MINUTE);
    if (Number.isNaN(expiresAt.getTime())) {
      throw new ShortLinkError(ErrorCode.INVALID_VALIDITY, "Validity is out of range");
    }

    const record: LinkRecord = {
      shortcode,
      originalUrl: url,
      createdAt,
      expiresAt,
      validityMinutes: validity,
      clicks: [],
    };
    this.records.set(shortcode, record);

    logEvent(this.log, "URL_CREATED", {
      shortcode,
      url,
      validity,
      custom: shortcode === requestedCode,
    });

    return snapshot(record);
  }

  /**
   * Append a click to a live record's log.
   *
   * @throws ShortLinkError NOT_FOUND | EXPIRED
   */
  recordClick(code: string, event: ClickEvent): void {
    const record = this.lookup(code);
    if (this.isExpired(record)) {
      throw new ShortLinkError(ErrorCode.EXPIRED, "Short URL has expired");
    }
    record.clicks.push({ ...event, timestamp: new Date(event.timestamp.getTime()) });
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Fetch a record. The returned object is a copy; mutating it has no
   * effect on the registry.
   *
   * @throws ShortLinkError NOT_FOUND
   */
  get(code: string): LinkRecord {
    return snapshot(this.lookup(code));
  }

  /**
   * Fetch only what the redirect path needs, without copying the click log.
   *
   * @throws ShortLinkError NOT_FOUND
   */
  target(code: string): LinkTarget {
    const { shortcode, originalUrl, expiresAt } = this.lookup(code);
    return { shortcode, originalUrl, expiresAt: new Date(expiresAt.getTime()) };
  }

  has(code: string): boolean {
    return this.records.has(code);
  }

  /** Expired iff now >= expiresAt */
  isExpired(record: Pick<LinkRecord, "expiresAt">): boolean {
    return this.clock().getTime() >= record.expiresAt.getTime();
  }

  /** Number of records, expired ones included */
  size(): number {
    return this.records.size;
  }

  now(): Date {
    return this.clock();
  }

  private lookup(code: string): LinkRecord {
    const record = this.records.get(code);
    if (!record) {
      throw new ShortLinkError(ErrorCode.NOT_FOUND, "Short URL not found");
    }
    return record;
  }
}

/**
 * Copy a record so callers never hold a reference to the stored click log.
 */
function snapshot(record: LinkRecord): LinkRecord {
  return {
    ...record,
    createdAt: new Date(record.createdAt.getTime()),
    expiresAt: new Date(record.expiresAt.getTime()),
    clicks: record.clicks.map((click) => ({
      ...click,
      timestamp: new Date(click.timestamp.getTime()),
    })),
  };
}

/**
 * Create a LinkRegistry from configuration
 */
export function createRegistry(options: RegistryOptions = {}): LinkRegistry {
  return new LinkRegistry(options);
}
