/**
 * Link Creation Service
 *
 * Wraps registry creation and renders the public short link.
 */

import type { CreateLinkInput } from "@shortlink/shared";
import type { LinkRegistry } from "@shortlink/registry";

export interface CreateLinkResult {
  shortcode: string;
  /** `${baseUrl}/${shortcode}` */
  shortLink: string;
  /** ISO 8601 expiry timestamp */
  expiry: string;
}

export class LinkService {
  private readonly registry: LinkRegistry;
  private readonly baseUrl: string;

  constructor(registry: LinkRegistry, baseUrl: string) {
    this.registry = registry;
    // Strip trailing slashes so the short link never contains "//code"
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  /**
   * @throws ShortLinkError INVALID_URL | INVALID_VALIDITY | INVALID_CODE | CODE_TAKEN
   */
  createLink(input: CreateLinkInput): CreateLinkResult {
    const record = this.registry.create(input.url, input.validityMinutes, input.shortcode);

    return {
      shortcode: record.shortcode,
      shortLink: `${this.baseUrl}/${record.shortcode}`,
      expiry: record.expiresAt.toISOString(),
    };
  }
}
