/**
 * Short URL Routes
 *
 * Endpoints:
 *   POST /shorturls             - Create a new short link
 *   GET  /shorturls/:shortcode  - Link statistics and click log
 *   GET  /:shortcode            - Redirect to the original URL
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import { ErrorCode, LINK_CONFIG, SHORTCODE_CONFIG, URL_CONFIG, type LinkStats, type RequestContext } from "@shortlink/shared";
import type { ErrorResponse, ShortUrlStatsResponse } from "../../types.js";

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const createShortUrlSchema = z.object({
  url: z
    .string({ required_error: "URL is required", invalid_type_error: "URL must be a string" })
    .url("Invalid URL format")
    .max(URL_CONFIG.MAX_LENGTH, `URL too long (max ${URL_CONFIG.MAX_LENGTH} characters)`),
  validity: z
    .number({ invalid_type_error: "Validity must be a number of minutes" })
    .int("Validity must be an integer")
    .positive("Validity must be greater than 0")
    .max(
      LINK_CONFIG.MAX_VALIDITY_MINUTES,
      `Validity must be at most ${LINK_CONFIG.MAX_VALIDITY_MINUTES} minutes`
    )
    .nullish(),
  shortcode: z
    .string({ invalid_type_error: "Shortcode must be a string" })
    .min(
      SHORTCODE_CONFIG.MIN_LENGTH,
      `Shortcode must be at least ${SHORTCODE_CONFIG.MIN_LENGTH} characters long`
    )
    .regex(SHORTCODE_CONFIG.PATTERN, "Shortcode can only contain alphanumeric characters")
    .nullish(),
});

interface ShortcodeParams {
  shortcode: string;
}

/**
 * Map the first failing body field to its error code.
 */
function errorCodeForField(field: string | number | undefined): ErrorCode {
  switch (field) {
    case "validity":
      return ErrorCode.INVALID_VALIDITY;
    case "shortcode":
      return ErrorCode.INVALID_CODE;
    default:
      return ErrorCode.INVALID_URL;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Pull click metadata off the request.
 * request.ip already honours X-Forwarded-For when trustProxy is on.
 */
export function extractRequestContext(request: FastifyRequest): RequestContext {
  return {
    referer: request.headers.referer,
    userAgent: request.headers["user-agent"],
    ip: request.ip,
  };
}

function toStatsResponse(stats: LinkStats): ShortUrlStatsResponse {
  return {
    shortcode: stats.shortcode,
    original_url: stats.originalUrl,
    total_clicks: stats.totalClicks,
    created_at: stats.createdAt.toISOString(),
    expiry: stats.expiresAt.toISOString(),
    clicks_data: stats.clicks.map((click) => ({
      timestamp: click.timestamp.toISOString(),
      source: click.source,
      user_agent: click.userAgent,
      ip: click.ip,
      geographical_info: click.geo,
    })),
    is_expired: stats.isExpired,
  };
}

// ============================================================================
// Route Handlers
// ============================================================================

/**
 * POST /shorturls - Create a new shortened URL
 */
async function createShortUrlHandler(
  request: FastifyRequest<{ Body: unknown }>,
  reply: FastifyReply
): Promise<FastifyReply> {
  const parseResult = createShortUrlSchema.safeParse(request.body);
  if (!parseResult.success) {
    const issue = parseResult.error.issues[0];
    const body: ErrorResponse = {
      success: false,
      error: issue?.message ?? "Validation failed",
      errorCode: errorCodeForField(issue?.path[0]),
      details: parseResult.error.flatten().fieldErrors,
    };
    return reply.status(400).send(body);
  }

  const { url, validity, shortcode } = parseResult.data;

  const result = request.server.services.links.createLink({
    url,
    validityMinutes: validity,
    shortcode,
  });

  return reply.status(201).send({
    shortLink: result.shortLink,
    expiry: result.expiry,
  });
}

/**
 * GET /shorturls/:shortcode - Statistics for a short link
 */
async function statsHandler(
  request: FastifyRequest<{ Params: ShortcodeParams }>,
  reply: FastifyReply
): Promise<FastifyReply> {
  const stats = request.server.services.reporter.report(request.params.shortcode);
  return reply.status(200).send(toStatsResponse(stats));
}

/**
 * GET /:shortcode - Redirect to the original URL
 */
async function redirectHandler(
  request: FastifyRequest<{ Params: ShortcodeParams }>,
  reply: FastifyReply
): Promise<FastifyReply> {
  const url = await request.server.services.resolver.resolve(
    request.params.shortcode,
    extractRequestContext(request)
  );

  // Every visit must reach the service to be counted
  return reply.header("Cache-Control", "no-store").redirect(302, url);
}

// ============================================================================
// Route Registration
// ============================================================================

export async function linksRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.post<{ Body: unknown }>("/shorturls", createShortUrlHandler);
  fastify.get<{ Params: ShortcodeParams }>("/shorturls/:shortcode", statsHandler);
  fastify.get<{ Params: ShortcodeParams }>("/:shortcode", redirectHandler);
}
