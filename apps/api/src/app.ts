/**
 * Application Factory
 *
 * Builds the Fastify instance around an injected service container.
 * index.ts calls this for the real server; tests call it with an isolated
 * registry and `fastify.inject()`.
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import { ErrorCode, isShortLinkError } from "@shortlink/shared";

import type { Config, ErrorResponse } from "./types.js";
import type { Services } from "./services/index.js";
import { servicesPlugin } from "./middleware/services.js";
import { healthRoutes } from "./routes/health.js";
import { linksRoutes } from "./routes/links/index.js";

const API_VERSION = "1.0.0";

export type AppConfig = Pick<Config, "env" | "logLevel" | "trustProxy" | "corsOrigin">;

export async function buildApp(config: AppConfig, services: Services): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      transport:
        config.env === "development"
          ? {
              target: "pino-pretty",
              options: { colorize: true },
            }
          : undefined,
    },
    trustProxy: config.trustProxy,
    requestIdHeader: "x-request-id",
  });

  // ==========================================================================
  // Plugins
  // ==========================================================================

  await fastify.register(helmet, {
    contentSecurityPolicy: config.env === "production",
  });

  await fastify.register(cors, {
    origin: config.corsOrigin,
  });

  await fastify.register(servicesPlugin, { services });

  // ==========================================================================
  // Lifecycle Hooks
  // ==========================================================================

  fastify.addHook("onRequest", async (request) => {
    request.log.info({ url: request.url, method: request.method }, "Incoming request");
  });

  fastify.addHook("onResponse", async (request, reply) => {
    request.log.info(
      {
        url: request.url,
        method: request.method,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      "Request completed"
    );
  });

  // ==========================================================================
  // Error Handling
  // ==========================================================================

  fastify.setNotFoundHandler((request, reply) => {
    const body: ErrorResponse = {
      success: false,
      error: "Not Found",
      errorCode: ErrorCode.NOT_FOUND,
    };
    return reply.status(404).send(body);
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (isShortLinkError(error)) {
      request.log.info({ errorCode: error.code }, error.message);
      const body: ErrorResponse = {
        success: false,
        error: error.message,
        errorCode: error.code,
      };
      return reply.status(error.statusCode).send(body);
    }

    // Malformed requests rejected by Fastify itself (bad JSON, wrong content type)
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      request.log.info({ err: error }, "Rejected request");
      const body: ErrorResponse = {
        success: false,
        error: error.message,
        errorCode: error.code || "BAD_REQUEST",
      };
      return reply.status(error.statusCode).send(body);
    }

    request.log.error({ err: error }, "Request error");
    const body: ErrorResponse = {
      success: false,
      error: "Internal server error",
      errorCode: ErrorCode.INTERNAL,
    };
    return reply.status(500).send(body);
  });

  // ==========================================================================
  // Routes
  // ==========================================================================

  fastify.get("/", async () => {
    return {
      message: "URL Shortener API",
      version: API_VERSION,
      endpoints: {
        create_url: "POST /shorturls",
        redirect: "GET /{shortcode}",
        stats: "GET /shorturls/{shortcode}",
        health: "GET /health",
      },
    };
  });

  await fastify.register(healthRoutes);
  await fastify.register(linksRoutes);

  return fastify;
}
