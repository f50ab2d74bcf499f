/**
 * Short Link API Service
 *
 * Main entry point. Owns the process-wide registry: it is created here at
 * startup, injected into every service, and dropped when the process exits.
 *
 * Endpoints:
 *   POST /shorturls             - Create new short link
 *   GET  /shorturls/:shortcode  - Link statistics
 *   GET  /:shortcode            - Redirect to original URL
 *   GET  /health                - Health check
 */

import type { FastifyInstance } from "fastify";
import { logger } from "@shortlink/logger";
import { createRegistry } from "@shortlink/registry";

import { loadConfig, validateConfig } from "./config.js";
import { buildApp } from "./app.js";
import { createServices } from "./services/index.js";

// ============================================================================
// Graceful Shutdown
// ============================================================================

async function gracefulShutdown(fastify: FastifyInstance, signal: string): Promise<void> {
  logger.info({ signal }, "Received shutdown signal");

  try {
    await fastify.close();
    logger.info("Fastify server closed");
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "Error during shutdown");
    process.exit(1);
  }
}

// ============================================================================
// Server Start
// ============================================================================

async function start(): Promise<void> {
  const config = validateConfig(loadConfig(), logger);

  const registry = createRegistry({
    codeLength: config.shortcodeLength,
    defaultValidityMinutes: config.defaultValidityMinutes,
  });

  const services = createServices(registry, {
    baseUrl: config.shortUrlBase,
    geoTimeoutMs: config.geoTimeoutMs,
  });

  const fastify = await buildApp(config, services);

  process.on("SIGINT", () => void gracefulShutdown(fastify, "SIGINT"));
  process.on("SIGTERM", () => void gracefulShutdown(fastify, "SIGTERM"));

  await fastify.listen({ port: config.port, host: config.host });

  logger.info(`Short link API running on http://${config.host}:${config.port}`);
  logger.info(`Base URL for short links: ${config.shortUrlBase}`);
}

start().catch((err: unknown) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
