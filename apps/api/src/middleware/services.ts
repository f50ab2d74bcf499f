/**
 * Services Plugin
 *
 * Decorates the Fastify instance with the service container so route
 * handlers share one registry without reaching for module globals.
 */

import type { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import type { Services } from "../services/index.js";

// ============================================================================
// Type Augmentation
// ============================================================================

declare module "fastify" {
  interface FastifyInstance {
    services: Services;
  }
}

export interface ServicesPluginOptions {
  services: Services;
}

const servicesPluginImpl: FastifyPluginAsync<ServicesPluginOptions> = async (fastify, opts) => {
  fastify.decorate("services", opts.services);
};

export const servicesPlugin = fp(servicesPluginImpl, {
  name: "shortlink-services",
});
