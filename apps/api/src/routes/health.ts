/**
 * Health Check Routes
 *
 * Liveness probe for load balancers and orchestrators. The registry lives in
 * process memory, so there is no dependency to check: a response means the
 * process is serving.
 */

import type { FastifyInstance } from "fastify";
import type { LivenessResponse } from "../types.js";

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get("/health", async (): Promise<LivenessResponse> => {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      total_urls: fastify.services.registry.size(),
    };
  });
}
