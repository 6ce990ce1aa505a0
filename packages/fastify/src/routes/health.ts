/**
 * Health check endpoint.
 */

import type { FastifyInstance } from "fastify";
import { availableBackends } from "@taskscope/core";

export async function registerHealthRoutes(app: FastifyInstance): Promise<void> {
  app.get("/api/health", async () => {
    return {
      status: "ok",
      pid: process.pid,
      uptime: process.uptime(),
      backends: availableBackends(),
    };
  });
}
