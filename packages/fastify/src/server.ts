/**
 * Fastify server factory for the demo application.
 */

import Fastify, { type FastifyInstance } from "fastify";
import { defaultRuntime } from "@taskscope/core";
import { registerTaskscope, type TaskscopeOptions } from "./plugin.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerDemoRoutes } from "./routes/demo.js";

export interface CreateDemoServerOptions extends TaskscopeOptions {
  /** Fastify request logging (default true) */
  logger?: boolean;
}

/**
 * Create the demo server with profiling hooks on every route except
 * the health check.
 */
export async function createDemoServer(
  options: CreateDemoServerOptions = {}
): Promise<FastifyInstance> {
  const { logger = true, runtime = defaultRuntime, ...taskscope } = options;

  const app = Fastify({ logger });

  await registerTaskscope(app, {
    shouldProfile: (request) => request.url !== "/api/health",
    ...taskscope,
    runtime,
  });

  // Register routes
  await registerHealthRoutes(app);
  await registerDemoRoutes(app, { runtime });

  return app;
}

/**
 * Start the server on localhost only.
 */
export async function startServer(
  app: FastifyInstance,
  port: number
): Promise<void> {
  await app.listen({
    port,
    host: "127.0.0.1",
  });
  console.log(`taskscope demo server listening on http://127.0.0.1:${port}`);
}
