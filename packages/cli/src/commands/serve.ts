/**
 * Serve command - runs the demo server with per-request profiling.
 */

import { createDemoServer, startServer } from "@taskscope/fastify";
import { formatSummary } from "@taskscope/core";

export interface ServeCommandOptions {
  port: string;
}

export async function serveCommand(options: ServeCommandOptions): Promise<void> {
  const port = Number.parseInt(options.port, 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    console.error(`Invalid port: ${options.port}`);
    process.exitCode = 1;
    return;
  }

  const app = await createDemoServer({
    onStats: (stats, request) => {
      request.log.info(
        { taskscope: { backend: stats.backend, tasks: stats.tasksCreated } },
        `taskscope: ${formatSummary(stats)}`
      );
    },
  });
  await startServer(app, port);

  const shutdown = async () => {
    console.log("\nShutting down...");
    await app.close();
  };

  process.on("SIGINT", () => shutdown().then(() => process.exit(0)));
  process.on("SIGTERM", () => shutdown().then(() => process.exit(0)));
}
