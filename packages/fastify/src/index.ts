/**
 * @taskscope/fastify
 *
 * Per-request task profiling for Fastify, plus a demo server.
 */

export {
  registerTaskscope,
  SERVER_TIMING_HEADER,
  SUMMARY_HEADER,
  type StatsHandler,
  type TaskscopeOptions,
} from "./plugin.js";
export { pinoLogger } from "./logger.js";
export {
  createDemoServer,
  startServer,
  type CreateDemoServerOptions,
} from "./server.js";
