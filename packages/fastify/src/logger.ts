/**
 * Route profiler log lines into Fastify's pino logger.
 */

import type { FastifyBaseLogger } from "fastify";
import type { ProfilerLogger } from "@taskscope/core";

export function pinoLogger(log: FastifyBaseLogger): ProfilerLogger {
  return {
    debug: (message) => log.debug(message),
    info: (message) => log.info(message),
    warn: (message) => log.warn(message),
    error: (message) => log.error(message),
  };
}
