/**
 * Per-request profiling for Fastify.
 *
 * Each request is one profiling session: it begins in onRequest and ends in
 * onSend, where the Server-Timing and X-Taskscope-Summary headers are set.
 * Requests are profiled independently even when they overlap: the session's
 * unit of work is the request's own async context, entered in onRequest and
 * re-entered in preValidation once the body has been read. Replies that end
 * without onSend (hijacked replies, dropped connections, timeouts) end their
 * session when the raw response finishes or closes.
 */

import { AsyncResource } from "node:async_hooks";
import type { FastifyInstance, FastifyRequest } from "fastify";
import {
  ProfilingCoordinator,
  defaultRuntime,
  describeError,
  formatServerTiming,
  formatSummary,
  loadConfig,
  serverTimingMetrics,
  type ProfilerConfigInput,
  type ProfilerStats,
  type TaskRuntime,
} from "@taskscope/core";
import { pinoLogger } from "./logger.js";

declare module "fastify" {
  interface FastifyRequest {
    /** Finalized profiling stats, null until the request's session ends */
    taskscope: ProfilerStats | null;
  }
}

export const SUMMARY_HEADER = "x-taskscope-summary";
export const SERVER_TIMING_HEADER = "server-timing";

export type StatsHandler = (
  stats: ProfilerStats,
  request: FastifyRequest
) => void | Promise<void>;

export interface TaskscopeOptions {
  /** Defaults to the TASKSCOPE_* environment */
  config?: ProfilerConfigInput;
  /** Runtime the route handlers create tasks on */
  runtime?: TaskRuntime;
  /** Receives the finalized stats of every profiled request */
  onStats?: StatsHandler;
  /** Set Server-Timing and X-Taskscope-Summary (default true) */
  headers?: boolean;
  /** Return false to leave a request unprofiled */
  shouldProfile?: (request: FastifyRequest) => boolean;
}

interface RequestProfile {
  coordinator: ProfilingCoordinator;
  /** Async context of the request's unit of work, set once the session is up */
  context: AsyncResource | null;
}

/**
 * Install the profiling hooks on `app`. Hooks are added to the instance
 * itself, so they cover every route registered on it.
 */
export async function registerTaskscope(
  app: FastifyInstance,
  options: TaskscopeOptions = {}
): Promise<void> {
  const config = options.config ?? loadConfig(process.env, pinoLogger(app.log));
  const runtime = options.runtime ?? defaultRuntime;
  const headers = options.headers ?? true;
  const active = new WeakMap<FastifyRequest, RequestProfile>();

  async function finish(request: FastifyRequest): Promise<ProfilerStats | null> {
    const profile = active.get(request);
    if (!profile) {
      return request.taskscope;
    }
    active.delete(request);

    await profile.coordinator.stop();
    const stats = profile.coordinator.getStats();
    request.taskscope = stats;
    if (options.onStats) {
      try {
        await options.onStats(stats, request);
      } catch (error) {
        request.log.error(`Stats handler failed: ${describeError(error)}`);
      }
    }
    return stats;
  }

  function finishDetached(request: FastifyRequest): void {
    finish(request).catch((error: unknown) => {
      request.log.error(`Failed to end profiling session: ${describeError(error)}`);
    });
  }

  app.decorateRequest("taskscope", null);

  app.addHook("onRequest", (request, reply, done) => {
    if (options.shouldProfile && !options.shouldProfile(request)) {
      done();
      return;
    }
    const coordinator = new ProfilingCoordinator({
      config,
      runtime,
      logger: pinoLogger(request.log),
    });
    const profile: RequestProfile = { coordinator, context: null };
    active.set(request, profile);
    reply.raw.once("finish", () => finishDetached(request));
    reply.raw.once("close", () => finishDetached(request));

    // The rest of the lifecycle continues inside the session's unit of work
    coordinator
      .start()
      .catch((error: unknown) => {
        request.log.error(`Failed to start profiling session: ${describeError(error)}`);
      })
      .then(() =>
        coordinator.run(() => {
          profile.context = new AsyncResource("taskscope-request");
          done();
        })
      )
      .catch((error: unknown) => {
        request.log.error(`Profiling hook failed: ${describeError(error)}`);
      });
  });

  // Body parsing runs in the socket's context; step back into the request's
  app.addHook("preValidation", (request, _reply, done) => {
    const context = active.get(request)?.context;
    if (context) {
      context.runInAsyncScope(done);
    } else {
      done();
    }
  });

  app.addHook("onSend", async (request, reply, payload) => {
    const stats = await finish(request);
    if (stats && headers) {
      const timing = formatServerTiming(serverTimingMetrics(stats));
      if (timing) {
        reply.header(SERVER_TIMING_HEADER, timing);
      }
      reply.header(SUMMARY_HEADER, formatSummary(stats));
    }
    return payload;
  });

  app.addHook("onResponse", async (request) => {
    await finish(request);
  });

  app.addHook("onRequestAbort", async (request) => {
    await finish(request);
  });

  app.addHook("onTimeout", async (request) => {
    await finish(request);
  });
}
