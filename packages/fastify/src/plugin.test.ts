/**
 * Tests for the per-request profiling hooks.
 */

import { get } from "node:http";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";
import {
  TaskRuntime,
  busyWait,
  createSilentLogger,
  sleep,
  type ProfilerConfigInput,
  type ProfilerStats,
} from "@taskscope/core";
import { registerTaskscope, type TaskscopeOptions } from "./plugin.js";

const QUIET_CONFIG: ProfilerConfigInput = {
  backend: "tasktracker",
  enableLagMonitor: false,
  enableBlockingDetection: false,
};

describe("registerTaskscope", () => {
  let app: FastifyInstance;
  let runtime: TaskRuntime;
  let collected: ProfilerStats[];

  beforeEach(() => {
    app = Fastify({ logger: false });
    runtime = new TaskRuntime({ logger: createSilentLogger() });
    collected = [];
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await app.close();
  });

  async function setup(options: TaskscopeOptions = {}): Promise<void> {
    await registerTaskscope(app, {
      config: QUIET_CONFIG,
      runtime,
      onStats: (stats) => {
        collected.push(stats);
      },
      ...options,
    });

    app.get("/work", async () => {
      await runtime.createTask(
        async () => {
          await Promise.all([
            runtime.createTask(() => sleep(5), { name: "child-1" }),
            runtime.createTask(() => sleep(5), { name: "child-2" }),
          ]);
        },
        { name: "parent" }
      );
      return { ok: true };
    });

    app.get("/hog", async () => {
      await runtime.createTask(() => busyWait(120), { name: "hog" });
      return { ok: true };
    });

    app.get("/fail", async () => {
      await runtime.createTask(async () => 1);
      throw new Error("handler failed");
    });
  }

  it("profiles each request and sets headers", async () => {
    await setup();
    const response = await app.inject({ method: "GET", url: "/work" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["x-taskscope-summary"]).toBe("OK");
    expect(response.headers["server-timing"]).toMatch(
      /^taskscope-overhead;dur=\d+\.\d\d, taskscope-blocking;dur=0\.00, taskscope-lag;dur=0\.00$/
    );

    expect(collected).toHaveLength(1);
    const [stats] = collected;
    expect(stats?.backend).toBe("tasktracker");
    expect(stats?.state).toBe("finalized");
    expect(stats?.tasksCreated).toBe(3);
    expect(stats?.taskHierarchy[0]?.children).toHaveLength(2);
  });

  it("reports blocking handlers in the summary header", async () => {
    await setup({
      config: { ...QUIET_CONFIG, enableBlockingDetection: true, blockingThreshold: 50 },
    });
    const response = await app.inject({ method: "GET", url: "/hog" });

    expect(response.headers["x-taskscope-summary"]).toBe("1 blocking, lag 0ms");
    expect(collected[0]?.blockingCalls[0]?.taskName).toBe("hog");
  });

  it("starts a fresh session per request", async () => {
    await setup();
    await app.inject({ method: "GET", url: "/work" });
    await app.inject({ method: "GET", url: "/work" });

    expect(collected.map((stats) => stats.tasksCreated)).toEqual([3, 3]);
    expect(collected[0]).not.toBe(collected[1]);
  });

  it("restores the runtime after every request", async () => {
    await setup();
    const factory = runtime.taskFactory;
    await app.inject({ method: "GET", url: "/work" });

    expect(runtime.taskFactory).toBe(factory);
  });

  it("ends the session when the handler fails", async () => {
    await setup();
    const factory = runtime.taskFactory;
    const response = await app.inject({ method: "GET", url: "/fail" });

    expect(response.statusCode).toBe(500);
    expect(response.headers["x-taskscope-summary"]).toBe("OK");
    expect(collected[0]?.tasksCreated).toBe(1);
    expect(runtime.taskFactory).toBe(factory);
  });

  it("exposes the stats on the request", async () => {
    await setup();
    const seen: Array<ProfilerStats | null> = [];
    app.addHook("onResponse", async (request) => {
      seen.push(request.taskscope);
    });
    await app.inject({ method: "GET", url: "/work" });

    expect(seen).toHaveLength(1);
    expect(seen[0]).toBe(collected[0]);
  });

  it("skips requests rejected by shouldProfile", async () => {
    await setup({ shouldProfile: (request) => request.url !== "/work" });
    const response = await app.inject({ method: "GET", url: "/work" });

    expect(response.headers["x-taskscope-summary"]).toBeUndefined();
    expect(response.headers["server-timing"]).toBeUndefined();
    expect(collected).toEqual([]);
  });

  it("can leave headers off", async () => {
    await setup({ headers: false });
    const response = await app.inject({ method: "GET", url: "/work" });

    expect(response.headers["x-taskscope-summary"]).toBeUndefined();
    expect(collected).toHaveLength(1);
  });

  it("keeps serving when the stats handler throws", async () => {
    const onStats = vi.fn(() => {
      throw new Error("storage offline");
    });
    await setup({ onStats });
    const response = await app.inject({ method: "GET", url: "/work" });

    expect(response.statusCode).toBe(200);
    expect(onStats).toHaveBeenCalledTimes(1);
  });

  it("keeps overlapping requests apart", async () => {
    const byUrl = new Map<string, ProfilerStats>();
    await setup({
      onStats: (stats, request) => {
        byUrl.set(request.url, stats);
      },
    });
    app.get("/a", async () => {
      await runtime.createTask(() => sleep(40), { name: "a-task" });
      return { ok: true };
    });
    app.get("/b", async () => {
      await sleep(10);
      await runtime.createTask(async () => 1, { name: "b-task" });
      return { ok: true };
    });
    const factory = runtime.taskFactory;

    const [a, b] = await Promise.all([
      app.inject({ method: "GET", url: "/a" }),
      app.inject({ method: "GET", url: "/b" }),
    ]);

    expect(a.statusCode).toBe(200);
    expect(b.statusCode).toBe(200);
    expect(byUrl.get("/a")?.backend).toBe("tasktracker");
    expect(byUrl.get("/b")?.backend).toBe("tasktracker");
    expect(byUrl.get("/a")?.tasks.map((task) => task.name)).toEqual(["a-task"]);
    expect(byUrl.get("/b")?.tasks.map((task) => task.name)).toEqual(["b-task"]);
    expect(byUrl.get("/a")?.warnings).toEqual([]);
    expect(byUrl.get("/b")?.warnings).toEqual([]);
    expect(runtime.taskFactory).toBe(factory);
  });

  it("tracks tasks of handlers that read a request body", async () => {
    await setup();
    app.post("/echo", async (request) => {
      await runtime.createTask(async () => 1, { name: "echo" });
      return request.body;
    });
    const response = await app.inject({
      method: "POST",
      url: "/echo",
      payload: { hello: "world" },
    });

    expect(response.json()).toEqual({ hello: "world" });
    expect(collected[0]?.tasks.map((task) => task.name)).toEqual(["echo"]);
  });

  it("registers with invalid TASKSCOPE_* values and profiles on defaults", async () => {
    vi.stubEnv("TASKSCOPE_BLOCKING_THRESHOLD_MS", "abc");
    vi.stubEnv("TASKSCOPE_BACKEND", "tasktracker");
    vi.stubEnv("TASKSCOPE_LAG_MONITOR", "0");
    await setup({ config: undefined });
    const response = await app.inject({ method: "GET", url: "/work" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["x-taskscope-summary"]).toBe("OK");
    expect(collected).toHaveLength(1);
    expect(collected[0]?.backend).toBe("tasktracker");
    expect(collected[0]?.tasksCreated).toBe(3);
  });

  it("ends the session of a hijacked reply", async () => {
    await setup();
    app.get("/raw", async (_request, reply) => {
      reply.hijack();
      await runtime.createTask(async () => 1, { name: "raw-task" });
      reply.raw.writeHead(200, { "content-type": "text/plain" });
      reply.raw.end("raw body");
    });
    const factory = runtime.taskFactory;
    const response = await app.inject({ method: "GET", url: "/raw" });

    expect(response.body).toBe("raw body");
    expect(response.headers["x-taskscope-summary"]).toBeUndefined();
    await vi.waitFor(() => expect(collected).toHaveLength(1));
    expect(collected[0]?.state).toBe("finalized");
    expect(collected[0]?.tasks.map((task) => task.name)).toEqual(["raw-task"]);
    expect(runtime.taskFactory).toBe(factory);
  });

  describe("requests that never reach onSend", () => {
    let markEntered: () => void;
    let entered: Promise<void>;

    beforeEach(() => {
      entered = new Promise<void>((resolve) => {
        markEntered = resolve;
      });
    });

    async function requestSlowRoute(abortAfterEntry: boolean): Promise<void> {
      app.get("/slow", async () => {
        markEntered();
        await runtime.createTask(() => sleep(300), { name: "slow" });
        return { ok: true };
      });
      const address = await app.listen({ port: 0, host: "127.0.0.1" });
      const client = get(`${address}/slow`);
      client.on("error", () => {});
      const closed = new Promise<void>((resolve) => client.once("close", () => resolve()));
      await entered;
      if (abortAfterEntry) {
        client.destroy();
      }
      await closed;
    }

    it("ends the session when the client disconnects", async () => {
      const onStats = vi.fn((stats: ProfilerStats) => {
        collected.push(stats);
      });
      await setup({ onStats });
      const factory = runtime.taskFactory;
      await requestSlowRoute(true);

      await vi.waitFor(() => expect(onStats).toHaveBeenCalledTimes(1));
      expect(collected[0]?.state).toBe("finalized");
      expect(collected[0]?.tasks.map((task) => task.name)).toEqual(["slow"]);
      expect(runtime.taskFactory).toBe(factory);
    });

    it("ends the session when the connection times out", async () => {
      await app.close();
      app = Fastify({ logger: false, connectionTimeout: 50 });
      const onStats = vi.fn((stats: ProfilerStats) => {
        collected.push(stats);
      });
      await setup({ onStats });
      const factory = runtime.taskFactory;
      await requestSlowRoute(false);

      await vi.waitFor(() => expect(onStats).toHaveBeenCalledTimes(1));
      expect(collected[0]?.state).toBe("finalized");
      expect(collected[0]?.tasks.map((task) => task.name)).toEqual(["slow"]);
      expect(runtime.taskFactory).toBe(factory);
    });
  });
});
