import { describe, it, expect, beforeEach } from "vitest";
import { ProfilingCoordinator } from "./coordinator.js";
import { taskTrackerBackend } from "./backends/task-tracker.js";
import { emptyBackendStats, type BackendDescriptor } from "./backends/types.js";
import { createSilentLogger } from "./logger.js";
import { ScopedTaskHook } from "./runtime/scoped-hook.js";
import { TaskRuntime, sleep, type TaskFactory } from "./runtime/task-runtime.js";
import { countNodes, walkHierarchy } from "./stats/hierarchy.js";
import type { ProfilerConfigInput } from "./config.js";
import { busyWait } from "./demo/scenarios.js";
import { RestoreError } from "./utils/errors.js";

function fakeDescriptor(
  name: string,
  behavior: { start?: () => void; stop?: () => void; available?: boolean }
): BackendDescriptor {
  return {
    name,
    deep: true,
    isAvailable: () => behavior.available ?? true,
    create: () => ({
      name,
      start: behavior.start ?? (() => undefined),
      stop: behavior.stop ?? (() => undefined),
      getStats: emptyBackendStats,
    }),
  };
}

describe("ProfilingCoordinator", () => {
  let runtime: TaskRuntime;

  beforeEach(() => {
    runtime = new TaskRuntime({ logger: createSilentLogger() });
  });

  function createCoordinator(
    config: ProfilerConfigInput = {},
    registry?: readonly BackendDescriptor[]
  ): ProfilingCoordinator {
    return new ProfilingCoordinator({
      config: { backend: "tasktracker", ...config },
      runtime,
      logger: createSilentLogger(),
      registry,
    });
  }

  it("reports empty stats before start", () => {
    const coordinator = createCoordinator();
    const stats = coordinator.getStats();

    expect(coordinator.state).toBe("idle");
    expect(stats.backend).toBe("none");
    expect(stats.state).toBe("idle");
    expect(stats.tasksCreated).toBe(0);
    expect(coordinator.summary()).toBe("OK");
    expect(coordinator.serverTiming()).toEqual({});
    expect(coordinator.serverTimingHeader()).toBe("");
  });

  it("treats stop before start as a no-op", async () => {
    const coordinator = createCoordinator();
    await coordinator.stop();
    expect(coordinator.state).toBe("idle");
  });

  it("profiles a parent and its children", async () => {
    const coordinator = createCoordinator();
    await coordinator.start();
    expect(coordinator.state).toBe("active");
    expect(coordinator.backendName).toBe("tasktracker");

    await coordinator.run(() =>
      runtime.createTask(
        async () => {
          await Promise.all([
            runtime.createTask(() => sleep(12), { name: "child-1" }),
            runtime.createTask(() => sleep(12), { name: "child-2" }),
          ]);
        },
        { name: "parent" }
      )
    );
    await coordinator.stop();

    const stats = coordinator.getStats();
    expect(stats.state).toBe("finalized");
    expect(stats.backend).toBe("tasktracker");
    expect(stats.tasksCreated).toBe(3);
    expect(stats.tasksCompleted).toBe(3);
    expect(stats.taskHierarchy).toHaveLength(1);
    expect(stats.taskHierarchy[0]?.children).toHaveLength(2);
    expect(stats.timeline.entries).toHaveLength(3);
    expect(stats.timeline.maxConcurrent).toBe(3);
    expect(stats.sessionDuration).toBeGreaterThanOrEqual(10);
    expect(stats.profilingOverhead).toBeGreaterThanOrEqual(0);
  });

  it("restores the runtime when the session ends", async () => {
    const coordinator = createCoordinator();
    const factory = runtime.taskFactory;
    await coordinator.start();
    expect(runtime.isTimingSteps).toBe(true);
    await coordinator.stop();

    expect(runtime.taskFactory).toBe(factory);
    expect(runtime.isTimingSteps).toBe(false);
  });

  it("returns the same stats after repeated stops", async () => {
    const coordinator = createCoordinator();
    await coordinator.start();
    await coordinator.stop();
    const first = coordinator.getStats();
    await coordinator.stop();

    expect(coordinator.getStats()).toBe(first);
  });

  it("freezes the finalized stats", async () => {
    const coordinator = createCoordinator();
    await coordinator.profile(() => runtime.createTask(async () => 1, { name: "only" }));
    const stats = coordinator.getStats();

    expect(Object.isFrozen(stats)).toBe(true);
    expect(Object.isFrozen(stats.tasks)).toBe(true);
    expect(Object.isFrozen(stats.taskHierarchy[0])).toBe(true);
    expect(() => {
      stats.tasksCreated = 99;
    }).toThrow(TypeError);
    expect(() => {
      stats.tasks.pop();
    }).toThrow(TypeError);
    expect(coordinator.getStats().tasksCreated).toBe(1);
    expect(coordinator.getStats().tasks.map((task) => task.name)).toEqual(["only"]);
  });

  it("waits for an in-flight start before stopping", async () => {
    const coordinator = createCoordinator();
    const factory = runtime.taskFactory;
    const starting = coordinator.start();
    const stopping = coordinator.stop();
    await Promise.all([starting, stopping]);

    expect(coordinator.state).toBe("finalized");
    expect(runtime.taskFactory).toBe(factory);
  });

  it("starts a fresh session once an in-flight stop completes", async () => {
    const coordinator = createCoordinator();
    await coordinator.profile(() => runtime.createTask(async () => 1));
    const finished = coordinator.getStats();
    await coordinator.start();
    await coordinator.run(() => runtime.createTask(async () => 2));

    const stopping = coordinator.stop();
    await coordinator.start();
    await stopping;

    expect(coordinator.state).toBe("active");
    const live = coordinator.getStats();
    expect(live.state).toBe("active");
    expect(live.tasksCreated).toBe(0);
    expect(finished.tasksCreated).toBe(1);

    await coordinator.run(() => runtime.createTask(async () => 3, { name: "next" }));
    await coordinator.stop();
    expect(coordinator.getStats().tasks.map((task) => task.name)).toEqual(["next"]);
  });

  it("counts tasks past the tracking limit without tracking them", async () => {
    const coordinator = createCoordinator({ maxTrackedTasks: 2 });
    await coordinator.profile(() =>
      Promise.all([
        runtime.createTask(async () => 1),
        runtime.createTask(async () => 2),
        runtime.createTask(async () => 3),
      ])
    );

    const stats = coordinator.getStats();
    expect(stats.tasksCreated).toBe(3);
    expect(stats.tasksDropped).toBe(1);
    expect(countNodes(stats.taskHierarchy)).toBe(2);
  });

  it("reports blocking calls in the summary", async () => {
    const coordinator = createCoordinator({ blockingThreshold: 50 });
    await coordinator.profile(async () => {
      await runtime.createTask(() => busyWait(70), { name: "hog" });
      await sleep(20);
    });

    const stats = coordinator.getStats();
    expect(stats.blockingCalls).toHaveLength(1);
    expect(stats.blockingCalls[0]?.taskName).toBe("hog");
    expect(stats.hasWarnings).toBe(true);
    expect(coordinator.summary()).toMatch(/^1 blocking, lag \d+ms$/);
    expect(coordinator.serverTimingHeader()).toMatch(
      /^taskscope-overhead;dur=\d+\.\d\d, taskscope-blocking;dur=\d+\.\d\d, taskscope-lag;dur=\d+\.\d\d$/
    );
  });

  it("falls back when the requested backend is unavailable", async () => {
    const coordinator = createCoordinator({ backend: "deep" }, [
      fakeDescriptor("deep", { available: false }),
      taskTrackerBackend,
    ]);
    await coordinator.start();
    await coordinator.stop();

    const stats = coordinator.getStats();
    expect(stats.backend).toBe("tasktracker");
    expect(stats.requestedBackend).toBe("deep");
    expect(stats.warnings).toEqual([
      'Backend "deep" is unavailable, falling back to "tasktracker"',
    ]);
  });

  it("falls back when the selected backend fails to start", async () => {
    const coordinator = createCoordinator({ backend: "deep" }, [
      fakeDescriptor("deep", {
        start: () => {
          throw new Error("no profiler");
        },
      }),
      taskTrackerBackend,
    ]);
    await coordinator.start();

    expect(coordinator.backendName).toBe("tasktracker");
    expect(coordinator.getStats().warnings).toEqual([
      'Backend "deep" failed to start: Error: no profiler',
      'Falling back to backend "tasktracker"',
    ]);
    await coordinator.stop();
  });

  it("profiles overlapping sessions on one runtime separately", async () => {
    const first = createCoordinator();
    const second = createCoordinator();
    const factory = runtime.taskFactory;
    await first.start();
    await second.start();

    const slow = first.run(() => runtime.createTask(() => sleep(20), { name: "first-task" }));
    await second.run(() => runtime.createTask(async () => 1, { name: "second-task" }));
    await runtime.createTask(async () => 2, { name: "unscoped" });
    await slow;
    await first.stop();
    await second.stop();

    expect(first.getStats().backend).toBe("tasktracker");
    expect(second.getStats().backend).toBe("tasktracker");
    expect(first.getStats().tasks.map((task) => task.name)).toEqual(["first-task"]);
    expect(second.getStats().tasks.map((task) => task.name)).toEqual(["second-task"]);
    expect(first.getStats().warnings).toEqual([]);
    expect(runtime.taskFactory).toBe(factory);
  });

  it("disables profiling when the factory was swapped behind an installed hook", async () => {
    const factory = runtime.taskFactory;
    const hook = new ScopedTaskHook(runtime);
    hook.install((original) => original);
    const swapped: TaskFactory = (spec, context) => factory(spec, context);
    runtime.taskFactory = swapped;
    const coordinator = createCoordinator();

    await coordinator.profile(() => runtime.createTask(async () => 1));
    expect(() => hook.restore()).toThrow(RestoreError);

    const stats = coordinator.getStats();
    expect(stats.backend).toBe("none");
    expect(stats.tasksCreated).toBe(0);
    expect(stats.warnings).toEqual([
      'Backend "tasktracker" failed to start: HookConflictError: Task factory was replaced outside the installed hooks',
      "Profiling disabled for this session: no backend could start",
    ]);
    expect(coordinator.summary()).toBe("disabled");
    expect(runtime.taskFactory).toBe(factory);
    expect(runtime.isTimingSteps).toBe(false);
  });

  it("finalizes even when a component fails to stop", async () => {
    const coordinator = createCoordinator({ backend: "fragile" }, [
      fakeDescriptor("fragile", {
        stop: () => {
          throw new Error("stuck");
        },
      }),
    ]);
    await coordinator.start();
    await coordinator.stop();

    expect(coordinator.state).toBe("finalized");
    expect(coordinator.getStats().warnings).toContain("Failed to stop fragile: Error: stuck");
    expect(runtime.isTimingSteps).toBe(false);
  });

  it("starts over after finalize", async () => {
    const coordinator = createCoordinator();
    await coordinator.profile(() => runtime.createTask(async () => 1));
    await coordinator.start();

    const live = coordinator.getStats();
    expect(live.state).toBe("active");
    expect(live.tasksCreated).toBe(0);
    await coordinator.stop();
  });

  it("stops the session when the profiled function throws", async () => {
    const coordinator = createCoordinator();
    const factory = runtime.taskFactory;

    await expect(
      coordinator.profile(async () => {
        await runtime.createTask(async () => 1);
        throw new Error("request failed");
      })
    ).rejects.toThrow("request failed");

    expect(coordinator.state).toBe("finalized");
    expect(runtime.taskFactory).toBe(factory);
    expect(coordinator.getStats().tasksCreated).toBe(1);
  });

  it("returns the profiled function's value", async () => {
    const coordinator = createCoordinator();
    expect(await coordinator.profile(() => "done")).toBe("done");
  });

  it("always produces a forest", async () => {
    const coordinator = createCoordinator();
    const spawn = async (depth: number): Promise<void> => {
      if (depth === 0) {
        return;
      }
      const children = Array.from({ length: depth }, () =>
        runtime.createTask(() => spawn(depth - 1))
      );
      await sleep(1);
      await Promise.all(children);
    };
    await coordinator.profile(() => runtime.createTask(() => spawn(3)));

    const stats = coordinator.getStats();
    const seen = new Set<number>();
    for (const { node } of walkHierarchy(stats.taskHierarchy)) {
      expect(seen.has(node.id)).toBe(false);
      seen.add(node.id);
    }
    // 1 + 3 + 3*2 + 3*2*1
    expect(stats.tasksCreated).toBe(16);
    expect(seen.size).toBe(16);
  });

  it("falls back to defaults on invalid configuration", () => {
    const coordinator = createCoordinator({ blockingThreshold: -5 });

    expect(coordinator.config.blockingThreshold).toBe(100);
    expect(coordinator.config.backend).toBe("auto");
    expect(coordinator.getStats().warnings[0]).toMatch(
      /^InvalidConfigError: Invalid profiler configuration: blockingThreshold: .+; using defaults$/
    );
  });
});
