import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { BlockingDetector, classifySeverity } from "./blocking-detector.js";
import { createSilentLogger } from "../logger.js";
import { TaskRuntime, sleep } from "../runtime/task-runtime.js";
import { ProfilingSession } from "../session/session.js";
import { busyWait } from "../demo/scenarios.js";

describe("classifySeverity", () => {
  it("marks stalls of twice the threshold as critical", () => {
    expect(classifySeverity(99, 50)).toBe("warning");
    expect(classifySeverity(100, 50)).toBe("critical");
  });
});

describe("BlockingDetector", () => {
  let runtime: TaskRuntime;
  let session: ProfilingSession;
  let detector: BlockingDetector;

  beforeEach(() => {
    runtime = new TaskRuntime({ logger: createSilentLogger() });
    session = new ProfilingSession({ maxTrackedTasks: 100 });
    detector = new BlockingDetector({
      runtime,
      writer: session.blockingWriter(),
      threshold: 50,
      logger: createSilentLogger(),
    });
  });

  afterEach(() => {
    detector.stop();
  });

  it("reports a stall inside a task and names the task", async () => {
    detector.start();
    function hogThread() {
      busyWait(80);
    }
    await runtime.createTask(hogThread, { name: "hog" });
    await sleep(20);
    detector.stop();

    const events = session.blocking();
    expect(events).toHaveLength(1);
    expect(events[0]?.duration).toBeGreaterThanOrEqual(80);
    expect(events[0]?.taskName).toBe("hog");
    expect(events[0]?.location.function).toBe("hogThread");
    expect(events[0]?.severity).toBe("warning");
  });

  it("marks long stalls critical", async () => {
    detector.start();
    await runtime.createTask(() => busyWait(130));
    await sleep(20);
    detector.stop();

    const [event] = session.blocking();
    expect(event?.duration).toBeGreaterThanOrEqual(130);
    expect(event?.severity).toBe("critical");
  });

  it("reports stalls outside tasks with an unknown location", async () => {
    detector.start();
    await sleep(1);
    busyWait(70);
    await sleep(20);
    detector.stop();

    const [event] = session.blocking();
    expect(event?.taskId).toBeNull();
    expect(event?.location).toEqual({
      function: "<unknown>",
      file: null,
      line: null,
      column: null,
    });
  });

  it("reports a stall still pending at stop", () => {
    detector.start();
    busyWait(70);
    detector.stop();

    const [event] = session.blocking();
    expect(event?.duration).toBeGreaterThanOrEqual(70);
    expect(event?.severity).toBe("warning");
  });

  it("ignores stalls under the threshold", async () => {
    detector.start();
    await runtime.createTask(() => busyWait(10));
    await sleep(20);
    detector.stop();

    expect(session.blocking()).toEqual([]);
  });

  it("names a task that stalls after an await by its creation site", async () => {
    runtime.creationStackDepth = 5;
    function spawnHog() {
      return runtime.createTask(
        async function hogAfterAwait() {
          await sleep(2);
          busyWait(80);
        },
        { name: "hog" }
      );
    }
    detector.start();
    const hog = spawnHog();
    await hog;
    await sleep(20);
    detector.stop();

    const events = session.blocking();
    expect(events).toHaveLength(1);
    expect(events[0]?.duration).toBeGreaterThanOrEqual(80);
    expect(events[0]?.taskId).toBe(hog.id);
    expect(events[0]?.taskName).toBe("hog");
    expect(events[0]?.location.function).toBe("spawnHog");
  });

  it("leaves the runtime's slow-step setting alone", () => {
    runtime.slowCallbackDuration = 7;
    detector.start();
    expect(runtime.slowCallbackDuration).toBe(7);
    detector.stop();
    expect(runtime.slowCallbackDuration).toBe(7);
  });

  it("stops idempotently", () => {
    detector.stop();
    detector.start();
    expect(detector.isRunning).toBe(true);
    detector.stop();
    detector.stop();
    expect(detector.isRunning).toBe(false);
    expect(runtime.isTimingSteps).toBe(false);
  });
});
