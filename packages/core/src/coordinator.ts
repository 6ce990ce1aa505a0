/**
 * Profiling coordinator.
 *
 * Owns one session per unit of work: idle → active → finalized. It selects
 * and runs the backend, runs the blocking detector and lag monitor, and
 * merges everything into ProfilerStats. No method throws to the host;
 * failures degrade to profiling less and are recorded as warnings.
 *
 * Each session has its own work scope. Only tasks created inside run() or
 * profile() (and their descendants) are recorded, so coordinators for
 * overlapping units of work on one runtime do not see each other's tasks.
 */

import { performance } from "node:perf_hooks";
import {
  DEFAULT_CONFIG,
  resolveConfig,
  type ProfilerConfig,
  type ProfilerConfigInput,
} from "./config.js";
import { createConsoleLogger, type ProfilerLogger } from "./logger.js";
import { BACKEND_REGISTRY, selectBackend } from "./backends/registry.js";
import { TASK_TRACKER_BACKEND } from "./backends/task-tracker.js";
import {
  emptyBackendStats,
  type BackendDescriptor,
  type ProfilerBackend,
} from "./backends/types.js";
import { BlockingDetector } from "./detectors/blocking-detector.js";
import { LagMonitor } from "./detectors/lag-monitor.js";
import { WorkScope, defaultRuntime, type TaskRuntime } from "./runtime/task-runtime.js";
import { ProfilingSession } from "./session/session.js";
import { buildTaskHierarchy } from "./stats/hierarchy.js";
import { summarizeLag } from "./stats/lag.js";
import {
  createEmptyStats,
  formatServerTiming,
  formatSummary,
  NO_BACKEND,
  serverTimingMetrics,
} from "./stats/summary.js";
import { buildTimeline } from "./stats/timeline.js";
import type { ProfilerStats, SessionState } from "./types/index.js";
import { describeError } from "./utils/errors.js";
import { deepFreeze } from "./utils/freeze.js";

export interface CoordinatorOptions {
  config?: ProfilerConfigInput;
  runtime?: TaskRuntime;
  logger?: ProfilerLogger;
  registry?: readonly BackendDescriptor[];
}

/** Something that must be stopped when the session ends */
interface Stoppable {
  name: string;
  stop(): void | Promise<void>;
}

export class ProfilingCoordinator {
  readonly config: ProfilerConfig;
  private readonly runtime: TaskRuntime;
  private readonly logger: ProfilerLogger;
  private readonly registry: readonly BackendDescriptor[];
  private readonly configWarnings: string[] = [];

  private stateValue: SessionState = "idle";
  private session: ProfilingSession | null = null;
  private scope: WorkScope | null = null;
  private backend: ProfilerBackend | null = null;
  private started: Stoppable[] = [];
  private warnings: string[] = [];
  private overhead = 0;
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private finalStats: ProfilerStats | null = null;

  constructor(options: CoordinatorOptions = {}) {
    this.runtime = options.runtime ?? defaultRuntime;
    this.logger = options.logger ?? createConsoleLogger();
    this.registry = options.registry ?? BACKEND_REGISTRY;
    this.config = this.resolve(options.config ?? {});
    this.warnings = [...this.configWarnings];
  }

  get state(): SessionState {
    return this.stateValue;
  }

  /** Name of the backend in use, "none" when profiling is disabled */
  get backendName(): string {
    return this.backend?.name ?? NO_BACKEND;
  }

  /**
   * Begin a new session. From finalized this starts over with nothing
   * carried across; while active it is a no-op, unless a stop is in flight,
   * in which case the new session begins once that stop completes.
   */
  async start(): Promise<void> {
    if (this.stateValue === "active") {
      if (!this.stopping) {
        return this.starting ?? undefined;
      }
      await this.stopping;
      // Another start may have won the race while the stop completed
      if (this.stateValue === "active") {
        return this.starting ?? undefined;
      }
    }
    this.starting = this.begin();
    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  /**
   * End the session: stop everything in reverse start order, then freeze the
   * session. Safe to call repeatedly or without start().
   */
  async stop(): Promise<void> {
    if (this.stateValue !== "active") {
      return this.stopping ?? undefined;
    }
    if (!this.stopping) {
      this.stopping = this.finish(this.starting);
    }
    return this.stopping;
  }

  /**
   * Run `fn` inside a session. The session is stopped even when `fn` throws
   * or its task is cancelled; `fn`'s own error is rethrown.
   */
  async profile<T>(fn: () => T | PromiseLike<T>): Promise<T> {
    await this.start();
    try {
      return await this.run(fn);
    } finally {
      await this.stop();
    }
  }

  /**
   * Run `fn` as part of the current session's unit of work: tasks it
   * creates, directly or through its continuations, are recorded. Without a
   * session `fn` simply runs.
   */
  run<T>(fn: () => T): T {
    const scope = this.scope;
    return scope ? this.runtime.runInScope(scope, fn) : fn();
  }

  /**
   * Merged stats. Empty before any session; a live snapshot while active;
   * frozen once finalized.
   */
  getStats(): ProfilerStats {
    if (this.finalStats) {
      return this.finalStats;
    }
    try {
      return this.collect();
    } catch (error) {
      this.logger.error(`Failed to collect stats: ${describeError(error)}`);
      return createEmptyStats(this.config.backend, [...this.warnings]);
    }
  }

  /** Navigation label, e.g. "2 blocking, lag 4ms" or "OK" */
  summary(): string {
    return formatSummary(this.getStats());
  }

  serverTiming(): Record<string, number> {
    return serverTimingMetrics(this.getStats());
  }

  /** Server-Timing header value, empty before any session */
  serverTimingHeader(): string {
    return formatServerTiming(this.serverTiming());
  }

  private resolve(input: ProfilerConfigInput): ProfilerConfig {
    try {
      return resolveConfig(input);
    } catch (error) {
      const message = `${describeError(error)}; using defaults`;
      this.logger.warn(message);
      this.configWarnings.push(message);
      return DEFAULT_CONFIG;
    }
  }

  private reset(): void {
    this.session = null;
    this.scope = null;
    this.backend = null;
    this.started = [];
    this.warnings = [...this.configWarnings];
    this.overhead = 0;
    this.stopping = null;
    this.finalStats = null;
  }

  private warn(message: string): void {
    this.logger.warn(message);
    this.warnings.push(message);
  }

  private async startBackend(
    session: ProfilingSession,
    scope: WorkScope
  ): Promise<ProfilerBackend | null> {
    const selection = selectBackend(this.registry, this.config.backend);
    if (!selection) {
      return null;
    }
    if (selection.warning) {
      this.warn(selection.warning);
    }

    const attempt = async (descriptor: BackendDescriptor): Promise<ProfilerBackend> => {
      const backend = descriptor.create({
        runtime: this.runtime,
        scope,
        tasks: session.taskWriter(),
        config: this.config,
        logger: this.logger,
      });
      await backend.start();
      return backend;
    };

    try {
      return await attempt(selection.descriptor);
    } catch (error) {
      this.warn(
        `Backend "${selection.descriptor.name}" failed to start: ${describeError(error)}`
      );
    }

    const fallback = this.registry.find(
      (descriptor) =>
        descriptor.name === TASK_TRACKER_BACKEND &&
        descriptor !== selection.descriptor &&
        descriptor.isAvailable()
    );
    if (!fallback) {
      return null;
    }
    try {
      const backend = await attempt(fallback);
      this.warn(`Falling back to backend "${fallback.name}"`);
      return backend;
    } catch (error) {
      this.warn(`Backend "${fallback.name}" failed to start: ${describeError(error)}`);
      return null;
    }
  }

  private startDetectors(session: ProfilingSession): void {
    if (this.config.enableBlockingDetection) {
      this.startGuarded("blocking detector", () => {
        const detector = new BlockingDetector({
          runtime: this.runtime,
          writer: session.blockingWriter(),
          threshold: this.config.blockingThreshold,
          logger: this.logger,
        });
        detector.start();
        return { name: "blocking detector", stop: () => detector.stop() };
      });
    }
    if (this.config.enableLagMonitor) {
      this.startGuarded("lag monitor", () => {
        const monitor = new LagMonitor({
          writer: session.lagWriter(),
          interval: this.config.lagSampleInterval,
          logger: this.logger,
        });
        monitor.start();
        return { name: "lag monitor", stop: () => monitor.stop() };
      });
    }
  }

  private startGuarded(name: string, start: () => Stoppable): void {
    try {
      this.started.push(start());
    } catch (error) {
      this.warn(`Could not start ${name}: ${describeError(error)}`);
    }
  }

  /** Stop everything started, newest first; one failure never blocks the rest */
  private async stopAll(): Promise<void> {
    const started = this.started;
    this.started = [];
    for (const component of [...started].reverse()) {
      try {
        await component.stop();
      } catch (error) {
        this.warn(`Failed to stop ${component.name}: ${describeError(error)}`);
      }
    }
  }

  private async begin(): Promise<void> {
    const began = performance.now();
    this.reset();
    const session = new ProfilingSession({
      maxTrackedTasks: this.config.maxTrackedTasks,
    });
    const scope = new WorkScope("session");
    this.session = session;
    this.scope = scope;
    this.stateValue = "active";

    try {
      this.backend = await this.startBackend(session, scope);
      if (this.backend) {
        this.started.push(this.backend);
        this.startDetectors(session);
      } else {
        this.warn("Profiling disabled for this session: no backend could start");
      }
    } catch (error) {
      this.warn(`Profiling disabled for this session: ${describeError(error)}`);
      await this.stopAll();
      this.backend = null;
    }
    this.overhead += performance.now() - began;
  }

  private async finish(starting: Promise<void> | null): Promise<void> {
    // A stop racing a start waits for it, so nothing is left installed
    if (starting) {
      await starting;
    }
    const began = performance.now();
    try {
      await this.stopAll();
    } finally {
      this.session?.finalize();
      this.stateValue = "finalized";
      this.overhead += performance.now() - began;
      this.finalStats = deepFreeze(this.getStats());
    }
  }

  private collect(): ProfilerStats {
    const session = this.session;
    if (!session) {
      return createEmptyStats(this.config.backend, [...this.warnings]);
    }

    const contribution = this.backend ? this.backend.getStats() : emptyBackendStats();
    const tasks = session.tasks();
    const taskHierarchy = buildTaskHierarchy(tasks, contribution.taskTimings);
    const blockingCalls = session.blocking();
    const lagSamples = session.lag();
    const eventLoopLag = summarizeLag(lagSamples, this.config.lagThreshold);
    const count = (state: string): number =>
      tasks.filter((task) => task.state === state).length;

    return {
      backend: this.backendName,
      requestedBackend: this.config.backend,
      state: this.stateValue,
      profilingOverhead: this.overhead,
      sessionDuration: session.duration,
      tasksCreated: session.tasksCreated,
      tasksCompleted: count("completed"),
      tasksCancelled: count("cancelled"),
      tasksFailed: count("failed"),
      tasksDropped: session.tasksDropped,
      eventLoopLag,
      lagSamples,
      blockingCalls,
      taskHierarchy,
      tasks,
      timeline: buildTimeline(taskHierarchy, session.duration),
      topFunctions: contribution.topFunctions,
      idleTime: contribution.idleTime,
      hasWarnings: blockingCalls.length > 0 || eventLoopLag.spikes > 0,
      warnings: [...this.warnings],
    };
  }
}
