/**
 * Inspector profiler backend (deep profiling).
 *
 * Runs V8's sampling CPU profiler through an in-process node:inspector
 * session and times each task's execution slices with async_hooks. Task
 * lifecycle and hierarchy come from an embedded Task Tracker; this backend
 * adds per-function timings and splits each task's wall time into active
 * and suspended time. Idle samples are reported separately, since the
 * sampler cannot tell a suspended function from a finished one.
 */

import { createRequire } from "node:module";
import type { Profiler, Session } from "node:inspector";
import { ExecutionSliceTracker } from "../runtime/execution-slices.js";
import type { ProfilerLogger } from "../logger.js";
import { BackendStartError, describeError } from "../utils/errors.js";
import { summarizeProfile } from "./cpu-profile.js";
import { TaskTrackerBackend } from "./task-tracker.js";
import type {
  BackendContext,
  BackendDescriptor,
  BackendStats,
  ProfilerBackend,
} from "./types.js";

export const INSPECTOR_BACKEND = "inspector";

type InspectorModule = typeof import("node:inspector");

const requireModule = createRequire(import.meta.url);
let inspectorModule: InspectorModule | null | undefined;
let startFailed = false;

function loadInspector(): InspectorModule | null {
  if (inspectorModule === undefined) {
    try {
      // Throws ERR_INSPECTOR_NOT_AVAILABLE on builds without the inspector
      const loaded: InspectorModule = requireModule("node:inspector");
      inspectorModule = loaded;
    } catch {
      inspectorModule = null;
    }
  }
  return inspectorModule;
}

export function isInspectorAvailable(): boolean {
  if (startFailed) {
    return false;
  }
  const inspector = loadInspector();
  return inspector !== null && typeof inspector.Session === "function";
}

/** Forget an earlier start failure (tests, long-lived hosts after recovery) */
export function resetInspectorAvailability(): void {
  startFailed = false;
}

function callback(
  resolve: () => void,
  reject: (error: Error) => void
): (error: Error | null) => void {
  return (error) => (error ? reject(error) : resolve());
}

function startProfiler(session: Session, intervalUs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    session.post("Profiler.enable", (enableError) => {
      if (enableError) {
        reject(enableError);
        return;
      }
      session.post(
        "Profiler.setSamplingInterval",
        { interval: intervalUs },
        (intervalError) => {
          if (intervalError) {
            reject(intervalError);
            return;
          }
          session.post("Profiler.start", callback(resolve, reject));
        }
      );
    });
  });
}

function stopProfiler(session: Session): Promise<Profiler.Profile> {
  return new Promise<Profiler.Profile>((resolve, reject) => {
    session.post("Profiler.stop", (error, result) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(result.profile);
    });
  });
}

export class InspectorProfilerBackend implements ProfilerBackend {
  readonly name = INSPECTOR_BACKEND;

  private readonly tracker: TaskTrackerBackend;
  private readonly slices: ExecutionSliceTracker;
  private readonly logger: ProfilerLogger;
  private readonly topFunctions: number;
  private readonly samplingInterval: number;
  private session: Session | null = null;
  private profile: Profiler.Profile | null = null;

  constructor(context: BackendContext) {
    this.tracker = new TaskTrackerBackend(context);
    this.slices = new ExecutionSliceTracker(context.runtime);
    this.logger = context.logger;
    this.topFunctions = context.config.topFunctions;
    this.samplingInterval = context.config.samplingInterval;
  }

  async start(): Promise<void> {
    if (this.session) {
      return;
    }
    const inspector = loadInspector();
    if (!inspector) {
      startFailed = true;
      throw new BackendStartError(this.name, "node:inspector is not available");
    }

    // A hook conflict is not the profiler's fault; let it propagate as is
    this.tracker.start();

    const session = new inspector.Session();
    try {
      session.connect();
      await startProfiler(session, this.samplingInterval);
    } catch (error) {
      startFailed = true;
      this.disconnect(session);
      this.tracker.stop();
      throw new BackendStartError(this.name, error);
    }
    this.session = session;
    this.slices.enable();
  }

  async stop(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;
    this.slices.disable();
    try {
      this.profile = await stopProfiler(session);
    } catch (error) {
      this.logger.warn(`CPU profile could not be collected: ${describeError(error)}`);
    } finally {
      this.disconnect(session);
      this.tracker.stop();
    }
  }

  getStats(): BackendStats {
    const base = this.tracker.getStats();
    const taskTimings = new Map<number, { activeTime: number }>();
    for (const [taskId, activeTime] of this.slices.snapshot()) {
      taskTimings.set(taskId, { activeTime });
    }
    if (!this.profile) {
      return { ...base, taskTimings };
    }
    const summary = summarizeProfile(this.profile, this.topFunctions, this.samplingInterval);
    return {
      ...base,
      topFunctions: summary.functions,
      taskTimings,
      idleTime: summary.idleTime,
    };
  }

  private disconnect(session: Session): void {
    try {
      session.disconnect();
    } catch (error) {
      this.logger.warn(`Inspector session did not disconnect: ${describeError(error)}`);
    }
  }
}

export const inspectorBackend: BackendDescriptor = {
  name: INSPECTOR_BACKEND,
  deep: true,
  isAvailable: isInspectorAvailable,
  create: (context) => new InspectorProfilerBackend(context),
};
