/**
 * Backend abstraction.
 * A backend observes task activity for one session. Exactly one backend is
 * active per session.
 */

import type { ProfilerConfig } from "../config.js";
import type { ProfilerLogger } from "../logger.js";
import type { TaskRuntime, WorkScope } from "../runtime/task-runtime.js";
import type { TaskWriter } from "../session/session.js";
import type { TaskTiming } from "../stats/hierarchy.js";
import type { FunctionTiming } from "../types/index.js";

/**
 * What a backend adds to the session stats beyond the task records it wrote
 * to the session
 */
export interface BackendStats {
  /** Empty unless the backend attributes time to functions */
  topFunctions: FunctionTiming[];
  /** Measured execution time per task id */
  taskTimings: Map<number, TaskTiming>;
  idleTime: number | null;
}

export interface ProfilerBackend {
  readonly name: string;

  /**
   * Begin observing. Must return quickly; throws (or rejects) when the
   * backend cannot start.
   */
  start(): void | Promise<void>;

  /** Stop observing. Idempotent; a no-op without a prior start. */
  stop(): void | Promise<void>;

  /** Side-effect free; valid even if start() was never called */
  getStats(): BackendStats;
}

export interface BackendContext {
  runtime: TaskRuntime;
  /** Only tasks created in this unit of work are recorded */
  scope: WorkScope;
  tasks: TaskWriter;
  config: ProfilerConfig;
  logger: ProfilerLogger;
}

/** Registry entry describing a backend implementation */
export interface BackendDescriptor {
  readonly name: string;
  /** Attributes time to functions; preferred by auto-selection */
  readonly deep: boolean;
  /** Pure capability check */
  isAvailable(): boolean;
  create(context: BackendContext): ProfilerBackend;
}

export function emptyBackendStats(): BackendStats {
  return {
    topFunctions: [],
    taskTimings: new Map(),
    idleTime: null,
  };
}
