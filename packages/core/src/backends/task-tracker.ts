/**
 * Task Tracker backend.
 *
 * Intercepts the runtime's task-creation primitive for the session and
 * records the lifecycle and parent of every task created in the session's
 * unit of work into the session. Tasks of other units of work pass through
 * untouched. No time attribution to functions. Always available.
 */

import type {
  SpawnContext,
  Task,
  TaskFactory,
  TaskRuntime,
  TaskSpec,
  WorkScope,
} from "../runtime/task-runtime.js";
import { ScopedTaskHook } from "../runtime/scoped-hook.js";
import type { TaskWriter } from "../session/session.js";
import type { TaskOutcome } from "../types/index.js";
import { describeError } from "../utils/errors.js";
import {
  emptyBackendStats,
  type BackendContext,
  type BackendDescriptor,
  type BackendStats,
  type ProfilerBackend,
} from "./types.js";

export const TASK_TRACKER_BACKEND = "tasktracker";

function outcomeOf(task: Task): Omit<TaskOutcome, "completedAt"> | null {
  switch (task.state) {
    case "completed":
      return { state: "completed", error: null };
    case "cancelled":
      return { state: "cancelled", error: describeError(task.error) };
    case "failed":
      return { state: "failed", error: describeError(task.error) };
    default:
      return null;
  }
}

export class TaskTrackerBackend implements ProfilerBackend {
  readonly name = TASK_TRACKER_BACKEND;

  private readonly runtime: TaskRuntime;
  private readonly scope: WorkScope;
  private readonly writer: TaskWriter;
  private readonly stackDepth: number | null;
  private readonly hook: ScopedTaskHook;
  private active = false;
  private releaseStacks: (() => void) | null = null;

  constructor(context: BackendContext) {
    this.runtime = context.runtime;
    this.scope = context.scope;
    this.writer = context.tasks;
    this.stackDepth = context.config.captureStacks
      ? context.config.maxStackDepth
      : null;
    this.hook = new ScopedTaskHook(context.runtime);
  }

  get isActive(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) {
      return;
    }
    this.hook.install((original) => this.wrap(original));
    this.active = true;
    if (this.stackDepth !== null) {
      this.releaseStacks = this.runtime.requestCreationStacks(this.stackDepth);
    }
  }

  stop(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    try {
      this.releaseStacks?.();
      this.releaseStacks = null;
    } finally {
      this.hook.restore();
    }
  }

  /** Task records live in the session; nothing to add */
  getStats(): BackendStats {
    return emptyBackendStats();
  }

  private wrap(original: TaskFactory): TaskFactory {
    return <T>(spec: TaskSpec<T>, context: SpawnContext): Task<T> => {
      const task = original(spec, context);
      if (this.active && context.scope === this.scope) {
        this.track(task, context);
      }
      return task;
    };
  }

  private track<T>(task: Task<T>, context: SpawnContext): void {
    const entry = this.writer.add({
      id: task.id,
      name: task.name,
      qualifiedName: task.qualifiedName,
      parentId: context.parent ? context.parent.id : null,
      stack:
        this.stackDepth !== null && task.creationStack
          ? task.creationStack.slice(0, this.stackDepth)
          : null,
    });
    if (!entry) {
      return;
    }

    // Updates stop once the session is over; the last known state stands
    task.addStartCallback(() => {
      if (this.active) {
        this.writer.markStarted(entry);
      }
    });
    task.addDoneCallback((settled) => {
      const outcome = outcomeOf(settled);
      if (this.active && outcome) {
        this.writer.settle(entry, outcome);
      }
    });
  }
}

export const taskTrackerBackend: BackendDescriptor = {
  name: TASK_TRACKER_BACKEND,
  deep: false,
  isAvailable: () => true,
  create: (context) => new TaskTrackerBackend(context),
};
