/**
 * Per-task execution time, summed from the steps the runtime times.
 */

import type { TaskRuntime } from "./task-runtime.js";

export class ExecutionSliceTracker {
  private readonly runtime: TaskRuntime;
  private readonly totals = new Map<number, number>();
  private unsubscribe: (() => void) | null = null;

  constructor(runtime: TaskRuntime) {
    this.runtime = runtime;
  }

  get isEnabled(): boolean {
    return this.unsubscribe !== null;
  }

  enable(): void {
    if (this.unsubscribe) {
      return;
    }
    this.unsubscribe = this.runtime.onStep((step) => {
      const elapsed = step.endedAt - step.startedAt;
      this.totals.set(step.task.id, (this.totals.get(step.task.id) ?? 0) + elapsed);
    });
  }

  disable(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /** Accumulated execution time (ms) per task id */
  snapshot(): Map<number, number> {
    return new Map(this.totals);
  }
}
