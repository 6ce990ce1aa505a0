/**
 * Blocking call detector.
 *
 * Keeps a zero-delay timer armed and measures how late it fires. A gap at or
 * over the threshold means something held the thread, and a blocking event
 * is recorded for it. stop() also checks the probe still pending, so a stall
 * right before the end of the session is not lost. While running, the
 * detector subscribes to task steps at or over the same threshold, so a slow
 * step (a task's first run or any resumption after an await) observed in the
 * stalled interval names the culprit. The subscription is removed on stop;
 * no runtime setting is changed.
 *
 * Trade-offs: stalls shorter than the threshold are never reported, and a
 * burst of legitimate short callbacks adding up past the threshold is
 * reported as one stall. Stalls outside any task get an unknown location.
 */

import { performance } from "node:perf_hooks";
import type { ProfilerLogger } from "../logger.js";
import type { TaskRuntime, TaskStep } from "../runtime/task-runtime.js";
import type { BlockingWriter } from "../session/session.js";
import type { BlockingSeverity, StackFrame } from "../types/index.js";
import { describeError } from "../utils/errors.js";
import { UNKNOWN_LOCATION } from "../utils/stack.js";

export interface BlockingDetectorOptions {
  runtime: TaskRuntime;
  writer: BlockingWriter;
  /** ms */
  threshold: number;
  logger: ProfilerLogger;
}

export function classifySeverity(duration: number, threshold: number): BlockingSeverity {
  return duration >= 2 * threshold ? "critical" : "warning";
}

export class BlockingDetector {
  private readonly runtime: TaskRuntime;
  private readonly writer: BlockingWriter;
  private readonly threshold: number;
  private readonly logger: ProfilerLogger;
  private timer: NodeJS.Timeout | null = null;
  private armedAt = 0;
  private running = false;
  private lastSlowStep: TaskStep | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(options: BlockingDetectorOptions) {
    this.runtime = options.runtime;
    this.writer = options.writer;
    this.threshold = options.threshold;
    this.logger = options.logger;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.unsubscribe = this.runtime.onSlowStep((step) => {
      this.lastSlowStep = step;
      this.logger.warn(
        `Executing ${step.task.toString()} took ${(step.endedAt - step.startedAt).toFixed(1)}ms`
      );
    }, this.threshold);
    this.running = true;
    this.arm();
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    try {
      if (this.timer) {
        clearTimeout(this.timer);
        this.timer = null;
        // A probe still pending past the threshold means the stall is ongoing
        const now = performance.now();
        if (now - this.armedAt >= this.threshold) {
          this.record(this.armedAt, now, now - this.armedAt);
        }
      }
    } finally {
      this.unsubscribe?.();
      this.unsubscribe = null;
    }
  }

  private arm(): void {
    this.armedAt = performance.now();
    this.timer = setTimeout(() => this.check(), 0);
    this.timer.unref();
  }

  private check(): void {
    this.timer = null;
    try {
      const firedAt = performance.now();
      const gap = firedAt - this.armedAt;
      if (gap >= this.threshold) {
        this.record(this.armedAt, firedAt, gap);
      }
    } catch (error) {
      this.logger.error(`Blocking probe failed: ${describeError(error)}`);
    } finally {
      if (this.running) {
        this.arm();
      }
    }
  }

  private record(from: number, to: number, duration: number): void {
    const step = this.lastSlowStep;
    const culprit =
      step && step.startedAt < to && step.endedAt > from ? step.task : null;

    let location: StackFrame = UNKNOWN_LOCATION;
    if (culprit) {
      location = culprit.creationStack?.[0] ?? {
        function: culprit.qualifiedName,
        file: null,
        line: null,
        column: null,
      };
    }

    this.writer.append({
      timestamp: this.writer.now(),
      duration,
      location: { ...location },
      taskId: culprit ? culprit.id : null,
      taskName: culprit ? culprit.name : null,
      severity: classifySeverity(duration, this.threshold),
    });
  }
}
