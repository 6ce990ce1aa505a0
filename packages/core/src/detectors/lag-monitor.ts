/**
 * Event loop lag monitor.
 * A self-rescheduling timer probe; each firing records how late it was.
 */

import { performance } from "node:perf_hooks";
import type { ProfilerLogger } from "../logger.js";
import type { LagWriter } from "../session/session.js";
import { describeError } from "../utils/errors.js";

export interface LagMonitorOptions {
  writer: LagWriter;
  /** Probe cadence (ms) */
  interval: number;
  logger: ProfilerLogger;
}

export class LagMonitor {
  private readonly writer: LagWriter;
  private readonly interval: number;
  private readonly logger: ProfilerLogger;
  private timer: NodeJS.Timeout | null = null;
  private scheduledAt = 0;
  private running = false;

  constructor(options: LagMonitorOptions) {
    this.writer = options.writer;
    this.interval = options.interval;
    this.logger = options.logger;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** True while a probe is pending */
  get isScheduled(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.arm();
  }

  /** Cancels the pending probe, ending the chain */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private arm(): void {
    this.scheduledAt = performance.now();
    this.timer = setTimeout(() => this.probe(), this.interval);
    this.timer.unref();
  }

  private probe(): void {
    this.timer = null;
    try {
      const actualDelay = performance.now() - this.scheduledAt;
      this.writer.append({
        timestamp: this.writer.now(),
        expectedDelay: this.interval,
        actualDelay,
        lag: Math.max(0, actualDelay - this.interval),
      });
    } catch (error) {
      this.logger.error(`Lag probe failed: ${describeError(error)}`);
    } finally {
      if (this.running) {
        this.arm();
      }
    }
  }
}
