/**
 * Derived views of the stats: empty structure, navigation label and
 * Server-Timing metrics.
 */

import type { ProfilerStats } from "../types/index.js";
import { EMPTY_LAG_SUMMARY } from "./lag.js";

export const NO_BACKEND = "none";

/** Zero-valued stats, used before start and when profiling is disabled */
export function createEmptyStats(
  requestedBackend = "auto",
  warnings: string[] = []
): ProfilerStats {
  return {
    backend: NO_BACKEND,
    requestedBackend,
    state: "idle",
    profilingOverhead: 0,
    sessionDuration: 0,
    tasksCreated: 0,
    tasksCompleted: 0,
    tasksCancelled: 0,
    tasksFailed: 0,
    tasksDropped: 0,
    eventLoopLag: { ...EMPTY_LAG_SUMMARY },
    lagSamples: [],
    blockingCalls: [],
    taskHierarchy: [],
    tasks: [],
    timeline: { entries: [], totalDuration: 0, maxConcurrent: 0 },
    topFunctions: [],
    idleTime: null,
    hasWarnings: false,
    warnings,
  };
}

function formatMs(value: number): string {
  return `${Math.round(value)}ms`;
}

/**
 * Short label for a navigation entry, e.g. "2 blocking, lag 4ms" or "OK".
 */
export function formatSummary(stats: ProfilerStats): string {
  if (stats.backend === NO_BACKEND && stats.state !== "idle") {
    return "disabled";
  }
  if (!stats.hasWarnings) {
    return "OK";
  }
  const parts: string[] = [];
  if (stats.blockingCalls.length > 0) {
    parts.push(`${stats.blockingCalls.length} blocking`);
  }
  parts.push(`lag ${formatMs(stats.eventLoopLag.max)}`);
  return parts.join(", ");
}

/** Server-Timing metrics in milliseconds */
export function serverTimingMetrics(stats: ProfilerStats): Record<string, number> {
  if (stats.state === "idle") {
    return {};
  }
  return {
    "taskscope-overhead": stats.profilingOverhead,
    "taskscope-blocking": stats.blockingCalls.reduce(
      (total, event) => total + event.duration,
      0
    ),
    "taskscope-lag": stats.eventLoopLag.max,
  };
}

/** Render metrics as a Server-Timing header value */
export function formatServerTiming(metrics: Record<string, number>): string {
  return Object.entries(metrics)
    .map(([name, duration]) => `${name};dur=${duration.toFixed(2)}`)
    .join(", ");
}
