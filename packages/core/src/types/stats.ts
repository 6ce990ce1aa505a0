/**
 * Stats schema handed to the presentation layer.
 */

import type { StackFrame, TaskRecord, TaskState } from "./task.js";

export type BlockingSeverity = "warning" | "critical";

export interface BlockingEvent {
  /** Session offset (ms) at which the stall was detected */
  timestamp: number;
  /** Measured stall (ms) */
  duration: number;
  /** Best-effort location of the code that held the thread */
  location: StackFrame;
  /** Task the stall is attributed to, when known */
  taskId: number | null;
  taskName: string | null;
  severity: BlockingSeverity;
}

export interface LagSample {
  /** Session offset (ms) */
  timestamp: number;
  expectedDelay: number;
  actualDelay: number;
  /** actualDelay - expectedDelay, never negative */
  lag: number;
}

export interface LagSummary {
  min: number;
  avg: number;
  max: number;
  p95: number;
  samples: number;
  /** Samples at or above the configured lag threshold */
  spikes: number;
}

export interface FunctionTiming {
  function: string;
  file: string;
  line: number;
  /** Distinct call paths the function was sampled on */
  calls: number;
  /** Time spent in the function itself (ms) */
  selfTime: number;
  /** Time spent in the function and its callees (ms) */
  totalTime: number;
  perCall: number;
}

/** Task record with its children nested */
export interface TaskNode {
  id: number;
  name: string;
  qualifiedName: string;
  state: TaskState;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
  /** completedAt - createdAt, null while unsettled */
  duration: number | null;
  /** Execution time, set by backends that measure slices */
  activeTime: number | null;
  suspendedTime: number | null;
  error: string | null;
  stack: StackFrame[] | null;
  children: TaskNode[];
}

/** Rendering-ready projection of a task record */
export interface TimelineEntry {
  taskId: number;
  name: string;
  state: TaskState;
  start: number;
  duration: number;
  depth: number;
}

export interface Timeline {
  entries: TimelineEntry[];
  totalDuration: number;
  maxConcurrent: number;
}

export type SessionState = "idle" | "active" | "finalized";

export interface ProfilerStats {
  /** Backend that produced the task data, "none" when profiling was disabled */
  backend: string;
  requestedBackend: string;
  state: SessionState;
  /** Time (ms) the profiler itself spent starting and stopping */
  profilingOverhead: number;
  sessionDuration: number;
  tasksCreated: number;
  tasksCompleted: number;
  tasksCancelled: number;
  tasksFailed: number;
  /** Tasks created after the tracking limit was reached */
  tasksDropped: number;
  eventLoopLag: LagSummary;
  lagSamples: LagSample[];
  blockingCalls: BlockingEvent[];
  taskHierarchy: TaskNode[];
  tasks: TaskRecord[];
  timeline: Timeline;
  topFunctions: FunctionTiming[];
  /** Sampled idle time (ms), reported by the inspector backend */
  idleTime: number | null;
  hasWarnings: boolean;
  warnings: string[];
}
