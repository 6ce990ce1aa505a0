/**
 * Type exports for taskscope.
 */

export type {
  TaskState,
  TerminalTaskState,
  StackFrame,
  TaskOutcome,
  TaskRecord,
} from "./task.js";

export type {
  BlockingSeverity,
  BlockingEvent,
  LagSample,
  LagSummary,
  FunctionTiming,
  TaskNode,
  TimelineEntry,
  Timeline,
  SessionState,
  ProfilerStats,
} from "./stats.js";
