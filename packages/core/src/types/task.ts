/**
 * Task record types.
 * A task record is the profiler's view of one task created during a session.
 */

/** Lifecycle state of a tracked task */
export type TaskState = "created" | "running" | "completed" | "cancelled" | "failed";

/** States a task can never leave */
export type TerminalTaskState = Extract<TaskState, "completed" | "cancelled" | "failed">;

/** One captured stack frame */
export interface StackFrame {
  function: string;
  file: string | null;
  line: number | null;
  column: number | null;
}

/**
 * Terminal outcome of a task, assigned in one step so observers never see a
 * half-settled record.
 */
export interface TaskOutcome {
  state: TerminalTaskState;
  /** Session offset (ms) */
  completedAt: number;
  /** Failure or cancellation detail, null on success */
  error: string | null;
}

/** Serializable snapshot of a tracked task */
export interface TaskRecord {
  id: number;
  name: string;
  /** Name of the callable the task runs */
  qualifiedName: string;
  parentId: number | null;
  childIds: number[];
  state: TaskState;
  /** Session offsets (ms) */
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
  error: string | null;
  /** Creation call site, present when stack capture is enabled */
  stack: StackFrame[] | null;
}
