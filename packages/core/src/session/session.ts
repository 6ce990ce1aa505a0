/**
 * Profiling session.
 *
 * Append-only arena for one unit of work. Each observer writes through its
 * own narrow writer and never sees the others' entries. After finalize()
 * the session is frozen: writers become no-ops and snapshots stop changing.
 */

import { performance } from "node:perf_hooks";
import type {
  BlockingEvent,
  LagSample,
  StackFrame,
  TaskOutcome,
  TaskRecord,
  TaskState,
} from "../types/index.js";

/**
 * Mutable record of one task. All times are session offsets.
 * The terminal transition is the single `outcome` assignment.
 */
export class TaskEntry {
  readonly id: number;
  readonly name: string;
  readonly qualifiedName: string;
  readonly parentId: number | null;
  readonly createdAt: number;
  readonly stack: StackFrame[] | null;
  readonly childIds: number[] = [];
  startedAt: number | null = null;
  outcome: TaskOutcome | null = null;

  constructor(init: {
    id: number;
    name: string;
    qualifiedName: string;
    parentId: number | null;
    createdAt: number;
    stack: StackFrame[] | null;
  }) {
    this.id = init.id;
    this.name = init.name;
    this.qualifiedName = init.qualifiedName;
    this.parentId = init.parentId;
    this.createdAt = init.createdAt;
    this.stack = init.stack;
  }

  get state(): TaskState {
    if (this.outcome) {
      return this.outcome.state;
    }
    return this.startedAt === null ? "created" : "running";
  }

  toRecord(): TaskRecord {
    return {
      id: this.id,
      name: this.name,
      qualifiedName: this.qualifiedName,
      parentId: this.parentId,
      childIds: [...this.childIds],
      state: this.state,
      createdAt: this.createdAt,
      startedAt: this.startedAt,
      completedAt: this.outcome?.completedAt ?? null,
      error: this.outcome?.error ?? null,
      stack: this.stack ? [...this.stack] : null,
    };
  }
}

export interface NewTaskEntry {
  id: number;
  name: string;
  qualifiedName: string;
  parentId: number | null;
  stack: StackFrame[] | null;
}

/** Writer handed to task-tracking backends */
export interface TaskWriter {
  now(): number;
  /**
   * Record a new task. Returns null when the tracking limit is reached (the
   * task is counted as created and dropped) or the session is finalized.
   */
  add(entry: NewTaskEntry): TaskEntry | null;
  markStarted(entry: TaskEntry): void;
  settle(entry: TaskEntry, outcome: Omit<TaskOutcome, "completedAt">): void;
}

export interface BlockingWriter {
  now(): number;
  append(event: BlockingEvent): void;
}

export interface LagWriter {
  now(): number;
  append(sample: LagSample): void;
}

export interface SessionOptions {
  maxTrackedTasks: number;
}

export class ProfilingSession {
  /** performance.now() at session creation */
  readonly epoch: number;
  private readonly maxTrackedTasks: number;
  private readonly taskEntries: TaskEntry[] = [];
  private readonly taskIndex = new Map<number, TaskEntry>();
  private readonly blockingEvents: BlockingEvent[] = [];
  private readonly lagSamples: LagSample[] = [];
  private created = 0;
  private dropped = 0;
  private finalizedAt: number | null = null;

  constructor(options: SessionOptions) {
    this.epoch = performance.now();
    this.maxTrackedTasks = options.maxTrackedTasks;
  }

  /** Milliseconds since the session epoch */
  now(): number {
    return performance.now() - this.epoch;
  }

  get isFinalized(): boolean {
    return this.finalizedAt !== null;
  }

  /** Session length; grows until finalized */
  get duration(): number {
    return this.finalizedAt ?? this.now();
  }

  get tasksCreated(): number {
    return this.created;
  }

  get tasksDropped(): number {
    return this.dropped;
  }

  finalize(): void {
    if (this.finalizedAt === null) {
      this.finalizedAt = this.now();
    }
  }

  taskWriter(): TaskWriter {
    return {
      now: () => this.now(),
      add: (entry) => this.addTask(entry),
      markStarted: (entry) => {
        if (!this.isFinalized && entry.startedAt === null) {
          entry.startedAt = this.now();
        }
      },
      settle: (entry, outcome) => {
        if (!this.isFinalized && !entry.outcome) {
          entry.outcome = { ...outcome, completedAt: this.now() };
        }
      },
    };
  }

  blockingWriter(): BlockingWriter {
    return {
      now: () => this.now(),
      append: (event) => {
        if (!this.isFinalized) {
          this.blockingEvents.push(event);
        }
      },
    };
  }

  lagWriter(): LagWriter {
    return {
      now: () => this.now(),
      append: (sample) => {
        if (!this.isFinalized) {
          this.lagSamples.push(sample);
        }
      },
    };
  }

  tasks(): TaskRecord[] {
    return this.taskEntries.map((entry) => entry.toRecord());
  }

  blocking(): BlockingEvent[] {
    return this.blockingEvents.map((event) => ({ ...event }));
  }

  lag(): LagSample[] {
    return this.lagSamples.map((sample) => ({ ...sample }));
  }

  private addTask(init: NewTaskEntry): TaskEntry | null {
    if (this.isFinalized) {
      return null;
    }
    this.created++;
    if (this.taskEntries.length >= this.maxTrackedTasks) {
      this.dropped++;
      return null;
    }

    // Only link to a parent this session tracks
    const parent = init.parentId === null ? undefined : this.taskIndex.get(init.parentId);
    const entry = new TaskEntry({
      ...init,
      parentId: parent ? parent.id : null,
      createdAt: this.now(),
    });
    parent?.childIds.push(entry.id);
    this.taskEntries.push(entry);
    this.taskIndex.set(entry.id, entry);
    return entry;
  }
}
