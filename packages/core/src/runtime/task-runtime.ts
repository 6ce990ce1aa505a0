/**
 * Cooperative task runtime.
 *
 * Tasks are named units of asynchronous work scheduled on the event loop.
 * The runtime owns the task-creation primitive (`taskFactory`), which a
 * profiler may intercept for the duration of a session, and resolves the
 * current task and work scope through AsyncLocalStorage so both are handed
 * to the factory explicitly.
 *
 * While step timing is on, every resumption of a task (its first run and
 * each continuation after a suspension) is timed with async_hooks
 * before/after callbacks. Only outermost callbacks count.
 */

import { AsyncLocalStorage, createHook, type AsyncHook } from "node:async_hooks";
import { performance } from "node:perf_hooks";
import { setTimeout as delay } from "node:timers/promises";
import { createConsoleLogger, type ProfilerLogger } from "../logger.js";
import { describeError } from "../utils/errors.js";
import { captureStack } from "../utils/stack.js";
import type { StackFrame, TaskState, TerminalTaskState } from "../types/index.js";

export type TaskBody<T> = (signal: AbortSignal) => T | PromiseLike<T>;

export interface TaskOptions {
  /** Display name, defaults to "Task-<id>" */
  name?: string;
}

export interface TaskSpec<T> {
  body: TaskBody<T>;
  name?: string;
}

/**
 * A unit of work (a request, a profiled call). Tasks created inside
 * `runtime.runInScope(scope, ...)`, and their descendants, belong to it.
 */
export class WorkScope {
  readonly label: string;

  constructor(label: string) {
    this.label = label;
  }
}

/** Ambient context passed to the task factory */
export interface SpawnContext {
  /** Task that was running when the new task was requested */
  parent: Task | null;
  /** Unit of work the request came from */
  scope: WorkScope | null;
}

/** The task-creation primitive */
export type TaskFactory = <T>(spec: TaskSpec<T>, context: SpawnContext) => Task<T>;

/** One synchronous stretch of a task's execution, timed by the runtime */
export interface TaskStep {
  task: Task;
  /** performance.now() values */
  startedAt: number;
  endedAt: number;
}

export class TaskCancelledError extends Error {
  constructor(message = "Task was cancelled") {
    super(message);
    this.name = "TaskCancelledError";
  }
}

type Settled<T> =
  | { state: "completed"; value: T }
  | { state: Exclude<TerminalTaskState, "completed">; error: unknown };

export class Task<T = unknown> implements PromiseLike<T> {
  readonly id: number;
  readonly name: string;
  readonly qualifiedName: string;
  readonly parent: Task | null;
  /** performance.now() at creation */
  readonly createdAt: number;
  /** Where the task was created, when the runtime captures creation stacks */
  readonly creationStack: StackFrame[] | null;
  startedAt: number | null = null;

  private readonly runtime: TaskRuntime;
  private readonly body: TaskBody<T>;
  private readonly controller = new AbortController();
  private outcome: Settled<T> | null = null;
  private started = false;
  private readonly startCallbacks: Array<() => void> = [];
  private readonly doneCallbacks: Array<() => void> = [];

  constructor(
    runtime: TaskRuntime,
    id: number,
    spec: TaskSpec<T>,
    context: SpawnContext
  ) {
    this.runtime = runtime;
    this.id = id;
    this.name = spec.name ?? `Task-${id}`;
    this.qualifiedName = spec.body.name || "<anonymous>";
    this.parent = context.parent;
    this.body = spec.body;
    this.createdAt = performance.now();
    const depth = runtime.effectiveStackDepth;
    this.creationStack =
      depth === null ? null : captureStack(depth, TaskRuntime.prototype.createTask);
  }

  get state(): TaskState {
    if (this.outcome) {
      return this.outcome.state;
    }
    return this.started ? "running" : "created";
  }

  get done(): boolean {
    return this.outcome !== null;
  }

  /** Failure or cancellation reason, undefined while pending or on success */
  get error(): unknown {
    return this.outcome && this.outcome.state !== "completed"
      ? this.outcome.error
      : undefined;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Queue the body to start in a microtask, inside this task's async context.
   * Called once by the factory that created the task.
   */
  schedule(storage: AsyncLocalStorage<Task>): this {
    storage.run(this, () => {
      queueMicrotask(() => this.run());
    });
    return this;
  }

  /**
   * Request cancellation. The body's signal is aborted and the task settles
   * as cancelled right away; a task that has not started never runs.
   * Returns false if the task had already settled.
   */
  cancel(reason?: string): boolean {
    if (this.outcome) {
      return false;
    }
    const error = new TaskCancelledError(reason ?? `Task ${this.name} was cancelled`);
    this.controller.abort(error);
    this.settle({ state: "cancelled", error });
    return true;
  }

  addStartCallback(callback: (task: Task<T>) => void): void {
    const invoke = (): void => this.invoke(callback);
    if (this.started) {
      invoke();
      return;
    }
    this.startCallbacks.push(invoke);
  }

  /** Runs synchronously when the task settles, or immediately if it already has */
  addDoneCallback(callback: (task: Task<T>) => void): void {
    const invoke = (): void => this.invoke(callback);
    if (this.outcome) {
      invoke();
      return;
    }
    this.doneCallbacks.push(invoke);
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null | undefined,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null | undefined
  ): Promise<TResult1 | TResult2> {
    return this.toPromise().then(onfulfilled, onrejected);
  }

  toString(): string {
    return `<Task id=${this.id} name=${this.name} state=${this.state}>`;
  }

  private toPromise(): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const deliver = (): void => {
        const outcome = this.outcome;
        if (!outcome) {
          return;
        }
        if (outcome.state === "completed") {
          resolve(outcome.value);
        } else {
          reject(outcome.error);
        }
      };
      if (this.outcome) {
        deliver();
      } else {
        this.doneCallbacks.push(deliver);
      }
    });
  }

  private run(): void {
    if (this.outcome) {
      return;
    }
    this.started = true;
    this.startedAt = performance.now();
    for (const callback of this.startCallbacks.splice(0)) {
      callback();
    }

    let pending: T | PromiseLike<T>;
    try {
      pending = this.body(this.controller.signal);
    } catch (error) {
      this.settle({ state: "failed", error });
      return;
    }

    new Promise<T>((resolve) => resolve(pending)).then(
      (value) => this.settle({ state: "completed", value }),
      (error: unknown) =>
        this.settle(
          this.controller.signal.aborted
            ? { state: "cancelled", error }
            : { state: "failed", error }
        )
    );
  }

  private settle(outcome: Settled<T>): void {
    if (this.outcome) {
      return;
    }
    this.outcome = outcome;
    for (const callback of this.doneCallbacks.splice(0)) {
      callback();
    }
  }

  private invoke(callback: (task: Task<T>) => void): void {
    try {
      callback(this);
    } catch (error) {
      this.runtime.logger.error(
        `Callback for ${this.toString()} threw: ${describeError(error)}`
      );
    }
  }
}

export interface TaskRuntimeOptions {
  logger?: ProfilerLogger;
}

export type StepListener = (step: TaskStep) => void;

interface OpenStep {
  task: Task | null;
  startedAt: number;
}

export class TaskRuntime {
  /** Factory installed at construction; `taskFactory` starts out as this */
  readonly baseFactory: TaskFactory;

  /** The task-creation primitive. Replaceable for interception. */
  taskFactory: TaskFactory;

  /**
   * Frames of creation call site recorded on every new task. null disables
   * capture.
   */
  creationStackDepth: number | null = null;

  /** Most recent step timed by the runtime */
  lastStep: TaskStep | null = null;

  logger: ProfilerLogger;

  private readonly storage = new AsyncLocalStorage<Task>();
  private readonly scopes = new AsyncLocalStorage<WorkScope>();
  private readonly stepListeners = new Set<StepListener>();
  private readonly slowStepListeners = new Map<StepListener, number | null>();
  private readonly openSteps: OpenStep[] = [];
  private readonly stackRequests = new Set<{ depth: number }>();
  private stepHook: AsyncHook | null = null;
  private slowCallbackThreshold: number | null = null;
  private nextTaskId = 1;

  constructor(options: TaskRuntimeOptions = {}) {
    this.logger = options.logger ?? createConsoleLogger("taskscope:runtime");
    this.baseFactory = <T>(spec: TaskSpec<T>, context: SpawnContext): Task<T> =>
      new Task(this, this.nextTaskId++, spec, context).schedule(this.storage);
    this.taskFactory = this.baseFactory;
  }

  /**
   * Steps lasting at least this many ms are logged and reported to
   * slow-step listeners without a threshold of their own. null disables
   * the check.
   */
  get slowCallbackDuration(): number | null {
    return this.slowCallbackThreshold;
  }

  set slowCallbackDuration(value: number | null) {
    this.slowCallbackThreshold = value;
    this.updateStepTiming();
  }

  /** Stack depth captured for new tasks: the setting or the deepest request */
  get effectiveStackDepth(): number | null {
    let depth = this.creationStackDepth;
    for (const request of this.stackRequests) {
      depth = Math.max(depth ?? 0, request.depth);
    }
    return depth;
  }

  /**
   * Capture creation stacks of at least `depth` frames until the returned
   * release function is called.
   */
  requestCreationStacks(depth: number): () => void {
    const request = { depth };
    this.stackRequests.add(request);
    return () => {
      this.stackRequests.delete(request);
    };
  }

  /** Whether task steps are currently being timed */
  get isTimingSteps(): boolean {
    return this.stepHook !== null;
  }

  /**
   * Create a task running `body`. The body starts in a microtask; the task
   * that is current at call time becomes its parent.
   */
  createTask<T>(body: TaskBody<T>, options: TaskOptions = {}): Task<T> {
    const context: SpawnContext = {
      parent: this.currentTask(),
      scope: this.currentScope(),
    };
    return this.taskFactory({ body, name: options.name }, context);
  }

  /** Task whose body is executing, or null outside any task */
  currentTask(): Task | null {
    return this.storage.getStore() ?? null;
  }

  /** Unit of work the caller belongs to, or null */
  currentScope(): WorkScope | null {
    return this.scopes.getStore() ?? null;
  }

  /** Run `fn`, and everything it schedules, as part of `scope` */
  runInScope<T>(scope: WorkScope, fn: () => T): T {
    return this.scopes.run(scope, fn);
  }

  /** Subscribe to every timed step. Returns an unsubscribe function. */
  onStep(listener: StepListener): () => void {
    this.stepListeners.add(listener);
    this.updateStepTiming();
    return () => {
      this.stepListeners.delete(listener);
      this.updateStepTiming();
    };
  }

  /**
   * Subscribe to steps lasting at least `threshold` ms, or
   * `slowCallbackDuration` when no threshold is given. Returns an
   * unsubscribe function.
   */
  onSlowStep(listener: StepListener, threshold: number | null = null): () => void {
    this.slowStepListeners.set(listener, threshold);
    this.updateStepTiming();
    return () => {
      this.slowStepListeners.delete(listener);
      this.updateStepTiming();
    };
  }

  private updateStepTiming(): void {
    let wanted = this.slowCallbackThreshold !== null || this.stepListeners.size > 0;
    for (const threshold of this.slowStepListeners.values()) {
      wanted ||= threshold !== null;
    }

    if (wanted && !this.stepHook) {
      // Hook callbacks must not throw: an exception here is fatal to the process
      this.stepHook = createHook({
        before: () => {
          this.openSteps.push({
            task: this.openSteps.length === 0 ? this.currentTask() : null,
            startedAt: performance.now(),
          });
        },
        after: () => {
          const open = this.openSteps.pop();
          if (open && open.task) {
            this.recordStep({
              task: open.task,
              startedAt: open.startedAt,
              endedAt: performance.now(),
            });
          }
        },
      }).enable();
    } else if (!wanted && this.stepHook) {
      this.stepHook.disable();
      this.stepHook = null;
      this.openSteps.length = 0;
    }
  }

  private recordStep(step: TaskStep): void {
    this.lastStep = step;
    const elapsed = step.endedAt - step.startedAt;

    for (const listener of this.stepListeners) {
      this.notify(listener, step);
    }
    const setting = this.slowCallbackThreshold;
    if (setting !== null && elapsed >= setting) {
      this.logger.warn(`Executing ${step.task.toString()} took ${elapsed.toFixed(1)}ms`);
    }
    for (const [listener, threshold] of this.slowStepListeners) {
      const limit = threshold ?? setting;
      if (limit !== null && elapsed >= limit) {
        this.notify(listener, step);
      }
    }
  }

  private notify(listener: StepListener, step: TaskStep): void {
    try {
      listener(step);
    } catch (error) {
      this.logger.error(`Step listener threw: ${describeError(error)}`);
    }
  }
}

/** Suspend for `ms`, rejecting early with the abort reason if `signal` fires */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

/** Runtime shared by code that does not create its own */
export const defaultRuntime = new TaskRuntime();
