/**
 * @taskscope/core
 *
 * In-process profiler for cooperative async tasks: task hierarchy,
 * blocking calls and event loop lag for one unit of work.
 */

export * from "./types/index.js";
export {
  loadConfig,
  resolveConfig,
  CONFIG_ENV_VARS,
  profilerConfigSchema,
  DEFAULT_CONFIG,
  type ProfilerConfig,
  type ProfilerConfigInput,
} from "./config.js";
export {
  createConsoleLogger,
  createSilentLogger,
  type ProfilerLogger,
} from "./logger.js";
export {
  ProfilerError,
  HookConflictError,
  BackendStartError,
  RestoreError,
  InvalidConfigError,
  describeError,
  type ProfilerErrorCode,
  type ConfigIssue,
} from "./utils/errors.js";
export { captureStack, parseStack, parseStackLine } from "./utils/stack.js";
export {
  Task,
  TaskRuntime,
  TaskCancelledError,
  WorkScope,
  defaultRuntime,
  sleep,
  type TaskBody,
  type TaskOptions,
  type TaskSpec,
  type TaskFactory,
  type SpawnContext,
  type TaskStep,
  type StepListener,
} from "./runtime/task-runtime.js";
export { ScopedTaskHook, type FactoryWrapper } from "./runtime/scoped-hook.js";
export { ProfilingSession, type TaskWriter, type BlockingWriter, type LagWriter } from "./session/session.js";
export {
  BACKEND_REGISTRY,
  AUTO_BACKEND,
  selectBackend,
  availableBackends,
  type BackendSelection,
} from "./backends/registry.js";
export { TASK_TRACKER_BACKEND, TaskTrackerBackend } from "./backends/task-tracker.js";
export {
  INSPECTOR_BACKEND,
  InspectorProfilerBackend,
  isInspectorAvailable,
} from "./backends/inspector-profiler.js";
export type {
  ProfilerBackend,
  BackendDescriptor,
  BackendContext,
  BackendStats,
} from "./backends/types.js";
export { BlockingDetector } from "./detectors/blocking-detector.js";
export { LagMonitor } from "./detectors/lag-monitor.js";
export { buildTaskHierarchy, walkHierarchy, countNodes } from "./stats/hierarchy.js";
export { buildTimeline } from "./stats/timeline.js";
export { summarizeLag } from "./stats/lag.js";
export {
  createEmptyStats,
  formatSummary,
  formatServerTiming,
  serverTimingMetrics,
  NO_BACKEND,
} from "./stats/summary.js";
export { ProfilingCoordinator, type CoordinatorOptions } from "./coordinator.js";
export {
  DEMO_SCENARIOS,
  busyWait,
  findScenario,
  type DemoScenario,
} from "./demo/scenarios.js";
