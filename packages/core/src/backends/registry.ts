/**
 * Static backend registry and selection policy.
 */

import { inspectorBackend } from "./inspector-profiler.js";
import { TASK_TRACKER_BACKEND, taskTrackerBackend } from "./task-tracker.js";
import type { BackendDescriptor } from "./types.js";

export const AUTO_BACKEND = "auto";

/** Registered backends, deep profilers first */
export const BACKEND_REGISTRY: readonly BackendDescriptor[] = Object.freeze([
  inspectorBackend,
  taskTrackerBackend,
]);

export interface BackendSelection {
  descriptor: BackendDescriptor;
  requested: string;
  /** Set when the requested backend could not be used */
  warning: string | null;
}

/**
 * Pick the backend for a session.
 *
 * "auto" takes the first available deep backend, then any available one.
 * A named backend is used when registered and available; otherwise the
 * fallback is used and a warning explains why. Returns null only when
 * nothing in the registry is available.
 */
export function selectBackend(
  registry: readonly BackendDescriptor[],
  requested: string,
  fallback: string = TASK_TRACKER_BACKEND
): BackendSelection | null {
  const available = registry.filter((descriptor) => descriptor.isAvailable());

  if (requested === AUTO_BACKEND) {
    const descriptor =
      available.find((candidate) => candidate.deep) ?? available[0];
    return descriptor ? { descriptor, requested, warning: null } : null;
  }

  const named = registry.find((descriptor) => descriptor.name === requested);
  if (named && available.includes(named)) {
    return { descriptor: named, requested, warning: null };
  }

  const substitute =
    available.find((descriptor) => descriptor.name === fallback) ?? available[0];
  if (!substitute) {
    return null;
  }
  const reason = named ? "is unavailable" : "is not registered";
  return {
    descriptor: substitute,
    requested,
    warning: `Backend "${requested}" ${reason}, falling back to "${substitute.name}"`,
  };
}

/** Names of registered backends that can run in this process */
export function availableBackends(
  registry: readonly BackendDescriptor[] = BACKEND_REGISTRY
): string[] {
  return registry
    .filter((descriptor) => descriptor.isAvailable())
    .map((descriptor) => descriptor.name);
}
