/**
 * Timeline projection of a task hierarchy, for rendering.
 */

import type { TaskNode, Timeline, TimelineEntry } from "../types/index.js";
import { walkHierarchy } from "./hierarchy.js";

/**
 * Project the hierarchy onto a timeline. Unsettled tasks extend to the end of
 * the session.
 */
export function buildTimeline(
  roots: readonly TaskNode[],
  sessionDuration: number
): Timeline {
  const entries: TimelineEntry[] = [];
  for (const { node, depth } of walkHierarchy(roots)) {
    const end = node.completedAt ?? Math.max(sessionDuration, node.createdAt);
    entries.push({
      taskId: node.id,
      name: node.name,
      state: node.state,
      start: node.createdAt,
      duration: end - node.createdAt,
      depth,
    });
  }
  entries.sort((a, b) => a.start - b.start || a.taskId - b.taskId);

  return {
    entries,
    totalDuration: sessionDuration,
    maxConcurrent: maxConcurrent(entries),
  };
}

/**
 * Largest number of entries alive at the same instant. An entry ending
 * exactly when another starts does not overlap it.
 */
export function maxConcurrent(entries: readonly TimelineEntry[]): number {
  const edges: Array<{ at: number; delta: 1 | -1 }> = [];
  for (const entry of entries) {
    edges.push({ at: entry.start, delta: 1 });
    edges.push({ at: entry.start + entry.duration, delta: -1 });
  }
  edges.sort((a, b) => a.at - b.at || a.delta - b.delta);

  let live = 0;
  let peak = 0;
  for (const edge of edges) {
    live += edge.delta;
    peak = Math.max(peak, live);
  }
  return peak;
}
