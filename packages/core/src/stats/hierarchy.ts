/**
 * Task hierarchy reconstruction.
 */

import type { TaskNode, TaskRecord } from "../types/index.js";

export interface TaskTiming {
  /** Execution time (ms) measured for the task */
  activeTime: number;
}

/**
 * Build the parent/child forest from flat task records.
 *
 * A record whose parent is unknown, is itself, or was created after it is
 * treated as a root, so the result never contains a cycle.
 */
export function buildTaskHierarchy(
  records: readonly TaskRecord[],
  timings: ReadonlyMap<number, TaskTiming> = new Map()
): TaskNode[] {
  const nodes = new Map<number, TaskNode>();
  const byId = new Map<number, TaskRecord>();
  for (const record of records) {
    byId.set(record.id, record);
  }

  for (const record of records) {
    const duration =
      record.completedAt === null ? null : record.completedAt - record.createdAt;
    const timing = timings.get(record.id);
    const activeTime =
      timing === undefined
        ? null
        : duration === null
          ? timing.activeTime
          : Math.min(timing.activeTime, duration);
    nodes.set(record.id, {
      id: record.id,
      name: record.name,
      qualifiedName: record.qualifiedName,
      state: record.state,
      createdAt: record.createdAt,
      startedAt: record.startedAt,
      completedAt: record.completedAt,
      duration,
      activeTime,
      suspendedTime:
        activeTime === null || duration === null ? null : duration - activeTime,
      error: record.error,
      stack: record.stack,
      children: [],
    });
  }

  const roots: TaskNode[] = [];
  for (const record of records) {
    const node = nodes.get(record.id);
    if (!node) {
      continue;
    }
    const parent = record.parentId === null ? undefined : byId.get(record.parentId);
    const parentNode = parent ? nodes.get(parent.id) : undefined;
    if (
      parent &&
      parentNode &&
      parent.id !== record.id &&
      parent.createdAt <= record.createdAt &&
      parent.id < record.id
    ) {
      parentNode.children.push(node);
    } else {
      roots.push(node);
    }
  }
  return roots;
}

/** Depth-first walk yielding each node with its nesting depth */
export function* walkHierarchy(
  roots: readonly TaskNode[]
): Generator<{ node: TaskNode; depth: number }> {
  const stack: Array<{ node: TaskNode; depth: number }> = roots
    .map((node) => ({ node, depth: 0 }))
    .reverse();
  while (stack.length > 0) {
    const item = stack.pop();
    if (!item) {
      break;
    }
    yield item;
    for (let i = item.node.children.length - 1; i >= 0; i--) {
      const child = item.node.children[i];
      if (child) {
        stack.push({ node: child, depth: item.depth + 1 });
      }
    }
  }
}

/** Total number of nodes in a forest */
export function countNodes(roots: readonly TaskNode[]): number {
  let count = 0;
  for (const _ of walkHierarchy(roots)) {
    count++;
  }
  return count;
}
