import { describe, it, expect } from "vitest";
import { buildTimeline, maxConcurrent } from "./timeline.js";
import { buildTaskHierarchy } from "./hierarchy.js";
import type { TaskRecord } from "../types/index.js";

function record(
  id: number,
  parentId: number | null,
  createdAt: number,
  completedAt: number | null
): TaskRecord {
  return {
    id,
    name: `Task-${id}`,
    qualifiedName: "work",
    parentId,
    childIds: [],
    state: completedAt === null ? "running" : "completed",
    createdAt,
    startedAt: createdAt,
    completedAt,
    error: null,
    stack: null,
  };
}

describe("buildTimeline", () => {
  const roots = buildTaskHierarchy([
    record(1, null, 0, 100),
    record(2, 1, 10, 40),
    record(3, 1, 20, 60),
    record(4, null, 100, 120),
    record(5, null, 130, null),
  ]);

  it("lists entries by start time with depth", () => {
    const timeline = buildTimeline(roots, 150);

    expect(timeline.entries.map((entry) => [entry.taskId, entry.depth])).toEqual([
      [1, 0],
      [2, 1],
      [3, 1],
      [4, 0],
      [5, 0],
    ]);
    expect(timeline.totalDuration).toBe(150);
  });

  it("extends unsettled tasks to the end of the session", () => {
    const timeline = buildTimeline(roots, 150);
    const open = timeline.entries.find((entry) => entry.taskId === 5);

    expect(open?.duration).toBe(20);
    expect(open?.state).toBe("running");
  });

  it("counts peak concurrency", () => {
    expect(buildTimeline(roots, 150).maxConcurrent).toBe(3);
  });
});

describe("maxConcurrent", () => {
  it("does not count back-to-back entries as overlapping", () => {
    expect(
      maxConcurrent([
        { taskId: 1, name: "a", state: "completed", start: 0, duration: 10, depth: 0 },
        { taskId: 2, name: "b", state: "completed", start: 10, duration: 10, depth: 0 },
      ])
    ).toBe(1);
  });

  it("is zero for an empty timeline", () => {
    expect(maxConcurrent([])).toBe(0);
  });
});
