import { describe, it, expect } from "vitest";
import {
  createEmptyStats,
  formatServerTiming,
  formatSummary,
  serverTimingMetrics,
} from "./summary.js";
import type { BlockingEvent, ProfilerStats } from "../types/index.js";

function blocking(duration: number): BlockingEvent {
  return {
    timestamp: 10,
    duration,
    location: { function: "hog", file: null, line: null, column: null },
    taskId: null,
    taskName: null,
    severity: "warning",
  };
}

function finished(overrides: Partial<ProfilerStats>): ProfilerStats {
  return { ...createEmptyStats(), backend: "tasktracker", state: "finalized", ...overrides };
}

describe("formatSummary", () => {
  it("is OK before profiling starts", () => {
    expect(formatSummary(createEmptyStats())).toBe("OK");
  });

  it("is OK without warnings", () => {
    expect(formatSummary(finished({}))).toBe("OK");
  });

  it("reports blocking calls and lag", () => {
    const stats = finished({
      hasWarnings: true,
      blockingCalls: [blocking(120), blocking(150)],
      eventLoopLag: { min: 0, avg: 1, max: 4.4, p95: 4, samples: 10, spikes: 0 },
    });
    expect(formatSummary(stats)).toBe("2 blocking, lag 4ms");
  });

  it("reports lag alone", () => {
    const stats = finished({
      hasWarnings: true,
      eventLoopLag: { min: 0, avg: 3, max: 12.6, p95: 12, samples: 10, spikes: 2 },
    });
    expect(formatSummary(stats)).toBe("lag 13ms");
  });

  it("is disabled when no backend ran", () => {
    expect(formatSummary({ ...createEmptyStats(), state: "finalized" })).toBe("disabled");
  });
});

describe("Server-Timing", () => {
  it("has no metrics before profiling starts", () => {
    expect(serverTimingMetrics(createEmptyStats())).toEqual({});
  });

  it("reports overhead, total blocking and peak lag", () => {
    const stats = finished({
      profilingOverhead: 1.5,
      blockingCalls: [blocking(100), blocking(50)],
      eventLoopLag: { min: 0, avg: 1, max: 3, p95: 2, samples: 4, spikes: 0 },
    });
    expect(serverTimingMetrics(stats)).toEqual({
      "taskscope-overhead": 1.5,
      "taskscope-blocking": 150,
      "taskscope-lag": 3,
    });
  });

  it("formats header values", () => {
    expect(formatServerTiming({ a: 1.234, b: 0 })).toBe("a;dur=1.23, b;dur=0.00");
    expect(formatServerTiming({})).toBe("");
  });
});
