/**
 * Aggregation of a V8 CPU profile into per-function timings.
 */

import type { Profiler } from "node:inspector";
import type { FunctionTiming } from "../types/index.js";

export interface ProfileSummary {
  functions: FunctionTiming[];
  /** Time (ms) sampled while the thread was idle */
  idleTime: number;
  /** Time (ms) covered by samples */
  sampledTime: number;
}

const IDLE_NODE = "(idle)";

// (root), (program), (idle), (garbage collector) are not functions
function isSpecialNode(node: Profiler.ProfileNode): boolean {
  return node.callFrame.functionName.startsWith("(") && node.callFrame.url === "";
}

function functionKey(node: Profiler.ProfileNode): string {
  const frame = node.callFrame;
  return `${frame.functionName}\u0000${frame.url}\u0000${frame.lineNumber}`;
}

/**
 * Self time of every node in ms. Each sample lasts until the next one; the
 * last lasts until the profile's end time. Falls back to hitCount times the
 * sampling interval when the profile carries no samples.
 */
function selfTimes(
  profile: Profiler.Profile,
  samplingIntervalUs: number
): Map<number, number> {
  const times = new Map<number, number>();
  const samples = profile.samples ?? [];
  const deltas = profile.timeDeltas ?? [];

  if (samples.length === 0) {
    for (const node of profile.nodes) {
      times.set(node.id, ((node.hitCount ?? 0) * samplingIntervalUs) / 1000);
    }
    return times;
  }

  const stamps: number[] = [];
  let clock = profile.startTime;
  for (let i = 0; i < samples.length; i++) {
    clock += deltas[i] ?? 0;
    stamps.push(clock);
  }
  for (let i = 0; i < samples.length; i++) {
    const nodeId = samples[i];
    const at = stamps[i];
    if (nodeId === undefined || at === undefined) {
      continue;
    }
    const next = stamps[i + 1] ?? Math.max(profile.endTime, at);
    times.set(nodeId, (times.get(nodeId) ?? 0) + (next - at) / 1000);
  }
  return times;
}

/**
 * Summarize a CPU profile. Recursive functions are counted once per path in
 * totalTime.
 */
export function summarizeProfile(
  profile: Profiler.Profile,
  topN: number,
  samplingIntervalUs: number
): ProfileSummary {
  const nodes = new Map<number, Profiler.ProfileNode>();
  const childIds = new Set<number>();
  for (const node of profile.nodes) {
    nodes.set(node.id, node);
    for (const child of node.children ?? []) {
      childIds.add(child);
    }
  }
  const roots = profile.nodes.filter((node) => !childIds.has(node.id));
  const self = selfTimes(profile, samplingIntervalUs);

  // Pre-order, so reversing it visits children before parents
  const order: Profiler.ProfileNode[] = [];
  const pending = [...roots].reverse();
  while (pending.length > 0) {
    const node = pending.pop();
    if (!node) {
      break;
    }
    order.push(node);
    const children = node.children ?? [];
    for (let i = children.length - 1; i >= 0; i--) {
      const child = nodes.get(children[i] ?? -1);
      if (child) {
        pending.push(child);
      }
    }
  }

  const total = new Map<number, number>();
  for (let i = order.length - 1; i >= 0; i--) {
    const node = order[i];
    if (!node) {
      continue;
    }
    let sum = self.get(node.id) ?? 0;
    for (const child of node.children ?? []) {
      sum += total.get(child) ?? 0;
    }
    total.set(node.id, sum);
  }

  let idleTime = 0;
  let sampledTime = 0;
  for (const [id, time] of self) {
    sampledTime += time;
    if (nodes.get(id)?.callFrame.functionName === IDLE_NODE) {
      idleTime += time;
    }
  }

  const timings = new Map<string, FunctionTiming>();
  const onPath = new Map<string, number>();
  const walk: Array<{ node: Profiler.ProfileNode; exit: boolean }> = roots
    .map((node) => ({ node, exit: false }))
    .reverse();

  while (walk.length > 0) {
    const item = walk.pop();
    if (!item) {
      break;
    }
    const { node } = item;
    const special = isSpecialNode(node);
    const key = functionKey(node);

    if (item.exit) {
      if (!special) {
        onPath.set(key, (onPath.get(key) ?? 1) - 1);
      }
      continue;
    }

    if (!special) {
      const frame = node.callFrame;
      const timing = timings.get(key) ?? {
        function: frame.functionName || "(anonymous)",
        file: frame.url || "<native>",
        line: frame.lineNumber + 1,
        calls: 0,
        selfTime: 0,
        totalTime: 0,
        perCall: 0,
      };
      timing.calls++;
      timing.selfTime += self.get(node.id) ?? 0;
      if ((onPath.get(key) ?? 0) === 0) {
        timing.totalTime += total.get(node.id) ?? 0;
      }
      timings.set(key, timing);
      onPath.set(key, (onPath.get(key) ?? 0) + 1);
    }

    walk.push({ node, exit: true });
    const children = node.children ?? [];
    for (let i = children.length - 1; i >= 0; i--) {
      const child = nodes.get(children[i] ?? -1);
      if (child) {
        walk.push({ node: child, exit: false });
      }
    }
  }

  const functions = [...timings.values()]
    .map((timing) => ({
      ...timing,
      perCall: timing.calls > 0 ? timing.totalTime / timing.calls : 0,
    }))
    .sort((a, b) => b.totalTime - a.totalTime || b.selfTime - a.selfTime)
    .slice(0, topN);

  return { functions, idleTime, sampledTime };
}
