/**
 * Plain-text rendering of profiler stats for the terminal.
 */

import {
  formatSummary,
  walkHierarchy,
  type BlockingEvent,
  type ProfilerStats,
  type StackFrame,
} from "@taskscope/core";

export function formatMs(value: number): string {
  return `${value.toFixed(2)}ms`;
}

export function formatLocation(frame: StackFrame): string {
  if (!frame.file) {
    return frame.function;
  }
  const position = frame.line === null ? frame.file : `${frame.file}:${frame.line}`;
  return `${frame.function} (${position})`;
}

function heading(title: string, underline: string): string[] {
  return [title, underline.repeat(title.length)];
}

function taskTree(stats: ProfilerStats): string[] {
  const lines: string[] = [];
  for (const { node, depth } of walkHierarchy(stats.taskHierarchy)) {
    const duration = node.duration === null ? "pending" : formatMs(node.duration);
    const active = node.activeTime === null ? "" : ` (active ${formatMs(node.activeTime)})`;
    lines.push(`${"  ".repeat(depth)}${node.name} [${node.state}] ${duration}${active}`);
  }
  return lines.length > 0 ? lines : ["No tasks recorded."];
}

function blockingRow(event: BlockingEvent): string {
  return (
    formatMs(event.duration).padEnd(12) +
    event.severity.padEnd(10) +
    (event.taskName ?? "-").padEnd(20) +
    formatLocation(event.location)
  );
}

/**
 * Render a report. `title` names the profiled unit of work.
 */
export function formatReport(stats: ProfilerStats, title = "Taskscope Report"): string {
  const lag = stats.eventLoopLag;
  const lines = [
    ...heading(title, "="),
    `Backend:    ${stats.backend}`,
    `Duration:   ${formatMs(stats.sessionDuration)}`,
    `Overhead:   ${formatMs(stats.profilingOverhead)}`,
    `Tasks:      ${stats.tasksCreated} created, ${stats.tasksCompleted} completed, ` +
      `${stats.tasksCancelled} cancelled, ${stats.tasksFailed} failed, ` +
      `${stats.tasksDropped} dropped`,
    `Lag:        avg ${formatMs(lag.avg)}, p95 ${formatMs(lag.p95)}, max ${formatMs(lag.max)} ` +
      `(${lag.samples} samples, ${lag.spikes} spikes)`,
    `Summary:    ${formatSummary(stats)}`,
    "",
    ...heading("Task Tree", "-"),
    ...taskTree(stats),
  ];

  if (stats.blockingCalls.length > 0) {
    lines.push("", ...heading("Blocking Calls", "-"));
    lines.push("DURATION".padEnd(12) + "SEVERITY".padEnd(10) + "TASK".padEnd(20) + "LOCATION");
    lines.push(...stats.blockingCalls.map(blockingRow));
  }

  if (stats.topFunctions.length > 0) {
    lines.push("", ...heading("Top Functions", "-"));
    lines.push("TOTAL".padEnd(12) + "SELF".padEnd(12) + "CALLS".padEnd(7) + "FUNCTION");
    for (const timing of stats.topFunctions) {
      lines.push(
        formatMs(timing.totalTime).padEnd(12) +
          formatMs(timing.selfTime).padEnd(12) +
          String(timing.calls).padEnd(7) +
          `${timing.function} (${timing.file}:${timing.line})`
      );
    }
  }

  if (stats.warnings.length > 0) {
    lines.push("", ...heading("Warnings", "-"));
    lines.push(...stats.warnings.map((warning) => `- ${warning}`));
  }

  return lines.join("\n");
}
