/**
 * Call-site capture from V8 stack traces.
 */

import type { StackFrame } from "../types/index.js";

// "    at fn (file:line:col)" or "    at file:line:col"
const FRAME_WITH_NAME = /^\s*at (?:async )?(.+?) \((.*?)(?::(\d+))?(?::(\d+))?\)$/;
const FRAME_WITHOUT_NAME = /^\s*at (?:async )?(.*?)(?::(\d+))?(?::(\d+))?$/;

// Extra frames collected so that hidden frames do not eat into maxDepth
const FRAME_SLACK = 16;

function toNumber(raw: string | undefined): number | null {
  if (raw === undefined) {
    return null;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isNaN(value) ? null : value;
}

/**
 * Parse one line of a V8 stack trace. Returns null for lines that are not
 * frames (the leading "Error: message" line, blank lines).
 */
export function parseStackLine(line: string): StackFrame | null {
  if (!/^\s*at /.test(line)) {
    return null;
  }

  const named = FRAME_WITH_NAME.exec(line);
  if (named) {
    return {
      function: named[1] ?? "<anonymous>",
      file: named[2] || null,
      line: toNumber(named[3]),
      column: toNumber(named[4]),
    };
  }

  const bare = FRAME_WITHOUT_NAME.exec(line);
  if (bare) {
    return {
      function: "<anonymous>",
      file: bare[1] || null,
      line: toNumber(bare[2]),
      column: toNumber(bare[3]),
    };
  }

  return null;
}

/** Parse a full stack string, keeping at most `maxDepth` frames. */
export function parseStack(stack: string | undefined, maxDepth: number): StackFrame[] {
  if (!stack) {
    return [];
  }
  const frames: StackFrame[] = [];
  for (const line of stack.split("\n")) {
    if (frames.length >= maxDepth) {
      break;
    }
    const frame = parseStackLine(line);
    if (frame) {
      frames.push(frame);
    }
  }
  return frames;
}

/**
 * Capture the current call stack.
 * Frames at and above `above` (typically the public API function the caller
 * entered through) are omitted.
 */
export function captureStack(
  maxDepth: number,
  above?: (...args: never[]) => unknown
): StackFrame[] {
  const holder: { stack?: string } = {};
  const previousLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = maxDepth + FRAME_SLACK;
  try {
    Error.captureStackTrace(holder, above ?? captureStack);
    // `above` is not on the stack: V8 then omits every frame
    if (above && parseStack(holder.stack, 1).length === 0) {
      Error.captureStackTrace(holder, captureStack);
    }
  } finally {
    Error.stackTraceLimit = previousLimit;
  }
  return parseStack(holder.stack, maxDepth);
}

export const UNKNOWN_LOCATION: StackFrame = Object.freeze({
  function: "<unknown>",
  file: null,
  line: null,
  column: null,
});
