/**
 * Error taxonomy for the profiler.
 * Codes are stable enum-like strings so hosts can branch on them without
 * parsing messages.
 */

export type ProfilerErrorCode =
  | "HOOK_CONFLICT"
  | "BACKEND_START_FAILED"
  | "RESTORE_FAILED"
  | "INVALID_CONFIG";

export class ProfilerError extends Error {
  readonly code: ProfilerErrorCode;

  constructor(code: ProfilerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProfilerError";
    this.code = code;
  }
}

/** The task-creation primitive cannot be intercepted in its current state. */
export class HookConflictError extends ProfilerError {
  constructor(message = "Task factory was replaced outside the installed hooks") {
    super("HOOK_CONFLICT", message);
    this.name = "HookConflictError";
  }
}

export class BackendStartError extends ProfilerError {
  readonly backend: string;

  constructor(backend: string, cause: unknown) {
    super(
      "BACKEND_START_FAILED",
      `Backend "${backend}" failed to start: ${describeError(cause)}`,
      { cause }
    );
    this.name = "BackendStartError";
    this.backend = backend;
  }
}

/** A hook or setting could not be put back the way it was found. */
export class RestoreError extends ProfilerError {
  constructor(message: string) {
    super("RESTORE_FAILED", message);
    this.name = "RestoreError";
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class InvalidConfigError extends ProfilerError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(
      "INVALID_CONFIG",
      `Invalid profiler configuration: ${issues
        .map((issue) => `${issue.path || "<root>"}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "InvalidConfigError";
    this.issues = issues;
  }
}

/**
 * Render any thrown value as a single line for logs.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message ? `${error.name}: ${error.message}` : error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
