/**
 * Profiler configuration.
 * Reads from environment variables with sensible defaults, validated with zod.
 */

import { z } from "zod";
import { createConsoleLogger, type ProfilerLogger } from "./logger.js";
import { InvalidConfigError } from "./utils/errors.js";

export const profilerConfigSchema = z.object({
  /** "auto" or the name of a registered backend */
  backend: z.string().min(1).default("auto"),

  /** Stall duration (ms) from which a blocking call is reported */
  blockingThreshold: z.number().positive().default(100),

  enableBlockingDetection: z.boolean().default(true),

  /** Lag probe cadence (ms) */
  lagSampleInterval: z.number().positive().default(10),

  enableLagMonitor: z.boolean().default(true),

  /** Lag (ms) at or above which a sample counts as a spike */
  lagThreshold: z.number().nonnegative().default(5),

  /** Tasks beyond this count are counted but not tracked */
  maxTrackedTasks: z.number().int().nonnegative().default(1000),

  /** Capture creation call sites of tracked tasks */
  captureStacks: z.boolean().default(false),

  maxStackDepth: z.number().int().positive().default(10),

  /** Rows reported in topFunctions by the inspector backend */
  topFunctions: z.number().int().positive().default(50),

  /** CPU sampler interval in microseconds */
  samplingInterval: z.number().int().positive().default(1000),
});

export type ProfilerConfig = z.infer<typeof profilerConfigSchema>;
export type ProfilerConfigInput = z.input<typeof profilerConfigSchema>;

export const DEFAULT_CONFIG: ProfilerConfig = Object.freeze(
  profilerConfigSchema.parse({})
);

/**
 * Merge overrides over the defaults and validate the result.
 * @throws InvalidConfigError when a value is out of range or of the wrong type
 */
export function resolveConfig(overrides: ProfilerConfigInput = {}): ProfilerConfig {
  const result = profilerConfigSchema.safeParse(overrides);
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

/** Environment variable read for each setting */
export const CONFIG_ENV_VARS = {
  backend: "TASKSCOPE_BACKEND",
  blockingThreshold: "TASKSCOPE_BLOCKING_THRESHOLD_MS",
  enableBlockingDetection: "TASKSCOPE_BLOCKING_DETECTION",
  lagSampleInterval: "TASKSCOPE_LAG_INTERVAL_MS",
  enableLagMonitor: "TASKSCOPE_LAG_MONITOR",
  lagThreshold: "TASKSCOPE_LAG_THRESHOLD_MS",
  maxTrackedTasks: "TASKSCOPE_MAX_TASKS",
  captureStacks: "TASKSCOPE_CAPTURE_STACKS",
  maxStackDepth: "TASKSCOPE_MAX_STACK_DEPTH",
  topFunctions: "TASKSCOPE_TOP_FUNCTIONS",
  samplingInterval: "TASKSCOPE_SAMPLING_INTERVAL_US",
} as const satisfies Record<keyof ProfilerConfig, string>;

function readNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  return Number(raw);
}

function readFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined) {
    return undefined;
  }
  return raw === "1" || raw.toLowerCase() === "true";
}

function envVarOf(key: PropertyKey | undefined): string {
  for (const [setting, variable] of Object.entries(CONFIG_ENV_VARS)) {
    if (setting === key) {
      return variable;
    }
  }
  return String(key);
}

/**
 * Load configuration from TASKSCOPE_* environment variables.
 * Unset variables fall back to the defaults. An invalid value is logged and
 * replaced by its default; the other variables still apply. Never throws.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  logger: ProfilerLogger = createConsoleLogger()
): ProfilerConfig {
  const input: Record<string, unknown> = {
    backend: env[CONFIG_ENV_VARS.backend] || undefined,
    blockingThreshold: readNumber(env[CONFIG_ENV_VARS.blockingThreshold]),
    enableBlockingDetection: readFlag(env[CONFIG_ENV_VARS.enableBlockingDetection]),
    lagSampleInterval: readNumber(env[CONFIG_ENV_VARS.lagSampleInterval]),
    enableLagMonitor: readFlag(env[CONFIG_ENV_VARS.enableLagMonitor]),
    lagThreshold: readNumber(env[CONFIG_ENV_VARS.lagThreshold]),
    maxTrackedTasks: readNumber(env[CONFIG_ENV_VARS.maxTrackedTasks]),
    captureStacks: readFlag(env[CONFIG_ENV_VARS.captureStacks]),
    maxStackDepth: readNumber(env[CONFIG_ENV_VARS.maxStackDepth]),
    topFunctions: readNumber(env[CONFIG_ENV_VARS.topFunctions]),
    samplingInterval: readNumber(env[CONFIG_ENV_VARS.samplingInterval]),
  };

  const first = profilerConfigSchema.safeParse(input);
  if (first.success) {
    return first.data;
  }
  for (const issue of first.error.issues) {
    const key = issue.path[0];
    const variable = envVarOf(key);
    logger.warn(
      `Ignoring ${variable}=${JSON.stringify(env[variable] ?? "")}: ${issue.message}; using the default`
    );
    if (typeof key === "string") {
      delete input[key];
    }
  }

  const retry = profilerConfigSchema.safeParse(input);
  return retry.success ? retry.data : DEFAULT_CONFIG;
}
