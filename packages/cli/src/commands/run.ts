/**
 * Run command - profiles one exported function of a module.
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import {
  ProfilingCoordinator,
  createConsoleLogger,
  createSilentLogger,
  defaultRuntime,
  describeError,
  loadConfig,
  type TaskRuntime,
} from "@taskscope/core";
import { formatReport } from "../report/format.js";

export interface RunCommandOptions {
  export?: string;
  json?: boolean;
  backend?: string;
}

type Workload = (runtime: TaskRuntime) => unknown;

function isWorkload(value: unknown): value is Workload {
  return typeof value === "function";
}

async function importWorkload(modulePath: string, exportName: string): Promise<Workload> {
  const url = pathToFileURL(resolve(process.cwd(), modulePath)).href;
  const loaded: Record<string, unknown> = await import(url);
  const candidate = loaded[exportName];
  if (!isWorkload(candidate)) {
    throw new Error(`Export "${exportName}" of ${modulePath} is not a function`);
  }
  return candidate;
}

export async function runCommand(
  modulePath: string,
  options: RunCommandOptions = {},
  runtime: TaskRuntime = defaultRuntime
): Promise<void> {
  const exportName = options.export ?? "default";

  let workload: Workload;
  try {
    workload = await importWorkload(modulePath, exportName);
  } catch (error) {
    console.error(`Could not load workload: ${describeError(error)}`);
    process.exitCode = 1;
    return;
  }

  const logger = options.json ? createSilentLogger() : createConsoleLogger();
  const config = loadConfig(process.env, logger);
  const coordinator = new ProfilingCoordinator({
    config: options.backend ? { ...config, backend: options.backend } : config,
    runtime,
    logger,
  });

  let failure: unknown = null;
  try {
    await coordinator.profile(() => workload(runtime));
  } catch (error) {
    failure = error;
    process.exitCode = 1;
  }

  const stats = coordinator.getStats();
  if (options.json) {
    console.log(JSON.stringify(stats, null, 2));
  } else {
    console.log(formatReport(stats, `${modulePath} (${exportName})`));
  }
  if (failure !== null) {
    console.error(`Workload failed: ${describeError(failure)}`);
  }
}
