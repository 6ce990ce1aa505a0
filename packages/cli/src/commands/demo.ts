/**
 * Demo command - profiles the built-in scenarios.
 */

import {
  DEMO_SCENARIOS,
  ProfilingCoordinator,
  createConsoleLogger,
  createSilentLogger,
  defaultRuntime,
  findScenario,
  loadConfig,
  type DemoScenario,
  type ProfilerStats,
  type TaskRuntime,
} from "@taskscope/core";
import { formatReport } from "../report/format.js";

export interface DemoCommandOptions {
  scenario?: string;
  json?: boolean;
  backend?: string;
}

export async function demoCommand(
  options: DemoCommandOptions = {},
  runtime: TaskRuntime = defaultRuntime
): Promise<void> {
  let scenarios: readonly DemoScenario[] = DEMO_SCENARIOS;
  if (options.scenario) {
    const scenario = findScenario(options.scenario);
    if (!scenario) {
      const names = DEMO_SCENARIOS.map((entry) => entry.name).join(", ");
      console.error(`Unknown scenario "${options.scenario}". Available: ${names}`);
      process.exitCode = 1;
      return;
    }
    scenarios = [scenario];
  }

  const logger = options.json ? createSilentLogger() : createConsoleLogger();
  const config = loadConfig(process.env, logger);
  const results: Record<string, ProfilerStats> = {};
  for (const scenario of scenarios) {
    const coordinator = new ProfilingCoordinator({
      config: options.backend ? { ...config, backend: options.backend } : config,
      runtime,
      logger,
    });
    await coordinator.profile(() => scenario.run(runtime));
    const stats = coordinator.getStats();
    results[scenario.name] = stats;

    if (!options.json) {
      console.log(formatReport(stats, `Scenario: ${scenario.name} - ${scenario.description}`));
      console.log("");
    }
  }

  if (options.json) {
    console.log(JSON.stringify(results, null, 2));
  }
}
