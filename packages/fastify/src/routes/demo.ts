/**
 * Demo endpoints, one per built-in scenario, e.g. GET /demo/blocking.
 */

import type { FastifyInstance } from "fastify";
import { DEMO_SCENARIOS, type TaskRuntime } from "@taskscope/core";

interface DemoRoutesOptions {
  runtime: TaskRuntime;
}

export async function registerDemoRoutes(
  app: FastifyInstance,
  options: DemoRoutesOptions
): Promise<void> {
  const { runtime } = options;

  app.get("/demo", async () =>
    DEMO_SCENARIOS.map((scenario) => ({
      name: scenario.name,
      path: `/demo/${scenario.route}`,
      description: scenario.description,
    }))
  );

  for (const scenario of DEMO_SCENARIOS) {
    app.get(`/demo/${scenario.route}`, async () => {
      await scenario.run(runtime);
      return { scenario: scenario.name, status: "done" };
    });
  }
}
