/**
 * Built-in workloads used by the demo server and `taskscope demo`.
 */

import { performance } from "node:perf_hooks";
import { sleep, type TaskRuntime } from "../runtime/task-runtime.js";

/** Hold the thread for `ms` without yielding. Returns the spin count. */
export function busyWait(ms: number): number {
  const until = performance.now() + ms;
  let spins = 0;
  while (performance.now() < until) {
    spins++;
  }
  return spins;
}

export interface DemoScenario {
  name: string;
  /** Path segment under /demo on the demo server */
  route: string;
  description: string;
  run(runtime: TaskRuntime): Promise<void>;
}

async function fastTask(): Promise<void> {
  await sleep(10);
}

async function slowTask(): Promise<void> {
  await sleep(100);
}

export const DEMO_SCENARIOS: readonly DemoScenario[] = [
  {
    name: "basic",
    route: "tasks",
    description: "Five concurrent tasks sleeping 10ms each",
    async run(runtime) {
      await Promise.all(
        Array.from({ length: 5 }, (_, i) =>
          runtime.createTask(fastTask, { name: `fast-task-${i}` })
        )
      );
    },
  },
  {
    name: "mixed",
    route: "mixed",
    description: "Fast (10ms) and slow (100ms) tasks interleaved",
    async run(runtime) {
      await Promise.all([
        runtime.createTask(fastTask, { name: "fast-1" }),
        runtime.createTask(slowTask, { name: "slow-1" }),
        runtime.createTask(fastTask, { name: "fast-2" }),
        runtime.createTask(slowTask, { name: "slow-2" }),
      ]);
    },
  },
  {
    name: "blocking",
    route: "blocking",
    description: "A task holding the thread for 150ms",
    async run(runtime) {
      await runtime.createTask(
        function blockingTask() {
          busyWait(150);
        },
        { name: "blocking-task" }
      );
    },
  },
  {
    name: "lag",
    route: "lag",
    description: "Five rounds of 10ms sleep followed by 20ms of busy work",
    async run(runtime) {
      await runtime.createTask(
        async function laggyLoop() {
          for (let round = 0; round < 5; round++) {
            await sleep(10);
            busyWait(20);
          }
        },
        { name: "laggy-loop" }
      );
    },
  },
  {
    name: "nested",
    route: "nested",
    description: "A parent task awaiting three children",
    async run(runtime) {
      await runtime.createTask(
        async function nestedTasks() {
          await Promise.all(
            Array.from({ length: 3 }, (_, i) =>
              runtime.createTask(fastTask, { name: `child-${i}` })
            )
          );
        },
        { name: "parent-task" }
      );
    },
  },
];

export function findScenario(name: string): DemoScenario | undefined {
  return DEMO_SCENARIOS.find((scenario) => scenario.name === name);
}
