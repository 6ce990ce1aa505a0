/**
 * Workload module loaded by the run command tests.
 */

import { sleep, type TaskRuntime } from "@taskscope/core";

export default async function workload(runtime: TaskRuntime): Promise<void> {
  await Promise.all([
    runtime.createTask(() => sleep(5), { name: "fetch-user" }),
    runtime.createTask(() => sleep(5), { name: "fetch-orders" }),
  ]);
}

export async function failing(runtime: TaskRuntime): Promise<void> {
  await runtime.createTask(() => sleep(1), { name: "before-failure" });
  throw new Error("workload exploded");
}

export const notAFunction = 42;
