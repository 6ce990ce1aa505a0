/**
 * Scoped interception of the runtime's task-creation primitive.
 *
 * Hooks on one runtime stack: each installed wrapper wraps the ones
 * installed before it, and removing any of them rebuilds the chain from the
 * factory found before the first install. When the last hook is removed
 * that exact factory is put back.
 */

import type { TaskFactory, TaskRuntime } from "./task-runtime.js";
import { HookConflictError, RestoreError } from "../utils/errors.js";

export type FactoryWrapper = (original: TaskFactory) => TaskFactory;

interface HookChain {
  /** Factory found when the first hook was installed */
  original: TaskFactory;
  layers: Array<{ owner: ScopedTaskHook; wrap: FactoryWrapper }>;
  /** Factory the chain last put on the runtime */
  composed: TaskFactory;
}

const chains = new WeakMap<TaskRuntime, HookChain>();

function compose(runtime: TaskRuntime, chain: HookChain): void {
  chain.composed = chain.layers.reduce<TaskFactory>(
    (factory, layer) => layer.wrap(factory),
    chain.original
  );
  runtime.taskFactory = chain.composed;
}

export class ScopedTaskHook {
  private readonly runtime: TaskRuntime;
  private installed = false;

  constructor(runtime: TaskRuntime) {
    this.runtime = runtime;
  }

  get isInstalled(): boolean {
    return this.installed;
  }

  /**
   * Add `wrap` on top of the runtime's current factory.
   * @throws HookConflictError if this hook is already installed, or the
   * factory was swapped behind the back of the hooks already installed
   */
  install(wrap: FactoryWrapper): void {
    if (this.installed) {
      throw new HookConflictError("This hook is already installed");
    }
    let chain = chains.get(this.runtime);
    if (!chain) {
      chain = {
        original: this.runtime.taskFactory,
        layers: [],
        composed: this.runtime.taskFactory,
      };
      chains.set(this.runtime, chain);
    } else if (this.runtime.taskFactory !== chain.composed) {
      throw new HookConflictError();
    }
    chain.layers.push({ owner: this, wrap });
    compose(this.runtime, chain);
    this.installed = true;
  }

  /**
   * Take this hook out of the chain. No-op when not installed.
   * @throws RestoreError if something else replaced the factory in the
   * meantime; the chain is rebuilt (or the original restored) anyway
   */
  restore(): void {
    const chain = chains.get(this.runtime);
    if (!this.installed || !chain) {
      return;
    }
    this.installed = false;
    const replaced = this.runtime.taskFactory !== chain.composed;
    chain.layers = chain.layers.filter((layer) => layer.owner !== this);

    const last = chain.layers.length === 0;
    if (last) {
      chains.delete(this.runtime);
      this.runtime.taskFactory = chain.original;
    } else {
      compose(this.runtime, chain);
    }
    if (replaced) {
      throw new RestoreError(
        last
          ? "Task factory was replaced while intercepted; restored the factory found at install time"
          : "Task factory was replaced while intercepted; rebuilt the remaining hooks"
      );
    }
  }

  /** Run `fn` with the hook installed, restoring it afterwards no matter what */
  run<T>(wrap: FactoryWrapper, fn: () => T): T {
    this.install(wrap);
    try {
      return fn();
    } finally {
      this.restore();
    }
  }
}
