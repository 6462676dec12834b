//shardcore/core/TaskScope.ts

import { CancelledError, isCancellation } from "./errors";
import { Logger } from "../utils/logger";

const log = Logger.scope("CLIENT");

export type ScopedTask = (signal: AbortSignal) => Promise<void>;

/**
 * Structured-concurrency scope.
 *
 * Every task spawned here sees the scope's AbortSignal. The first failure
 * that is not a cancellation cancels the whole scope and is rethrown by
 * `join()`. No task outlives `join()`.
 */
export class TaskScope {
  private readonly controller = new AbortController();
  private readonly tasks = new Set<Promise<void>>();

  private failed = false;
  private failure: unknown = undefined;
  private detachParent: (() => void) | null = null;

  constructor(
    readonly name: string,
    parent?: AbortSignal,
  ) {
    if (!parent) return;
    if (parent.aborted) {
      this.cancel(parent.reason);
      return;
    }

    const onParentAbort = (): void => this.cancel(parent.reason);
    parent.addEventListener("abort", onParentAbort, { once: true });
    this.detachParent = () => parent.removeEventListener("abort", onParentAbort);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Number of tasks that have not finished yet. */
  get active(): number {
    return this.tasks.size;
  }

  /** The first task failure, if any task has failed. */
  get error(): unknown {
    return this.failure;
  }

  get hasFailed(): boolean {
    return this.failed;
  }

  spawn(taskName: string, fn: ScopedTask): void {
    if (this.cancelled) {
      throw new CancelledError(this.controller.signal.reason);
    }

    const task = this.runTask(taskName, fn);
    this.tasks.add(task);
    void task.then(() => {
      this.tasks.delete(task);
    });
  }

  cancel(reason?: unknown): void {
    if (this.cancelled) return;
    this.controller.abort(reason ?? new CancelledError());
  }

  /** Wait for every task, including ones spawned while waiting. */
  async join(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
    // Drained; the parent no longer needs to reach this scope.
    this.detachParent?.();
    this.detachParent = null;
    if (this.failed) throw this.failure;
  }

  async close(reason?: unknown): Promise<void> {
    this.cancel(reason);
    await this.join();
  }

  private async runTask(taskName: string, fn: ScopedTask): Promise<void> {
    try {
      await fn(this.controller.signal);
    } catch (err) {
      if (isCancellation(err) && this.cancelled) return;

      if (!this.failed) {
        this.failed = true;
        this.failure = err;
        log.debug(`Task ${this.name}/${taskName} failed, cancelling scope`, { err });
      }
      this.cancel(err);
    }
  }
}

/**
 * Run `body` with a fresh scope; the scope is cancelled and joined on every
 * exit path. A child failure wins over the cancellation it caused in `body`.
 */
export async function withTaskScope<T>(
  name: string,
  body: (scope: TaskScope) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  const scope = new TaskScope(name, parent);

  let result: T;
  try {
    result = await body(scope);
  } catch (err) {
    scope.cancel(err);
    try {
      await scope.join();
    } catch (childErr) {
      if (childErr !== err) {
        log.debug(`Scope ${name} child failure while unwinding`, { err: childErr });
      }
    }
    throw scope.hasFailed ? scope.error : err;
  }

  await scope.close();
  return result;
}
