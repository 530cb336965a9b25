/**
 * Test utilities: an in-process stand-in for the external scheduler plus
 * small helpers for driving tasks from tests.
 *
 * ManualScheduler follows the scheduler contract the Task expects:
 * - calls `willEnqueue()` once, admitting the dependencies it returns
 * - admits children announced through `taskDidProduce`
 * - re-polls readiness on every `stateChange` and `cancelled` event
 * - calls `execute()` once per task, when it is ready and its dependencies
 *   have finished (cancelled tasks are drained without waiting)
 */

import { Task } from "./task/Task";
import type { TaskObserver } from "./observers/TaskObserver";
import { BlockObserver } from "./observers/BlockObserver";
import type { TaskLogger } from "./logger";

export class ManualScheduler {
  /** Every admitted task, in admission order */
  readonly tasks: Task[] = [];
  /** Names of tasks in the order `execute()` was called on them */
  readonly executionOrder: string[] = [];

  private readonly started: Set<Task> = new Set();
  private pumping: boolean = false;
  private pumpAgain: boolean = false;

  add(task: Task): void {
    const conditionDependencies = task.willEnqueue();

    task.addObserver(new BlockObserver({ onProduce: (_, child) => this.add(child) }));
    task.on("stateChange", () => this.pump());
    task.on("cancelled", () => this.pump());
    this.tasks.push(task);

    for (const dependency of conditionDependencies) {
      if (dependency instanceof Task) {
        this.add(dependency);
      }
    }

    this.pump();
  }

  /**
   * Start every task that may start. Re-entrant calls are folded into the
   * running pass.
   */
  pump(): void {
    if (this.pumping) {
      this.pumpAgain = true;
      return;
    }

    this.pumping = true;
    try {
      do {
        this.pumpAgain = false;
        for (const task of this.tasks) {
          if (this.started.has(task) || !this.canStart(task)) {
            continue;
          }
          this.started.add(task);
          this.executionOrder.push(task.name);
          task.execute();
        }
      } while (this.pumpAgain);
    } finally {
      this.pumping = false;
    }
  }

  private canStart(task: Task): boolean {
    if (!task.isReady) {
      return false;
    }
    if (task.isCancelled) {
      return true;
    }
    return Array.from(task.dependencies).every((dependency) => dependency.isFinished);
  }
}

/**
 * Promise resolving with the errors a task finishes with. Must be called
 * before the task starts executing.
 */
export function finishedErrors(task: Task): Promise<readonly Error[]> {
  return new Promise((resolve) => {
    task.addObserver(new BlockObserver({ onFinish: (_, errors) => resolve(errors) }));
  });
}

/**
 * Observer that records every notification as a line of text
 */
export class RecordingObserver implements TaskObserver {
  readonly events: string[] = [];

  taskDidStart(task: Task): void {
    this.events.push(`start:${task.name}`);
  }

  taskDidProduce(task: Task, child: Task): void {
    this.events.push(`produce:${task.name}->${child.name}`);
  }

  taskDidFinish(task: Task, errors: readonly Error[]): void {
    this.events.push(`finish:${task.name}:[${errors.map((e) => e.message).join(",")}]`);
  }
}

/**
 * Logger that keeps lines in memory instead of printing them
 */
export function createMemoryLogger(): TaskLogger & { lines: string[] } {
  const lines: string[] = [];
  const record =
    (level: string) =>
    (...args: unknown[]): void => {
      const text = args.map((a) => (a instanceof Error ? a.message : String(a))).join(" ");
      lines.push(`${level} ${text}`);
    };
  return {
    lines,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait until queued promise callbacks and immediates have run
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
