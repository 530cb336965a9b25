/**
 * Executable
 *
 * The work a Task runs. The Task owns the lifecycle; an Executable only
 * supplies the body and, optionally, a hook that sees the final error list.
 *
 * The body must eventually call `task.finish()` (directly or from a child's
 * observer). A body that throws, or returns a promise that rejects, finishes
 * the task with that error.
 */

import type { Task } from "./Task";

export interface Executable {
  /** Run the work. Called at most once, after the task entered EXECUTING */
  execute(task: Task): void | Promise<void>;
  /** Called once with the combined errors, before observers are notified */
  finished?(errors: readonly Error[], task: Task): void;
}

/**
 * Function form of a work body
 */
export type TaskBody = (task: Task) => void | Promise<void>;

/**
 * Runs a function as the work body and finishes the task once it settles.
 */
export class BlockExecutable implements Executable {
  constructor(private readonly body: TaskBody) {}

  async execute(task: Task): Promise<void> {
    await this.body(task);
    task.finish();
  }
}
