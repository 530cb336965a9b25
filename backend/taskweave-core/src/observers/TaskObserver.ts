import type { Task } from "../task/Task";

/**
 * Passive listener for the significant events in a Task's lifecycle.
 * Observers are called synchronously, in the order they were added.
 */
export interface TaskObserver {
  /** Invoked immediately before the task's work body runs */
  taskDidStart(task: Task): void;

  /** Invoked when the task produces a new unit of work via `produceChild()` */
  taskDidProduce(task: Task, child: Task): void;

  /**
   * Invoked once as the task finishes, with every error produced during
   * condition evaluation, cancellation and execution.
   */
  taskDidFinish(task: Task, errors: readonly Error[]): void;
}
