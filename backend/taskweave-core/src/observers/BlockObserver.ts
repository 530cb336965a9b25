import type { Task } from "../task/Task";
import type { TaskObserver } from "./TaskObserver";

/**
 * Callbacks accepted by BlockObserver; any subset may be supplied
 */
export interface BlockObserverHandlers {
  onStart?: (task: Task) => void;
  onProduce?: (task: Task, child: Task) => void;
  onFinish?: (task: Task, errors: readonly Error[]) => void;
}

/**
 * Attaches arbitrary callbacks to a task's lifecycle without a dedicated
 * observer type per use site.
 *
 * Usage:
 *   task.addObserver(new BlockObserver({ onFinish: (_, errors) => report(errors) }));
 */
export class BlockObserver implements TaskObserver {
  private readonly onStart?: (task: Task) => void;
  private readonly onProduce?: (task: Task, child: Task) => void;
  private readonly onFinish?: (task: Task, errors: readonly Error[]) => void;

  constructor(handlers: BlockObserverHandlers = {}) {
    this.onStart = handlers.onStart;
    this.onProduce = handlers.onProduce;
    this.onFinish = handlers.onFinish;
  }

  taskDidStart(task: Task): void {
    this.onStart?.(task);
  }

  taskDidProduce(task: Task, child: Task): void {
    this.onProduce?.(task, child);
  }

  taskDidFinish(task: Task, errors: readonly Error[]): void {
    this.onFinish?.(task, errors);
  }
}
