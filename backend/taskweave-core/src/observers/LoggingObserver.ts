import type { Task } from "../task/Task";
import type { TaskObserver } from "./TaskObserver";
import { defaultLogger } from "../logger";
import type { TaskLogger } from "../logger";

/**
 * Writes one log line per lifecycle event, tagged with the task's label.
 */
export class LoggingObserver implements TaskObserver {
  constructor(private readonly logger: TaskLogger = defaultLogger) {}

  taskDidStart(task: Task): void {
    this.logger.info(`[${task.label}] started`);
  }

  taskDidProduce(task: Task, child: Task): void {
    this.logger.info(`[${task.label}] produced ${child.label}`);
  }

  taskDidFinish(task: Task, errors: readonly Error[]): void {
    if (errors.length === 0) {
      this.logger.info(`[${task.label}] finished`);
      return;
    }
    const messages = errors.map((e) => e.message).join("; ");
    this.logger.warn(`[${task.label}] finished with ${errors.length} error(s): ${messages}`);
  }
}
