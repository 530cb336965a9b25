import { TaskState, describeTaskState } from "./TaskState";

/**
 * Error thrown when the task API is misused: mutating a task after execution
 * began, executing it in the wrong state, enqueueing it twice. These are
 * programming errors and are never added to a task's error list.
 */
export class TaskContractError extends Error {
  constructor(
    public readonly taskName: string,
    message: string
  ) {
    super(`Task '${taskName}': ${message}`);
    this.name = "TaskContractError";
  }
}

/**
 * Error thrown when a state change is not allowed by the lifecycle
 */
export class InvalidTransitionError extends TaskContractError {
  constructor(
    taskName: string,
    public readonly from: TaskState,
    public readonly to: TaskState
  ) {
    super(
      taskName,
      `Invalid state transition: ${describeTaskState(from)} -> ${describeTaskState(to)}`
    );
    this.name = "InvalidTransitionError";
  }
}

/**
 * Error reported when a condition is not satisfied.
 *
 * `conditionName` is undefined for the canonical error appended when the task
 * was cancelled while its conditions were outstanding.
 */
export class ConditionFailedError extends Error {
  constructor(
    public readonly conditionName: string | undefined,
    public readonly reason: string
  ) {
    super(
      conditionName === undefined
        ? `Conditions failed: ${reason}`
        : `Condition '${conditionName}' failed: ${reason}`
    );
    this.name = "ConditionFailedError";
  }

  /**
   * The canonical error for a task cancelled before its conditions completed
   */
  static cancelled(): ConditionFailedError {
    return new ConditionFailedError(undefined, "task was cancelled");
  }
}

/**
 * Error reported when a condition did not settle within the configured timeout
 */
export class ConditionTimeoutError extends ConditionFailedError {
  constructor(
    conditionName: string,
    public readonly timeoutMs: number
  ) {
    super(conditionName, `timed out after ${timeoutMs}ms`);
    this.name = "ConditionTimeoutError";
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
