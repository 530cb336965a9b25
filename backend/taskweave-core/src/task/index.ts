/**
 * Task Module
 *
 * The task state machine and its contracts with the scheduler and the work.
 */

export {
  TaskState,
  isTerminalState,
  isValidTransition,
  isCancellationTransition,
  getAllowedTransitions,
  describeTaskState,
} from "./TaskState";
export { Task } from "./Task";
export type { TaskOptions, TaskEvents } from "./Task";
export { BlockExecutable } from "./Executable";
export type { Executable, TaskBody } from "./Executable";
export type { Schedulable } from "./Schedulable";
export {
  TaskContractError,
  InvalidTransitionError,
  ConditionFailedError,
  ConditionTimeoutError,
  toError,
} from "./errors";
