/**
 * @taskweave/core
 * Task coordination layer: lifecycle state machine, asynchronous conditions,
 * process-wide exclusivity and lifecycle observers for an external scheduler.
 */

// Task exports
export {
  TaskState,
  isTerminalState,
  isValidTransition,
  isCancellationTransition,
  getAllowedTransitions,
  describeTaskState,
  Task,
  BlockExecutable,
  TaskContractError,
  InvalidTransitionError,
  ConditionFailedError,
  ConditionTimeoutError,
  toError,
} from "./task";
export type { TaskOptions, TaskEvents, Executable, TaskBody, Schedulable } from "./task";

// Condition exports
export {
  conditionSatisfied,
  conditionFailed,
  ConditionEvaluator,
  MutuallyExclusive,
  BlockCondition,
} from "./conditions";
export type {
  Condition,
  ConditionResult,
  ConditionEvaluatorOptions,
  BlockConditionOptions,
  ConditionPredicate,
} from "./conditions";

// Observer exports
export { BlockObserver, LoggingObserver } from "./observers";
export type { TaskObserver, BlockObserverHandlers } from "./observers";

// Exclusivity exports
export { ExclusivityController, sharedExclusivityController } from "./exclusivity";

// Configuration exports
export {
  loadCoordinatorConfig,
  defaultCoordinatorConfig,
  CoordinatorConfigError,
} from "./config";
export type { CoordinatorConfig } from "./config";
export { Coordinator, createCoordinator } from "./coordinator";
export type { CoordinatorOptions } from "./coordinator";
export { defaultLogger } from "./logger";
export type { TaskLogger } from "./logger";
