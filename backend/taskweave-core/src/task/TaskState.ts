/**
 * TaskState Enum
 *
 * Represents the lifecycle state of a coordinated task. States are strictly
 * ordered so that "has the task reached X yet" is a numeric comparison:
 *
 *   INITIALIZED → PENDING → EVALUATING_CONDITIONS → READY → EXECUTING → FINISHING → FINISHED
 *                                                     ↓                     ↑
 *                                                     └─────────────────────┘
 *
 * State transitions:
 * - INITIALIZED: Task has been created but not yet handed to a scheduler
 * - PENDING: Task is admitted and waiting for its dependencies to finish
 * - EVALUATING_CONDITIONS: Conditions are being evaluated asynchronously
 * - READY: Conditions have reported; the scheduler may execute the task
 * - EXECUTING: The work body is running
 * - FINISHING: The finish protocol is notifying the hook and observers
 * - FINISHED: Terminal. Further transitions are ignored
 *
 * A cancelled task may also jump from any state before READY straight to
 * FINISHING, so that the scheduler can drain it without running its work.
 */
export enum TaskState {
  INITIALIZED = 0,
  PENDING = 1,
  EVALUATING_CONDITIONS = 2,
  READY = 3,
  EXECUTING = 4,
  FINISHING = 5,
  FINISHED = 6,
}

/**
 * Check if a state is terminal (no further transitions possible)
 */
export function isTerminalState(state: TaskState): boolean {
  return state === TaskState.FINISHED;
}

/**
 * Check if a state transition is valid for a task that has not been cancelled
 */
export function isValidTransition(from: TaskState, to: TaskState): boolean {
  switch (from) {
    case TaskState.INITIALIZED:
      return to === TaskState.PENDING;
    case TaskState.PENDING:
      return to === TaskState.EVALUATING_CONDITIONS;
    case TaskState.EVALUATING_CONDITIONS:
      return to === TaskState.READY;
    case TaskState.READY:
      // FINISHING directly when conditions failed
      return to === TaskState.EXECUTING || to === TaskState.FINISHING;
    case TaskState.EXECUTING:
      return to === TaskState.FINISHING;
    case TaskState.FINISHING:
      return to === TaskState.FINISHED;
    case TaskState.FINISHED:
      return false; // Terminal state
    default:
      return false;
  }
}

/**
 * Check if a transition is the early exit a cancelled task takes before it
 * ever became READY.
 */
export function isCancellationTransition(from: TaskState, to: TaskState): boolean {
  return to === TaskState.FINISHING && from < TaskState.READY;
}

/**
 * Get allowed next states from current state
 */
export function getAllowedTransitions(state: TaskState): TaskState[] {
  switch (state) {
    case TaskState.INITIALIZED:
      return [TaskState.PENDING];
    case TaskState.PENDING:
      return [TaskState.EVALUATING_CONDITIONS];
    case TaskState.EVALUATING_CONDITIONS:
      return [TaskState.READY];
    case TaskState.READY:
      return [TaskState.EXECUTING, TaskState.FINISHING];
    case TaskState.EXECUTING:
      return [TaskState.FINISHING];
    case TaskState.FINISHING:
      return [TaskState.FINISHED];
    case TaskState.FINISHED:
      return [];
    default:
      return [];
  }
}

/**
 * Human-readable name of a state, for log lines and error messages
 */
export function describeTaskState(state: TaskState): string {
  return TaskState[state] ?? `UNKNOWN(${state})`;
}
