/**
 * Condition
 *
 * An asynchronous precondition a Task must satisfy before it is allowed to
 * run. Conditions are policy objects: they hold no per-task state and the
 * same instance may be attached to many tasks.
 */

import type { Task } from "../task/Task";
import type { Schedulable } from "../task/Schedulable";

/**
 * Outcome of evaluating a condition
 */
export type ConditionResult = { satisfied: true } | { satisfied: false; error: Error };

export interface Condition {
  /** Name of the condition; also the exclusivity category when exclusive */
  readonly name: string;
  /** If true, tasks carrying this condition never run concurrently with each other */
  readonly isMutuallyExclusive: boolean;
  /**
   * An extra unit of work the task must wait for, e.g. one that acquires the
   * resource the condition checks. Queried once, when the task is enqueued.
   */
  dependencyForTask?(task: Task): Schedulable | undefined;
  /** Evaluate the condition for a task */
  evaluate(task: Task): Promise<ConditionResult>;
}

export function conditionSatisfied(): ConditionResult {
  return { satisfied: true };
}

export function conditionFailed(error: Error): ConditionResult {
  return { satisfied: false, error };
}
