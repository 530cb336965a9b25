/**
 * ConditionEvaluator
 *
 * Fan-out/fan-in evaluation of a task's conditions:
 * 1. Starts every evaluation at once; evaluations are not ordered among themselves
 * 2. Waits for all of them at a single barrier
 * 3. Reports failures in declaration order, never in completion order
 * 4. Appends the canonical cancellation error if the task was cancelled by then
 *
 * The evaluator never touches dependencies; condition-contributed
 * dependencies are wired by the Task when it is enqueued.
 */

import type { Task } from "../task/Task";
import type { Condition, ConditionResult } from "./Condition";
import { ConditionFailedError, ConditionTimeoutError } from "../task/errors";

/**
 * ConditionEvaluator configuration options
 */
export interface ConditionEvaluatorOptions {
  /**
   * Upper bound for a single evaluation in milliseconds. Unset means no
   * bound: a condition that never settles keeps its task waiting.
   */
  timeoutMs?: number;
}

export class ConditionEvaluator {
  private readonly timeoutMs?: number;

  constructor(options: ConditionEvaluatorOptions = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Evaluate all conditions for a task.
   *
   * Resolves exactly once, after every evaluation settled, with the failures
   * in the order the conditions were declared. Never rejects: a rejected
   * evaluation counts as a failed condition.
   */
  async evaluate(conditions: readonly Condition[], task: Task): Promise<Error[]> {
    const results = await Promise.allSettled(
      conditions.map((condition) => this.evaluateOne(condition, task))
    );

    // allSettled keeps input order, so slot i belongs to conditions[i]
    const failures: Error[] = [];
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        failures.push(this.rejectionToError(conditions[index], result.reason));
      } else if (!result.value.satisfied) {
        failures.push(result.value.error);
      }
    });

    if (task.isCancelled) {
      failures.push(ConditionFailedError.cancelled());
    }

    return failures;
  }

  private evaluateOne(condition: Condition, task: Task): Promise<ConditionResult> {
    // Wrap in async IIFE so a synchronous throw becomes a rejection
    const evaluation = (async () => condition.evaluate(task))();

    const timeoutMs = this.timeoutMs;
    if (timeoutMs === undefined) {
      return evaluation;
    }

    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        reject(new ConditionTimeoutError(condition.name, timeoutMs));
      }, timeoutMs);
    });

    return Promise.race([evaluation, timeoutPromise]).finally(() => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    });
  }

  private rejectionToError(condition: Condition, reason: unknown): Error {
    if (reason instanceof Error) {
      return reason;
    }
    return new ConditionFailedError(condition.name, String(reason));
  }
}
