import type { Task } from "../task/Task";
import type { Condition, ConditionResult } from "./Condition";
import { conditionFailed, conditionSatisfied } from "./Condition";
import { ConditionFailedError } from "../task/errors";

/**
 * Predicate form of a condition
 */
export type ConditionPredicate = (task: Task) => boolean | Promise<boolean>;

export interface BlockConditionOptions {
  /** Declare the condition mutually exclusive under its name (default: false) */
  mutuallyExclusive?: boolean;
  /** Reason reported when the predicate returns false */
  reason?: string;
}

/**
 * Wraps a predicate as a condition. A false result fails the condition with
 * a ConditionFailedError; a thrown error fails it with that error.
 */
export class BlockCondition implements Condition {
  readonly isMutuallyExclusive: boolean;
  private readonly reason: string;

  constructor(
    public readonly name: string,
    private readonly predicate: ConditionPredicate,
    options: BlockConditionOptions = {}
  ) {
    this.isMutuallyExclusive = options.mutuallyExclusive ?? false;
    this.reason = options.reason ?? "predicate returned false";
  }

  async evaluate(task: Task): Promise<ConditionResult> {
    const passed = await this.predicate(task);
    if (passed) {
      return conditionSatisfied();
    }
    return conditionFailed(new ConditionFailedError(this.name, this.reason));
  }
}
