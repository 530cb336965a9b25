import type { Condition, ConditionResult } from "./Condition";
import { conditionSatisfied } from "./Condition";

/**
 * A condition that only declares exclusivity: every task carrying a
 * MutuallyExclusive condition with the same category runs after the one
 * registered before it, process-wide.
 *
 * Usage:
 *   task.addCondition(new MutuallyExclusive("alert-dialog"));
 */
export class MutuallyExclusive implements Condition {
  readonly isMutuallyExclusive = true;

  constructor(public readonly name: string) {}

  async evaluate(): Promise<ConditionResult> {
    return conditionSatisfied();
  }
}
