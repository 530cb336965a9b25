/**
 * Conditions Module
 *
 * The condition contract, its evaluator and the generic conditions.
 */

export { conditionSatisfied, conditionFailed } from "./Condition";
export type { Condition, ConditionResult } from "./Condition";
export { ConditionEvaluator } from "./ConditionEvaluator";
export type { ConditionEvaluatorOptions } from "./ConditionEvaluator";
export { MutuallyExclusive } from "./MutuallyExclusive";
export { BlockCondition } from "./BlockCondition";
export type { BlockConditionOptions, ConditionPredicate } from "./BlockCondition";
