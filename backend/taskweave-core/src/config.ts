/**
 * Coordinator configuration
 *
 * Read from environment variables and validated with Zod:
 * - TASKWEAVE_CONDITION_TIMEOUT_MS: upper bound for each condition evaluation
 *   (positive integer, default: unset, meaning no bound)
 * - TASKWEAVE_LOG_LIFECYCLE: "1"/"true" attaches a LoggingObserver to every
 *   task the coordinator creates (default: off)
 */

import { z } from "zod";

const LifecycleFlagSchema = z
  .enum(["0", "1", "true", "false"])
  .optional()
  .transform((value) => value === "1" || value === "true");

/**
 * Zod schema for the environment variables the coordinator reads
 */
const CoordinatorEnvSchema = z.object({
  TASKWEAVE_CONDITION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  TASKWEAVE_LOG_LIFECYCLE: LifecycleFlagSchema,
});

export interface CoordinatorConfig {
  /** Upper bound for each condition evaluation in ms; undefined for none */
  conditionTimeoutMs?: number;
  /** Attach a LoggingObserver to created tasks */
  logLifecycle: boolean;
}

export const defaultCoordinatorConfig: CoordinatorConfig = {
  conditionTimeoutMs: undefined,
  logLifecycle: false,
};

/**
 * Error thrown when the environment holds an invalid configuration
 */
export class CoordinatorConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    const issueList = issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`).join("\n");
    super(`Invalid coordinator configuration:\n${issueList}`);
    this.name = "CoordinatorConfigError";
  }
}

/**
 * Load the coordinator configuration from environment variables.
 *
 * @param env - Environment to read (default: process.env)
 * @throws CoordinatorConfigError when a variable is present but invalid
 */
export function loadCoordinatorConfig(env: NodeJS.ProcessEnv = process.env): CoordinatorConfig {
  const result = CoordinatorEnvSchema.safeParse(env);
  if (!result.success) {
    throw new CoordinatorConfigError(result.error.issues);
  }

  return {
    conditionTimeoutMs: result.data.TASKWEAVE_CONDITION_TIMEOUT_MS,
    logLifecycle: result.data.TASKWEAVE_LOG_LIFECYCLE,
  };
}
