/**
 * Coordinator
 *
 * Wires a configuration into task creation: every task it creates shares one
 * exclusivity controller and picks up the configured condition timeout and
 * lifecycle logging.
 *
 * Usage:
 *   const coordinator = createCoordinator();
 *   const task = coordinator.createTask(async () => sync(), { name: "sync" });
 *   scheduler.add(task);
 */

import { Task } from "./task/Task";
import type { TaskOptions } from "./task/Task";
import type { Executable, TaskBody } from "./task/Executable";
import {
  ExclusivityController,
  sharedExclusivityController,
} from "./exclusivity/ExclusivityController";
import { LoggingObserver } from "./observers/LoggingObserver";
import { loadCoordinatorConfig } from "./config";
import type { CoordinatorConfig } from "./config";
import { defaultLogger } from "./logger";
import type { TaskLogger } from "./logger";

/**
 * Coordinator configuration options
 */
export interface CoordinatorOptions {
  /** Exclusivity controller for created tasks (default: the process-wide one) */
  exclusivity?: ExclusivityController;
  /** Logger for created tasks and lifecycle logging (default: console) */
  logger?: TaskLogger;
}

export class Coordinator {
  readonly config: CoordinatorConfig;
  readonly exclusivity: ExclusivityController;
  private readonly logger: TaskLogger;

  constructor(config: CoordinatorConfig, options: CoordinatorOptions = {}) {
    this.config = config;
    this.exclusivity = options.exclusivity ?? sharedExclusivityController;
    this.logger = options.logger ?? defaultLogger;

    const timeout = config.conditionTimeoutMs ?? "none";
    this.logger.debug(
      `[Coordinator] configured: conditionTimeoutMs=${timeout}, logLifecycle=${config.logLifecycle}`
    );
  }

  /**
   * Create a task with the configured defaults. Explicit options win.
   */
  createTask(work: Executable | TaskBody, options: TaskOptions = {}): Task {
    const observers = [...(options.observers ?? [])];
    if (this.config.logLifecycle) {
      observers.push(new LoggingObserver(this.logger));
    }

    return new Task(work, {
      ...options,
      observers,
      exclusivity: options.exclusivity ?? this.exclusivity,
      conditionTimeoutMs: options.conditionTimeoutMs ?? this.config.conditionTimeoutMs,
      logger: options.logger ?? this.logger,
    });
  }
}

/**
 * Create a coordinator, reading the configuration from the environment when
 * none is given.
 */
export function createCoordinator(
  config: CoordinatorConfig = loadCoordinatorConfig(),
  options: CoordinatorOptions = {}
): Coordinator {
  return new Coordinator(config, options);
}
