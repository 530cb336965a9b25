/**
 * Task
 *
 * A schedulable unit of work with an explicit lifecycle, asynchronous
 * preconditions, process-wide exclusivity and lifecycle observers. The Task
 * does not run itself: an external scheduler admits it, watches its readiness
 * signals and dependency set, and calls `execute()` when it may start.
 *
 * Lifecycle:
 *   new Task() → willEnqueue() → PENDING
 *     → dependencies finished (isReady polled / dependenciesSatisfied()) → EVALUATING_CONDITIONS
 *     → conditions reported → READY
 *     → execute() → EXECUTING → work body → finish() → FINISHING → FINISHED
 *
 * Failed conditions and cancellation do not stop the lifecycle: the task
 * still becomes ready, and `execute()` then finishes it without running the
 * work body, so observers always see exactly one finish.
 *
 * Integration:
 * - Executable: the work body and its `finished` hook
 * - ConditionEvaluator: fan-out/fan-in evaluation of the conditions
 * - ExclusivityController: dependency chaining for exclusive conditions
 * - TaskObserver: start / produce / finish notifications
 *
 * Events (EventEmitter):
 * - `stateWillChange(state, previousState)` before every actual state change
 * - `stateChange(state, previousState)` after it
 * - `cancelled()` the first time the task is cancelled
 *
 * There is no way to block until a task finishes; chain work with
 * dependencies or observe `taskDidFinish` instead.
 */

import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import {
  TaskState,
  describeTaskState,
  isCancellationTransition,
  isValidTransition,
} from "./TaskState";
import { ConditionFailedError, InvalidTransitionError, TaskContractError, toError } from "./errors";
import { BlockExecutable } from "./Executable";
import type { Executable, TaskBody } from "./Executable";
import type { Schedulable } from "./Schedulable";
import type { Condition } from "../conditions/Condition";
import { ConditionEvaluator } from "../conditions/ConditionEvaluator";
import type { TaskObserver } from "../observers/TaskObserver";
import {
  ExclusivityController,
  sharedExclusivityController,
} from "../exclusivity/ExclusivityController";
import { defaultLogger } from "../logger";
import type { TaskLogger } from "../logger";

/**
 * Configuration options for a Task
 */
export interface TaskOptions {
  /** Name used in log lines and error messages (default: 'Task') */
  name?: string;
  /** Diagnostic identifier (default: a generated UUID) */
  id?: string;
  /** Initial conditions, evaluated in this declaration order */
  conditions?: Condition[];
  /** Initial observers, notified in this order */
  observers?: TaskObserver[];
  /** Initial dependencies */
  dependencies?: Schedulable[];
  /** Controller for exclusive conditions (default: the process-wide one) */
  exclusivity?: ExclusivityController;
  /** Upper bound for each condition evaluation in ms (default: none) */
  conditionTimeoutMs?: number;
  /** Logger for failures inside observers and hooks (default: console) */
  logger?: TaskLogger;
}

/**
 * Events emitted by Task
 */
export interface TaskEvents {
  /** A state change is about to happen */
  stateWillChange: (state: TaskState, previousState: TaskState) => void;
  /** A state change happened */
  stateChange: (state: TaskState, previousState: TaskState) => void;
  /** The task was cancelled; readiness may have changed */
  cancelled: () => void;
}

export class Task extends EventEmitter implements Schedulable {
  /** Diagnostic identifier; identity is the object itself */
  readonly id: string;
  readonly name: string;

  /** Current state */
  private _state: TaskState = TaskState.INITIALIZED;
  /** Set once by cancel(); never cleared */
  private _cancelled: boolean = false;
  /** Guards the finish protocol */
  private hasFinished: boolean = false;
  /** Errors gathered from conditions and cancellation, in arrival order */
  private readonly internalErrors: Error[] = [];

  private readonly _conditions: Condition[] = [];
  private readonly _observers: TaskObserver[] = [];
  private readonly _dependencies: Set<Schedulable> = new Set();
  /** Categories registered with the exclusivity controller at enqueue time */
  private exclusiveCategories: string[] = [];

  private readonly work: Executable;
  private readonly exclusivity: ExclusivityController;
  private readonly evaluator: ConditionEvaluator;
  private readonly logger: TaskLogger;

  constructor(work: Executable | TaskBody, options: TaskOptions = {}) {
    super();

    this.work = typeof work === "function" ? new BlockExecutable(work) : work;
    this.id = options.id ?? uuidv4();
    this.name = options.name ?? "Task";
    this.exclusivity = options.exclusivity ?? sharedExclusivityController;
    this.evaluator = new ConditionEvaluator({ timeoutMs: options.conditionTimeoutMs });
    this.logger = options.logger ?? defaultLogger;

    for (const condition of options.conditions ?? []) {
      this.addCondition(condition);
    }
    for (const observer of options.observers ?? []) {
      this.addObserver(observer);
    }
    for (const dependency of options.dependencies ?? []) {
      this.addDependency(dependency);
    }
  }

  /**
   * Short tag for log lines, e.g. `upload#1a2b3c4d`
   */
  get label(): string {
    return `${this.name}#${this.id.slice(0, 8)}`;
  }

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  get state(): TaskState {
    return this._state;
  }

  /**
   * Check a transition. Returns false when the task is already FINISHED
   * (transitions are then ignored), throws when the transition is illegal.
   */
  private canTransition(to: TaskState): boolean {
    const from = this._state;
    if (from === TaskState.FINISHED) {
      return false;
    }
    if (isValidTransition(from, to)) {
      return true;
    }
    if (this._cancelled && isCancellationTransition(from, to)) {
      return true;
    }
    throw new InvalidTransitionError(this.name, from, to);
  }

  /**
   * The single write path for the state. Node runs this synchronously, so
   * the read-check-write below cannot interleave with another writer.
   */
  private setState(to: TaskState): void {
    if (!this.canTransition(to)) {
      return;
    }

    const from = this._state;
    this.emit("stateWillChange", to, from);
    this._state = to;
    this.emit("stateChange", to, from);
  }

  // ---------------------------------------------------------------------------
  // Scheduler signals
  // ---------------------------------------------------------------------------

  /**
   * Whether the scheduler may call `execute()`.
   *
   * A cancelled task is ready once it has been enqueued, so the scheduler can
   * drain it. While PENDING, reading this starts condition evaluation once
   * every dependency has finished.
   */
  get isReady(): boolean {
    if (this._cancelled && this._state !== TaskState.INITIALIZED) {
      return true;
    }

    switch (this._state) {
      case TaskState.PENDING:
        if (this.allDependenciesFinished()) {
          this.dependenciesSatisfied();
        }
        return false;
      case TaskState.READY:
      case TaskState.EXECUTING:
      case TaskState.FINISHING:
      case TaskState.FINISHED:
        return true;
      default:
        return false;
    }
  }

  get isExecuting(): boolean {
    return this._state === TaskState.EXECUTING;
  }

  get isFinished(): boolean {
    return this._state === TaskState.FINISHED;
  }

  get isCancelled(): boolean {
    return this._cancelled;
  }

  /**
   * Errors accumulated so far from conditions and cancellation
   */
  get errors(): readonly Error[] {
    return [...this.internalErrors];
  }

  // ---------------------------------------------------------------------------
  // Conditions, observers and dependencies
  // ---------------------------------------------------------------------------

  get conditions(): readonly Condition[] {
    return [...this._conditions];
  }

  get observers(): readonly TaskObserver[] {
    return [...this._observers];
  }

  get dependencies(): ReadonlySet<Schedulable> {
    return new Set(this._dependencies);
  }

  addCondition(condition: Condition): void {
    if (this._state >= TaskState.EVALUATING_CONDITIONS) {
      throw new TaskContractError(
        this.name,
        "Cannot modify conditions after evaluation has begun"
      );
    }
    this._conditions.push(condition);
  }

  addObserver(observer: TaskObserver): void {
    if (this._state >= TaskState.EXECUTING) {
      throw new TaskContractError(this.name, "Cannot modify observers after execution has begun");
    }
    this._observers.push(observer);
  }

  addDependency(dependency: Schedulable): void {
    if (this._state >= TaskState.EXECUTING) {
      throw new TaskContractError(
        this.name,
        "Dependencies cannot be modified after execution has begun"
      );
    }
    if (dependency === this) {
      throw new TaskContractError(this.name, "A task cannot depend on itself");
    }
    this._dependencies.add(dependency);
  }

  removeDependency(dependency: Schedulable): void {
    if (this._state >= TaskState.EXECUTING) {
      throw new TaskContractError(
        this.name,
        "Dependencies cannot be modified after execution has begun"
      );
    }
    this._dependencies.delete(dependency);
  }

  private allDependenciesFinished(): boolean {
    for (const dependency of this._dependencies) {
      if (!dependency.isFinished) {
        return false;
      }
    }
    return true;
  }

  // ---------------------------------------------------------------------------
  // Admission and condition evaluation
  // ---------------------------------------------------------------------------

  /**
   * Called by the scheduler immediately before admitting the task.
   *
   * Wires the dependencies contributed by conditions, registers exclusive
   * conditions with the exclusivity controller, and moves the task to
   * PENDING. Returns the condition-contributed dependencies, which the
   * scheduler must admit as well.
   */
  willEnqueue(): Schedulable[] {
    if (this._state === TaskState.FINISHED) {
      return [];
    }
    if (this._state !== TaskState.INITIALIZED) {
      throw new TaskContractError(this.name, "willEnqueue() may only be called once");
    }

    const added: Schedulable[] = [];
    for (const condition of this._conditions) {
      const dependency = condition.dependencyForTask?.(this);
      if (dependency) {
        this.addDependency(dependency);
        added.push(dependency);
      }
    }

    const categories = new Set(
      this._conditions.filter((c) => c.isMutuallyExclusive).map((c) => c.name)
    );
    if (categories.size > 0) {
      this.exclusiveCategories = Array.from(categories);
      this.exclusivity.register(this, this.exclusiveCategories);
    }

    this.setState(TaskState.PENDING);
    return added;
  }

  /**
   * Report that every dependency has finished. Starts condition evaluation
   * when the task is PENDING and not cancelled; otherwise does nothing.
   */
  dependenciesSatisfied(): void {
    if (this._state !== TaskState.PENDING || this._cancelled) {
      return;
    }

    this.setState(TaskState.EVALUATING_CONDITIONS);

    void this.evaluator.evaluate([...this._conditions], this).then(
      (failures) => this.conditionsEvaluated(failures),
      (error: unknown) => this.conditionsEvaluated([toError(error)])
    );
  }

  private conditionsEvaluated(failures: Error[]): void {
    // Drained by cancellation while the conditions were outstanding
    if (this.hasFinished) {
      return;
    }

    this.internalErrors.push(...failures);
    this.setState(TaskState.READY);
  }

  // ---------------------------------------------------------------------------
  // Execution and cancellation
  // ---------------------------------------------------------------------------

  /**
   * Called by the scheduler once `isReady` is true and every dependency has
   * finished.
   *
   * A task that is cancelled, or whose conditions failed, finishes without
   * running its work body. Anything else must be READY.
   */
  execute(): void {
    if (this._state === TaskState.FINISHED) {
      return;
    }

    if (this._cancelled && this._state <= TaskState.READY) {
      if (this._state < TaskState.READY) {
        this.internalErrors.push(ConditionFailedError.cancelled());
      }
      this.finish();
      return;
    }

    if (this._state !== TaskState.READY) {
      throw new TaskContractError(
        this.name,
        `execute() requires state READY, found ${describeTaskState(this._state)}`
      );
    }

    if (this.internalErrors.length > 0) {
      this.finish();
      return;
    }

    this.setState(TaskState.EXECUTING);
    this.notifyObservers("taskDidStart", (observer) => observer.taskDidStart(this));
    this.runWork();
  }

  private runWork(): void {
    let outcome: void | Promise<void>;
    try {
      outcome = this.work.execute(this);
    } catch (error) {
      this.failFromWork(error);
      return;
    }

    if (outcome instanceof Promise) {
      void outcome.then(undefined, (error: unknown) => this.failFromWork(error));
    }
  }

  private failFromWork(error: unknown): void {
    if (this.hasFinished) {
      this.logger.error(`[${this.label}] work body failed after finishing:`, error);
      return;
    }
    this.finish([toError(error)]);
  }

  /**
   * Announce a new unit of work produced by this task. The scheduler admits
   * it from its `taskDidProduce` observer; nothing is enqueued here.
   */
  produceChild(child: Task): void {
    this.notifyObservers("taskDidProduce", (observer) => observer.taskDidProduce(this, child));
  }

  /**
   * Cancel the task. Cooperative: running work is not interrupted, it may
   * check `isCancelled`.
   */
  cancel(): void {
    this.cancelWithError();
  }

  /**
   * Cancel the task, recording an error that will be part of its finish.
   */
  cancelWithError(error?: Error): void {
    if (error) {
      this.internalErrors.push(error);
    }

    if (this._cancelled) {
      return;
    }
    this._cancelled = true;
    this.emit("cancelled");
  }

  // ---------------------------------------------------------------------------
  // Finishing
  // ---------------------------------------------------------------------------

  /**
   * Finish the task. Only the first call has any effect.
   *
   * The combined error list (condition and cancellation errors first, then
   * `errors`) goes to the `finished` hook, then to every observer, and the
   * task becomes FINISHED.
   */
  finish(errors: readonly Error[] = []): void {
    if (this.hasFinished || !this.canTransition(TaskState.FINISHING)) {
      return;
    }
    this.hasFinished = true;
    this.setState(TaskState.FINISHING);

    const combinedErrors = [...this.internalErrors, ...errors];

    if (this.exclusiveCategories.length > 0) {
      this.exclusivity.unregister(this, this.exclusiveCategories);
    }

    if (this.work.finished) {
      try {
        this.work.finished(combinedErrors, this);
      } catch (error) {
        this.logger.error(`[${this.label}] finished hook failed:`, error);
      }
    }

    this.notifyObservers("taskDidFinish", (observer) =>
      observer.taskDidFinish(this, combinedErrors)
    );

    this.setState(TaskState.FINISHED);
  }

  /**
   * Finish with a single optional error.
   */
  finishWithError(error?: Error): void {
    this.finish(error ? [error] : []);
  }

  private notifyObservers(event: keyof TaskObserver, notify: (observer: TaskObserver) => void) {
    for (const observer of this._observers) {
      try {
        notify(observer);
      } catch (error) {
        this.logger.error(`[${this.label}] observer failed in ${event}:`, error);
      }
    }
  }
}
