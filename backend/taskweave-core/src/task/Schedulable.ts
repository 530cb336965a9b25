/**
 * The view of a unit of work that an external scheduler consumes: three
 * readiness signals and a dependency set it must honour before starting it.
 */
export interface Schedulable {
  readonly isReady: boolean;
  readonly isExecuting: boolean;
  readonly isFinished: boolean;
  /** Units that must be finished before this one may start */
  readonly dependencies: ReadonlySet<Schedulable>;
  addDependency(dependency: Schedulable): void;
}
