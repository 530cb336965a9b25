export type { TaskObserver } from "./TaskObserver";
export { BlockObserver } from "./BlockObserver";
export type { BlockObserverHandlers } from "./BlockObserver";
export { LoggingObserver } from "./LoggingObserver";
