/**
 * Logging surface used across the coordinator. Defaults to the console;
 * tests and embedders pass their own to capture or silence output.
 */
export type TaskLogger = Pick<Console, "debug" | "info" | "warn" | "error">;

export const defaultLogger: TaskLogger = console;
