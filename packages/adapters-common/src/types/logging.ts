/**
 * Logging type definitions.
 *
 * Components never write to the console themselves; they receive a log
 * callback from whoever drives them (CLI, tests, an embedding engine).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Log callback for streaming provider output */
export type ProviderLogCallback = (message: string, level: LogLevel) => void;

/**
 * A log callback that discards everything.
 */
export const silentLog: ProviderLogCallback = () => undefined;
