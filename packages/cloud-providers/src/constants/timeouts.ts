/**
 * Timeout constants for cloud operations.
 */

/** Maximum time to wait for any single operation (10 minutes) */
export const OPERATION_TIMEOUT_MS = 600_000;

/** Polling interval for checking operation status */
export const OPERATION_POLL_INTERVAL_MS = 5_000;

/** Upper bound for the poll interval when backoff is enabled */
export const OPERATION_MAX_POLL_INTERVAL_MS = 30_000;

/** Multiplier applied to the poll interval after each poll (1 = fixed interval) */
export const OPERATION_BACKOFF_MULTIPLIER = 1;

/** Consecutive transient lookup errors tolerated before giving up */
export const OPERATION_MAX_TRANSIENT_RETRIES = 3;
