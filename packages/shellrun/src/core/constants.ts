// Timeout defaults (milliseconds)
export const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;
export const SHORT_TIMEOUT_MS = 30 * 1000;
export const LONG_TIMEOUT_MS = 10 * 60 * 1000;

/** Timeouts observed before fresh requests start with the long default */
export const LONG_TIMEOUT_THRESHOLD = 1;

/** One initial attempt plus two retries */
export const MAX_ATTEMPTS = 3;

/** Exit code reported when the process could not be launched or run to completion */
export const LAUNCH_FAILURE_EXIT_CODE = 1;

/** Exit code reported when an attempt was aborted (timeout or internal failure) */
export const ABORTED_EXIT_CODE = -1;

/** setTimeout stores its delay as a signed 32-bit integer */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
