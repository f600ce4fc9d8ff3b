import { LONG_TIMEOUT_MS, LONG_TIMEOUT_THRESHOLD, SHORT_TIMEOUT_MS } from "./constants.js";

/**
 * Options for {@link TimeoutEscalationPolicy}.
 */
export interface TimeoutPolicyOptions {
  /**
   * Starting timeout while few timeouts have been observed.
   * @default 30000
   */
  shortTimeoutMs?: number;

  /**
   * Timeout that escalation raises to, and the starting timeout once the
   * threshold is passed.
   * @default 600000
   */
  longTimeoutMs?: number;

  /**
   * Number of observed timeouts after which fresh requests start long.
   * @default 1
   */
  threshold?: number;
}

/**
 * Tracks timeouts across runners and picks timeouts from that history.
 *
 * Repeated timeouts suggest a slow environment, so once more than `threshold`
 * have been seen, fresh requests start with the long timeout. Retries inside
 * a request escalate on their own through {@link increase}.
 *
 * The counter is shared by every runner holding the same instance and is
 * updated without coordination between them. Interleaved runners may each
 * count the same slow period; treat it as a hint, not an exact tally.
 */
export class TimeoutEscalationPolicy {
  readonly shortTimeoutMs: number;
  readonly longTimeoutMs: number;
  readonly threshold: number;

  private timeouts = 0;

  constructor(options: TimeoutPolicyOptions = {}) {
    this.shortTimeoutMs = options.shortTimeoutMs ?? SHORT_TIMEOUT_MS;
    this.longTimeoutMs = options.longTimeoutMs ?? LONG_TIMEOUT_MS;
    this.threshold = options.threshold ?? LONG_TIMEOUT_THRESHOLD;
  }

  /** Number of timeouts recorded so far. */
  get failures(): number {
    return this.timeouts;
  }

  /**
   * Records a timeout and returns the timeout for the next attempt.
   * Raises to the long timeout, never lowers a larger one.
   */
  increase(previousMs: number): number {
    this.timeouts++;
    return previousMs < this.longTimeoutMs ? this.longTimeoutMs : previousMs;
  }

  /** Timeout to start a fresh request with. */
  startingTimeout(): number {
    if (this.timeouts > this.threshold) {
      return this.longTimeoutMs;
    }
    return this.shortTimeoutMs;
  }

  reset(): void {
    this.timeouts = 0;
  }
}

/**
 * Policy shared by runners that are not given their own.
 */
export const defaultTimeoutPolicy = new TimeoutEscalationPolicy();
