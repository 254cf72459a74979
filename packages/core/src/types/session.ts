/**
 * Session types for the work timer.
 * A session lives only in memory until it is stopped and turned into a record.
 */

/** Status of the timer state machine */
export type TimerStatus = "idle" | "running" | "paused";

/** Clock sources used by the timer. */
export interface TimerClock {
  /** Wall-clock instant, recorded as the session start/end */
  now(): Date;
  /** Monotonic milliseconds, used only to measure intervals */
  monotonic(): number;
}

/** Read-only view of the active session */
export interface SessionSnapshot {
  status: TimerStatus;
  running: boolean;
  /** Monotonic ms at which the current running segment began */
  segmentStartEpoch: number | null;
  sessionStartTimestamp: Date | null;
  /** Seconds summed over completed running segments */
  accumulatedSeconds: number;
}

/** Result of stopping the timer */
export interface FinalizedSession {
  sessionStartTimestamp: Date;
  endTimestamp: Date;
  accumulatedSeconds: number;
}
