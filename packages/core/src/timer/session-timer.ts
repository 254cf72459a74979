/**
 * Work session timer.
 *
 * State machine: idle -> running <-> paused -> (stop) -> idle.
 * Intervals are measured on a monotonic clock; the wall clock is only used
 * for the start/end timestamps that end up in the record.
 */

import { performance } from "node:perf_hooks";
import { WorklogError } from "../errors.js";
import type {
  FinalizedSession,
  SessionSnapshot,
  TimerClock,
  TimerStatus,
  WorkRecord,
} from "../types/index.js";
import { formatIsoDateTime, fromLocalDate } from "../utils/datetime.js";

export const systemClock: TimerClock = {
  now: () => new Date(),
  monotonic: () => performance.now(),
};

export class SessionTimer {
  private readonly clock: TimerClock;

  private running = false;
  private segmentStartEpoch: number | null = null;
  private sessionStartTimestamp: Date | null = null;
  private accumulatedSeconds = 0;

  constructor(clock: TimerClock = systemClock) {
    this.clock = clock;
  }

  get status(): TimerStatus {
    if (this.running) return "running";
    return this.sessionStartTimestamp === null ? "idle" : "paused";
  }

  /** Begin a new session. */
  start(): void {
    if (this.status !== "idle") {
      throw new WorklogError(
        "ALREADY_RUNNING",
        "Timer is already running!"
      );
    }

    this.sessionStartTimestamp = this.clock.now();
    this.segmentStartEpoch = this.clock.monotonic();
    this.accumulatedSeconds = 0;
    this.running = true;
  }

  /** Commit the open segment and stop accumulating. */
  pause(): void {
    if (this.status !== "running") {
      throw new WorklogError(
        "NOT_RUNNING",
        "No timer is running to pause."
      );
    }

    this.commitSegment();
  }

  /** Open a new segment on a paused session. */
  resume(): void {
    const status = this.status;
    if (status === "running") {
      throw new WorklogError("ALREADY_RUNNING", "Timer is already running!");
    }
    if (status === "idle") {
      throw new WorklogError("NOT_RUNNING", "No paused session to resume.");
    }

    this.segmentStartEpoch = this.clock.monotonic();
    this.running = true;
  }

  /**
   * Finish the session and reset to idle.
   * A session stopped right after start yields zero seconds; that is allowed.
   */
  stop(): FinalizedSession {
    const startedAt = this.sessionStartTimestamp;
    if (startedAt === null) {
      throw new WorklogError(
        "NO_ACTIVE_SESSION",
        "No active or paused session to stop."
      );
    }

    if (this.running) {
      this.commitSegment();
    }

    // The wall clock may have been set back (NTP, DST) since start
    const now = this.clock.now();
    const finalized: FinalizedSession = {
      sessionStartTimestamp: startedAt,
      endTimestamp:
        now.getTime() < startedAt.getTime() ? new Date(startedAt.getTime()) : now,
      accumulatedSeconds: this.accumulatedSeconds,
    };

    this.running = false;
    this.segmentStartEpoch = null;
    this.sessionStartTimestamp = null;
    this.accumulatedSeconds = 0;

    return finalized;
  }

  /** Elapsed seconds including the open segment. Never mutates state. */
  currentElapsed(): number {
    if (!this.running || this.segmentStartEpoch === null) {
      return this.accumulatedSeconds;
    }
    return (
      this.accumulatedSeconds +
      (this.clock.monotonic() - this.segmentStartEpoch) / 1000
    );
  }

  snapshot(): SessionSnapshot {
    return {
      status: this.status,
      running: this.running,
      segmentStartEpoch: this.segmentStartEpoch,
      sessionStartTimestamp:
        this.sessionStartTimestamp === null
          ? null
          : new Date(this.sessionStartTimestamp.getTime()),
      accumulatedSeconds: this.accumulatedSeconds,
    };
  }

  private commitSegment(): void {
    if (this.segmentStartEpoch !== null) {
      this.accumulatedSeconds +=
        (this.clock.monotonic() - this.segmentStartEpoch) / 1000;
    }
    this.segmentStartEpoch = null;
    this.running = false;
  }
}

/**
 * Turn a stopped session into a record.
 * elapsedSeconds keeps the paused time excluded, so it can be shorter than
 * the span between startTime and endTime.
 */
export function toRecord(session: FinalizedSession, comment = ""): WorkRecord {
  return {
    startTime: formatIsoDateTime(fromLocalDate(session.sessionStartTimestamp)),
    endTime: formatIsoDateTime(fromLocalDate(session.endTimestamp)),
    elapsedSeconds: session.accumulatedSeconds,
    comment,
  };
}
