/**
 * Tests for the work session timer.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { SessionTimer, toRecord } from "./session-timer.js";
import { isWorklogError } from "../errors.js";
import type { TimerClock } from "../types/index.js";

/** Clock whose wall and monotonic time only move when told to. */
class FakeClock implements TimerClock {
  wall = new Date(2025, 0, 1, 9, 0, 0);
  mono = 1_000;

  now(): Date {
    return new Date(this.wall.getTime());
  }

  monotonic(): number {
    return this.mono;
  }

  advance(seconds: number): void {
    this.wall = new Date(this.wall.getTime() + seconds * 1000);
    this.mono += seconds * 1000;
  }
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}

describe("SessionTimer", () => {
  let clock: FakeClock;
  let timer: SessionTimer;

  beforeEach(() => {
    clock = new FakeClock();
    timer = new SessionTimer(clock);
  });

  describe("start", () => {
    it("starts idle", () => {
      expect(timer.status).toBe("idle");
      expect(timer.currentElapsed()).toBe(0);
      expect(timer.snapshot()).toEqual({
        status: "idle",
        running: false,
        segmentStartEpoch: null,
        sessionStartTimestamp: null,
        accumulatedSeconds: 0,
      });
    });

    it("records the wall-clock start and begins a segment", () => {
      timer.start();
      const snap = timer.snapshot();
      expect(snap.status).toBe("running");
      expect(snap.running).toBe(true);
      expect(snap.segmentStartEpoch).toBe(1_000);
      expect(snap.sessionStartTimestamp).toEqual(new Date(2025, 0, 1, 9, 0, 0));
      expect(snap.accumulatedSeconds).toBe(0);
    });

    it("hands out a copy of the start timestamp", () => {
      timer.start();
      const started = timer.snapshot().sessionStartTimestamp;
      started?.setFullYear(2000);
      clock.advance(10);
      expect(timer.stop().sessionStartTimestamp).toEqual(
        new Date(2025, 0, 1, 9, 0, 0)
      );
    });

    it("fails with ALREADY_RUNNING while running", () => {
      timer.start();
      clock.advance(5);
      const error = captureError(() => timer.start());
      expect(isWorklogError(error, "ALREADY_RUNNING")).toBe(true);
      expect(timer.snapshot().segmentStartEpoch).toBe(1_000);
      expect(timer.currentElapsed()).toBe(5);
    });

    it("fails with ALREADY_RUNNING while paused", () => {
      timer.start();
      clock.advance(5);
      timer.pause();
      const error = captureError(() => timer.start());
      expect(isWorklogError(error, "ALREADY_RUNNING")).toBe(true);
      expect(timer.status).toBe("paused");
      expect(timer.snapshot().accumulatedSeconds).toBe(5);
    });
  });

  describe("pause", () => {
    it("commits the running segment", () => {
      timer.start();
      clock.advance(90);
      timer.pause();
      expect(timer.status).toBe("paused");
      expect(timer.snapshot().accumulatedSeconds).toBe(90);
      expect(timer.snapshot().segmentStartEpoch).toBeNull();
    });

    it("fails with NOT_RUNNING when idle", () => {
      const error = captureError(() => timer.pause());
      expect(isWorklogError(error, "NOT_RUNNING")).toBe(true);
    });

    it("fails with NOT_RUNNING on a second pause and keeps the total", () => {
      timer.start();
      clock.advance(10);
      timer.pause();
      clock.advance(30);
      const error = captureError(() => timer.pause());
      expect(isWorklogError(error, "NOT_RUNNING")).toBe(true);
      expect(timer.snapshot().accumulatedSeconds).toBe(10);
    });
  });

  describe("resume", () => {
    it("starts a new segment without resetting the total", () => {
      timer.start();
      clock.advance(10);
      timer.pause();
      clock.advance(50);
      timer.resume();
      expect(timer.status).toBe("running");
      expect(timer.snapshot().segmentStartEpoch).toBe(61_000);
      expect(timer.snapshot().accumulatedSeconds).toBe(10);
      clock.advance(5);
      expect(timer.currentElapsed()).toBe(15);
    });

    it("fails with ALREADY_RUNNING while running", () => {
      timer.start();
      const error = captureError(() => timer.resume());
      expect(isWorklogError(error, "ALREADY_RUNNING")).toBe(true);
    });

    it("fails with NOT_RUNNING when idle", () => {
      const error = captureError(() => timer.resume());
      expect(isWorklogError(error, "NOT_RUNNING")).toBe(true);
      expect(timer.status).toBe("idle");
    });
  });

  describe("stop", () => {
    it("sums running segments and excludes paused time", () => {
      timer.start();
      clock.advance(600);
      timer.pause();
      clock.advance(300);
      timer.resume();
      clock.advance(120);
      timer.pause();
      clock.advance(1000);
      timer.resume();
      clock.advance(30);

      const session = timer.stop();
      expect(session.accumulatedSeconds).toBe(750);
      expect(session.sessionStartTimestamp).toEqual(
        new Date(2025, 0, 1, 9, 0, 0)
      );
      expect(session.endTimestamp).toEqual(new Date(2025, 0, 1, 9, 34, 10));
    });

    it("stopping while paused does not add the pause", () => {
      timer.start();
      clock.advance(20);
      timer.pause();
      clock.advance(100);
      expect(timer.stop().accumulatedSeconds).toBe(20);
    });

    it("allows stop immediately after start", () => {
      timer.start();
      const session = timer.stop();
      expect(session.accumulatedSeconds).toBe(0);
      expect(session.endTimestamp.getTime()).toBeGreaterThanOrEqual(
        session.sessionStartTimestamp.getTime()
      );
    });

    it("resets to idle", () => {
      timer.start();
      clock.advance(5);
      timer.stop();
      expect(timer.snapshot()).toEqual({
        status: "idle",
        running: false,
        segmentStartEpoch: null,
        sessionStartTimestamp: null,
        accumulatedSeconds: 0,
      });
      timer.start();
      expect(timer.status).toBe("running");
    });

    it("fails with NO_ACTIVE_SESSION when idle", () => {
      const error = captureError(() => timer.stop());
      expect(isWorklogError(error, "NO_ACTIVE_SESSION")).toBe(true);
    });
  });

  describe("currentElapsed", () => {
    it("includes the open segment without committing it", () => {
      timer.start();
      clock.advance(42);
      expect(timer.currentElapsed()).toBe(42);
      expect(timer.currentElapsed()).toBe(42);
      expect(timer.snapshot().accumulatedSeconds).toBe(0);
    });

    it("is frozen while paused", () => {
      timer.start();
      clock.advance(7);
      timer.pause();
      clock.advance(100);
      expect(timer.currentElapsed()).toBe(7);
    });

    it("ignores wall-clock jumps", () => {
      timer.start();
      clock.mono += 3_000;
      clock.wall = new Date(2025, 0, 1, 8, 0, 0);
      expect(timer.currentElapsed()).toBe(3);
    });

    it("never ends a session before it started when the wall clock goes back", () => {
      timer.start();
      clock.mono += 60_000;
      clock.wall = new Date(2025, 0, 1, 8, 30, 0);

      const session = timer.stop();
      expect(session.accumulatedSeconds).toBe(60);
      expect(session.endTimestamp).toEqual(new Date(2025, 0, 1, 9, 0, 0));

      const record = toRecord(session);
      expect(record.startTime).toBe("2025-01-01T09:00:00");
      expect(record.endTime).toBe("2025-01-01T09:00:00");
    });
  });
});

describe("toRecord", () => {
  it("uses local ISO timestamps and keeps the pause-excluding total", () => {
    const record = toRecord(
      {
        sessionStartTimestamp: new Date(2025, 0, 1, 9, 0, 0),
        endTimestamp: new Date(2025, 0, 1, 10, 30, 0),
        accumulatedSeconds: 3600.25,
      },
      "Planning"
    );
    expect(record).toEqual({
      startTime: "2025-01-01T09:00:00",
      endTime: "2025-01-01T10:30:00",
      elapsedSeconds: 3600.25,
      comment: "Planning",
    });
  });

  it("defaults to an empty comment", () => {
    const record = toRecord({
      sessionStartTimestamp: new Date(2025, 5, 3, 8, 5, 9),
      endTimestamp: new Date(2025, 5, 3, 8, 5, 9),
      accumulatedSeconds: 0,
    });
    expect(record.comment).toBe("");
    expect(record.startTime).toBe("2025-06-03T08:05:09");
  });
});
