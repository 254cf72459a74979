import { describe, it, expect } from "vitest";
import { WorklogError, isWorklogError, isRecoverable } from "./errors.js";

describe("WorklogError", () => {
  it("carries a code and message", () => {
    const error = new WorklogError("NOT_RUNNING", "No timer is running to pause.");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("WorklogError");
    expect(error.code).toBe("NOT_RUNNING");
    expect(error.message).toBe("No timer is running to pause.");
  });

  it("matches codes with isWorklogError", () => {
    const error = new WorklogError("INVALID_FORMAT", "bad");
    expect(isWorklogError(error)).toBe(true);
    expect(isWorklogError(error, "INVALID_FORMAT")).toBe(true);
    expect(isWorklogError(error, "END_BEFORE_START")).toBe(false);
    expect(isWorklogError(new Error("bad"))).toBe(false);
  });

  it("treats only corrupt storage as unrecoverable", () => {
    expect(isRecoverable("CORRUPT_STORAGE")).toBe(false);
    expect(isRecoverable("INDEX_OUT_OF_RANGE")).toBe(true);
    expect(isRecoverable("NO_RECORDS_IN_RANGE")).toBe(true);
  });
});
