/**
 * Tests for configuration management.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { homedir } from "node:os";
import { join } from "node:path";
import { loadConfig, getDefaultDataPath, DEFAULT_TICK_MS } from "./config.js";

describe("Config", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env["WORKLOG_DATA_FILE"];
    delete process.env["WORKLOG_TICK_MS"];
    delete process.env["WORKLOG_DEBUG"];
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe("getDefaultDataPath", () => {
    it("returns path in user home directory", () => {
      expect(getDefaultDataPath()).toBe(
        join(homedir(), ".worklog", "time_records.json")
      );
    });
  });

  describe("loadConfig", () => {
    it("uses defaults when nothing is set", () => {
      expect(loadConfig()).toEqual({
        dataFile: join(homedir(), ".worklog", "time_records.json"),
        tickMs: 200,
        debug: false,
      });
    });

    it("uses WORKLOG_DATA_FILE when set", () => {
      process.env["WORKLOG_DATA_FILE"] = "/custom/path/records.json";
      expect(loadConfig().dataFile).toBe("/custom/path/records.json");
    });

    it("lets overrides win over the environment", () => {
      process.env["WORKLOG_DATA_FILE"] = "/custom/path/records.json";
      expect(loadConfig({ dataFile: "/flag/records.json" }).dataFile).toBe(
        "/flag/records.json"
      );
    });

    it("reads WORKLOG_TICK_MS", () => {
      process.env["WORKLOG_TICK_MS"] = "500";
      expect(loadConfig().tickMs).toBe(500);
    });

    it("falls back to the default tick for invalid values", () => {
      for (const value of ["0", "-5", "1.5", "fast"]) {
        process.env["WORKLOG_TICK_MS"] = value;
        expect(loadConfig().tickMs).toBe(DEFAULT_TICK_MS);
      }
    });

    it("enables debug only for WORKLOG_DEBUG=1", () => {
      process.env["WORKLOG_DEBUG"] = "1";
      expect(loadConfig().debug).toBe(true);
      process.env["WORKLOG_DEBUG"] = "true";
      expect(loadConfig().debug).toBe(false);
    });
  });
});
