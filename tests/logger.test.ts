/**
 * Tests for the diagnostics logger.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  configureLogger,
  debug,
  error as logError,
  info,
  resetLogger,
  warn,
  warningCount,
} from "../src/core/logger.js";

let stderr: string[] = [];

describe("logger", () => {
  beforeEach(() => {
    resetLogger();
    stderr = [];
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      stderr.push(args.join(" "));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  describe("warn", () => {
    it("should tag data warnings with the input position", () => {
      warn("header of SGASTAT changed", { source: "dbstat.log", line: 42 });
      expect(stderr).toEqual(["warning: header of SGASTAT changed (dbstat.log:42)"]);
    });

    it("should print warnings without a position as they are", () => {
      warn("no rows were emitted; writing an empty workbook");
      expect(stderr).toEqual(["warning: no rows were emitted; writing an empty workbook"]);
    });

    it("should count warnings hidden by --quiet", () => {
      configureLogger({ quiet: true });
      warn("sheet SGASTAT is full");
      warn("sheet KSMSS is full");

      expect(stderr).toEqual([]);
      expect(warningCount()).toBe(2);
    });

    it("should restart the count on reset", () => {
      warn("sheet SGASTAT is full");
      resetLogger();
      expect(warningCount()).toBe(0);
    });
  });

  describe("info", () => {
    it("should print the run summary unless quiet", () => {
      info("Rows written: 30");
      configureLogger({ quiet: true });
      info("Rows written: 31");

      expect(stderr).toEqual(["Rows written: 30"]);
    });
  });

  describe("debug", () => {
    it("should stay silent by default", () => {
      debug("Reading dbstat.log");
      expect(stderr).toEqual([]);
    });

    it("should print with --debug", () => {
      configureLogger({ debug: true });
      debug("Reading dbstat.log");
      expect(stderr).toEqual(["[DEBUG] Reading dbstat.log"]);
    });

    it("should let --quiet win over --debug", () => {
      configureLogger({ quiet: true, debug: true });
      debug("Reading dbstat.log");
      expect(stderr).toEqual([]);
    });
  });

  describe("error", () => {
    it("should print even with --quiet", () => {
      configureLogger({ quiet: true });
      logError("Error: Missing input file.");
      expect(stderr).toEqual(["Error: Missing input file."]);
    });
  });

  it("should never write to stdout", () => {
    const log = vi.spyOn(console, "log");
    configureLogger({ debug: true });
    warn("w");
    info("i");
    debug("d");
    logError("e");

    expect(log).not.toHaveBeenCalled();
    expect(stderr).toEqual(["warning: w", "i", "[DEBUG] d", "e"]);
  });
});
