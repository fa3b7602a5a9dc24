import { describe, it, expect, afterEach, vi } from "vitest";
import {
  formatReport,
  isReportLevel,
  report,
  resetWriter,
  setWriter,
  type ReportLevel,
} from "../src/index.js";

describe("formatReport", () => {
  it("should prefix the scope and upper-case the level", () => {
    expect(formatReport("warn", "option", "get() called on Absent")).toBe(
      "[optio/option] WARN: get() called on Absent"
    );
  });
});

describe("isReportLevel", () => {
  it("should accept the four levels", () => {
    for (const level of ["error", "warn", "info", "off"]) {
      expect(isReportLevel(level)).toBe(true);
    }
  });

  it("should reject anything else", () => {
    expect(isReportLevel("verbose")).toBe(false);
    expect(isReportLevel(1)).toBe(false);
    expect(isReportLevel(undefined)).toBe(false);
  });
});

describe("report", () => {
  afterEach(() => {
    resetWriter();
    vi.restoreAllMocks();
  });

  it("should pass the level and rendered line to the writer", () => {
    const seen: Array<[ReportLevel, string]> = [];
    setWriter((level, line) => {
      seen.push([level, line]);
    });

    report("error", "config", "boom");
    report("info", "option", "hello");

    expect(seen).toEqual([
      ["error", "[optio/config] ERROR: boom"],
      ["info", "[optio/option] INFO: hello"],
    ]);
  });

  it("should write nothing at level off", () => {
    const writer = vi.fn();
    setWriter(writer);
    report("off", "option", "ignored");
    expect(writer).not.toHaveBeenCalled();
  });

  it("should route each level to the matching console method", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});

    report("error", "s", "e");
    report("warn", "s", "w");
    report("info", "s", "i");

    expect(errorSpy).toHaveBeenCalledWith("[optio/s] ERROR: e");
    expect(warnSpy).toHaveBeenCalledWith("[optio/s] WARN: w");
    expect(infoSpy).toHaveBeenCalledWith("[optio/s] INFO: i");
  });
});
