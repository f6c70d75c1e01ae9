import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from "vitest";
import { createConsoleLogger, logLevelFor } from "./logger";

let logSpy: MockInstance<typeof console.log>;
let errorSpy: MockInstance<typeof console.error>;

beforeEach(() => {
  logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

function emitAll(level: "debug" | "info" | "error"): void {
  const logger = createConsoleLogger(level);
  logger.debug("d");
  logger.info("i");
  logger.warn("w");
  logger.error("e");
}

describe("createConsoleLogger", () => {
  it("prints info to stdout and problems to stderr", () => {
    emitAll("info");
    expect(logSpy.mock.calls).toEqual([["i"]]);
    expect(errorSpy.mock.calls).toEqual([["Warning: w"], ["Error: e"]]);
  });

  it("adds debug lines when verbose", () => {
    emitAll("debug");
    expect(logSpy.mock.calls).toEqual([["[debug] d"], ["i"]]);
  });

  it("keeps only errors when quiet", () => {
    emitAll("error");
    expect(logSpy.mock.calls).toEqual([]);
    expect(errorSpy.mock.calls).toEqual([["Error: e"]]);
  });
});

describe("logLevelFor", () => {
  it("maps flags to levels, quiet first", () => {
    expect(logLevelFor({})).toBe("info");
    expect(logLevelFor({ verbose: true })).toBe("debug");
    expect(logLevelFor({ verbose: true, quiet: true })).toBe("error");
  });
});
