import { describe, expect, it, vi } from "vitest";
import {
  filteredLogger,
  isLogLevel,
  parseLogLevel,
  prefixedLogger,
} from "./logger.js";

function mockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("parseLogLevel", () => {
  it("accepts known levels in any case", () => {
    expect(parseLogLevel("warn")).toBe("warn");
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
  });

  it("rejects anything else", () => {
    expect(() => parseLogLevel("loud")).toThrow(
      'Unknown log level "loud" (expected one of debug, info, warn, error)',
    );
    expect(isLogLevel("toString")).toBe(false);
  });
});

describe("prefixedLogger", () => {
  it("prefixes the message and passes extra arguments through", () => {
    const base = mockLogger();
    const err = new Error("x");

    prefixedLogger("strand", base).error("failed", err);

    expect(base.error).toHaveBeenCalledWith("[strand] failed", err);
  });
});

describe("filteredLogger", () => {
  it("drops messages below the level", () => {
    const base = mockLogger();
    const logger = filteredLogger("warn", base);

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(base.debug).not.toHaveBeenCalled();
    expect(base.info).not.toHaveBeenCalled();
    expect(base.warn).toHaveBeenCalledWith("w");
    expect(base.error).toHaveBeenCalledWith("e");
  });

  it("passes everything at debug", () => {
    const base = mockLogger();
    filteredLogger("debug", base).debug("d", 1);
    expect(base.debug).toHaveBeenCalledWith("d", 1);
  });
});
