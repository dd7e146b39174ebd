import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import {
  debug,
  error,
  getLogLevel,
  info,
  logger,
  setLogLevel,
  warn,
} from "../../src/utils/logger";

describe("logger", () => {
  let originalLevel: ReturnType<typeof getLogLevel>;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleWarnSpy: MockInstance<typeof console.warn>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    originalLevel = getLogLevel();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel(originalLevel);
    vi.restoreAllMocks();
  });

  describe("setLogLevel / getLogLevel", () => {
    test("sets and gets log level", () => {
      setLogLevel("debug");
      expect(getLogLevel()).toBe("debug");

      setLogLevel("error");
      expect(getLogLevel()).toBe("error");
    });

    test("logger object exposes the same accessors", () => {
      logger.setLevel("warn");
      expect(logger.getLevel()).toBe("warn");
    });
  });

  describe("log level filtering", () => {
    test("debug logs when level is debug", () => {
      setLogLevel("debug");
      debug("test message");
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });

    test("debug does not log when level is info", () => {
      setLogLevel("info");
      debug("test message");
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    test("info does not log when level is warn", () => {
      setLogLevel("warn");
      info("test message");
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    test("warn goes to console.warn", () => {
      setLogLevel("info");
      warn("careful");
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
    });

    test("error always logs at error level", () => {
      setLogLevel("error");
      error("broken");
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("message format", () => {
    test("includes level tag and message", () => {
      setLogLevel("info");
      info("snapshot saved");
      const line = String(consoleLogSpy.mock.calls[0]?.[0]);
      expect(line).toContain("INFO ");
      expect(line).toContain("snapshot saved");
    });

    test("serializes object data as JSON", () => {
      setLogLevel("info");
      info("details", { count: 2 });
      const line = String(consoleLogSpy.mock.calls[0]?.[0]);
      expect(line).toContain('"count": 2');
    });

    test("appends primitive data", () => {
      setLogLevel("info");
      info("value", 42);
      const line = String(consoleLogSpy.mock.calls[0]?.[0]);
      expect(line.endsWith("value 42")).toBe(true);
    });
  });
});
