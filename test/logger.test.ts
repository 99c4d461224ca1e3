// test/logger.test.ts

import { describe, it, expect, afterEach, vi } from "vitest";
import {
  createLogger,
  formatLogEntry,
  LogEntry,
  Logger,
  loggerConfig,
} from "../src";

describe("formatLogEntry", () => {
  it("renders timestamp, level, context and message", () => {
    const line = formatLogEntry({
      level: "info",
      message: "Registered on the bus",
      context: { component: "RegistrationCoordinator", serviceName: "org.example.app" },
      timestamp: new Date("2024-01-02T03:04:05.000Z"),
    });

    expect(line).toBe(
      "2024-01-02T03:04:05.000Z INFO  [component=RegistrationCoordinator serviceName=org.example.app] Registered on the bus",
    );
  });

  it("omits undefined context values", () => {
    const line = formatLogEntry({
      level: "debug",
      message: "hello",
      context: { component: "Test", serviceName: undefined },
      timestamp: new Date("2024-01-02T03:04:05.000Z"),
    });

    expect(line).toBe("2024-01-02T03:04:05.000Z DEBUG [component=Test] hello");
  });
});

describe("Logger", () => {
  afterEach(() => {
    loggerConfig.reset();
  });

  it("filters entries below the configured level", () => {
    const entries: LogEntry[] = [];
    loggerConfig.configure({ level: "warn", handler: (e) => entries.push(e) });
    const log = createLogger("Test");

    log.debug("debug");
    log.info("info");
    log.warn("warn");
    log.error("error", new Error("boom"));

    expect(entries.map((e) => e.level)).toEqual(["warn", "error"]);
    expect(entries[1].error?.message).toBe("boom");
  });

  it("merges child and call context", () => {
    const handler = vi.fn();
    loggerConfig.configure({ level: "debug", handler });

    new Logger({ component: "Test" })
      .child({ uniqueName: ":1.1" })
      .info("connected", { attempt: 2 });

    expect(handler).toHaveBeenCalledWith(
      expect.objectContaining({
        level: "info",
        message: "connected",
        context: { component: "Test", uniqueName: ":1.1", attempt: 2 },
      }),
    );
  });

  it("logs nothing at level none", () => {
    const handler = vi.fn();
    loggerConfig.configure({ level: "none", handler });

    createLogger("Test").error("ignored");

    expect(handler).not.toHaveBeenCalled();
  });
});
