import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, LogLevel } from "./logger.js";

describe("Logger", () => {
  afterEach(() => {
    Logger.setLevel(LogLevel.WARN);
    vi.restoreAllMocks();
  });

  it("defaults to WARN", () => {
    expect(Logger.getLevel()).toBe(LogLevel.WARN);
  });

  it("suppresses messages below the current level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    Logger.debug("hidden");
    Logger.info("hidden");
    expect(log).not.toHaveBeenCalled();
  });

  it("prefixes messages with their level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    Logger.warn("narrow room", 3);
    Logger.error("broken tree");
    expect(warn).toHaveBeenCalledWith("[WARN] narrow room", 3);
    expect(error).toHaveBeenCalledWith("[ERROR] broken tree");
  });

  it("shows debug output at DEBUG", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    Logger.setLevel(LogLevel.DEBUG);
    Logger.debug("tracing");
    expect(Logger.getLevel()).toBe(LogLevel.DEBUG);
    expect(log).toHaveBeenCalledWith("[DEBUG] tracing");
  });

  it("silences errors too at NONE", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    Logger.setLevel(LogLevel.NONE);
    Logger.error("silenced");
    expect(error).not.toHaveBeenCalled();
  });
});
