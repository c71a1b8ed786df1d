import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, parseLogLevel, silentLogger } from "../src/logging/logger.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("prefixes the scope and formats fields", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    createLogger("arena", "info").info("match finished", { seed: 7, ratio: 0.5, ok: true, skipped: undefined });
    expect(log).toHaveBeenCalledWith("[arena] match finished seed=7 ratio=0.500 ok=true");
  });

  it("drops messages below its level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createLogger("arena", "warn");
    logger.debug("noise");
    logger.info("noise");
    logger.warn("plots merged", { count: 2 });
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[arena] plots merged count=2");
  });

  it("nests child scopes", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    createLogger("fighter", "debug").child("tracker").debug("track spawned");
    expect(log).toHaveBeenCalledWith("[fighter tracker] track spawned");
  });

  it("keeps the silent logger quiet", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    silentLogger.error("boom");
    expect(error).not.toHaveBeenCalled();
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels and falls back otherwise", () => {
    expect(parseLogLevel("debug", "warn")).toBe("debug");
    expect(parseLogLevel("loud", "warn")).toBe("warn");
    expect(parseLogLevel(undefined, "info")).toBe("info");
  });
});
