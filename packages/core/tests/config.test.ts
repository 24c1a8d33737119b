/**
 * Tests for the configuration layer
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config, defineConfig, DEFAULTS, createLogger } from "@transcend/core";

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    config.reset();
  });

  describe("defaults", () => {
    it("should load without a config file", () => {
      expect(() => config.resolved()).not.toThrow();
      expect(config.getConfigFilePath()).toBeUndefined();
      expect(config.getAll()).toEqual(DEFAULTS);
    });

    it("should resolve every known key", () => {
      expect(config.resolved()).toEqual(DEFAULTS);
    });

    it("should expose raw values by dotted path", () => {
      expect(config.get("precision.digits")).toBe(34);
      expect(config.get("angles.unit")).toBe("degrees");
      expect(config.get("series.missing")).toBeUndefined();
    });

    it("should report truthiness with has()", () => {
      expect(config.has("series.limit")).toBe(true);
      expect(config.has("debug")).toBe(false);
    });
  });

  describe("set", () => {
    it("should deep-merge programmatic values", () => {
      config.set({ precision: { digits: 50 } });

      expect(config.resolved().precision).toEqual({ digits: 50, rounding: "half-even" });
    });

    it("should invalidate the resolved view", () => {
      expect(config.resolved().angles.unit).toBe("degrees");
      config.set({ angles: { unit: "radians" } });
      expect(config.resolved().angles.unit).toBe("radians");
    });

    it("should fall back to defaults for malformed values", () => {
      vi.stubEnv("TRANSCEND_ANGLES_UNIT", "turns");
      config.set({ series: { limit: -4 } });

      expect(config.resolved().series.limit).toBe(1000);
      expect(config.resolved().angles.unit).toBe("degrees");
    });
  });

  describe("environment", () => {
    it("should read TRANSCEND_* variables as nested keys", () => {
      vi.stubEnv("TRANSCEND_PRECISION_DIGITS", "60");
      vi.stubEnv("TRANSCEND_SERIES_EXHAUSTED", "throw");
      vi.stubEnv("TRANSCEND_DEBUG", "1");

      const resolved = config.resolved();
      expect(resolved.precision.digits).toBe(60);
      expect(resolved.series.exhausted).toBe("throw");
      expect(resolved.debug).toBe(true);
    });
  });

  describe("reset", () => {
    it("should discard programmatic values", () => {
      config.set({ series: { exhausted: "partial" } });
      config.reset();

      expect(config.resolved().series.exhausted).toBe("nan");
    });
  });

  it("defineConfig returns its argument", () => {
    const cfg = { angles: { unit: "gradians" as const } };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});

describe("createLogger", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("should prefix lines with the scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    createLogger("series").warn("slow", 3);

    expect(warn).toHaveBeenCalledWith("[transcend:series]", "slow", 3);
  });

  it("should drop debug lines unless debug is set", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = createLogger("gamma");

    log.debug("hidden");
    expect(debug).not.toHaveBeenCalled();

    config.set({ debug: true });
    log.debug("shown");
    expect(debug).toHaveBeenCalledWith("[transcend:gamma]", "shown");
  });
});
