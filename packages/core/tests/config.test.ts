import { describe, it, expect, vi, afterEach } from "vitest";
import { ConfigError, ProducerConsumedError, config, createLogger, from, logger } from "../src/index.js";

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  config.reset();
});

describe("config", () => {
  it("has defaults", () => {
    expect(config.get("debug")).toBe(false);
    expect(config.get("guards.reuse")).toBe("throw");
    expect(config.isDebug()).toBe(false);
    expect(config.reuseGuard()).toBe("throw");
  });

  it("set merges nested values", () => {
    config.set({ guards: { reuse: "warn" } });
    expect(config.get("guards.reuse")).toBe("warn");
    expect(config.get("debug")).toBe(false);
    expect(config.getAll()).toEqual({ debug: false, guards: { reuse: "warn" } });
  });

  it("has reports truthy values", () => {
    expect(config.has("guards.reuse")).toBe(true);
    expect(config.has("debug")).toBe(false);
    expect(config.has("missing.path")).toBe(false);
  });

  it("reset drops programmatic values", () => {
    config.set({ debug: true });
    config.reset();
    expect(config.isDebug()).toBe(false);
  });

  it("reads SLUICE_* environment variables", () => {
    vi.stubEnv("SLUICE_DEBUG", "1");
    vi.stubEnv("SLUICE_GUARDS_REUSE", "off");
    vi.stubEnv("SLUICE_TRACE_DEPTH", "42");
    config.reset();

    expect(config.isDebug()).toBe(true);
    expect(config.reuseGuard()).toBe("off");
    expect(config.get("trace.depth")).toBe(42);
  });

  it("parses \"false\" as false", () => {
    vi.stubEnv("SLUICE_DEBUG", "false");
    config.reset();
    expect(config.get("debug")).toBe(false);
  });

  it("programmatic values override the environment", () => {
    vi.stubEnv("SLUICE_GUARDS_REUSE", "off");
    config.reset();
    config.set({ guards: { reuse: "warn" } });
    expect(config.reuseGuard()).toBe("warn");
  });

  it("rejects an unknown reuse guard mode", () => {
    vi.stubEnv("SLUICE_GUARDS_REUSE", "loud");
    config.reset();
    expect(() => config.reuseGuard()).toThrow(ConfigError);
    expect(() => config.reuseGuard()).toThrow(
      'Invalid guards.reuse value "loud"; expected "throw", "warn" or "off"',
    );
  });

  it("finds no config file in the workspace", () => {
    expect(config.getConfigFilePath()).toBeUndefined();
  });
});

describe("reuse guard", () => {
  it("throws on a second traversal by default", () => {
    const p = from([1, 2, 3]);
    expect(p.count()).toBe(3);
    expect(() => p.count()).toThrow(ProducerConsumedError);
    expect(() => p.toArray()).toThrow(
      "ArrayProducer has already been consumed; producers are single-use, build a new one to traverse again",
    );
  });

  it("wrapping a producer in an adapter consumes it", () => {
    const p = from([1, 2, 3]);
    const doubled = p.map((x) => x * 2);
    expect(() => p.filter((x) => x > 1)).toThrow(ProducerConsumedError);
    expect(doubled.toArray()).toEqual([2, 4, 6]);
  });

  it("chain consumes both sides", () => {
    const front = from([1]);
    const back = from([2]);
    front.chain(back);
    expect(() => back.count()).toThrow(ProducerConsumedError);
  });

  it("carries a machine-readable code", () => {
    const p = from(["a"]);
    p.first();
    try {
      p.first();
      expect.unreachable("second traversal should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ProducerConsumedError);
      if (error instanceof ProducerConsumedError) {
        expect(error.code).toBe("PRODUCER_CONSUMED");
        expect(error.producerName).toBe("ArrayProducer");
      }
    }
  });

  it("warns and runs again in warn mode", () => {
    config.set({ guards: { reuse: "warn" } });
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const p = from([1, 2, 3]);
    expect(p.sum()).toBe(6);
    expect(p.sum()).toBe(6);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[sluice/producer] WARN: ArrayProducer is being traversed again after it was consumed",
    );
  });

  it("runs again silently when off", () => {
    config.set({ guards: { reuse: "off" } });
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const p = from([4, 5]);
    expect(p.toArray()).toEqual([4, 5]);
    expect(p.toArray()).toEqual([4, 5]);
    expect(warn).not.toHaveBeenCalled();
  });
});

describe("logger", () => {
  it("always prints warnings and errors with the scope prefix", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("test").warn("careful");
    logger.error("broken");

    expect(warn).toHaveBeenCalledWith("[sluice/test] WARN: careful");
    expect(error).toHaveBeenCalledWith("[sluice] ERROR: broken");
  });

  it("prints debug and info only in debug mode", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const log = createLogger("test");

    log.debug("hidden");
    log.info("hidden");
    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();

    config.set({ debug: true });
    log.debug("shown");
    log.info("shown too");
    expect(debug).toHaveBeenCalledWith("[sluice/test] DEBUG: shown");
    expect(info).toHaveBeenCalledWith("[sluice/test] INFO: shown too");
  });
});
