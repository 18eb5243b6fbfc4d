import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { ConfigError } from "../../src/config/validator";
import { getNextRun, matchesCron, parseCron, parseInterval, Scheduler } from "../../src/core/scheduler";
import { memoryLogger } from "../helpers/logger";

describe("schedule parsing", () => {
  describe("parseCron", () => {
    test("accepts five fields", () => {
      expect(parseCron(" 0 2 * * * ").expression).toBe("0 2 * * *");
    });

    test("rejects other field counts", () => {
      expect(() => parseCron("0 2 * *")).toThrow("Expected 5 fields, got 4");
    });

    test("rejects out of range values", () => {
      expect(() => parseCron("99 2 * * *")).toThrow(ConfigError);
    });
  });

  test("matchesCron and getNextRun", () => {
    const cron = parseCron("*/15 * * * *");
    expect(matchesCron(cron, new Date(Date.UTC(2024, 0, 1, 10, 15, 30)))).toBe(true);
    expect(matchesCron(cron, new Date(Date.UTC(2024, 0, 1, 10, 16)))).toBe(false);
    expect(getNextRun(cron, new Date(Date.UTC(2024, 0, 1, 10, 7))).toISOString()).toBe("2024-01-01T10:15:00.000Z");
  });

  describe("parseInterval", () => {
    test("bare numbers and h are hours", () => {
      expect(parseInterval("24")).toBe(86_400_000);
      expect(parseInterval("2h")).toBe(7_200_000);
    });

    test("m is minutes", () => {
      expect(parseInterval("30m")).toBe(1_800_000);
    });

    test("rejects zero, junk and overflow", () => {
      expect(() => parseInterval("0")).toThrow("greater than zero");
      expect(() => parseInterval("1d")).toThrow(ConfigError);
      expect(() => parseInterval("600h")).toThrow("596h");
    });
  });
});

describe("Scheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("needs a trigger", () => {
    expect(() => new Scheduler({ schedule: {}, run: async () => {} })).toThrow(ConfigError);
  });

  test("interval mode runs at once and then every interval", async () => {
    const run = vi.fn(async () => {});
    const scheduler = new Scheduler({ schedule: { interval: "30m" }, run, logger: memoryLogger() });

    scheduler.start();
    expect(run).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(30 * 60_000);
    expect(run).toHaveBeenCalledTimes(2);

    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(60 * 60_000);
    expect(run).toHaveBeenCalledTimes(2);
  });

  test("skips a trigger while the previous run is active", async () => {
    let finish = () => {};
    const run = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );
    const logger = memoryLogger();
    const scheduler = new Scheduler({ schedule: { interval: "1m" }, run, logger });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(run).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus().running).toBe(true);
    expect(logger.lines.some((l) => l.message === "Previous backup run still in progress, skipping this one")).toBe(true);

    finish();
    await scheduler.stop();
    expect(scheduler.getStatus().running).toBe(false);
  });

  test("failed runs are logged and scheduling continues", async () => {
    const run = vi.fn(async () => {
      throw new Error("boom");
    });
    const logger = memoryLogger();
    const scheduler = new Scheduler({ schedule: { interval: "1m" }, run, logger });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(60_000);
    await scheduler.stop();

    expect(run).toHaveBeenCalledTimes(2);
    expect(logger.lines.filter((l) => l.message === "Scheduled run failed: boom")).toHaveLength(2);
  });

  test("cron mode fires once per matching minute", async () => {
    const now = new Date(Date.UTC(2024, 0, 1, 10, 15, 10));
    const run = vi.fn(async () => {});
    const scheduler = new Scheduler({
      schedule: { cron: "*/15 * * * *" },
      run,
      logger: memoryLogger(),
      now: () => new Date(now),
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(run).toHaveBeenCalledTimes(1);
    expect(scheduler.getNextRun()?.toISOString()).toBe("2024-01-01T10:30:00.000Z");
    await scheduler.stop();
  });

  test("status", () => {
    const now = new Date(Date.UTC(2024, 0, 1, 12, 0, 0));
    const scheduler = new Scheduler({
      schedule: { interval: "2h" },
      run: async () => {},
      logger: memoryLogger(),
      now: () => now,
    });

    expect(scheduler.getStatus()).toEqual({
      mode: "interval",
      expression: "2h",
      started: false,
      running: false,
      lastRun: null,
      nextRun: null,
    });

    scheduler.start();
    expect(scheduler.getNextRun()?.toISOString()).toBe("2024-01-01T14:00:00.000Z");
    return scheduler.stop();
  });
});
