import { describe, it, expect, vi, afterEach } from "vitest";
import { HeadlessHost, type HostLogger } from "./HeadlessHost.js";
import type { RunnerConfig } from "./config.js";

function runnerConfig(overrides: Partial<RunnerConfig> = {}): RunnerConfig {
  return {
    simTickHz: 60,
    runSeconds: 2,
    realtime: false,
    fieldWidth: 960,
    fieldHeight: 640,
    logEverySeconds: 1,
    ...overrides,
  };
}

function createLogger() {
  return { log: vi.fn(), error: vi.fn() } satisfies HostLogger;
}

describe("HeadlessHost", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs the configured number of ticks", () => {
    const logger = createLogger();
    const host = new HeadlessHost(runnerConfig(), logger);

    const summary = host.runFast();

    expect(summary.ticks).toBe(120);
    expect(summary.simulatedSeconds).toBeCloseTo(2);
    expect(summary.highestWave).toBeGreaterThanOrEqual(1);
    expect(summary.finalPhase).toBe("PLAYING");
    expect(host.isDone()).toBe(true);
  });

  it("logs phase changes, waves and periodic progress", () => {
    const logger = createLogger();
    new HeadlessHost(runnerConfig(), logger).runFast();

    expect(logger.log).toHaveBeenCalledWith("[Host] Phase ->", "PLAYING");
    expect(logger.log).toHaveBeenCalledWith("[Host] Wave 1 spawned 4 rocks");
    expect(logger.log).toHaveBeenCalledWith(
      "[Host] t=1.0s",
      expect.stringMatching(/^score=\d+$/),
      "lives=3",
      expect.stringMatching(/^wave=\d+$/),
      expect.stringMatching(/^rocks=\d+$/),
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("passes the field size to the simulation", () => {
    const host = new HeadlessHost(runnerConfig({ fieldWidth: 400, fieldHeight: 300 }), createLogger());
    expect(host.simulation.config.FIELD_WIDTH).toBe(400);
    expect(host.simulation.config.FIELD_HEIGHT).toBe(300);
    expect(host.simulation.craft.position).toEqual({ x: 200, y: 150 });
  });

  it("counts finished games and restarts on the next step", () => {
    const logger = createLogger();
    const host = new HeadlessHost(runnerConfig(), logger);
    host.start();
    const sim = host.simulation;
    sim.score = 250;
    sim.lives = 0;

    sim.onCraftHit();
    expect(logger.log).toHaveBeenCalledWith("[Host] Game over: score 250, wave 1");

    host.step();

    const summary = host.summary();
    expect(summary.gamesFinished).toBe(1);
    expect(summary.bestScore).toBe(250);
    expect(summary.finalPhase).toBe("PLAYING");
    expect(summary.ticks).toBe(1);
    expect(sim.lives).toBe(3);
  });

  it("reports rejected actions through the error log", () => {
    const logger = createLogger();
    const host = new HeadlessHost(runnerConfig(), logger);
    host.start();

    host.simulation.restart();

    expect(logger.error).toHaveBeenCalledWith(
      "[Host] Simulation rejected action",
      "INVALID_PHASE",
      "Cannot restart from PLAYING",
    );
  });

  it("paces ticks on a timer in realtime mode", async () => {
    vi.useFakeTimers();
    const host = new HeadlessHost(runnerConfig({ simTickHz: 10, runSeconds: 0.5 }), createLogger());

    const pending = host.runRealtime();
    vi.advanceTimersByTime(500);
    const summary = await pending;

    expect(summary.ticks).toBe(5);
    expect(vi.getTimerCount()).toBe(0);
  });
});
