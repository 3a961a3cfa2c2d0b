import { RockDriftSimulation } from "../../shared/sim/RockDriftSimulation.js";
import {
  createAutopilotState,
  updateAutopilot,
  type AutopilotState,
} from "../../shared/sim/AutopilotSystem.js";
import type { RandomSource } from "../../shared/sim/RandomSource.js";
import type { GamePhase } from "../../shared/sim/types.js";
import type { RunnerConfig } from "./config.js";

export type HostLogger = Pick<Console, "log" | "error">;

export interface RunSummary {
  ticks: number;
  simulatedSeconds: number;
  gamesFinished: number;
  bestScore: number;
  highestWave: number;
  finalScore: number;
  finalPhase: GamePhase;
}

export class HeadlessHost {
  readonly simulation: RockDriftSimulation;
  private readonly pilot: AutopilotState = createAutopilotState();
  private readonly tickSec: number;
  private readonly totalTicks: number;
  private readonly logEveryTicks: number;
  private ticks = 0;
  private gamesFinished = 0;
  private bestScore = 0;
  private highestWave = 0;

  constructor(
    private readonly cfg: RunnerConfig,
    private readonly logger: HostLogger = console,
    random?: RandomSource,
  ) {
    this.tickSec = 1 / cfg.simTickHz;
    this.totalTicks = Math.ceil(cfg.runSeconds * cfg.simTickHz);
    this.logEveryTicks = Math.max(1, Math.round(cfg.logEverySeconds * cfg.simTickHz));
    this.simulation = new RockDriftSimulation({
      config: { FIELD_WIDTH: cfg.fieldWidth, FIELD_HEIGHT: cfg.fieldHeight },
      random,
      hooks: {
        onPhase: (phase: GamePhase) => {
          this.logger.log("[Host] Phase ->", phase);
          if (phase === "GAME_OVER") {
            this.gamesFinished += 1;
            this.bestScore = Math.max(this.bestScore, this.simulation.score);
            this.logger.log(
              "[Host] Game over: score " + this.simulation.score + ", wave " + this.simulation.waveNumber,
            );
          }
        },
        onWave: (waveNumber: number, rockCount: number) => {
          this.highestWave = Math.max(this.highestWave, waveNumber);
          this.logger.log("[Host] Wave " + waveNumber + " spawned " + rockCount + " rocks");
        },
        onCraftDestroyed: (livesLeft: number) => {
          this.logger.log("[Host] Craft destroyed, lives left:", livesLeft);
        },
        onError: (code: string, message: string) => {
          this.logger.error("[Host] Simulation rejected action", code, message);
        },
      },
    });
  }

  start(): void {
    this.simulation.startGame();
  }

  isDone(): boolean {
    return this.ticks >= this.totalTicks;
  }

  step(): void {
    const sim = this.simulation;
    if (sim.phase === "GAME_OVER") {
      sim.restart();
    }
    sim.update(this.tickSec, updateAutopilot(sim, this.pilot));
    this.ticks += 1;
    this.bestScore = Math.max(this.bestScore, sim.score);

    if (this.ticks % this.logEveryTicks === 0) {
      this.logger.log(
        "[Host] t=" + (this.ticks * this.tickSec).toFixed(1) + "s",
        "score=" + sim.score,
        "lives=" + Math.max(0, sim.lives),
        "wave=" + sim.waveNumber,
        "rocks=" + sim.rocks.length,
      );
    }
  }

  runFast(): RunSummary {
    this.start();
    while (!this.isDone()) {
      this.step();
    }
    return this.summary();
  }

  runRealtime(): Promise<RunSummary> {
    this.start();
    return new Promise((resolve, reject) => {
      const timer = setInterval(() => {
        try {
          this.step();
          if (this.isDone()) {
            clearInterval(timer);
            resolve(this.summary());
          }
        } catch (error) {
          clearInterval(timer);
          reject(error);
        }
      }, this.tickSec * 1000);
    });
  }

  summary(): RunSummary {
    return {
      ticks: this.ticks,
      simulatedSeconds: this.ticks * this.tickSec,
      gamesFinished: this.gamesFinished,
      bestScore: this.bestScore,
      highestWave: this.highestWave,
      finalScore: this.simulation.score,
      finalPhase: this.simulation.phase,
    };
  }
}
