import type { SimState } from "./types.js";
import type { Projectile } from "./Projectile.js";
import type { RockBody } from "./RockBody.js";
import { spawnWave } from "./RockSystem.js";

export function clearSessionEntities(sim: SimState): void {
  sim.projectiles = [];
  sim.rocks = [];
}

/** Shared by the first start and every restart. */
export function beginPlaying(sim: SimState): void {
  clearSessionEntities(sim);
  sim.craft.reset();
  sim.score = 0;
  sim.lives = sim.config.STARTING_LIVES;
  sim.waveNumber = 0;
  sim.setPhase("PLAYING");
  spawnWave(sim);
}

export function killCraft(sim: SimState): void {
  sim.lives -= 1;
  sim.audio.playDeathSound();
  sim.hooks.onCraftDestroyed(Math.max(0, sim.lives));
  if (sim.lives < 0) {
    sim.craft.alive = false;
    sim.setPhase("GAME_OVER");
    return;
  }
  sim.craft.reset();
}

export function cleanupDeadEntities(sim: SimState): void {
  sim.projectiles = sim.projectiles.filter((proj: Projectile) => proj.alive);
  sim.rocks = sim.rocks.filter((rock: RockBody) => rock.alive);
}

export function updateWaveProgress(sim: SimState): void {
  if (sim.phase !== "PLAYING") return;
  if (sim.rocks.length === 0) {
    spawnWave(sim);
  }
}
