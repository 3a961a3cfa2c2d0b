import type { SimState, Vec2 } from "./types.js";
import { RockBody, rockCollisionRadius, rockSpriteFor } from "./RockBody.js";
import { circlesOverlap, directionFromAngle, scale } from "./Vector.js";

export function updateRocks(sim: SimState, dtSec: number): void {
  for (const rock of sim.rocks) {
    if (!rock.alive) continue;
    rock.update(dtSec);
  }
}

export function waveRockCount(sim: SimState, waveNumber: number): number {
  return sim.config.WAVE_BASE_COUNT + waveNumber;
}

export function spawnWave(sim: SimState): void {
  const cfg = sim.config;
  const rng = sim.random;
  sim.waveNumber += 1;
  const count = waveRockCount(sim, sim.waveNumber);

  for (let i = 0; i < count; i++) {
    const variant = rng.nextInt(0, cfg.ROCK_SPRITES.length - 1);
    const rockScale = rng.nextRange(cfg.ROCK_SPAWN_SCALE_MIN, cfg.ROCK_SPAWN_SCALE_MAX);
    const radius = rockCollisionRadius(cfg, rockSpriteFor(cfg, variant), rockScale);
    const position = pickClearPosition(sim, radius);

    const angle = rng.next() * Math.PI * 2;
    const speed = rng.nextRange(cfg.ROCK_SPEED_MIN, cfg.ROCK_SPEED_MAX);
    sim.rocks.push(
      new RockBody(cfg, rng, {
        position,
        velocity: scale(directionFromAngle(angle), speed),
        scale: rockScale,
        spinRate: rng.nextRange(-cfg.ROCK_WAVE_SPIN, cfg.ROCK_WAVE_SPIN),
        variant,
      }),
    );
  }

  sim.hooks.onWave(sim.waveNumber, count);
}

// Rejection sampling around the craft. After the attempt cap the last
// sample is kept as-is.
export function pickClearPosition(sim: SimState, radius: number): Vec2 {
  const cfg = sim.config;
  const craftPos = sim.craft.position;
  let candidate: Vec2 = { x: 0, y: 0 };

  for (let attempt = 0; attempt < cfg.SPAWN_MAX_ATTEMPTS; attempt++) {
    candidate = {
      x: sim.random.nextRange(0, cfg.FIELD_WIDTH),
      y: sim.random.nextRange(0, cfg.FIELD_HEIGHT),
    };
    if (!circlesOverlap(candidate, radius, craftPos, cfg.SPAWN_CLEARANCE)) {
      break;
    }
  }
  return candidate;
}
