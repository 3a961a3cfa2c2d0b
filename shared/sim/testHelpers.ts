import { vi, type Mock } from "vitest";
import type { AudioMixer, MixerVolumes, SimState, Vec2 } from "./types.js";
import type { RandomSource } from "./RandomSource.js";
import { Projectile } from "./Projectile.js";
import { RockBody } from "./RockBody.js";

/** Replays the given values, then keeps returning `fallback`. */
export class ScriptedRandom implements RandomSource {
  calls = 0;
  private index = 0;

  constructor(
    private readonly values: number[] = [],
    private readonly fallback = 0.5,
  ) {}

  next(): number {
    this.calls += 1;
    if (this.index < this.values.length) {
      const value = this.values[this.index];
      this.index += 1;
      return value;
    }
    return this.fallback;
  }

  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  nextRange(min: number, max: number): number {
    return min + this.next() * (max - min);
  }
}

export interface AudioStub extends AudioMixer {
  playShootSound: Mock<() => void>;
  playExplosionSound: Mock<() => void>;
  playDeathSound: Mock<() => void>;
  applyVolumes: Mock<(volumes: MixerVolumes) => void>;
}

export function createAudioStub(): AudioStub {
  return {
    playShootSound: vi.fn<() => void>(),
    playExplosionSound: vi.fn<() => void>(),
    playDeathSound: vi.fn<() => void>(),
    applyVolumes: vi.fn<(volumes: MixerVolumes) => void>(),
  };
}

export function placeRock(sim: SimState, position: Vec2, rockScale = 1, velocity: Vec2 = { x: 0, y: 0 }): RockBody {
  const rock = new RockBody(sim.config, sim.random, {
    position,
    velocity,
    scale: rockScale,
    spinRate: 0,
    variant: 0,
    rotation: 0,
  });
  sim.rocks.push(rock);
  return rock;
}

export function placeProjectile(sim: SimState, position: Vec2, velocity: Vec2 = { x: 0, y: 0 }): Projectile {
  const proj = new Projectile(sim.config, position, velocity);
  sim.projectiles.push(proj);
  return proj;
}
