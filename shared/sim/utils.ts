import type { SimConfig } from "./types.js";
import { DEFAULT_SIM_CONFIG } from "./constants.js";

export class SimConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SimConfigError";
  }
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function radToDeg(radians: number): number {
  return (radians * 180) / Math.PI;
}

/** Wraps into [0, 360). */
export function wrapDegrees(angle: number): number {
  return ((angle % 360) + 360) % 360;
}

/** Signed shortest difference, in (-180, 180]. */
export function normalizeDegrees(angle: number): number {
  let out = wrapDegrees(angle);
  if (out > 180) out -= 360;
  return out;
}

export function resolveSimConfig(
  overrides: Partial<SimConfig> = {},
): Readonly<SimConfig> {
  const cfg: SimConfig = {
    ...DEFAULT_SIM_CONFIG,
    ...overrides,
  };

  if (!(cfg.FIELD_WIDTH > 0) || !(cfg.FIELD_HEIGHT > 0)) {
    throw new SimConfigError(
      "Field size must be positive, got " + cfg.FIELD_WIDTH + "x" + cfg.FIELD_HEIGHT,
    );
  }
  if (cfg.ROCK_SPRITES.length === 0) {
    throw new SimConfigError("At least one rock sprite size is required");
  }
  if (cfg.ROCK_SPEED_MIN > cfg.ROCK_SPEED_MAX) {
    throw new SimConfigError("ROCK_SPEED_MIN exceeds ROCK_SPEED_MAX");
  }
  if (cfg.ROCK_FRAGMENT_MIN > cfg.ROCK_FRAGMENT_MAX) {
    throw new SimConfigError("ROCK_FRAGMENT_MIN exceeds ROCK_FRAGMENT_MAX");
  }
  if (cfg.ROCK_SPAWN_SCALE_MIN > cfg.ROCK_SPAWN_SCALE_MAX) {
    throw new SimConfigError("ROCK_SPAWN_SCALE_MIN exceeds ROCK_SPAWN_SCALE_MAX");
  }
  if (!(cfg.ROCK_SPLIT_FACTOR > 0 && cfg.ROCK_SPLIT_FACTOR < 1)) {
    throw new SimConfigError("ROCK_SPLIT_FACTOR must lie strictly between 0 and 1");
  }
  if (cfg.SPAWN_MAX_ATTEMPTS < 1) {
    throw new SimConfigError("SPAWN_MAX_ATTEMPTS must be at least 1");
  }

  return Object.freeze({
    ...cfg,
    CRAFT_SPRITE: Object.freeze({ ...cfg.CRAFT_SPRITE }),
    ROCK_SPRITES: Object.freeze(cfg.ROCK_SPRITES.map((sprite) => Object.freeze({ ...sprite }))),
  });
}
