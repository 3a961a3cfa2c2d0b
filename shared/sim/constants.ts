import type { MenuItem, MixerVolumes, SimConfig } from "./types.js";

// ============= SPRITES =============

// Placeholder sizes used when the host has no artwork to measure.
export const FALLBACK_CRAFT_SPRITE = { width: 56, height: 56 } as const;
export const FALLBACK_ROCK_SPRITE = { width: 128, height: 128 } as const;

// ============= CRAFT FLAME =============

export const FLAME_LENGTH = 18;
export const FLAME_HALF_WIDTH = 10;
export const FLAME_INNER_TIP_PULL = 6;
export const FLAME_INNER_BASE_PULL = 4;

// ============= MENU / MIXER =============

export const MENU_ITEMS: ReadonlyArray<MenuItem> = ["MUSIC_VOLUME", "SFX_VOLUME"];
export const VOLUME_STEP = 0.05;
export const DEFAULT_VOLUMES: MixerVolumes = {
  music: 0.6,
  sfx: 0.9,
};

// ============= AUTOPILOT =============

export const AUTOPILOT_CONFIG = {
  REACTION_DELAY_SEC: 0.12,
  LEAD_FACTOR: 0.25,
  AIM_TOLERANCE_DEG: 8,
  AIM_ERROR_DEG: 4,
  PANIC_RADIUS: 18,
  CRUISE_RADIUS: 260,
  MAX_CRUISE_SPEED: 120,
} as const;

// ============= DEFAULT CONFIG =============

export const DEFAULT_SIM_CONFIG: SimConfig = {
  FIELD_WIDTH: 960,
  FIELD_HEIGHT: 640,

  BULLET_SPEED: 520,
  BULLET_LIFETIME: 1.2,
  BULLET_RADIUS: 2,
  MAX_BULLETS: 5,
  FIRE_COOLDOWN: 0.18,

  CRAFT_SPRITE: FALLBACK_CRAFT_SPRITE,
  CRAFT_TURN_SPEED_DEG: 220,
  CRAFT_THRUST: 300,
  CRAFT_FRICTION: 0.9,
  CRAFT_COLLISION_SCALE: 0.75,
  CRAFT_START_ANGLE_DEG: -90,
  CRAFT_NOSE_FACTOR: 0.95,
  CRAFT_TAIL_FACTOR: 0.9,
  MUZZLE_OFFSET: 6,
  INVULN_TIME: 2.0,
  HYPERSPACE_INVULN_TIME: 0.8,
  BLINK_HZ: 10,
  STARTING_LIVES: 3,

  ROCK_SPRITES: [FALLBACK_ROCK_SPRITE],
  ROCK_SPEED_MIN: 60,
  ROCK_SPEED_MAX: 160,
  ROCK_FRAGMENT_MIN: 2,
  ROCK_FRAGMENT_MAX: 3,
  ROCK_SPLIT_FACTOR: 0.6,
  ROCK_SCALE_MIN: 0.45,
  ROCK_SPAWN_SCALE_MIN: 0.8,
  ROCK_SPAWN_SCALE_MAX: 1.0,
  ROCK_COLLISION_SCALE: 0.85,
  ROCK_WAVE_SPIN: 60,
  ROCK_FRAGMENT_SPIN: 120,

  WAVE_BASE_COUNT: 3,
  SPAWN_CLEARANCE: 140,
  SPAWN_MAX_ATTEMPTS: 64,
  MIN_HIT_SCORE: 10,
};
