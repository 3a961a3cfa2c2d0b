import type { Projectile } from "./Projectile.js";
import type { RockBody } from "./RockBody.js";
import type { Craft } from "./Craft.js";
import type { RandomSource } from "./RandomSource.js";
import type { FlameGeometry } from "../geometry/EntityShapes.js";

// ============= GAME TYPES =============

export type GamePhase = "MENU" | "PLAYING" | "GAME_OVER";

export type MenuItem = "MUSIC_VOLUME" | "SFX_VOLUME";
export type MenuAction = "UP" | "DOWN" | "LEFT" | "RIGHT" | "CONFIRM";

export type SimErrorCode = "INVALID_PHASE";

export interface Vec2 {
  x: number;
  y: number;
}

export interface SpriteSize {
  width: number;
  height: number;
}

// ============= INPUT =============

export interface CraftInput {
  turnLeft: boolean;
  turnRight: boolean;
  thrust: boolean;
  fire: boolean;
  hyperspace: boolean;
}

// ============= AUDIO =============

export interface AudioTriggers {
  playShootSound(): void;
  playExplosionSound(): void;
  playDeathSound(): void;
}

export interface MixerVolumes {
  music: number;
  sfx: number;
}

export interface AudioMixer extends AudioTriggers {
  applyVolumes(volumes: MixerVolumes): void;
}

// ============= CONFIG =============

export interface SimConfig {
  FIELD_WIDTH: number;
  FIELD_HEIGHT: number;

  BULLET_SPEED: number;
  BULLET_LIFETIME: number;
  BULLET_RADIUS: number;
  MAX_BULLETS: number;
  FIRE_COOLDOWN: number;

  CRAFT_SPRITE: SpriteSize;
  CRAFT_TURN_SPEED_DEG: number;
  CRAFT_THRUST: number;
  CRAFT_FRICTION: number;
  CRAFT_COLLISION_SCALE: number;
  CRAFT_START_ANGLE_DEG: number;
  CRAFT_NOSE_FACTOR: number;
  CRAFT_TAIL_FACTOR: number;
  MUZZLE_OFFSET: number;
  INVULN_TIME: number;
  HYPERSPACE_INVULN_TIME: number;
  BLINK_HZ: number;
  STARTING_LIVES: number;

  ROCK_SPRITES: ReadonlyArray<SpriteSize>;
  ROCK_SPEED_MIN: number;
  ROCK_SPEED_MAX: number;
  ROCK_FRAGMENT_MIN: number;
  ROCK_FRAGMENT_MAX: number;
  ROCK_SPLIT_FACTOR: number;
  ROCK_SCALE_MIN: number;
  ROCK_SPAWN_SCALE_MIN: number;
  ROCK_SPAWN_SCALE_MAX: number;
  ROCK_COLLISION_SCALE: number;
  ROCK_WAVE_SPIN: number;
  ROCK_FRAGMENT_SPIN: number;

  WAVE_BASE_COUNT: number;
  SPAWN_CLEARANCE: number;
  SPAWN_MAX_ATTEMPTS: number;
  MIN_HIT_SCORE: number;
}

// ============= ENTITY STATES (snapshot-serializable) =============

export interface CraftState {
  x: number;
  y: number;
  vx: number;
  vy: number;
  facingAngle: number;
  thrusting: boolean;
  invulnerabilityRemaining: number;
  visible: boolean;
  alive: boolean;
  flame: FlameGeometry | null;
}

export interface ProjectileState {
  x: number;
  y: number;
  age: number;
}

export interface RockState {
  x: number;
  y: number;
  rotation: number;
  scale: number;
  variant: number;
  collisionRadius: number;
}

export interface MenuState {
  selected: MenuItem;
  volumes: MixerVolumes;
}

export interface SnapshotPayload {
  phase: GamePhase;
  score: number;
  lives: number;
  waveNumber: number;
  craft: CraftState;
  projectiles: ProjectileState[];
  rocks: RockState[];
  menu: MenuState;
  nowSec: number;
}

// ============= HOOKS (simulation → host) =============

export interface Hooks {
  onPhase: (phase: GamePhase) => void;
  onWave: (waveNumber: number, rockCount: number) => void;
  onRockDestroyed: (points: number, fragments: number) => void;
  onCraftDestroyed: (livesLeft: number) => void;
  onSnapshot: (payload: SnapshotPayload) => void;
  onError: (code: SimErrorCode, message: string) => void;
}

// ============= SIM STATE (interface for system access) =============

export interface SimState {
  // Entity collections
  craft: Craft;
  projectiles: Projectile[];
  rocks: RockBody[];

  // Session state
  phase: GamePhase;
  score: number;
  lives: number;
  waveNumber: number;
  nowSec: number;
  menuIndex: number;
  volumes: MixerVolumes;

  readonly config: Readonly<SimConfig>;
  readonly random: RandomSource;
  readonly audio: AudioMixer;
  readonly hooks: Hooks;

  // Helper methods systems may call
  setPhase(phase: GamePhase): void;
  applyVolumes(): void;
  onCraftHit(): void;
  startGame(): void;
  restart(): void;
}
