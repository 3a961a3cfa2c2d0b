import type { RockState, SimConfig, SpriteSize, Vec2 } from "./types.js";
import type { RandomSource } from "./RandomSource.js";
import { add, directionFromAngle, scale, wrap } from "./Vector.js";
import { wrapDegrees } from "./utils.js";

export interface RockSpawn {
  position: Vec2;
  velocity: Vec2;
  scale: number;
  spinRate: number;
  variant: number;
  rotation?: number;
}

export function rockSpriteFor(cfg: Readonly<SimConfig>, variant: number): SpriteSize {
  return cfg.ROCK_SPRITES[variant] ?? cfg.ROCK_SPRITES[0];
}

// Half the scaled sprite width, trimmed to the visible silhouette.
export function rockCollisionRadius(
  cfg: Readonly<SimConfig>,
  sprite: SpriteSize,
  rockScale: number,
): number {
  const scaledWidth = Math.max(1, Math.floor(sprite.width * rockScale));
  return 0.5 * scaledWidth * cfg.ROCK_COLLISION_SCALE;
}

export class RockBody {
  position: Vec2;
  velocity: Vec2;
  rotation: number;
  alive = true;
  readonly scale: number;
  readonly spinRate: number;
  readonly variant: number;
  readonly collisionRadius: number;
  private readonly cfg: Readonly<SimConfig>;
  private readonly rng: RandomSource;

  constructor(cfg: Readonly<SimConfig>, rng: RandomSource, spawn: RockSpawn) {
    this.cfg = cfg;
    this.rng = rng;
    this.position = { ...spawn.position };
    this.velocity = { ...spawn.velocity };
    this.scale = spawn.scale;
    this.spinRate = spawn.spinRate;
    this.variant = spawn.variant;
    this.rotation = wrapDegrees(spawn.rotation ?? rng.nextRange(0, 360));
    this.collisionRadius = rockCollisionRadius(cfg, rockSpriteFor(cfg, spawn.variant), spawn.scale);
  }

  update(dt: number): void {
    this.position = wrap(
      add(this.position, scale(this.velocity, dt)),
      this.cfg.FIELD_WIDTH,
      this.cfg.FIELD_HEIGHT,
    );
    this.rotation = wrapDegrees(this.rotation + this.spinRate * dt);
  }

  /** Consumes this rock. Too-small rocks leave no pieces. */
  fragment(): RockBody[] {
    const cfg = this.cfg;
    const childScale = this.scale * cfg.ROCK_SPLIT_FACTOR;
    this.alive = false;
    if (childScale < cfg.ROCK_SCALE_MIN) {
      return [];
    }

    const pieces: RockBody[] = [];
    const count = this.rng.nextInt(cfg.ROCK_FRAGMENT_MIN, cfg.ROCK_FRAGMENT_MAX);
    for (let i = 0; i < count; i++) {
      const angle = this.rng.next() * Math.PI * 2;
      const speed = this.rng.nextRange(cfg.ROCK_SPEED_MIN, cfg.ROCK_SPEED_MAX);
      const spinRate = this.rng.nextRange(-cfg.ROCK_FRAGMENT_SPIN, cfg.ROCK_FRAGMENT_SPIN);
      pieces.push(
        new RockBody(cfg, this.rng, {
          position: this.position,
          velocity: add(this.velocity, scale(directionFromAngle(angle), speed)),
          scale: childScale,
          spinRate,
          variant: this.variant,
        }),
      );
    }
    return pieces;
  }

  getState(): RockState {
    return {
      x: this.position.x,
      y: this.position.y,
      rotation: this.rotation,
      scale: this.scale,
      variant: this.variant,
      collisionRadius: this.collisionRadius,
    };
  }
}
