import type { AudioTriggers, CraftInput, CraftState, SimConfig, Vec2 } from "./types.js";
import type { RandomSource } from "./RandomSource.js";
import { Projectile } from "./Projectile.js";
import { add, directionFromAngle, scale, wrap } from "./Vector.js";
import { degToRad } from "./utils.js";
import { buildThrustFlame, isBlinkVisible } from "../geometry/EntityShapes.js";

export class Craft {
  position: Vec2;
  velocity: Vec2 = { x: 0, y: 0 };
  facingAngle: number;
  fireCooldown = 0;
  invulnerabilityRemaining = 0;
  alive = true;
  isThrusting = false;
  readonly collisionRadius: number;
  readonly noseDistance: number;
  readonly tailDistance: number;
  private readonly cfg: Readonly<SimConfig>;
  private readonly rng: RandomSource;
  private readonly audio: AudioTriggers;

  constructor(cfg: Readonly<SimConfig>, rng: RandomSource, audio: AudioTriggers) {
    this.cfg = cfg;
    this.rng = rng;
    this.audio = audio;
    this.position = this.center();
    this.facingAngle = cfg.CRAFT_START_ANGLE_DEG;

    const sprite = cfg.CRAFT_SPRITE;
    this.collisionRadius = 0.5 * sprite.width * cfg.CRAFT_COLLISION_SCALE;
    this.noseDistance = (sprite.height / 2) * cfg.CRAFT_NOSE_FACTOR;
    this.tailDistance = (sprite.height / 2) * cfg.CRAFT_TAIL_FACTOR;
  }

  reset(): void {
    this.position = this.center();
    this.velocity = { x: 0, y: 0 };
    this.facingAngle = this.cfg.CRAFT_START_ANGLE_DEG;
    this.fireCooldown = 0;
    this.invulnerabilityRemaining = this.cfg.INVULN_TIME;
    this.alive = true;
    this.isThrusting = false;
  }

  update(dt: number, input: CraftInput): void {
    const cfg = this.cfg;

    if (input.turnLeft) {
      this.facingAngle -= cfg.CRAFT_TURN_SPEED_DEG * dt;
    }
    if (input.turnRight) {
      this.facingAngle += cfg.CRAFT_TURN_SPEED_DEG * dt;
    }

    this.isThrusting = input.thrust;
    if (this.isThrusting) {
      const accel = scale(this.forward(), cfg.CRAFT_THRUST);
      this.velocity = add(this.velocity, scale(accel, dt));
    }

    // Continuous damping so the decay rate does not depend on frame rate.
    this.velocity = scale(this.velocity, 1 - (1 - cfg.CRAFT_FRICTION) * dt);

    this.position = wrap(
      add(this.position, scale(this.velocity, dt)),
      cfg.FIELD_WIDTH,
      cfg.FIELD_HEIGHT,
    );

    this.fireCooldown = Math.max(0, this.fireCooldown - dt);
    this.invulnerabilityRemaining = Math.max(0, this.invulnerabilityRemaining - dt);
  }

  /** Returns false when the shot is held back by cooldown or the bullet cap. */
  fire(projectiles: Projectile[]): boolean {
    const cfg = this.cfg;
    if (this.fireCooldown > 0 || projectiles.length >= cfg.MAX_BULLETS) {
      return false;
    }
    const fwd = this.forward();
    const muzzle = add(this.nosePosition(), scale(fwd, cfg.MUZZLE_OFFSET));
    const velocity = add(scale(fwd, cfg.BULLET_SPEED), this.velocity);
    projectiles.push(new Projectile(cfg, muzzle, velocity));
    this.fireCooldown = cfg.FIRE_COOLDOWN;
    this.audio.playShootSound();
    return true;
  }

  // No landing check: a jump may end inside a rock.
  hyperspace(): void {
    this.position = {
      x: this.rng.nextRange(0, this.cfg.FIELD_WIDTH),
      y: this.rng.nextRange(0, this.cfg.FIELD_HEIGHT),
    };
    this.velocity = { x: 0, y: 0 };
    this.invulnerabilityRemaining = this.cfg.HYPERSPACE_INVULN_TIME;
  }

  isInvulnerable(): boolean {
    return this.invulnerabilityRemaining > 0;
  }

  forward(): Vec2 {
    return directionFromAngle(degToRad(this.facingAngle));
  }

  nosePosition(): Vec2 {
    return add(this.position, scale(this.forward(), this.noseDistance));
  }

  tailPosition(): Vec2 {
    return add(this.position, scale(this.forward(), -this.tailDistance));
  }

  getState(nowSec: number): CraftState {
    return {
      x: this.position.x,
      y: this.position.y,
      vx: this.velocity.x,
      vy: this.velocity.y,
      facingAngle: this.facingAngle,
      thrusting: this.isThrusting,
      invulnerabilityRemaining: this.invulnerabilityRemaining,
      visible: isBlinkVisible(this.invulnerabilityRemaining, nowSec, this.cfg.BLINK_HZ),
      alive: this.alive,
      flame: this.isThrusting ? buildThrustFlame(this.tailPosition(), this.forward()) : null,
    };
  }

  private center(): Vec2 {
    return { x: this.cfg.FIELD_WIDTH / 2, y: this.cfg.FIELD_HEIGHT / 2 };
  }
}
