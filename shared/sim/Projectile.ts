import type { ProjectileState, SimConfig, Vec2 } from "./types.js";
import { add, scale, wrap } from "./Vector.js";

export class Projectile {
  position: Vec2;
  velocity: Vec2;
  age = 0;
  alive = true;
  private readonly cfg: Readonly<SimConfig>;

  constructor(cfg: Readonly<SimConfig>, position: Vec2, velocity: Vec2) {
    this.cfg = cfg;
    this.position = { ...position };
    this.velocity = { ...velocity };
  }

  update(dt: number): void {
    this.age += dt;
    if (this.age > this.cfg.BULLET_LIFETIME) {
      this.alive = false;
      return;
    }
    this.position = wrap(
      add(this.position, scale(this.velocity, dt)),
      this.cfg.FIELD_WIDTH,
      this.cfg.FIELD_HEIGHT,
    );
  }

  getState(): ProjectileState {
    return {
      x: this.position.x,
      y: this.position.y,
      age: this.age,
    };
  }
}
