import type { Vec2 } from "../sim/types.js";
import { add, perpendicular, scale } from "../sim/Vector.js";
import {
  FLAME_HALF_WIDTH,
  FLAME_INNER_BASE_PULL,
  FLAME_INNER_TIP_PULL,
  FLAME_LENGTH,
} from "../sim/constants.js";

export type Triangle = [Vec2, Vec2, Vec2];

export interface FlameGeometry {
  outer: Triangle;
  inner: Triangle;
}

/**
 * Two nested triangles trailing from the tail point, opposite the facing
 * direction. `forward` must be a unit vector.
 */
export function buildThrustFlame(tail: Vec2, forward: Vec2): FlameGeometry {
  const side = perpendicular(forward);
  const tip = add(tail, scale(forward, -FLAME_LENGTH));
  const baseL = add(tail, scale(side, -FLAME_HALF_WIDTH));
  const baseR = add(tail, scale(side, FLAME_HALF_WIDTH));
  const innerPull = scale(forward, FLAME_INNER_BASE_PULL);
  return {
    outer: [tip, baseL, baseR],
    inner: [
      add(tip, scale(forward, FLAME_INNER_TIP_PULL)),
      add(baseL, innerPull),
      add(baseR, innerPull),
    ],
  };
}

// Hidden during the negative half of each blink period.
export function isBlinkVisible(
  invulnerabilityRemaining: number,
  timeSec: number,
  blinkHz: number,
): boolean {
  if (invulnerabilityRemaining <= 0) return true;
  return Math.sin(timeSec * blinkHz * 2 * Math.PI) >= 0;
}
