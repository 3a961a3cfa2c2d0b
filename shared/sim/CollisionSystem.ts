import type { SimState } from "./types.js";
import type { Projectile } from "./Projectile.js";
import type { RockBody } from "./RockBody.js";
import { circlesOverlap } from "./Vector.js";

export function updateProjectiles(sim: SimState, dtSec: number): void {
  for (const proj of sim.projectiles) {
    proj.update(dtSec);
  }
  sim.projectiles = sim.projectiles.filter((proj: Projectile) => proj.alive);
}

export function scoreForRock(sim: SimState, rock: RockBody): number {
  return Math.max(sim.config.MIN_HIT_SCORE, Math.floor(rock.collisionRadius));
}

/**
 * Each rock takes the first live projectile touching it, in collection order.
 * A projectile is spent by its first hit, so it destroys at most one rock per
 * frame. Fragments join the collection after the pass and are not tested
 * until the next frame.
 */
export function processProjectileCollisions(sim: SimState): void {
  const radius = sim.config.BULLET_RADIUS;
  const fragments: RockBody[] = [];

  for (const rock of sim.rocks) {
    if (!rock.alive) continue;

    let hit: Projectile | null = null;
    for (const proj of sim.projectiles) {
      if (!proj.alive) continue;
      if (circlesOverlap(rock.position, rock.collisionRadius, proj.position, radius)) {
        hit = proj;
        break;
      }
    }
    if (!hit) continue;

    const points = scoreForRock(sim, rock);
    sim.score += points;
    hit.alive = false;
    const pieces = rock.fragment();
    fragments.push(...pieces);
    sim.audio.playExplosionSound();
    sim.hooks.onRockDestroyed(points, pieces.length);
  }

  if (fragments.length > 0) {
    sim.rocks.push(...fragments);
  }
}

/** First overlapping rock kills the craft; rocks survive the contact. */
export function processCraftCollisions(sim: SimState): void {
  const craft = sim.craft;
  if (!craft.alive || craft.isInvulnerable()) return;

  for (const rock of sim.rocks) {
    if (!rock.alive) continue;
    if (circlesOverlap(craft.position, craft.collisionRadius, rock.position, rock.collisionRadius)) {
      sim.onCraftHit();
      return;
    }
  }
}
