import type { CraftInput, SimState } from "./types.js";
import type { RockBody } from "./RockBody.js";
import { AUTOPILOT_CONFIG } from "./constants.js";
import { normalizeDegrees, radToDeg } from "./utils.js";
import { lengthSquared } from "./Vector.js";

export interface AutopilotState {
  lastDecisionSec: number;
  cached: CraftInput;
}

function idleInput(): CraftInput {
  return { turnLeft: false, turnRight: false, thrust: false, fire: false, hyperspace: false };
}

export function createAutopilotState(): AutopilotState {
  return { lastDecisionSec: -Infinity, cached: idleInput() };
}

export function updateAutopilot(sim: SimState, pilot: AutopilotState): CraftInput {
  if (sim.phase !== "PLAYING") {
    pilot.cached = idleInput();
    return pilot.cached;
  }
  if (sim.nowSec - pilot.lastDecisionSec < AUTOPILOT_CONFIG.REACTION_DELAY_SEC) {
    return pilot.cached;
  }
  pilot.lastDecisionSec = sim.nowSec;

  const craft = sim.craft;
  const target = findNearestRock(sim);
  if (!target) {
    pilot.cached = idleInput();
    return pilot.cached;
  }

  const dx = target.position.x - craft.position.x;
  const dy = target.position.y - craft.position.y;
  const distance = Math.sqrt(dx * dx + dy * dy);

  const leadX = dx + target.velocity.x * AUTOPILOT_CONFIG.LEAD_FACTOR;
  const leadY = dy + target.velocity.y * AUTOPILOT_CONFIG.LEAD_FACTOR;
  let desired = radToDeg(Math.atan2(leadY, leadX));
  desired += (sim.random.next() - 0.5) * AUTOPILOT_CONFIG.AIM_ERROR_DEG * 2;
  const diff = normalizeDegrees(desired - craft.facingAngle);
  const aimed = Math.abs(diff) < AUTOPILOT_CONFIG.AIM_TOLERANCE_DEG;

  const gap = distance - target.collisionRadius - craft.collisionRadius;
  const cruising =
    distance > AUTOPILOT_CONFIG.CRUISE_RADIUS &&
    Math.abs(diff) < 45 &&
    lengthSquared(craft.velocity) < AUTOPILOT_CONFIG.MAX_CRUISE_SPEED ** 2;

  pilot.cached = {
    turnLeft: !aimed && diff < 0,
    turnRight: !aimed && diff > 0,
    thrust: cruising,
    fire: aimed,
    hyperspace: !craft.isInvulnerable() && gap < AUTOPILOT_CONFIG.PANIC_RADIUS,
  };
  return pilot.cached;
}

export function findNearestRock(sim: SimState): RockBody | null {
  const origin = sim.craft.position;
  let best: RockBody | null = null;
  let bestDistSq = Infinity;
  for (const rock of sim.rocks) {
    if (!rock.alive) continue;
    const dx = rock.position.x - origin.x;
    const dy = rock.position.y - origin.y;
    const distSq = dx * dx + dy * dy;
    if (distSq < bestDistSq) {
      bestDistSq = distSq;
      best = rock;
    }
  }
  return best;
}
