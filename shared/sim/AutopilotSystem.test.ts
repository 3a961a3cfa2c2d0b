import { describe, it, expect, beforeEach } from "vitest";
import { RockDriftSimulation } from "./RockDriftSimulation.js";
import { createAutopilotState, findNearestRock, updateAutopilot } from "./AutopilotSystem.js";
import { placeRock, ScriptedRandom } from "./testHelpers.js";

describe("AutopilotSystem", () => {
  let sim: RockDriftSimulation;

  beforeEach(() => {
    // Fallback draw 0.5 means zero aim error
    sim = new RockDriftSimulation({ random: new ScriptedRandom() });
    sim.startGame();
    sim.rocks = [];
  });

  it("idles outside play", () => {
    const menuSim = new RockDriftSimulation();
    const input = updateAutopilot(menuSim, createAutopilotState());
    expect(input).toEqual({
      turnLeft: false,
      turnRight: false,
      thrust: false,
      fire: false,
      hyperspace: false,
    });
  });

  it("fires at a rock straight ahead", () => {
    placeRock(sim, { x: 480, y: 100 });

    const input = updateAutopilot(sim, createAutopilotState());

    expect(input).toEqual({
      turnLeft: false,
      turnRight: false,
      thrust: false,
      fire: true,
      hyperspace: false,
    });
  });

  it("turns toward a rock off to the side", () => {
    placeRock(sim, { x: 700, y: 320 });
    expect(updateAutopilot(sim, createAutopilotState()).turnRight).toBe(true);

    sim.rocks = [];
    placeRock(sim, { x: 260, y: 320 });
    expect(updateAutopilot(sim, createAutopilotState()).turnLeft).toBe(true);
  });

  it("thrusts toward a distant rock it is facing", () => {
    sim.craft.position = { x: 480, y: 600 };
    placeRock(sim, { x: 480, y: 100 });

    const input = updateAutopilot(sim, createAutopilotState());

    expect(input.thrust).toBe(true);
    expect(input.fire).toBe(true);
  });

  it("jumps away from a rock about to hit", () => {
    sim.craft.invulnerabilityRemaining = 0;
    placeRock(sim, { x: 510, y: 320 });

    expect(updateAutopilot(sim, createAutopilotState()).hyperspace).toBe(true);
  });

  it("holds its last decision until the reaction delay passes", () => {
    const pilot = createAutopilotState();
    placeRock(sim, { x: 480, y: 100 });
    const first = updateAutopilot(sim, pilot);

    sim.rocks = [];
    placeRock(sim, { x: 700, y: 320 });
    sim.nowSec += 0.05;
    expect(updateAutopilot(sim, pilot)).toBe(first);

    sim.nowSec += 0.1;
    expect(updateAutopilot(sim, pilot).turnRight).toBe(true);
  });

  it("finds the closest live rock", () => {
    const near = placeRock(sim, { x: 500, y: 320 });
    placeRock(sim, { x: 100, y: 100 });
    placeRock(sim, { x: 480, y: 330 }).alive = false;

    expect(findNearestRock(sim)).toBe(near);
  });
});
