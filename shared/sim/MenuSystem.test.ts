import { describe, it, expect, beforeEach } from "vitest";
import { RockDriftSimulation } from "./RockDriftSimulation.js";
import { handleMenuAction, selectedMenuItem } from "./MenuSystem.js";
import { createAudioStub, type AudioStub } from "./testHelpers.js";

describe("MenuSystem", () => {
  let audio: AudioStub;
  let sim: RockDriftSimulation;

  beforeEach(() => {
    audio = createAudioStub();
    sim = new RockDriftSimulation({ audio });
  });

  it("cycles the selection in both directions", () => {
    expect(selectedMenuItem(sim)).toBe("MUSIC_VOLUME");
    handleMenuAction(sim, "DOWN");
    expect(selectedMenuItem(sim)).toBe("SFX_VOLUME");
    handleMenuAction(sim, "DOWN");
    expect(selectedMenuItem(sim)).toBe("MUSIC_VOLUME");
    handleMenuAction(sim, "UP");
    expect(selectedMenuItem(sim)).toBe("SFX_VOLUME");
  });

  it("steps the music volume and pushes it to the mixer", () => {
    handleMenuAction(sim, "RIGHT");
    expect(sim.volumes.music).toBe(0.65);
    expect(audio.applyVolumes).toHaveBeenLastCalledWith({ music: 0.65, sfx: 0.9 });
  });

  it("clamps the volume at zero", () => {
    for (let i = 0; i < 20; i++) {
      handleMenuAction(sim, "LEFT");
    }
    expect(sim.volumes.music).toBe(0);
    expect(sim.volumes.sfx).toBe(0.9);
  });

  it("clamps the effects volume at one", () => {
    handleMenuAction(sim, "DOWN");
    handleMenuAction(sim, "RIGHT");
    expect(sim.volumes.sfx).toBe(0.95);
    handleMenuAction(sim, "RIGHT");
    handleMenuAction(sim, "RIGHT");
    expect(sim.volumes.sfx).toBe(1);
    expect(sim.volumes.music).toBe(0.6);
  });

  it("starts the game on confirm", () => {
    handleMenuAction(sim, "CONFIRM");
    expect(sim.phase).toBe("PLAYING");
  });

  it("ignores menu input during play", () => {
    sim.startGame();
    handleMenuAction(sim, "RIGHT");
    handleMenuAction(sim, "DOWN");
    expect(sim.volumes.music).toBe(0.6);
    expect(sim.menuIndex).toBe(0);
  });

  it("restarts from game over on confirm only", () => {
    sim.startGame();
    sim.lives = 0;
    sim.onCraftHit();

    handleMenuAction(sim, "UP");
    expect(sim.phase).toBe("GAME_OVER");
    expect(sim.menuIndex).toBe(0);

    handleMenuAction(sim, "CONFIRM");
    expect(sim.phase).toBe("PLAYING");
    expect(sim.lives).toBe(3);
  });
});
