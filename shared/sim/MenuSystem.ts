import type { MenuAction, MenuItem, SimState } from "./types.js";
import { MENU_ITEMS, VOLUME_STEP } from "./constants.js";
import { clamp } from "./utils.js";

export function selectedMenuItem(sim: SimState): MenuItem {
  return MENU_ITEMS[sim.menuIndex] ?? MENU_ITEMS[0];
}

export function handleMenuAction(sim: SimState, action: MenuAction): void {
  if (sim.phase === "GAME_OVER") {
    if (action === "CONFIRM") sim.restart();
    return;
  }
  if (sim.phase !== "MENU") return;

  switch (action) {
    case "UP":
      sim.menuIndex = (sim.menuIndex - 1 + MENU_ITEMS.length) % MENU_ITEMS.length;
      break;
    case "DOWN":
      sim.menuIndex = (sim.menuIndex + 1) % MENU_ITEMS.length;
      break;
    case "LEFT":
      adjustSelectedVolume(sim, -VOLUME_STEP);
      break;
    case "RIGHT":
      adjustSelectedVolume(sim, VOLUME_STEP);
      break;
    case "CONFIRM":
      sim.startGame();
      break;
  }
}

function adjustSelectedVolume(sim: SimState, delta: number): void {
  // Rounded to whole steps so repeated presses land exactly on 0 and 1.
  const step = (value: number): number => clamp(Math.round((value + delta) * 100) / 100, 0, 1);
  if (selectedMenuItem(sim) === "MUSIC_VOLUME") {
    sim.volumes.music = step(sim.volumes.music);
  } else {
    sim.volumes.sfx = step(sim.volumes.sfx);
  }
  sim.applyVolumes();
}
