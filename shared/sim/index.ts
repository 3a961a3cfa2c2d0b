export { RockDriftSimulation, IDLE_INPUT } from "./RockDriftSimulation.js";
export type { SimulationOptions } from "./RockDriftSimulation.js";
export { Craft } from "./Craft.js";
export { Projectile } from "./Projectile.js";
export { RockBody, rockCollisionRadius } from "./RockBody.js";
export type { RockSpawn } from "./RockBody.js";
export { MathRandomSource } from "./RandomSource.js";
export type { RandomSource } from "./RandomSource.js";
export { SoundBank, SilentSound } from "./AudioSystem.js";
export type { SoundCue, MusicTrack, SoundCueName, SoundBankSources } from "./AudioSystem.js";
export { createAutopilotState, updateAutopilot } from "./AutopilotSystem.js";
export type { AutopilotState } from "./AutopilotSystem.js";
export { DEFAULT_SIM_CONFIG } from "./constants.js";
export { resolveSimConfig, SimConfigError } from "./utils.js";
export { wrap, directionFromAngle, perpendicular, circlesOverlap } from "./Vector.js";
export { buildThrustFlame, isBlinkVisible } from "../geometry/EntityShapes.js";
export type { FlameGeometry, Triangle } from "../geometry/EntityShapes.js";
export type {
  AudioMixer,
  AudioTriggers,
  CraftInput,
  CraftState,
  GamePhase,
  Hooks,
  MenuAction,
  MenuItem,
  MixerVolumes,
  ProjectileState,
  RockState,
  SimConfig,
  SnapshotPayload,
  SpriteSize,
  Vec2,
} from "./types.js";
