import type {
  AudioMixer,
  CraftInput,
  GamePhase,
  Hooks,
  MenuAction,
  MixerVolumes,
  SimConfig,
  SimState,
  SnapshotPayload,
} from "./types.js";
import type { Projectile } from "./Projectile.js";
import type { RockBody } from "./RockBody.js";
import { Craft } from "./Craft.js";
import { MathRandomSource, type RandomSource } from "./RandomSource.js";
import { SoundBank } from "./AudioSystem.js";
import { DEFAULT_VOLUMES } from "./constants.js";
import { resolveSimConfig } from "./utils.js";

// System imports
import { updateRocks } from "./RockSystem.js";
import {
  updateProjectiles,
  processProjectileCollisions,
  processCraftCollisions,
} from "./CollisionSystem.js";
import {
  beginPlaying,
  killCraft,
  cleanupDeadEntities,
  updateWaveProgress,
} from "./GameFlowSystem.js";
import { handleMenuAction as menuHandleAction, selectedMenuItem } from "./MenuSystem.js";

export const IDLE_INPUT: Readonly<CraftInput> = Object.freeze({
  turnLeft: false,
  turnRight: false,
  thrust: false,
  fire: false,
  hyperspace: false,
});

export interface SimulationOptions {
  config?: Partial<SimConfig>;
  random?: RandomSource;
  audio?: AudioMixer;
  hooks?: Partial<Hooks>;
}

function createHooks(partial: Partial<Hooks> = {}): Hooks {
  return {
    onPhase: partial.onPhase ?? (() => {}),
    onWave: partial.onWave ?? (() => {}),
    onRockDestroyed: partial.onRockDestroyed ?? (() => {}),
    onCraftDestroyed: partial.onCraftDestroyed ?? (() => {}),
    onSnapshot: partial.onSnapshot ?? (() => {}),
    onError: partial.onError ?? (() => {}),
  };
}

export class RockDriftSimulation implements SimState {
  // ---- Entity collections ----
  craft: Craft;
  projectiles: Projectile[] = [];
  rocks: RockBody[] = [];

  // ---- Session state ----
  phase: GamePhase = "MENU";
  score = 0;
  lives: number;
  waveNumber = 0;
  nowSec = 0;
  menuIndex = 0;
  volumes: MixerVolumes = { ...DEFAULT_VOLUMES };

  readonly config: Readonly<SimConfig>;
  readonly random: RandomSource;
  readonly audio: AudioMixer;
  readonly hooks: Hooks;

  constructor(options: SimulationOptions = {}) {
    this.config = resolveSimConfig(options.config);
    this.random = options.random ?? new MathRandomSource();
    this.audio = options.audio ?? new SoundBank();
    this.hooks = createHooks(options.hooks);
    this.lives = this.config.STARTING_LIVES;
    this.craft = new Craft(this.config, this.random, this.audio);
    this.applyVolumes();
  }

  // ============= PUBLIC API (called by host) =============

  startGame(): void {
    if (this.phase !== "MENU") {
      this.hooks.onError("INVALID_PHASE", "Cannot start from " + this.phase);
      return;
    }
    this.enterPlay();
  }

  restart(): void {
    if (this.phase !== "GAME_OVER") {
      this.hooks.onError("INVALID_PHASE", "Cannot restart from " + this.phase);
      return;
    }
    this.enterPlay();
  }

  handleMenuAction(action: MenuAction): void {
    menuHandleAction(this, action);
  }

  // ============= TICK =============

  update(dtSec: number, input: CraftInput = IDLE_INPUT): void {
    this.nowSec += dtSec;

    if (this.phase !== "PLAYING") {
      this.hooks.onSnapshot(this.buildSnapshot());
      return;
    }

    this.craft.update(dtSec, input);
    if (input.fire) {
      this.craft.fire(this.projectiles);
    }
    // Like fire, a held key jumps again every frame.
    if (input.hyperspace) {
      this.craft.hyperspace();
    }

    updateProjectiles(this, dtSec);
    updateRocks(this, dtSec);
    processProjectileCollisions(this);
    cleanupDeadEntities(this);
    processCraftCollisions(this);
    updateWaveProgress(this);

    this.hooks.onSnapshot(this.buildSnapshot());
  }

  // ============= SimState interface methods =============

  setPhase(phase: GamePhase): void {
    if (this.phase === phase) return;
    this.phase = phase;
    this.hooks.onPhase(phase);
  }

  applyVolumes(): void {
    this.audio.applyVolumes(this.volumes);
  }

  onCraftHit(): void {
    killCraft(this);
  }

  // ============= GETTERS =============

  buildSnapshot(): SnapshotPayload {
    return {
      phase: this.phase,
      score: this.score,
      lives: Math.max(0, this.lives),
      waveNumber: this.waveNumber,
      craft: this.craft.getState(this.nowSec),
      projectiles: this.projectiles
        .filter((proj) => proj.alive)
        .map((proj) => proj.getState()),
      rocks: this.rocks
        .filter((rock) => rock.alive)
        .map((rock) => rock.getState()),
      menu: {
        selected: selectedMenuItem(this),
        volumes: { ...this.volumes },
      },
      nowSec: this.nowSec,
    };
  }

  // ============= PRIVATE HELPERS =============

  private enterPlay(): void {
    beginPlaying(this);
  }
}
