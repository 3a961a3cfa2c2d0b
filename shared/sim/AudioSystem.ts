// ============= AUDIO =============
// The simulation only talks to AudioMixer. Hosts back it with real
// sounds, or with SilentSound when a resource could not be loaded.

import type { AudioMixer, MixerVolumes } from "./types.js";
import { clamp } from "./utils.js";

export interface SoundCue {
  play(): void;
  setVolume(volume: number): void;
}

export interface MusicTrack {
  setVolume(volume: number): void;
}

export class SilentSound implements SoundCue, MusicTrack {
  play(): void {}

  setVolume(_volume: number): void {}
}

export type SoundCueName = "shoot" | "explode" | "death";

export interface SoundBankSources {
  cues?: Partial<Record<SoundCueName, SoundCue>>;
  music?: MusicTrack;
}

export class SoundBank implements AudioMixer {
  private readonly cues: Record<SoundCueName, SoundCue>;
  private readonly music: MusicTrack;

  constructor(sources: SoundBankSources = {}) {
    const cues = sources.cues ?? {};
    this.cues = {
      shoot: cues.shoot ?? new SilentSound(),
      explode: cues.explode ?? new SilentSound(),
      death: cues.death ?? new SilentSound(),
    };
    this.music = sources.music ?? new SilentSound();
  }

  playShootSound(): void {
    this.safePlay("shoot");
  }

  playExplosionSound(): void {
    this.safePlay("explode");
  }

  playDeathSound(): void {
    this.safePlay("death");
  }

  applyVolumes(volumes: MixerVolumes): void {
    this.safeSetVolume("music", this.music, clamp(volumes.music, 0, 1));
    const sfx = clamp(volumes.sfx, 0, 1);
    for (const [name, cue] of Object.entries(this.cues)) {
      this.safeSetVolume(name, cue, sfx);
    }
  }

  // A failing backend must not reach the simulation step.
  private safePlay(name: SoundCueName): void {
    try {
      this.cues[name].play();
    } catch (e) {
      console.log("[SoundBank] Could not play " + name + ":", e);
    }
  }

  private safeSetVolume(name: string, target: MusicTrack, volume: number): void {
    try {
      target.setVolume(volume);
    } catch (e) {
      console.log("[SoundBank] Could not set volume for " + name + ":", e);
    }
  }
}
