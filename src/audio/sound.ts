import { debugLog } from "../utils/debug";

/** Loop count meaning "repeat until stopped". */
export const LOOP_CONTINUOUSLY = -1;

export const MIN_DECIBELS = -65;
export const MAX_DECIBELS = 0;

export type GainControl = {
  readonly minimumDb: number;
  readonly maximumDb: number;
  setDb(db: number): void;
};

export type MuteControl = {
  isMuted(): boolean;
  setMuted(muted: boolean): void;
};

/** An opened, playable audio clip supplied by the platform. */
export type AudioClip = {
  start(): void;
  stop(): void;
  close(): void;
  setPositionMicros(micros: number): void;
  /** Play and repeat `extraLoops` more times, or forever for {@link LOOP_CONTINUOUSLY}. */
  loop(extraLoops: number): void;
  readonly gain?: GainControl;
  readonly mute?: MuteControl;
};

export type AudioBackend = {
  openClip(filepath: string): Promise<AudioClip>;
};

export function decibelsToLinear(db: number): number {
  return Math.pow(10, db / 20);
}

export function linearToDecibels(linear: number): number {
  return Math.log10(linear) * 20;
}

/**
 * Named sound effect or track bound to a file. Every playback call is a
 * no-op until open() succeeds.
 */
export class Sound {
  private clip: AudioClip | null = null;
  private playing = false;
  private volume = 1;
  private minVolume = 0;
  private maxVolume = 1;

  constructor(
    private readonly backend: AudioBackend,
    private readonly filepath: string,
    private name: string | null = null,
  ) {}

  /** Resolves to false, with a warning, when the clip cannot be opened. */
  async open(): Promise<boolean> {
    if (this.clip !== null) return true;
    try {
      const clip = await this.backend.openClip(this.filepath);
      this.clip = clip;
      this.readGainRange(clip);
      debugLog("audio", `opened ${this.describe()}`);
      return true;
    } catch (error) {
      console.warn(`Failed to open sound ${this.describe()}:`, error);
      return false;
    }
  }

  close(): void {
    const clip = this.clip;
    if (clip === null) return;
    this.clip = null;
    this.playing = false;
    this.minVolume = 0;
    this.maxVolume = 1;
    try {
      clip.stop();
      clip.close();
    } catch (error) {
      console.warn(`Failed to close sound ${this.describe()}:`, error);
    }
  }

  isOpen(): boolean {
    return this.clip !== null;
  }

  /** Play from the beginning. */
  start(): void {
    const clip = this.idleClip();
    if (clip === null) return;
    this.updateGain(clip);
    clip.setPositionMicros(0);
    clip.start();
    this.playing = true;
  }

  /** Play from the current position. */
  resume(): void {
    const clip = this.idleClip();
    if (clip === null) return;
    this.updateGain(clip);
    clip.start();
    this.playing = true;
  }

  reset(): void {
    this.clip?.setPositionMicros(0);
  }

  stop(): void {
    const clip = this.playingClip();
    if (clip === null) return;
    clip.stop();
    clip.setPositionMicros(0);
    this.playing = false;
  }

  pause(): void {
    const clip = this.playingClip();
    if (clip === null) return;
    clip.stop();
    this.playing = false;
  }

  /** Play from the beginning `count` times in total, or forever without a count. */
  loop(count?: number): void {
    const clip = this.idleClip();
    if (clip === null) return;
    this.updateGain(clip);
    clip.setPositionMicros(0);
    clip.loop(count === undefined ? LOOP_CONTINUOUSLY : count - 1);
    this.playing = true;
  }

  resumeLoop(count?: number): void {
    const clip = this.idleClip();
    if (clip === null) return;
    this.updateGain(clip);
    clip.loop(count === undefined ? LOOP_CONTINUOUSLY : count - 1);
    this.playing = true;
  }

  isPlaying(): boolean {
    return this.playing;
  }

  getVolume(): number {
    return this.volume;
  }

  /** Clamped to 0..1, mapped linearly across the clip's usable gain range. */
  setVolume(volume: number): void {
    const clamped = Math.min(1, Math.max(0, volume));
    if (clamped === this.volume) return;
    this.volume = clamped;
    if (this.clip !== null) this.updateGain(this.clip);
  }

  isMuted(): boolean {
    return this.clip?.mute?.isMuted() ?? false;
  }

  mute(): void {
    this.setMuted(true);
  }

  unmute(): void {
    this.setMuted(false);
  }

  setMuted(muted: boolean): void {
    const control = this.clip?.mute;
    if (control === undefined) return;
    if (control.isMuted() === muted) return;
    control.setMuted(muted);
  }

  getFilepath(): string {
    return this.filepath;
  }

  getName(): string | null {
    return this.name;
  }

  setName(name: string | null): void {
    this.name = name;
  }

  private idleClip(): AudioClip | null {
    return this.playing ? null : this.clip;
  }

  private playingClip(): AudioClip | null {
    return this.playing ? this.clip : null;
  }

  private readGainRange(clip: AudioClip): void {
    if (clip.gain === undefined) return;
    this.minVolume = decibelsToLinear(
      Math.max(clip.gain.minimumDb, MIN_DECIBELS),
    );
    this.maxVolume = decibelsToLinear(
      Math.min(clip.gain.maximumDb, MAX_DECIBELS),
    );
  }

  private updateGain(clip: AudioClip): void {
    if (clip.gain === undefined) return;
    const linear =
      this.volume * (this.maxVolume - this.minVolume) + this.minVolume;
    clip.gain.setDb(linearToDecibels(linear));
  }

  private describe(): string {
    return `${this.name ?? "<unnamed>"} (${this.filepath})`;
  }
}
