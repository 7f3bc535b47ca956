export interface BeeperOptions {
  sampleRate?: number;
  frequency?: number;
  volume?: number;
}

// Square-wave tone source for the sound timer. The caller decides when it is audible,
// normally while emu.soundTimer() > 0.
export class SquareWaveBeeper {
  readonly sampleRate: number;
  readonly halfPeriod: number; // samples per half cycle
  readonly volume: number;
  private phase = 0;

  constructor(opts: BeeperOptions = {}) {
    this.sampleRate = Math.max(1, (opts.sampleRate ?? 8100) | 0);
    const frequency = Math.max(1, opts.frequency ?? 440);
    this.volume = opts.volume ?? 0.25;
    const period = Math.max(2, Math.floor(this.sampleRate / frequency));
    this.halfPeriod = Math.floor(period / 2);
  }

  // Writes out.length samples. Silence does not advance the phase.
  fill(out: Float32Array, active: boolean): void {
    if (!active) {
      out.fill(0);
      return;
    }
    for (let i = 0; i < out.length; i++) {
      out[i] = Math.floor(this.phase / this.halfPeriod) % 2 ? this.volume : -this.volume;
      this.phase = (this.phase + 1) % this.sampleRate;
    }
  }

  resetPhase(): void {
    this.phase = 0;
  }
}
