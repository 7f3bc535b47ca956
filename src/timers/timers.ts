// Delay and sound timers: 8-bit counters that stop at zero.
// The cadence (once per display frame, canonically 60 Hz) belongs to the driver.
export class Timers {
  private delay = 0;
  private sound = 0;

  reset(): void {
    this.delay = 0;
    this.sound = 0;
  }

  getDelay(): number { return this.delay; }
  getSound(): number { return this.sound; }

  setDelay(v: number): void { this.delay = v & 0xff; }
  setSound(v: number): void { this.sound = v & 0xff; }

  tickDelay(): void {
    if (this.delay > 0) this.delay--;
  }

  tickSound(): void {
    if (this.sound > 0) this.sound--;
  }
}
