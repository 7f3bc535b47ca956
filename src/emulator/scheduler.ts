import type { Emulator } from './core';
import { formatOpcode } from '../cpu/decoder';

export type CpuErrorMode = 'ignore' | 'throw' | 'record';

export interface SchedulerOptions {
  ips?: number; // instructions per second
  fps?: number; // timer ticks per second
  onCpuError?: CpuErrorMode;
  traceEveryInstr?: number; // if >0, log CPU state every N instructions
}

// Deterministic frame driver: no wall-clock pacing, the host decides when to call stepFrame().
// - stepFrame: floor(ips / fps) instructions, then one tick of each timer
export class Scheduler {
  readonly instrPerFrame: number;
  private onCpuError: CpuErrorMode;
  private traceEveryInstr: number;
  public lastCpuError: unknown | undefined;
  public frames = 0;
  private execCount = 0;

  constructor(private emu: Emulator, opts: SchedulerOptions = {}) {
    const ips = Math.max(1, opts.ips ?? 700);
    const fps = Math.max(1, opts.fps ?? 60);
    // ips below fps gives frames with no instructions; timers still tick
    this.instrPerFrame = Math.floor(ips / fps);
    this.onCpuError = opts.onCpuError ?? 'throw';
    this.traceEveryInstr = Math.max(0, opts.traceEveryInstr ?? 0) | 0;
  }

  get instructionsExecuted(): number {
    return this.execCount;
  }

  // 'record' halts on the first error until cleared
  get halted(): boolean {
    return this.onCpuError === 'record' && this.lastCpuError !== undefined;
  }

  clearError(): void {
    this.lastCpuError = undefined;
  }

  stepFrame(): void {
    if (this.halted) return;
    for (let i = 0; i < this.instrPerFrame; i++) {
      try {
        this.emu.step();
        this.execCount++;
        if (this.traceEveryInstr > 0 && (this.execCount % this.traceEveryInstr) === 0) this.trace();
      } catch (e) {
        this.lastCpuError = e;
        if (this.onCpuError === 'throw') throw e;
        // Stop executing this frame; timers still tick below
        break;
      }
    }
    if (this.halted) return;
    this.emu.tickDelay();
    this.emu.tickSound();
    this.frames++;
  }

  runFrames(count: number): void {
    for (let f = 0; f < count && !this.halted; f++) this.stepFrame();
  }

  private trace(): void {
    const s = this.emu.state();
    const regs = s.V.map((v) => v.toString(16).padStart(2, '0')).join(' ');
    console.log(`[TRACE] PC=${formatOpcode(s.PC)} I=${formatOpcode(s.I)} SP=${s.stack.length} DT=${s.delay} ST=${s.sound} V=${regs}`);
  }
}
