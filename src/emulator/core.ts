import { MemoryBus } from '../bus/memoryBus';
import { Chip8Cpu, type CpuState, type RandomSource } from '../cpu/chip8Cpu';
import { type Quirks, quirksFromEnv } from '../cpu/quirks';
import { Framebuffer } from '../display/framebuffer';
import { Keypad } from '../input/keypad';
import { Timers } from '../timers/timers';
import type { IEmulator } from './types';

export interface EmulatorOptions {
  quirks?: Partial<Quirks>;
  random?: RandomSource;
  stackLimit?: number;
  // CHIP8_QUIRK_* and CHIP8_DEBUG are read from here; explicit options win
  env?: Record<string, string | undefined>;
}

const processEnv = (): Record<string, string | undefined> =>
  typeof process !== 'undefined' && process?.env ? process.env : {};

// Keys left undefined in the overrides keep the environment's value
function mergeQuirks(base: Partial<Quirks>, overrides: Partial<Quirks> = {}): Partial<Quirks> {
  return {
    shiftCopiesVy: overrides.shiftCopiesVy ?? base.shiftCopiesVy,
    jumpUsesVx: overrides.jumpUsesVx ?? base.jumpUsesVx,
    loadStoreIncrementsI: overrides.loadStoreIncrementsI ?? base.loadStoreIncrementsI,
  };
}

export class Emulator implements IEmulator {
  constructor(
    public readonly memory: MemoryBus,
    public readonly cpu: Chip8Cpu,
    public readonly framebuffer: Framebuffer,
    public readonly keypad: Keypad,
    public readonly timers: Timers
  ) {}

  static create(opts: EmulatorOptions = {}): Emulator {
    const env = opts.env ?? processEnv();
    const memory = new MemoryBus();
    const framebuffer = new Framebuffer();
    const keypad = new Keypad();
    const timers = new Timers();
    const debug = (env.CHIP8_DEBUG ?? '0').toString().toLowerCase();
    const cpu = new Chip8Cpu(memory, framebuffer, keypad, timers, {
      quirks: mergeQuirks(quirksFromEnv(env), opts.quirks),
      random: opts.random,
      stackLimit: opts.stackLimit,
      debug: debug === '1' || debug === 'true',
    });
    return new Emulator(memory, cpu, framebuffer, keypad, timers);
  }

  // Clears the machine back to power-on state, including any loaded program.
  reset(): void {
    this.memory.reset();
    this.cpu.reset();
    this.keypad.releaseAll();
  }

  load(program: ArrayLike<number>): void {
    this.memory.load(program);
  }

  stepInstruction(): void {
    this.cpu.stepInstruction();
  }

  step(): void {
    this.cpu.stepInstruction();
  }

  tickDelay(): void { this.timers.tickDelay(); }
  tickSound(): void { this.timers.tickSound(); }

  display(): Uint8Array {
    return this.framebuffer.snapshot();
  }

  delayTimer(): number { return this.timers.getDelay(); }
  soundTimer(): number { return this.timers.getSound(); }

  setKey(index: number, down: boolean): void {
    this.keypad.setKey(index, down);
  }

  state(): CpuState {
    return this.cpu.getState();
  }
}
