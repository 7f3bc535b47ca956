import { type MemoryBus, PROGRAM_START } from '../bus/memoryBus';
import type { Framebuffer } from '../display/framebuffer';
import type { Keypad } from '../input/keypad';
import type { Timers } from '../timers/timers';
import { decode, formatOpcode } from './decoder';
import { execute } from './opcodes';
import { type Quirks, resolveQuirks } from './quirks';

// Returns a byte in 0..255
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.floor(Math.random() * 256) & 0xff;

export const DEFAULT_STACK_LIMIT = 16;

export interface CpuOptions {
  quirks?: Partial<Quirks>;
  random?: RandomSource;
  stackLimit?: number;
  debug?: boolean; // log every executed opcode
}

export interface CpuState {
  readonly V: readonly number[];
  readonly I: number;
  readonly PC: number;
  readonly stack: readonly number[];
  readonly delay: number;
  readonly sound: number;
}

export class Chip8Cpu {
  // Registers
  public V = new Uint8Array(16);
  public I = 0;
  public PC = PROGRAM_START;
  public stack: number[] = [];
  // Address of the instruction being executed (PC before fetch)
  public currentPC = PROGRAM_START;

  readonly quirks: Quirks;
  readonly random: RandomSource;
  readonly stackLimit: number;
  private readonly debugEnabled: boolean;

  constructor(
    readonly memory: MemoryBus,
    readonly display: Framebuffer,
    readonly keypad: Keypad,
    readonly timers: Timers,
    opts: CpuOptions = {}
  ) {
    this.quirks = resolveQuirks(opts.quirks);
    this.random = opts.random ?? defaultRandom;
    const limit = opts.stackLimit ?? DEFAULT_STACK_LIMIT;
    if (Number.isNaN(limit) || limit < 1) throw new RangeError(`Stack limit ${limit} must be at least 1`);
    // Infinity leaves the stack unbounded
    this.stackLimit = Number.isFinite(limit) ? Math.floor(limit) : limit;
    this.debugEnabled = opts.debug ?? false;
  }

  reset(): void {
    this.V.fill(0);
    this.I = 0;
    this.PC = PROGRAM_START;
    this.currentPC = PROGRAM_START;
    this.stack = [];
    this.timers.reset();
    this.display.clear();
  }

  // Fetch, advance PC by 2, decode, dispatch. Errors from the handler propagate to the caller.
  stepInstruction(): void {
    this.currentPC = this.PC;
    const word = this.memory.read16(this.PC);
    this.PC = (this.PC + 2) & 0xffff;
    if (this.debugEnabled) {
      console.log(`[CHIP8] PC=${formatOpcode(this.currentPC)} OP=${formatOpcode(word)}`);
    }
    execute(this, decode(word));
  }

  getState(): CpuState {
    return {
      V: Array.from(this.V),
      I: this.I,
      PC: this.PC,
      stack: this.stack.slice(),
      delay: this.timers.getDelay(),
      sound: this.timers.getSound(),
    };
  }
}
