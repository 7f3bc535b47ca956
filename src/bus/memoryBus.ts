import type { IMemoryBus, Address, Byte, Word } from '../emulator/types';
import { ProgramTooLargeError } from '../emulator/errors';
import font from './font.json';

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START;
export const FONT_START = 0x000;
export const GLYPH_HEIGHT: number = font.glyphHeight;

// 16 hex-digit glyphs, 5 rows each, packed in digit order
export const FONT_SET: Uint8Array = Uint8Array.from(
  font.glyphs.flatMap((g) => g.split(' ').map((b) => parseInt(b, 16)))
);

export function glyphAddress(digit: number): Address {
  return FONT_START + (digit & 0xf) * GLYPH_HEIGHT;
}

// 4 KiB address space; every access wraps through the 12-bit address mask.
export class MemoryBus implements IMemoryBus {
  private mem = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.reset();
  }

  reset(): void {
    this.mem.fill(0);
    this.mem.set(FONT_SET, FONT_START);
  }

  read8(addr: Address): Byte {
    return this.mem[addr & 0xfff];
  }

  write8(addr: Address, value: Byte): void {
    this.mem[addr & 0xfff] = value & 0xff;
  }

  read16(addr: Address): Word {
    const hi = this.mem[addr & 0xfff];
    const lo = this.mem[(addr + 1) & 0xfff];
    return (hi << 8) | lo;
  }

  // Copies a program image to PROGRAM_START. Oversized images are rejected before any write.
  load(program: ArrayLike<number>): void {
    if (program.length > MAX_PROGRAM_SIZE) {
      throw new ProgramTooLargeError(program.length, MAX_PROGRAM_SIZE);
    }
    for (let i = 0; i < program.length; i++) {
      this.mem[PROGRAM_START + i] = program[i] & 0xff;
    }
  }

  snapshot(): Uint8Array {
    return this.mem.slice();
  }
}
