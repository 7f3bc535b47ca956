import type { Word } from '../emulator/types';

// Field views of one fetched instruction word. Lives for a single dispatch.
export interface Instruction {
  readonly opcode: Word;
  readonly family: number; // bits 12-15
  readonly x: number;      // bits 8-11
  readonly y: number;      // bits 4-7
  readonly n: number;      // bits 0-3
  readonly nn: number;     // bits 0-7
  readonly nnn: number;    // bits 0-11
}

export function decode(word: Word): Instruction {
  const w = word & 0xffff;
  return {
    opcode: w,
    family: (w >>> 12) & 0xf,
    x: (w >>> 8) & 0xf,
    y: (w >>> 4) & 0xf,
    n: w & 0xf,
    nn: w & 0xff,
    nnn: w & 0xfff,
  };
}

export function formatOpcode(word: Word): string {
  return `0x${(word & 0xffff).toString(16).toUpperCase().padStart(4, '0')}`;
}
