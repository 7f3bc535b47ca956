import { describe, it, expect } from 'vitest';
import { decode, formatOpcode } from '../../src/cpu/decoder';

describe('Instruction decoder', () => {
  it('splits a word into its overlapping field views', () => {
    expect(decode(0xd7a5)).toEqual({ opcode: 0xd7a5, family: 0xd, x: 0x7, y: 0xa, n: 0x5, nn: 0xa5, nnn: 0x7a5 });
  });

  it('is total over 16-bit input', () => {
    expect(decode(0x0000)).toEqual({ opcode: 0, family: 0, x: 0, y: 0, n: 0, nn: 0, nnn: 0 });
    expect(decode(0xffff).nnn).toBe(0xfff);
    expect(decode(0x1ffff).opcode).toBe(0xffff);
  });

  it('formats opcodes as four upper-case hex digits', () => {
    expect(formatOpcode(0x00e0)).toBe('0x00E0');
    expect(formatOpcode(0xf33)).toBe('0x0F33');
  });
});
