import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { Quirks } from '../../src/cpu/quirks';
import { mkEmu, steps } from '../helpers/machineKit';

// LD VX, a ; LD VY, b ; 8XY<op>
function alu(op: number, a: number, b: number, quirks: Partial<Quirks> = {}) {
  const emu = mkEmu([0x6000 | (1 << 8) | a, 0x6000 | (2 << 8) | b, 0x8120 | op], { quirks });
  steps(emu, 3);
  return emu.state();
}

describe('8XYN logic and arithmetic', () => {
  it('8XY0..8XY3 copy, or, and, xor', () => {
    expect(alu(0x0, 0x12, 0x34).V[1]).toBe(0x34);
    expect(alu(0x1, 0xf0, 0x0f).V[1]).toBe(0xff);
    expect(alu(0x2, 0xf3, 0x3f).V[1]).toBe(0x33);
    expect(alu(0x3, 0xff, 0x0f).V[1]).toBe(0xf0);
  });

  it('8XY4 sets VF on unsigned overflow', () => {
    const over = alu(0x4, 0xff, 0x01);
    expect(over.V[1]).toBe(0x00);
    expect(over.V[0xf]).toBe(1);
    const plain = alu(0x4, 0x01, 0x01);
    expect(plain.V[1]).toBe(0x02);
    expect(plain.V[0xf]).toBe(0);
  });

  it('8XY5 clears VF on borrow', () => {
    const borrow = alu(0x5, 0x01, 0x02);
    expect(borrow.V[1]).toBe(0xff);
    expect(borrow.V[0xf]).toBe(0);
    const noBorrow = alu(0x5, 0x02, 0x01);
    expect(noBorrow.V[1]).toBe(0x01);
    expect(noBorrow.V[0xf]).toBe(1);
    const equal = alu(0x5, 0x07, 0x07);
    expect(equal.V[1]).toBe(0x00);
    expect(equal.V[0xf]).toBe(1);
  });

  it('8XY7 computes VY - VX', () => {
    const noBorrow = alu(0x7, 0x01, 0x03);
    expect(noBorrow.V[1]).toBe(0x02);
    expect(noBorrow.V[0xf]).toBe(1);
    const borrow = alu(0x7, 0x03, 0x01);
    expect(borrow.V[1]).toBe(0xfe);
    expect(borrow.V[0xf]).toBe(0);
    const equal = alu(0x7, 0x07, 0x07);
    expect(equal.V[1]).toBe(0x00);
    expect(equal.V[0xf]).toBe(1);
  });

  it('8XY6 shifts VX right; with the shift quirk it shifts a copy of VY', () => {
    const plain = alu(0x6, 0x05, 0x40);
    expect(plain.V[1]).toBe(0x02);
    expect(plain.V[0xf]).toBe(1);
    const quirk = alu(0x6, 0x05, 0x40, { shiftCopiesVy: true });
    expect(quirk.V[1]).toBe(0x20);
    expect(quirk.V[0xf]).toBe(0);
  });

  it('8XYE shifts VX left; with the shift quirk it shifts a copy of VY', () => {
    const plain = alu(0xe, 0x81, 0x01);
    expect(plain.V[1]).toBe(0x02);
    expect(plain.V[0xf]).toBe(1);
    const quirk = alu(0xe, 0x81, 0x03, { shiftCopiesVy: true });
    expect(quirk.V[1]).toBe(0x06);
    expect(quirk.V[0xf]).toBe(0);
  });

  it('flag write wins when the destination is VF', () => {
    // LD VF, 0xFF ; LD V1, 0x01 ; ADD VF, V1
    const emu = mkEmu([0x6fff, 0x6101, 0x8f14]);
    steps(emu, 3);
    expect(emu.state().V[0xf]).toBe(1);
  });
});

describe('Property-based: 8XY4 / 8XY5 / 8XY7 against a pure model', () => {
  it('add matches (a + b) & 0xff with carry flag', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 255 }), fc.integer({ min: 0, max: 255 }), (a, b) => {
        const s = alu(0x4, a, b);
        expect(s.V[1]).toBe((a + b) & 0xff);
        expect(s.V[0xf]).toBe(a + b > 0xff ? 1 : 0);
      }),
      { numRuns: 200 }
    );
  });

  it('sub matches (a - b) & 0xff with no-borrow flag', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 255 }), fc.integer({ min: 0, max: 255 }), (a, b) => {
        const s = alu(0x5, a, b);
        expect(s.V[1]).toBe((a - b) & 0xff);
        expect(s.V[0xf]).toBe(a >= b ? 1 : 0);
      }),
      { numRuns: 200 }
    );
  });

  it('reverse sub matches (b - a) & 0xff with no-borrow flag', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 255 }), fc.integer({ min: 0, max: 255 }), (a, b) => {
        const s = alu(0x7, a, b);
        expect(s.V[1]).toBe((b - a) & 0xff);
        expect(s.V[0xf]).toBe(b >= a ? 1 : 0);
      }),
      { numRuns: 200 }
    );
  });
});
