import { describe, it, expect } from 'vitest';
import { Keypad, keyForCode } from '../../src/input/keypad';
import { mkEmu } from '../helpers/machineKit';

describe('Keypad', () => {
  it('tracks key state and reports the lowest held key', () => {
    const k = new Keypad();
    expect(k.firstDown()).toBe(-1);
    k.setKey(0xe, true);
    k.setKey(0x3, true);
    expect(k.isDown(0x3)).toBe(true);
    expect(k.firstDown()).toBe(0x3);
    k.setKey(0x3, false);
    expect(k.firstDown()).toBe(0xe);
    k.releaseAll();
    expect(k.firstDown()).toBe(-1);
  });

  it('rejects indices outside 0..15', () => {
    const k = new Keypad();
    expect(() => k.setKey(16, true)).toThrow(RangeError);
    expect(() => k.setKey(-1, true)).toThrow('Key index -1 outside 0..15');
    expect(() => k.setKey(1.5, true)).toThrow(RangeError);
  });

  it('EX9E uses only the low nibble of VX as the key index', () => {
    // LD V0, 0x12 ; SKP V0
    const emu = mkEmu([0x6012, 0xe09e]);
    emu.setKey(0x2, true);
    emu.step();
    emu.step();
    expect(emu.state().PC).toBe(0x206);
  });

  it('maps the host QWERTY block onto the hex keypad', () => {
    expect(keyForCode('Digit1')).toBe(0x1);
    expect(keyForCode('KeyR')).toBe(0xd);
    expect(keyForCode('KeyX')).toBe(0x0);
    expect(keyForCode('KeyV')).toBe(0xf);
    expect(keyForCode('KeyP')).toBeUndefined();
    expect(keyForCode('toString')).toBeUndefined();
  });
});
