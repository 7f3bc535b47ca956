import { describe, it, expect } from 'vitest';
import { Timers } from '../../src/timers/timers';

describe('Delay and sound timers', () => {
  it('count down once per tick and stop at zero', () => {
    const t = new Timers();
    t.setDelay(2);
    t.tickDelay();
    expect(t.getDelay()).toBe(1);
    t.tickDelay();
    t.tickDelay();
    expect(t.getDelay()).toBe(0);
  });

  it('tickDelay at zero does not wrap to 255', () => {
    const t = new Timers();
    t.tickDelay();
    t.tickSound();
    expect(t.getDelay()).toBe(0);
    expect(t.getSound()).toBe(0);
  });

  it('ticks the two timers independently', () => {
    const t = new Timers();
    t.setDelay(5);
    t.setSound(3);
    t.tickSound();
    expect(t.getDelay()).toBe(5);
    expect(t.getSound()).toBe(2);
  });

  it('masks written values to 8 bits and resets to zero', () => {
    const t = new Timers();
    t.setSound(0x1ff);
    expect(t.getSound()).toBe(0xff);
    t.reset();
    expect(t.getSound()).toBe(0);
  });
});
