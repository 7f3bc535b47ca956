export const KEY_COUNT = 16;

// Hex keypad: 16 keys "0".."F". Written by the host input layer, read by EX9E/EXA1/FX0A.
export class Keypad {
  private state = new Array<boolean>(KEY_COUNT).fill(false);

  setKey(index: number, down: boolean): void {
    if (!Number.isInteger(index) || index < 0 || index >= KEY_COUNT) {
      throw new RangeError(`Key index ${index} outside 0..15`);
    }
    this.state[index] = down;
  }

  isDown(index: number): boolean {
    return this.state[index & 0xf];
  }

  // Lowest held key, or -1 when none is down
  firstDown(): number {
    return this.state.indexOf(true);
  }

  releaseAll(): void {
    this.state.fill(false);
  }
}

// Conventional host layout: the left-hand 4x4 block of a QWERTY keyboard.
//   1 2 3 4      1 2 3 C
//   Q W E R  ->  4 5 6 D
//   A S D F      7 8 9 E
//   Z X C V      A 0 B F
export const KEY_LAYOUT: Readonly<Record<string, number>> = {
  Digit1: 0x1, Digit2: 0x2, Digit3: 0x3, Digit4: 0xc,
  KeyQ: 0x4, KeyW: 0x5, KeyE: 0x6, KeyR: 0xd,
  KeyA: 0x7, KeyS: 0x8, KeyD: 0x9, KeyF: 0xe,
  KeyZ: 0xa, KeyX: 0x0, KeyC: 0xb, KeyV: 0xf,
};

export function keyForCode(code: string): number | undefined {
  return Object.prototype.hasOwnProperty.call(KEY_LAYOUT, code) ? KEY_LAYOUT[code] : undefined;
}
