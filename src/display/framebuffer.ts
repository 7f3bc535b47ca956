export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;

// 64x32 monochrome bitmap, one byte (0/1) per pixel, row-major.
export class Framebuffer {
  readonly width = DISPLAY_WIDTH;
  readonly height = DISPLAY_HEIGHT;
  private pixels = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);

  clear(): void {
    this.pixels.fill(0);
  }

  getPixel(x: number, y: number): number {
    if (x < 0 || x >= DISPLAY_WIDTH || y < 0 || y >= DISPLAY_HEIGHT) return 0;
    return this.pixels[y * DISPLAY_WIDTH + x];
  }

  // XOR an 8-pixel-wide sprite at (x, y). The origin wraps, the body is clipped at the edges.
  // Returns true if any lit pixel was turned off.
  drawSprite(x: number, y: number, rows: ArrayLike<number>): boolean {
    const ox = x % DISPLAY_WIDTH;
    const oy = y % DISPLAY_HEIGHT;
    let collided = false;
    for (let r = 0; r < rows.length && oy + r < DISPLAY_HEIGHT; r++) {
      const bits = rows[r] & 0xff;
      const rowBase = (oy + r) * DISPLAY_WIDTH;
      for (let c = 0; c < 8 && ox + c < DISPLAY_WIDTH; c++) {
        if ((bits & (0x80 >>> c)) === 0) continue;
        const idx = rowBase + ox + c;
        if (this.pixels[idx]) collided = true;
        this.pixels[idx] ^= 1;
      }
    }
    return collided;
  }

  snapshot(): Uint8Array {
    return this.pixels.slice();
  }
}
