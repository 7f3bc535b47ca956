import { DISPLAY_HEIGHT, DISPLAY_WIDTH, type Framebuffer } from './framebuffer';

export type RGB = readonly [number, number, number];

export interface RenderOptions {
  scale?: number;
  on?: RGB;
  off?: RGB;
}

// Expand the 1-bit display into an RGBA buffer of (64*scale) x (32*scale), alpha 255.
export function renderDisplayRGBA(fb: Framebuffer, opts: RenderOptions = {}): Uint8Array {
  const scale = Math.max(1, (opts.scale ?? 1) | 0);
  const on = opts.on ?? [0xff, 0xff, 0xff];
  const off = opts.off ?? [0x00, 0x00, 0x00];
  const width = DISPLAY_WIDTH * scale;
  const height = DISPLAY_HEIGHT * scale;
  const out = new Uint8Array(width * height * 4);
  for (let py = 0; py < height; py++) {
    const y = Math.floor(py / scale);
    for (let px = 0; px < width; px++) {
      const c = fb.getPixel(Math.floor(px / scale), y) ? on : off;
      const o = (py * width + px) * 4;
      out[o] = c[0];
      out[o + 1] = c[1];
      out[o + 2] = c[2];
      out[o + 3] = 0xff;
    }
  }
  return out;
}

// One character per pixel, rows joined by '\n'
export function renderDisplayText(fb: Framebuffer, on = '#', off = ' '): string {
  const lines: string[] = [];
  for (let y = 0; y < DISPLAY_HEIGHT; y++) {
    let line = '';
    for (let x = 0; x < DISPLAY_WIDTH; x++) line += fb.getPixel(x, y) ? on : off;
    lines.push(line);
  }
  return lines.join('\n');
}
