import fs from 'fs';

export function readProgramFile(path: string): Uint8Array {
  const raw = fs.readFileSync(path);
  return new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength).slice();
}

// "6005 7001, 1200" -> [0x60,0x05,0x70,0x01,0x12,0x00]. Each token is one 16-bit word.
export function parseHexProgram(text: string): Uint8Array {
  const out: number[] = [];
  for (const token of text.split(/[\s,]+/)) {
    if (token.length === 0) continue;
    const cleaned = token.replace(/^0x/i, '');
    if (!/^[0-9a-f]{1,4}$/i.test(cleaned)) {
      throw new SyntaxError(`Invalid instruction word "${token}"`);
    }
    const w = parseInt(cleaned, 16);
    out.push((w >>> 8) & 0xff, w & 0xff);
  }
  return Uint8Array.from(out);
}
