#!/usr/bin/env tsx
/*
Run a CHIP-8 program headlessly for a number of frames and dump the screen.

Usage:
  tsx scripts/run_headless.ts --rom=path/to/game.ch8 [--frames=60] [--ips=700] [--fps=60]
      [--quirks=shift,jump,loadstore] [--out=screen.png] [--scale=8] [--ascii=1]
      [--onCpuError=throw|record|ignore] [--traceCpu=N]
  tsx scripts/run_headless.ts --hex="00E0 A000 D015 1206" --ascii=1

Environment fallbacks: CHIP8_ROM, CHIP8_FRAMES, CHIP8_IPS, CHIP8_QUIRK_*.
*/
import fs from 'fs';
import { PNG } from 'pngjs';
import { Emulator } from '../src/emulator/core';
import { Scheduler, type CpuErrorMode } from '../src/emulator/scheduler';
import { parseQuirkList } from '../src/cpu/quirks';
import { DISPLAY_HEIGHT, DISPLAY_WIDTH } from '../src/display/framebuffer';
import { renderDisplayRGBA, renderDisplayText } from '../src/display/renderer';
import { parseHexProgram, readProgramFile } from '../src/rom/loader';

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const a of argv.slice(2)) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
  }
  return out;
}

function intArg(raw: string | undefined, fallback: number, min: number): number {
  const n = Number(raw);
  return raw !== undefined && Number.isFinite(n) ? Math.max(min, Math.floor(n)) : fallback;
}

function errorMode(raw: string | undefined): CpuErrorMode {
  if (raw === undefined || raw === 'throw' || raw === 'record' || raw === 'ignore') return raw ?? 'throw';
  throw new TypeError(`--onCpuError must be throw, record or ignore (got "${raw}")`);
}

async function writePng(path: string, rgba: Uint8Array, width: number, height: number): Promise<void> {
  const png = new PNG({ width, height });
  Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength).copy(png.data);
  await new Promise<void>((resolve, reject) => {
    const s = fs.createWriteStream(path);
    png.pack().pipe(s);
    s.on('finish', () => resolve());
    s.on('error', (e) => reject(e));
  });
}

async function main() {
  const args = parseArgs(process.argv);
  const romPath = args.rom || process.env.CHIP8_ROM;
  const hex = args.hex;
  if (!romPath && !hex) {
    console.error('Usage: tsx scripts/run_headless.ts --rom=path/to/game.ch8 | --hex="6005 1202" [--frames=60] [--ips=700] [--quirks=shift,jump,loadstore] [--out=screen.png] [--scale=8] [--ascii=1] [--onCpuError=throw|record|ignore]');
    process.exit(1);
  }

  const frames = intArg(args.frames ?? process.env.CHIP8_FRAMES, 60, 1);
  const ips = intArg(args.ips ?? process.env.CHIP8_IPS, 700, 1);
  const fps = intArg(args.fps, 60, 1);
  const scale = intArg(args.scale, 8, 1);
  const traceCpu = intArg(args.traceCpu, 0, 0);
  const ascii = (args.ascii ?? '0') !== '0';
  const onCpuError = errorMode(args.onCpuError);
  const quirks = args.quirks !== undefined ? parseQuirkList(args.quirks) : {};

  const program = romPath ? readProgramFile(romPath) : parseHexProgram(hex ?? '');
  console.log(`[run] program: ${romPath ?? 'inline hex'} (${program.length} bytes)  frames: ${frames}  ips: ${ips}  fps: ${fps}  quirks: ${JSON.stringify(quirks)}  onCpuError=${onCpuError}`);

  const emu = Emulator.create({ quirks });
  emu.load(program);
  const sched = new Scheduler(emu, { ips, fps, onCpuError, traceEveryInstr: traceCpu });

  let soundFrames = 0;
  for (let i = 0; i < frames && !sched.halted; i++) {
    sched.stepFrame();
    if (emu.soundTimer() > 0) soundFrames++;
    if (i % 60 === 59) console.log(`[run] stepped ${i + 1} frames`);
  }
  if (sched.lastCpuError !== undefined) {
    console.error('[run] CPU error during stepping:', sched.lastCpuError);
  }

  const s = emu.state();
  console.log(`[run] done: frames=${sched.frames} instructions=${sched.instructionsExecuted} PC=0x${s.PC.toString(16).padStart(4, '0')} soundFrames=${soundFrames}`);

  if (ascii) console.log(renderDisplayText(emu.framebuffer));

  if (args.out) {
    const rgba = renderDisplayRGBA(emu.framebuffer, { scale });
    await writePng(args.out, rgba, DISPLAY_WIDTH * scale, DISPLAY_HEIGHT * scale);
    console.log(`Wrote ${args.out} (${DISPLAY_WIDTH * scale}x${DISPLAY_HEIGHT * scale})`);
  }
}

main().catch((e) => {
  console.error('[run] Unhandled error:', e);
  process.exit(1);
});
