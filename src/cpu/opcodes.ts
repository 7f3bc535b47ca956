import type { Chip8Cpu } from './chip8Cpu';
import type { Instruction } from './decoder';
import { glyphAddress } from '../bus/memoryBus';
import { InvalidOpcodeError, StackOverflowError, StackUnderflowError } from '../emulator/errors';

export type Handler = (cpu: Chip8Cpu, ins: Instruction) => void;

type Nibble = 0x0 | 0x1 | 0x2 | 0x3 | 0x4 | 0x5 | 0x6 | 0x7 | 0x8 | 0x9 | 0xa | 0xb | 0xc | 0xd | 0xe | 0xf;

// Defined sub-opcodes per family. Anything outside these unions is an invalid instruction.
type SysOp = 0x0e0 | 0x0ee;
type AluOp = 0x0 | 0x1 | 0x2 | 0x3 | 0x4 | 0x5 | 0x6 | 0x7 | 0xe;
type KeyOp = 0x9e | 0xa1;
type MiscOp = 0x07 | 0x0a | 0x15 | 0x18 | 0x1e | 0x29 | 0x33 | 0x55 | 0x65;

type OpTable<K extends number> = { readonly [P in K]: Handler };

function hasOp<K extends number>(table: OpTable<K>, op: number): op is K {
  return Object.prototype.hasOwnProperty.call(table, op);
}

const invalid = (cpu: Chip8Cpu, ins: Instruction): never => {
  throw new InvalidOpcodeError(ins.opcode, cpu.currentPC);
};

const skipIf = (cpu: Chip8Cpu, cond: boolean): void => {
  if (cond) cpu.PC = (cpu.PC + 2) & 0xffff;
};

const SYS_OPS: OpTable<SysOp> = {
  // 00E0 CLS
  0x0e0: (cpu) => cpu.display.clear(),
  // 00EE RET
  0x0ee: (cpu) => {
    const ret = cpu.stack.pop();
    if (ret === undefined) throw new StackUnderflowError(cpu.currentPC);
    cpu.PC = ret;
  },
};

const ALU_OPS: OpTable<AluOp> = {
  0x0: (cpu, { x, y }) => { cpu.V[x] = cpu.V[y]; },
  0x1: (cpu, { x, y }) => { cpu.V[x] |= cpu.V[y]; },
  0x2: (cpu, { x, y }) => { cpu.V[x] &= cpu.V[y]; },
  0x3: (cpu, { x, y }) => { cpu.V[x] ^= cpu.V[y]; },
  // VF is written last so it wins when X is F
  0x4: (cpu, { x, y }) => {
    const sum = cpu.V[x] + cpu.V[y];
    cpu.V[x] = sum & 0xff;
    cpu.V[0xf] = sum > 0xff ? 1 : 0;
  },
  0x5: (cpu, { x, y }) => {
    const vx = cpu.V[x];
    const vy = cpu.V[y];
    cpu.V[x] = (vx - vy) & 0xff;
    cpu.V[0xf] = vx >= vy ? 1 : 0; // 1 = no borrow
  },
  0x6: (cpu, { x, y }) => {
    if (cpu.quirks.shiftCopiesVy) cpu.V[x] = cpu.V[y];
    const out = cpu.V[x] & 0x01;
    cpu.V[x] = cpu.V[x] >>> 1;
    cpu.V[0xf] = out;
  },
  0x7: (cpu, { x, y }) => {
    const vx = cpu.V[x];
    const vy = cpu.V[y];
    cpu.V[x] = (vy - vx) & 0xff;
    cpu.V[0xf] = vy >= vx ? 1 : 0;
  },
  0xe: (cpu, { x, y }) => {
    if (cpu.quirks.shiftCopiesVy) cpu.V[x] = cpu.V[y];
    const out = (cpu.V[x] >>> 7) & 0x01;
    cpu.V[x] = (cpu.V[x] << 1) & 0xff;
    cpu.V[0xf] = out;
  },
};

const KEY_OPS: OpTable<KeyOp> = {
  0x9e: (cpu, { x }) => skipIf(cpu, cpu.keypad.isDown(cpu.V[x] & 0xf)),
  0xa1: (cpu, { x }) => skipIf(cpu, !cpu.keypad.isDown(cpu.V[x] & 0xf)),
};

const MISC_OPS: OpTable<MiscOp> = {
  0x07: (cpu, { x }) => { cpu.V[x] = cpu.timers.getDelay(); },
  // Wait for key: re-run this instruction until one is held
  0x0a: (cpu, { x }) => {
    const key = cpu.keypad.firstDown();
    if (key < 0) {
      cpu.PC = (cpu.PC - 2) & 0xffff;
      return;
    }
    cpu.V[x] = key;
  },
  0x15: (cpu, { x }) => cpu.timers.setDelay(cpu.V[x]),
  0x18: (cpu, { x }) => cpu.timers.setSound(cpu.V[x]),
  // VF is left alone; see DESIGN.md
  0x1e: (cpu, { x }) => { cpu.I = (cpu.I + cpu.V[x]) & 0xfff; },
  0x29: (cpu, { x }) => { cpu.I = glyphAddress(cpu.V[x]); },
  0x33: (cpu, { x }) => {
    const v = cpu.V[x];
    cpu.memory.write8(cpu.I, Math.floor(v / 100) % 10);
    cpu.memory.write8(cpu.I + 1, Math.floor(v / 10) % 10);
    cpu.memory.write8(cpu.I + 2, v % 10);
  },
  0x55: (cpu, { x }) => {
    for (let r = 0; r <= x; r++) cpu.memory.write8(cpu.I + r, cpu.V[r]);
    if (cpu.quirks.loadStoreIncrementsI) cpu.I = (cpu.I + x + 1) & 0xfff;
  },
  0x65: (cpu, { x }) => {
    for (let r = 0; r <= x; r++) cpu.V[r] = cpu.memory.read8(cpu.I + r);
    if (cpu.quirks.loadStoreIncrementsI) cpu.I = (cpu.I + x + 1) & 0xfff;
  },
};

// One entry per top nibble; the mapped type makes a missing family a compile error.
export const FAMILIES: OpTable<Nibble> = {
  0x0: (cpu, ins) => {
    const op = ins.nnn;
    if (!hasOp<SysOp>(SYS_OPS, op)) return invalid(cpu, ins);
    SYS_OPS[op](cpu, ins);
  },
  // 1NNN JP
  0x1: (cpu, { nnn }) => { cpu.PC = nnn; },
  // 2NNN CALL
  0x2: (cpu, { nnn }) => {
    if (cpu.stack.length >= cpu.stackLimit) {
      throw new StackOverflowError(cpu.currentPC, cpu.stack.length);
    }
    cpu.stack.push(cpu.PC);
    cpu.PC = nnn;
  },
  0x3: (cpu, { x, nn }) => skipIf(cpu, cpu.V[x] === nn),
  0x4: (cpu, { x, nn }) => skipIf(cpu, cpu.V[x] !== nn),
  0x5: (cpu, ins) => {
    if (ins.n !== 0) return invalid(cpu, ins);
    skipIf(cpu, cpu.V[ins.x] === cpu.V[ins.y]);
  },
  0x6: (cpu, { x, nn }) => { cpu.V[x] = nn; },
  0x7: (cpu, { x, nn }) => { cpu.V[x] = (cpu.V[x] + nn) & 0xff; },
  0x8: (cpu, ins) => {
    const op = ins.n;
    if (!hasOp<AluOp>(ALU_OPS, op)) return invalid(cpu, ins);
    ALU_OPS[op](cpu, ins);
  },
  0x9: (cpu, ins) => {
    if (ins.n !== 0) return invalid(cpu, ins);
    skipIf(cpu, cpu.V[ins.x] !== cpu.V[ins.y]);
  },
  0xa: (cpu, { nnn }) => { cpu.I = nnn; },
  0xb: (cpu, { x, nnn }) => {
    const base = cpu.quirks.jumpUsesVx ? cpu.V[x] : cpu.V[0];
    cpu.PC = (nnn + base) & 0xfff;
  },
  0xc: (cpu, { x, nn }) => { cpu.V[x] = cpu.random() & 0xff & nn; },
  0xd: (cpu, { x, y, n }) => {
    const rows = new Uint8Array(n);
    for (let r = 0; r < n; r++) rows[r] = cpu.memory.read8(cpu.I + r);
    cpu.V[0xf] = cpu.display.drawSprite(cpu.V[x], cpu.V[y], rows) ? 1 : 0;
  },
  0xe: (cpu, ins) => {
    const op = ins.nn;
    if (!hasOp<KeyOp>(KEY_OPS, op)) return invalid(cpu, ins);
    KEY_OPS[op](cpu, ins);
  },
  0xf: (cpu, ins) => {
    const op = ins.nn;
    if (!hasOp<MiscOp>(MISC_OPS, op)) return invalid(cpu, ins);
    MISC_OPS[op](cpu, ins);
  },
};

export function execute(cpu: Chip8Cpu, ins: Instruction): void {
  const family = ins.family;
  if (!hasOp<Nibble>(FAMILIES, family)) return invalid(cpu, ins);
  FAMILIES[family](cpu, ins);
}
