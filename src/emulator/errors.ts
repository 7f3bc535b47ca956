import { formatOpcode } from '../cpu/decoder';

const hex4 = (v: number) => `0x${(v & 0xffff).toString(16).toUpperCase().padStart(4, '0')}`;

export class Chip8Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Load rejection: recoverable, memory untouched.
export class ProgramTooLargeError extends Chip8Error {
  constructor(public readonly size: number, public readonly capacity: number) {
    super(`[CHIP8] Program of ${size} bytes exceeds ${capacity} bytes of program memory`);
  }
}

// pc is the address the faulting word was fetched from
export class InvalidOpcodeError extends Chip8Error {
  constructor(public readonly opcode: number, public readonly pc: number) {
    super(`[CHIP8] Invalid opcode ${formatOpcode(opcode)} at PC=${hex4(pc)}`);
  }
}

export class StackOverflowError extends Chip8Error {
  constructor(public readonly pc: number, public readonly depth: number) {
    super(`[CHIP8] Call stack overflow (depth ${depth}) at PC=${hex4(pc)}`);
  }
}

export class StackUnderflowError extends Chip8Error {
  constructor(public readonly pc: number) {
    super(`[CHIP8] Return with empty call stack at PC=${hex4(pc)}`);
  }
}
