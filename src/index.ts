export { Emulator, type EmulatorOptions } from './emulator/core';
export { Scheduler, type SchedulerOptions, type CpuErrorMode } from './emulator/scheduler';
export {
  Chip8Error,
  ProgramTooLargeError,
  InvalidOpcodeError,
  StackOverflowError,
  StackUnderflowError,
} from './emulator/errors';
export type { Byte, Word, Address, IMemoryBus, IEmulator } from './emulator/types';
export { MemoryBus, MEMORY_SIZE, PROGRAM_START, MAX_PROGRAM_SIZE, FONT_START, FONT_SET, glyphAddress } from './bus/memoryBus';
export { Chip8Cpu, DEFAULT_STACK_LIMIT, type CpuOptions, type CpuState, type RandomSource } from './cpu/chip8Cpu';
export { decode, formatOpcode, type Instruction } from './cpu/decoder';
export { DEFAULT_QUIRKS, resolveQuirks, quirksFromEnv, parseQuirkList, type Quirks, type QuirkName } from './cpu/quirks';
export { Framebuffer, DISPLAY_WIDTH, DISPLAY_HEIGHT } from './display/framebuffer';
export { renderDisplayRGBA, renderDisplayText, type RenderOptions, type RGB } from './display/renderer';
export { Keypad, KEY_COUNT, KEY_LAYOUT, keyForCode } from './input/keypad';
export { Timers } from './timers/timers';
export { SquareWaveBeeper, type BeeperOptions } from './audio/beeper';
export { readProgramFile, parseHexProgram } from './rom/loader';
