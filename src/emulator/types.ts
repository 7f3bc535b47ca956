export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Address = number; // 0..0xFFF

export interface IMemoryBus {
  read8(addr: Address): Byte;
  write8(addr: Address, value: Byte): void;
  read16(addr: Address): Word; // big-endian
}

export interface IEmulator {
  reset(): void;
  stepInstruction(): void; // execute exactly one instruction
}
