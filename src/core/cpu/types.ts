export type Byte = number; // 0..255
export type Word = number; // 0..65535

// Four 4-bit fields of one instruction, high nibble of the first byte first
export type Nibbles = readonly [number, number, number, number];

export type Status = 'working';
export type ExecMode = 'running' | 'awaiting-keypress';

export interface Chip8State {
  v: Uint8Array; // copy of V0..VF
  i: Word;
  pc: Word;
  sp: number; // occupied stack slots
  stack: Uint16Array; // copy, only [0, sp) is meaningful
  delayTimer: Byte;
  soundTimer: Byte;
  mode: ExecMode;
  steps: number; // instructions executed since reset
}
