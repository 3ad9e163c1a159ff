import type { Byte, Nibbles, Word } from './types';
import { IncompleteInstructionError, UnsupportedOpcodeError } from './errors';

// x/y are register indices (0..15), nn an 8-bit immediate, nnn a 12-bit address, n a sprite height
export type Opcode =
  | { readonly kind: 'CallMachineCodeRoutine'; readonly nnn: Word } // 0NNN
  | { readonly kind: 'ClearScreen' } // 00E0
  | { readonly kind: 'Return' } // 00EE
  | { readonly kind: 'Goto'; readonly nnn: Word } // 1NNN
  | { readonly kind: 'CallSubroutine'; readonly nnn: Word } // 2NNN
  | { readonly kind: 'SkipInstructionIfEqual'; readonly x: number; readonly nn: Byte } // 3XNN
  | { readonly kind: 'SkipInstructionIfNotEqual'; readonly x: number; readonly nn: Byte } // 4XNN
  | { readonly kind: 'SkipInstructionIfRegistersEqual'; readonly x: number; readonly y: number } // 5XY0
  | { readonly kind: 'SetRegister'; readonly x: number; readonly nn: Byte } // 6XNN
  | { readonly kind: 'AddToRegister'; readonly x: number; readonly nn: Byte } // 7XNN
  | { readonly kind: 'CopyRegisters'; readonly x: number; readonly y: number } // 8XY0
  | { readonly kind: 'OrRegisters'; readonly x: number; readonly y: number } // 8XY1
  | { readonly kind: 'AndRegisters'; readonly x: number; readonly y: number } // 8XY2
  | { readonly kind: 'XorRegisters'; readonly x: number; readonly y: number } // 8XY3
  | { readonly kind: 'AddRegisters'; readonly x: number; readonly y: number } // 8XY4
  | { readonly kind: 'SubtractRegisters'; readonly x: number; readonly y: number } // 8XY5
  | { readonly kind: 'ShiftRegisterRight'; readonly x: number; readonly y: number } // 8XY6
  | { readonly kind: 'SubtractRegistersReversed'; readonly x: number; readonly y: number } // 8XY7
  | { readonly kind: 'ShiftRegisterLeft'; readonly x: number; readonly y: number } // 8XYE
  | { readonly kind: 'SkipInstructionIfRegistersNotEqual'; readonly x: number; readonly y: number } // 9XY0
  | { readonly kind: 'SetMemoryAddress'; readonly nnn: Word } // ANNN
  | { readonly kind: 'JumpToMemoryAddress'; readonly nnn: Word } // BNNN
  | { readonly kind: 'SetRegisterRandom'; readonly x: number; readonly nn: Byte } // CXNN
  | { readonly kind: 'DrawSprite'; readonly x: number; readonly y: number; readonly n: number } // DXYN
  | { readonly kind: 'SkipInstructionIfKeyDown'; readonly x: number } // EX9E
  | { readonly kind: 'SkipInstructionIfKeyUp'; readonly x: number } // EXA1
  | { readonly kind: 'StoreDelayTimerToRegister'; readonly x: number } // FX07
  | { readonly kind: 'HaltAndStoreKeypressIntoRegister'; readonly x: number } // FX0A
  | { readonly kind: 'SetDelayTimerToRegister'; readonly x: number } // FX15
  | { readonly kind: 'SetSoundTimerToRegister'; readonly x: number } // FX18
  | { readonly kind: 'AddRegisterToMemoryAddress'; readonly x: number } // FX1E
  | { readonly kind: 'SetMemoryAddressToSpriteFromRegister'; readonly x: number } // FX29
  | { readonly kind: 'SetMemoryAddressToBinaryEncodedDecimalFromRegister'; readonly x: number } // FX33
  | { readonly kind: 'DumpRegistersIntoMemoryUpToRegister'; readonly x: number } // FX55
  | { readonly kind: 'DumpMemoryIntoRegistersUpToRegister'; readonly x: number }; // FX65

export type OpcodeKind = Opcode['kind'];

export function nibbles(byte0: Byte, byte1: Byte): Nibbles {
  return [(byte0 >>> 4) & 0xF, byte0 & 0xF, (byte1 >>> 4) & 0xF, byte1 & 0xF];
}

const addr = (a: number, b: number, c: number): Word => (a << 8) | (b << 4) | c;
const imm = (a: number, b: number): Byte => (a << 4) | b;

type RegisterPair = (x: number, y: number) => Opcode;
type SingleRegister = (x: number) => Opcode;

// 8XY? keyed by the low nibble
const ALU: Record<number, RegisterPair | undefined> = {
  0x0: (x, y) => ({ kind: 'CopyRegisters', x, y }),
  0x1: (x, y) => ({ kind: 'OrRegisters', x, y }),
  0x2: (x, y) => ({ kind: 'AndRegisters', x, y }),
  0x3: (x, y) => ({ kind: 'XorRegisters', x, y }),
  0x4: (x, y) => ({ kind: 'AddRegisters', x, y }),
  0x5: (x, y) => ({ kind: 'SubtractRegisters', x, y }),
  0x6: (x, y) => ({ kind: 'ShiftRegisterRight', x, y }),
  0x7: (x, y) => ({ kind: 'SubtractRegistersReversed', x, y }),
  0xE: (x, y) => ({ kind: 'ShiftRegisterLeft', x, y }),
};

// FX?? keyed by the low byte
const MISC: Record<number, SingleRegister | undefined> = {
  0x07: (x) => ({ kind: 'StoreDelayTimerToRegister', x }),
  0x0A: (x) => ({ kind: 'HaltAndStoreKeypressIntoRegister', x }),
  0x15: (x) => ({ kind: 'SetDelayTimerToRegister', x }),
  0x18: (x) => ({ kind: 'SetSoundTimerToRegister', x }),
  0x1E: (x) => ({ kind: 'AddRegisterToMemoryAddress', x }),
  0x29: (x) => ({ kind: 'SetMemoryAddressToSpriteFromRegister', x }),
  0x33: (x) => ({ kind: 'SetMemoryAddressToBinaryEncodedDecimalFromRegister', x }),
  0x55: (x) => ({ kind: 'DumpRegistersIntoMemoryUpToRegister', x }),
  0x65: (x) => ({ kind: 'DumpMemoryIntoRegistersUpToRegister', x }),
};

export function decode(byte0: Byte, byte1: Byte): Opcode {
  const bits = nibbles(byte0, byte1);
  const [n0, n1, n2, n3] = bits;
  switch (n0) {
    case 0x0:
      // Literal matches win over the 0NNN catch-all
      if (n1 === 0x0 && n2 === 0xE && n3 === 0x0) return { kind: 'ClearScreen' };
      if (n1 === 0x0 && n2 === 0xE && n3 === 0xE) return { kind: 'Return' };
      return { kind: 'CallMachineCodeRoutine', nnn: addr(n1, n2, n3) };
    case 0x1: return { kind: 'Goto', nnn: addr(n1, n2, n3) };
    case 0x2: return { kind: 'CallSubroutine', nnn: addr(n1, n2, n3) };
    case 0x3: return { kind: 'SkipInstructionIfEqual', x: n1, nn: imm(n2, n3) };
    case 0x4: return { kind: 'SkipInstructionIfNotEqual', x: n1, nn: imm(n2, n3) };
    case 0x5:
      if (n3 === 0x0) return { kind: 'SkipInstructionIfRegistersEqual', x: n1, y: n2 };
      break;
    case 0x6: return { kind: 'SetRegister', x: n1, nn: imm(n2, n3) };
    case 0x7: return { kind: 'AddToRegister', x: n1, nn: imm(n2, n3) };
    case 0x8: {
      const build = ALU[n3];
      if (build) return build(n1, n2);
      break;
    }
    case 0x9:
      if (n3 === 0x0) return { kind: 'SkipInstructionIfRegistersNotEqual', x: n1, y: n2 };
      break;
    case 0xA: return { kind: 'SetMemoryAddress', nnn: addr(n1, n2, n3) };
    case 0xB: return { kind: 'JumpToMemoryAddress', nnn: addr(n1, n2, n3) };
    case 0xC: return { kind: 'SetRegisterRandom', x: n1, nn: imm(n2, n3) };
    case 0xD: return { kind: 'DrawSprite', x: n1, y: n2, n: n3 };
    case 0xE:
      if (n2 === 0x9 && n3 === 0xE) return { kind: 'SkipInstructionIfKeyDown', x: n1 };
      if (n2 === 0xA && n3 === 0x1) return { kind: 'SkipInstructionIfKeyUp', x: n1 };
      break;
    case 0xF: {
      const build = MISC[imm(n2, n3)];
      if (build) return build(n1);
      break;
    }
  }
  throw new UnsupportedOpcodeError(bits);
}

const pack = (n0: number, n1: number, n2: number, n3: number): [Byte, Byte] => [
  ((n0 & 0xF) << 4) | (n1 & 0xF),
  ((n2 & 0xF) << 4) | (n3 & 0xF),
];
const packAddr = (n0: number, nnn: Word): [Byte, Byte] => pack(n0, nnn >>> 8, nnn >>> 4, nnn);
const packImm = (n0: number, x: number, nn: Byte): [Byte, Byte] => pack(n0, x, nn >>> 4, nn);

export function encode(op: Opcode): [Byte, Byte] {
  switch (op.kind) {
    case 'CallMachineCodeRoutine': return packAddr(0x0, op.nnn);
    case 'ClearScreen': return [0x00, 0xE0];
    case 'Return': return [0x00, 0xEE];
    case 'Goto': return packAddr(0x1, op.nnn);
    case 'CallSubroutine': return packAddr(0x2, op.nnn);
    case 'SkipInstructionIfEqual': return packImm(0x3, op.x, op.nn);
    case 'SkipInstructionIfNotEqual': return packImm(0x4, op.x, op.nn);
    case 'SkipInstructionIfRegistersEqual': return pack(0x5, op.x, op.y, 0x0);
    case 'SetRegister': return packImm(0x6, op.x, op.nn);
    case 'AddToRegister': return packImm(0x7, op.x, op.nn);
    case 'CopyRegisters': return pack(0x8, op.x, op.y, 0x0);
    case 'OrRegisters': return pack(0x8, op.x, op.y, 0x1);
    case 'AndRegisters': return pack(0x8, op.x, op.y, 0x2);
    case 'XorRegisters': return pack(0x8, op.x, op.y, 0x3);
    case 'AddRegisters': return pack(0x8, op.x, op.y, 0x4);
    case 'SubtractRegisters': return pack(0x8, op.x, op.y, 0x5);
    case 'ShiftRegisterRight': return pack(0x8, op.x, op.y, 0x6);
    case 'SubtractRegistersReversed': return pack(0x8, op.x, op.y, 0x7);
    case 'ShiftRegisterLeft': return pack(0x8, op.x, op.y, 0xE);
    case 'SkipInstructionIfRegistersNotEqual': return pack(0x9, op.x, op.y, 0x0);
    case 'SetMemoryAddress': return packAddr(0xA, op.nnn);
    case 'JumpToMemoryAddress': return packAddr(0xB, op.nnn);
    case 'SetRegisterRandom': return packImm(0xC, op.x, op.nn);
    case 'DrawSprite': return pack(0xD, op.x, op.y, op.n);
    case 'SkipInstructionIfKeyDown': return packImm(0xE, op.x, 0x9E);
    case 'SkipInstructionIfKeyUp': return packImm(0xE, op.x, 0xA1);
    case 'StoreDelayTimerToRegister': return packImm(0xF, op.x, 0x07);
    case 'HaltAndStoreKeypressIntoRegister': return packImm(0xF, op.x, 0x0A);
    case 'SetDelayTimerToRegister': return packImm(0xF, op.x, 0x15);
    case 'SetSoundTimerToRegister': return packImm(0xF, op.x, 0x18);
    case 'AddRegisterToMemoryAddress': return packImm(0xF, op.x, 0x1E);
    case 'SetMemoryAddressToSpriteFromRegister': return packImm(0xF, op.x, 0x29);
    case 'SetMemoryAddressToBinaryEncodedDecimalFromRegister': return packImm(0xF, op.x, 0x33);
    case 'DumpRegistersIntoMemoryUpToRegister': return packImm(0xF, op.x, 0x55);
    case 'DumpMemoryIntoRegistersUpToRegister': return packImm(0xF, op.x, 0x65);
  }
}

// Decode a whole ROM two bytes at a time
export function decodeProgram(bytes: ArrayLike<Byte>): Opcode[] {
  const out: Opcode[] = [];
  for (let i = 0; i < bytes.length; i += 2) {
    if (i + 1 >= bytes.length) throw new IncompleteInstructionError(i);
    out.push(decode(bytes[i] & 0xFF, bytes[i + 1] & 0xFF));
  }
  return out;
}
