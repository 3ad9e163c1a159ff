import type { Byte, Word } from "@core/cpu/types";
import { decode, type Opcode } from "@core/cpu/opcodes";
import { UnsupportedOpcodeError } from "@core/cpu/errors";

export type ReadByteFn = (addr: Word) => Byte;

export interface Disasm {
  pc: Word;
  bytes: [Byte, Byte];
  op: Opcode | null; // null when the word is not a CHIP-8 instruction
  text: string;
}

const hex = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, "0");
const reg = (x: number) => `V${hex(x, 1)}`;
const a12 = (v: number) => `$${hex(v, 3)}`;
const b8 = (v: number) => `$${hex(v, 2)}`;

export function formatOpcode(op: Opcode): string {
  switch (op.kind) {
    case "CallMachineCodeRoutine": return `SYS ${a12(op.nnn)}`;
    case "ClearScreen": return "CLS";
    case "Return": return "RET";
    case "Goto": return `JP ${a12(op.nnn)}`;
    case "CallSubroutine": return `CALL ${a12(op.nnn)}`;
    case "SkipInstructionIfEqual": return `SE ${reg(op.x)}, ${b8(op.nn)}`;
    case "SkipInstructionIfNotEqual": return `SNE ${reg(op.x)}, ${b8(op.nn)}`;
    case "SkipInstructionIfRegistersEqual": return `SE ${reg(op.x)}, ${reg(op.y)}`;
    case "SetRegister": return `LD ${reg(op.x)}, ${b8(op.nn)}`;
    case "AddToRegister": return `ADD ${reg(op.x)}, ${b8(op.nn)}`;
    case "CopyRegisters": return `LD ${reg(op.x)}, ${reg(op.y)}`;
    case "OrRegisters": return `OR ${reg(op.x)}, ${reg(op.y)}`;
    case "AndRegisters": return `AND ${reg(op.x)}, ${reg(op.y)}`;
    case "XorRegisters": return `XOR ${reg(op.x)}, ${reg(op.y)}`;
    case "AddRegisters": return `ADD ${reg(op.x)}, ${reg(op.y)}`;
    case "SubtractRegisters": return `SUB ${reg(op.x)}, ${reg(op.y)}`;
    case "ShiftRegisterRight": return `SHR ${reg(op.x)}`;
    case "SubtractRegistersReversed": return `SUBN ${reg(op.x)}, ${reg(op.y)}`;
    case "ShiftRegisterLeft": return `SHL ${reg(op.x)}`;
    case "SkipInstructionIfRegistersNotEqual": return `SNE ${reg(op.x)}, ${reg(op.y)}`;
    case "SetMemoryAddress": return `LD I, ${a12(op.nnn)}`;
    case "JumpToMemoryAddress": return `JP V0, ${a12(op.nnn)}`;
    case "SetRegisterRandom": return `RND ${reg(op.x)}, ${b8(op.nn)}`;
    case "DrawSprite": return `DRW ${reg(op.x)}, ${reg(op.y)}, ${op.n}`;
    case "SkipInstructionIfKeyDown": return `SKP ${reg(op.x)}`;
    case "SkipInstructionIfKeyUp": return `SKNP ${reg(op.x)}`;
    case "StoreDelayTimerToRegister": return `LD ${reg(op.x)}, DT`;
    case "HaltAndStoreKeypressIntoRegister": return `LD ${reg(op.x)}, K`;
    case "SetDelayTimerToRegister": return `LD DT, ${reg(op.x)}`;
    case "SetSoundTimerToRegister": return `LD ST, ${reg(op.x)}`;
    case "AddRegisterToMemoryAddress": return `ADD I, ${reg(op.x)}`;
    case "SetMemoryAddressToSpriteFromRegister": return `LD F, ${reg(op.x)}`;
    case "SetMemoryAddressToBinaryEncodedDecimalFromRegister": return `LD B, ${reg(op.x)}`;
    case "DumpRegistersIntoMemoryUpToRegister": return `LD [I], ${reg(op.x)}`;
    case "DumpMemoryIntoRegistersUpToRegister": return `LD ${reg(op.x)}, [I]`;
  }
}

// Unknown words disassemble as data instead of throwing
function decodeOrNull(hi: Byte, lo: Byte): Opcode | null {
  try {
    return decode(hi, lo);
  } catch (e) {
    if (e instanceof UnsupportedOpcodeError) return null;
    throw e;
  }
}

export function disasmAt(read: ReadByteFn, pc: Word): Disasm {
  const hi = read(pc) & 0xFF;
  const lo = read(pc + 1) & 0xFF;
  const op = decodeOrNull(hi, lo);
  const text = op ? formatOpcode(op) : `DW $${hex((hi << 8) | lo, 4)}`;
  return { pc, bytes: [hi, lo], op, text };
}

// One listing line per word; a trailing odd byte is shown as DB
export function disassemble(bytes: Uint8Array, origin: Word = 0x200): string[] {
  const lines: string[] = [];
  const read = (addr: Word) => bytes[addr - origin] ?? 0;
  for (let off = 0; off < bytes.length; off += 2) {
    const pc = origin + off;
    if (off + 1 >= bytes.length) {
      lines.push(`${hex(pc, 3)}: ${hex(bytes[off], 2)}    DB $${hex(bytes[off], 2)}`);
      break;
    }
    const d = disasmAt(read, pc);
    lines.push(`${hex(pc, 3)}: ${hex(d.bytes[0], 2)}${hex(d.bytes[1], 2)}  ${d.text}`);
  }
  return lines;
}

export interface TraceRegs {
  v: ArrayLike<number>;
  i: number;
  sp: number;
}

// "0200  00E0  CLS             I:000 SP:0 V:00 00 ..."
export function formatTraceLine(d: Disasm, regs: TraceRegs): string {
  const v: string[] = [];
  for (let k = 0; k < 16; k++) v.push(hex(regs.v[k] & 0xFF, 2));
  return `${hex(d.pc, 4)}  ${hex(d.bytes[0], 2)}${hex(d.bytes[1], 2)}  ${d.text.padEnd(16, " ")}I:${hex(regs.i & 0xFFFF, 3)} SP:${regs.sp} V:${v.join(" ")}`;
}
