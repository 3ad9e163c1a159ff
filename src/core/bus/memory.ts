import type { Byte, Word } from '@core/cpu/types';
import { MemoryOutOfBoundsError, RomTooLargeError } from '@core/cpu/errors';
import FONT from './font.json';

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const MAX_ROM_SIZE = MEMORY_SIZE - PROGRAM_START;
// Hex digit glyphs 0..F, 5 rows each, 4 pixels wide in the high nibble
export const FONT_BASE = 0x050;
export const GLYPH_BYTES = 5;

export const glyphAddress = (digit: number): Word => FONT_BASE + GLYPH_BYTES * (digit & 0xF);

export class Memory {
  private ram = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.ram.set(FONT, FONT_BASE);
  }

  read(addr: Word): Byte {
    this.check(addr);
    return this.ram[addr];
  }

  write(addr: Word, value: Byte): void {
    this.check(addr);
    this.ram[addr] = value & 0xFF;
  }

  // Validate a whole [addr, addr + length) span before touching any of it
  checkRange(addr: Word, length: number): void {
    if (length <= 0) return;
    this.check(addr);
    this.check(addr + length - 1);
  }

  // Copies the ROM verbatim to $200 over a cleared program area; memory is untouched when it does not fit
  loadProgram(rom: Uint8Array): void {
    if (rom.length > MAX_ROM_SIZE) throw new RomTooLargeError(rom.length, MAX_ROM_SIZE);
    this.ram.fill(0, PROGRAM_START);
    this.ram.set(rom, PROGRAM_START);
  }

  snapshot(): Uint8Array {
    return this.ram.slice();
  }

  private check(addr: Word): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= MEMORY_SIZE) throw new MemoryOutOfBoundsError(addr);
  }
}
