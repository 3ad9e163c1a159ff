import { describe, it, expect } from 'vitest';
import { FONT_BASE, MAX_ROM_SIZE, MEMORY_SIZE, Memory, PROGRAM_START, glyphAddress } from '@core/bus/memory';
import { MemoryOutOfBoundsError, RomTooLargeError } from '@core/cpu/errors';

describe('Memory', () => {
  it('installs the 80-byte hex font at its base', () => {
    const mem = new Memory();
    expect(mem.read(FONT_BASE)).toBe(0xF0);
    // glyph F: F0 80 F0 80 80 ends the font
    expect(mem.read(glyphAddress(0xF) + 4)).toBe(0x80);
    expect(mem.read(FONT_BASE + 80)).toBe(0x00);
    expect(glyphAddress(0x13)).toBe(FONT_BASE + 15);
  });

  it('masks writes to a byte', () => {
    const mem = new Memory();
    mem.write(0x300, 0x1FF);
    expect(mem.read(0x300)).toBe(0xFF);
  });

  it('rejects any address outside 0..4095', () => {
    const mem = new Memory();
    expect(() => mem.read(MEMORY_SIZE)).toThrow(MemoryOutOfBoundsError);
    expect(() => mem.write(-1, 0)).toThrow(MemoryOutOfBoundsError);
    expect(() => mem.read(MEMORY_SIZE - 1)).not.toThrow();
    expect(() => mem.checkRange(0xFF0, 16)).not.toThrow();
    expect(() => mem.checkRange(0xFF0, 17)).toThrow('Memory access out of bounds at $1000');
  });

  it('loads a program at $200 over a cleared program area', () => {
    const mem = new Memory();
    mem.loadProgram(new Uint8Array([1, 2, 3, 4]));
    mem.loadProgram(new Uint8Array([9]));
    expect(mem.read(PROGRAM_START)).toBe(9);
    expect(mem.read(PROGRAM_START + 1)).toBe(0);
    expect(mem.read(FONT_BASE)).toBe(0xF0);
  });

  it('accepts a ROM that exactly fills memory and rejects one byte more', () => {
    const mem = new Memory();
    const full = new Uint8Array(MAX_ROM_SIZE).fill(0xAB);
    mem.loadProgram(full);
    expect(mem.read(MEMORY_SIZE - 1)).toBe(0xAB);

    try {
      mem.loadProgram(new Uint8Array(MAX_ROM_SIZE + 1));
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(RomTooLargeError);
      if (e instanceof RomTooLargeError) {
        expect(e.size).toBe(3585);
        expect(e.max).toBe(3584);
        expect(e.message).toBe('ROM is 3585 bytes, at most 3584 fit above $200');
      }
    }
    expect(mem.read(MEMORY_SIZE - 1)).toBe(0xAB);
  });

  it('snapshot is a copy', () => {
    const mem = new Memory();
    const snap = mem.snapshot();
    snap[0x300] = 7;
    expect(mem.read(0x300)).toBe(0);
    expect(snap.length).toBe(4096);
  });
});
