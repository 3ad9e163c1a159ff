import { describe, it, expect } from 'vitest';
import { cpuWithProgram, steps } from '../helpers/cpuh';

describe('CPU: register arithmetic and VF', () => {
  it('AddRegisters wraps and sets VF on carry', () => {
    const { cpu } = cpuWithProgram([
      0x60FF, // LD V0, $FF
      0x612B, // LD V1, 43
      0x8014, // ADD V0, V1
    ]);
    steps(cpu, 3);
    expect(cpu.getRegister(0)).toBe(42);
    expect(cpu.getRegister(0xF)).toBe(1);
  });

  it('AddRegisters without overflow clears VF', () => {
    const { cpu } = cpuWithProgram([0x6028, 0x6102, 0x6F07, 0x8014]);
    steps(cpu, 4);
    expect(cpu.getRegister(0)).toBe(42);
    expect(cpu.getRegister(0xF)).toBe(0);
  });

  it('SubtractRegisters sets VF=1 when no borrow (equal counts as no borrow)', () => {
    const { cpu } = cpuWithProgram([0x600A, 0x6105, 0x8015, 0x6205, 0x6305, 0x8235]);
    steps(cpu, 3);
    expect(cpu.getRegister(0)).toBe(5);
    expect(cpu.getRegister(0xF)).toBe(1);
    steps(cpu, 3);
    expect(cpu.getRegister(2)).toBe(0);
    expect(cpu.getRegister(0xF)).toBe(1);
  });

  it('SubtractRegisters wraps on borrow with VF=0 (5 - 10 = 251)', () => {
    const { cpu } = cpuWithProgram([0x6005, 0x610A, 0x8015]);
    steps(cpu, 3);
    expect(cpu.getRegister(0)).toBe(251);
    expect(cpu.getRegister(0xF)).toBe(0);
  });

  it('SubtractRegistersReversed computes Vy - Vx', () => {
    const { cpu } = cpuWithProgram([0x6003, 0x610A, 0x8017, 0x620A, 0x6303, 0x8237]);
    steps(cpu, 3);
    expect(cpu.getRegister(0)).toBe(7);
    expect(cpu.getRegister(0xF)).toBe(1);
    steps(cpu, 3);
    expect(cpu.getRegister(2)).toBe(0xF9); // 3 - 10
    expect(cpu.getRegister(0xF)).toBe(0);
  });

  it('ShiftRegisterRight captures the low bit into VF', () => {
    const { cpu } = cpuWithProgram([0x6005, 0x8006, 0x6106, 0x8106]);
    steps(cpu, 2);
    expect(cpu.getRegister(0)).toBe(0b10);
    expect(cpu.getRegister(0xF)).toBe(1);
    steps(cpu, 2);
    expect(cpu.getRegister(1)).toBe(0b11);
    expect(cpu.getRegister(0xF)).toBe(0);
  });

  it('ShiftRegisterRight ignores Vy', () => {
    const { cpu } = cpuWithProgram([0x6008, 0x61FF, 0x8016]);
    steps(cpu, 3);
    expect(cpu.getRegister(0)).toBe(0x04);
    expect(cpu.getRegister(1)).toBe(0xFF);
    expect(cpu.getRegister(0xF)).toBe(0);
  });

  it('ShiftRegisterLeft captures the high bit and drops it from the result', () => {
    const { cpu } = cpuWithProgram([0x6081, 0x800E, 0x6140, 0x810E]);
    steps(cpu, 2);
    expect(cpu.getRegister(0)).toBe(0x02);
    expect(cpu.getRegister(0xF)).toBe(1);
    steps(cpu, 2);
    expect(cpu.getRegister(1)).toBe(0x80);
    expect(cpu.getRegister(0xF)).toBe(0);
  });

  it('AddToRegister wraps without touching VF', () => {
    const { cpu } = cpuWithProgram([0x6FAA, 0x60F0, 0x7020]);
    steps(cpu, 3);
    expect(cpu.getRegister(0)).toBe(0x10);
    expect(cpu.getRegister(0xF)).toBe(0xAA);
  });

  it('copy and bitwise ops leave VF alone', () => {
    const { cpu } = cpuWithProgram([
      0x6F55, // VF = $55
      0x600C, // V0 = 1100b
      0x610A, // V1 = 1010b
      0x8210, // V2 = V1
      0x8011, // V0 |= V1 -> 1110b
      0x6306, 0x8312, // V3 = 0110b & 1010b = 0010b
      0x6406, 0x8413, // V4 = 0110b ^ 1010b = 1100b
    ]);
    steps(cpu, 9);
    expect(cpu.getRegister(2)).toBe(0x0A);
    expect(cpu.getRegister(0)).toBe(0x0E);
    expect(cpu.getRegister(3)).toBe(0x02);
    expect(cpu.getRegister(4)).toBe(0x0C);
    expect(cpu.getRegister(0xF)).toBe(0x55);
  });

  it('the flag write wins when VF is also the destination', () => {
    const { cpu } = cpuWithProgram([0x6FFF, 0x6102, 0x8F14]);
    steps(cpu, 3);
    // 255 + 2 overflows; the result 1 is overwritten by the carry flag 1
    expect(cpu.getRegister(0xF)).toBe(1);
  });

  it('SetRegisterRandom masks the random byte', () => {
    const { cpu } = cpuWithProgram([0xC00F, 0xC1F0], { random: () => 0.5 });
    steps(cpu, 2);
    // floor(0.5 * 256) = 0x80
    expect(cpu.getRegister(0)).toBe(0x00);
    expect(cpu.getRegister(1)).toBe(0x80);
  });
});
