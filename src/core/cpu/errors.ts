import type { Nibbles, Word } from './types';

const hex = (v: number, width: number): string => v.toString(16).toUpperCase().padStart(width, '0');

export abstract class Chip8Error extends Error {
  abstract readonly kind: string;
}

// Decode errors

export class UnsupportedOpcodeError extends Chip8Error {
  readonly kind = 'unsupported-opcode' as const;
  constructor(readonly nibbles: Nibbles, message?: string) {
    super(message ?? `Unsupported instruction ${nibbles.map((n) => hex(n, 1)).join('')}`);
    this.name = 'UnsupportedOpcodeError';
  }
}

export class IncompleteInstructionError extends Chip8Error {
  readonly kind = 'incomplete-instruction' as const;
  constructor(readonly offset: number) {
    super(`Malformed ROM: half an instruction at byte offset ${offset}`);
    this.name = 'IncompleteInstructionError';
  }
}

export type DecodeError = UnsupportedOpcodeError | IncompleteInstructionError;

// Load errors

export class RomTooLargeError extends Chip8Error {
  readonly kind = 'rom-too-large' as const;
  constructor(readonly size: number, readonly max: number) {
    super(`ROM is ${size} bytes, at most ${max} fit above $200`);
    this.name = 'RomTooLargeError';
  }
}

export class RomReadError extends Chip8Error {
  readonly kind = 'rom-read' as const;
  constructor(readonly path: string, cause: unknown) {
    super(`Could not read ROM ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'RomReadError';
  }
}

export type LoadError = RomTooLargeError | RomReadError;

// Execution errors

export class StackOverflowError extends Chip8Error {
  readonly kind = 'stack-overflow' as const;
  constructor(readonly pc: Word, readonly depth: number) {
    super(`Stack overflow at pc=$${hex(pc, 3)} (depth ${depth})`);
    this.name = 'StackOverflowError';
  }
}

export class StackUnderflowError extends Chip8Error {
  readonly kind = 'stack-underflow' as const;
  constructor(readonly pc: Word) {
    super(`Return with empty stack at pc=$${hex(pc, 3)}`);
    this.name = 'StackUnderflowError';
  }
}

export class MemoryOutOfBoundsError extends Chip8Error {
  readonly kind = 'memory-out-of-bounds' as const;
  constructor(readonly address: number) {
    super(`Memory access out of bounds at $${hex(address, 4)}`);
    this.name = 'MemoryOutOfBoundsError';
  }
}

export type ExecError = StackOverflowError | StackUnderflowError | MemoryOutOfBoundsError | UnsupportedOpcodeError;
