import type { Byte, Chip8State, ExecMode, Status, Word } from './types';
import { decode, encode, nibbles, type Opcode } from './opcodes';
import { StackOverflowError, StackUnderflowError, UnsupportedOpcodeError } from './errors';
import { Memory, PROGRAM_START, glyphAddress } from '@core/bus/memory';
import { Framebuffer, type SpriteEdge } from '@core/display/framebuffer';
import { Keypad } from '@core/input/keypad';
import { Timers } from '@core/timers/timers';

export const STACK_DEPTH = 16;
const VF = 0xF;

export interface CpuOptions {
  random?: () => number; // uniform in [0, 1)
  spriteEdge?: SpriteEdge;
}

export type TraceHook = (pc: Word, op: Opcode) => void;

export class Chip8CPU {
  readonly memory = new Memory();
  readonly display = new Framebuffer();
  readonly keypad = new Keypad();
  readonly timers = new Timers();

  private v = new Uint8Array(16);
  private i: Word = 0;
  private pc: Word = PROGRAM_START;
  private stack = new Uint16Array(STACK_DEPTH);
  private sp = 0;
  private steps = 0;

  // FX0A latch: target register and the key state last observed while waiting
  private mode: ExecMode = 'running';
  private waitRegister = 0;
  private waitKeys = new Uint8Array(16);

  private random: () => number;
  private spriteEdge: SpriteEdge;
  private traceHook: TraceHook | null = null;

  constructor(opts: CpuOptions = {}) {
    this.random = opts.random ?? Math.random;
    this.spriteEdge = opts.spriteEdge ?? 'clip';
  }

  // Per-instruction callback, invoked after decode and before execute
  setTraceHook(fn: TraceHook | null): void { this.traceHook = fn; }

  get state(): Chip8State {
    return {
      v: this.v.slice(),
      i: this.i,
      pc: this.pc,
      sp: this.sp,
      stack: this.stack.slice(),
      delayTimer: this.timers.delay,
      soundTimer: this.timers.sound,
      mode: this.mode,
      steps: this.steps,
    };
  }

  get awaitingKeypress(): boolean { return this.mode === 'awaiting-keypress'; }

  getRegister(x: number): Byte { return this.v[x & 0xF]; }
  setRegister(x: number, value: Byte): void { this.v[x & 0xF] = value & 0xFF; }
  setIndex(value: Word): void { this.i = value & 0xFFFF; }
  setProgramCounter(value: Word): void { this.pc = value & 0xFFFF; }

  load(rom: Uint8Array): void {
    this.memory.loadProgram(rom);
    this.pc = PROGRAM_START;
  }

  // Clears machine state; loaded program and font stay in memory
  reset(): void {
    this.v.fill(0);
    this.i = 0;
    this.pc = PROGRAM_START;
    this.stack.fill(0);
    this.sp = 0;
    this.steps = 0;
    this.mode = 'running';
    this.waitRegister = 0;
    this.waitKeys.fill(0);
    this.timers.reset();
    this.display.clear();
  }

  // Elapsed wall-clock time for the 60 Hz timers; update() never touches them
  tick(elapsedMs: number): void {
    this.timers.advance(elapsedMs);
  }

  update(): Status {
    if (this.mode === 'awaiting-keypress') {
      const key = this.keypad.firstNewlyPressed(this.waitKeys);
      if (key === null) {
        this.waitKeys = this.keypad.snapshot();
      } else {
        this.v[this.waitRegister] = key;
        this.mode = 'running';
      }
      return 'working';
    }

    const pc = this.pc;
    const hi = this.memory.read(pc);
    const lo = this.memory.read(pc + 1);
    const op = decode(hi, lo);
    this.pc = (pc + 2) & 0xFFFF;
    if (this.traceHook) this.traceHook(pc, op);
    this.execute(op, pc);
    this.steps++;
    return 'working';
  }

  private skipIf(cond: boolean): void {
    if (cond) this.pc = (this.pc + 2) & 0xFFFF;
  }

  private execute(op: Opcode, at: Word): void {
    const v = this.v;
    switch (op.kind) {
      case 'CallMachineCodeRoutine': {
        const [b0, b1] = encode(op);
        throw new UnsupportedOpcodeError(nibbles(b0, b1), `Machine code routine $${op.nnn.toString(16).toUpperCase().padStart(3, '0')} is not supported`);
      }
      case 'ClearScreen':
        this.display.clear();
        return;
      case 'Return':
        if (this.sp === 0) throw new StackUnderflowError(at);
        this.sp--;
        this.pc = this.stack[this.sp];
        return;
      case 'Goto':
        this.pc = op.nnn;
        return;
      case 'CallSubroutine':
        if (this.sp >= STACK_DEPTH) throw new StackOverflowError(at, this.sp);
        this.stack[this.sp++] = this.pc;
        this.pc = op.nnn;
        return;
      case 'SkipInstructionIfEqual':
        this.skipIf(v[op.x] === op.nn);
        return;
      case 'SkipInstructionIfNotEqual':
        this.skipIf(v[op.x] !== op.nn);
        return;
      case 'SkipInstructionIfRegistersEqual':
        this.skipIf(v[op.x] === v[op.y]);
        return;
      case 'SkipInstructionIfRegistersNotEqual':
        this.skipIf(v[op.x] !== v[op.y]);
        return;
      case 'SetRegister':
        v[op.x] = op.nn;
        return;
      case 'AddToRegister':
        v[op.x] = (v[op.x] + op.nn) & 0xFF; // no carry into VF
        return;
      case 'CopyRegisters':
        v[op.x] = v[op.y];
        return;
      case 'OrRegisters':
        v[op.x] = v[op.x] | v[op.y];
        return;
      case 'AndRegisters':
        v[op.x] = v[op.x] & v[op.y];
        return;
      case 'XorRegisters':
        v[op.x] = v[op.x] ^ v[op.y];
        return;
      // Flag ops write the result first, then VF, so VF holds the flag even when x is F
      case 'AddRegisters': {
        const sum = v[op.x] + v[op.y];
        v[op.x] = sum & 0xFF;
        v[VF] = sum > 0xFF ? 1 : 0;
        return;
      }
      case 'SubtractRegisters': {
        const a = v[op.x], b = v[op.y];
        v[op.x] = (a - b) & 0xFF;
        v[VF] = a >= b ? 1 : 0;
        return;
      }
      case 'SubtractRegistersReversed': {
        const a = v[op.x], b = v[op.y];
        v[op.x] = (b - a) & 0xFF;
        v[VF] = b >= a ? 1 : 0;
        return;
      }
      case 'ShiftRegisterRight': {
        const a = v[op.x];
        v[op.x] = a >>> 1;
        v[VF] = a & 0x01;
        return;
      }
      case 'ShiftRegisterLeft': {
        const a = v[op.x];
        v[op.x] = (a << 1) & 0xFF;
        v[VF] = (a >>> 7) & 0x01;
        return;
      }
      case 'SetMemoryAddress':
        this.i = op.nnn;
        return;
      case 'JumpToMemoryAddress':
        this.pc = op.nnn + v[0];
        return;
      case 'SetRegisterRandom':
        v[op.x] = Math.floor(this.random() * 256) & op.nn;
        return;
      case 'DrawSprite': {
        this.memory.checkRange(this.i, op.n);
        const rows = new Uint8Array(op.n);
        for (let r = 0; r < op.n; r++) rows[r] = this.memory.read(this.i + r);
        const collided = this.display.drawSprite(v[op.x], v[op.y], rows, this.spriteEdge);
        v[VF] = collided ? 1 : 0;
        return;
      }
      case 'SkipInstructionIfKeyDown':
        this.skipIf(this.keypad.isDown(v[op.x] & 0xF));
        return;
      case 'SkipInstructionIfKeyUp':
        this.skipIf(!this.keypad.isDown(v[op.x] & 0xF));
        return;
      case 'StoreDelayTimerToRegister':
        v[op.x] = this.timers.delay;
        return;
      case 'HaltAndStoreKeypressIntoRegister':
        this.mode = 'awaiting-keypress';
        this.waitRegister = op.x;
        this.waitKeys = this.keypad.snapshot();
        return;
      case 'SetDelayTimerToRegister':
        this.timers.setDelay(v[op.x]);
        return;
      case 'SetSoundTimerToRegister':
        this.timers.setSound(v[op.x]);
        return;
      case 'AddRegisterToMemoryAddress':
        this.i = (this.i + v[op.x]) & 0xFFFF; // VF untouched
        return;
      case 'SetMemoryAddressToSpriteFromRegister':
        this.i = glyphAddress(v[op.x]);
        return;
      case 'SetMemoryAddressToBinaryEncodedDecimalFromRegister': {
        const value = v[op.x];
        this.memory.checkRange(this.i, 3);
        this.memory.write(this.i, Math.floor(value / 100));
        this.memory.write(this.i + 1, Math.floor(value / 10) % 10);
        this.memory.write(this.i + 2, value % 10);
        return;
      }
      case 'DumpRegistersIntoMemoryUpToRegister':
        this.memory.checkRange(this.i, op.x + 1);
        for (let k = 0; k <= op.x; k++) this.memory.write(this.i + k, v[k]);
        return;
      case 'DumpMemoryIntoRegistersUpToRegister':
        this.memory.checkRange(this.i, op.x + 1);
        for (let k = 0; k <= op.x; k++) v[k] = this.memory.read(this.i + k);
        return;
    }
  }
}
