import { Chip8CPU } from '@core/cpu/cpu';
import { encode, type Opcode } from '@core/cpu/opcodes';
import type { Word } from '@core/cpu/types';
import { formatOpcode, formatTraceLine } from '@utils/disasm';
import { resolveOptions, type Chip8Options } from './config';

export const FRAME_MS = 1000 / 60;

export class Chip8System {
  readonly cpu: Chip8CPU;
  readonly options: Chip8Options;

  constructor(opts: Partial<Chip8Options> = {}) {
    this.options = resolveOptions(opts);
    this.cpu = new Chip8CPU({ random: this.options.random, spriteEdge: this.options.spriteEdge });
    if (this.options.trace) this.cpu.setTraceHook((pc, op) => this.logInstruction(pc, op));
  }

  get display() { return this.cpu.display; }
  get keypad() { return this.cpu.keypad; }
  get timers() { return this.cpu.timers; }

  load(rom: Uint8Array): void {
    this.cpu.reset();
    this.cpu.load(rom);
  }

  reset(): void {
    this.cpu.reset();
  }

  stepInstruction(): void {
    this.cpu.update();
  }

  // One host frame: a fixed batch of instructions, then the timers catch up with wall-clock time
  runFrame(elapsedMs: number = FRAME_MS): void {
    for (let n = 0; n < this.options.instructionsPerFrame; n++) this.cpu.update();
    this.cpu.tick(elapsedMs);
  }

  private logInstruction(pc: Word, op: Opcode): void {
    const s = this.cpu.state;
    const line = formatTraceLine({ pc, bytes: encode(op), op, text: formatOpcode(op) }, s);
    // eslint-disable-next-line no-console
    console.log(`[cpu] ${line}`);
  }
}
