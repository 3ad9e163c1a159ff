import { Chip8System, FRAME_MS } from '@core/system/system';
import type { Chip8Options } from '@core/system/config';

export interface RunResult {
  steps: number;
  reason: 'fail' | 'timeout';
  message?: string;
  system: Chip8System;
}

// A well-formed ROM never halts, so a run ends either in an error or when the step budget runs out
export function runRom(buffer: Uint8Array, opts: { maxSteps: number } & Partial<Chip8Options>): RunResult {
  const { maxSteps, ...options } = opts;
  const sys = new Chip8System(options);
  sys.load(buffer);
  const perFrame = sys.options.instructionsPerFrame;

  let steps = 0;
  while (steps < maxSteps) {
    try {
      sys.stepInstruction();
    } catch (e) {
      return { steps, reason: 'fail', message: e instanceof Error ? e.message : String(e), system: sys };
    }
    steps++;
    if (steps % perFrame === 0) sys.cpu.tick(FRAME_MS);
  }
  return { steps, reason: 'timeout', system: sys };
}
