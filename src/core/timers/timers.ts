import type { Byte } from '@core/cpu/types';

export const TIMER_HZ = 60;

// Delay and sound timers count down at 60 Hz of wall-clock time, independent of instruction rate
export class Timers {
  delay: Byte = 0;
  sound: Byte = 0;
  // Elapsed time in ms * TIMER_HZ, so one tick is exactly 1000 units
  private carry = 0;
  private static readonly SLACK = 1e-6;

  get soundActive(): boolean {
    return this.sound > 0;
  }

  setDelay(v: Byte): void { this.delay = v & 0xFF; }
  setSound(v: Byte): void { this.sound = v & 0xFF; }

  advance(elapsedMs: number): void {
    if (!Number.isFinite(elapsedMs) || elapsedMs < 0) throw new RangeError(`Invalid elapsed time ${elapsedMs}`);
    this.carry += elapsedMs * TIMER_HZ;
    const ticks = Math.floor((this.carry + Timers.SLACK) / 1000);
    if (ticks === 0) return;
    this.carry = Math.max(0, this.carry - ticks * 1000);
    this.delay = Math.max(0, this.delay - ticks);
    this.sound = Math.max(0, this.sound - ticks);
  }

  reset(): void {
    this.delay = 0;
    this.sound = 0;
    this.carry = 0;
  }
}
