export const KEY_COUNT = 16;

// Hex keypad 0..F. Hosts write key state, the interpreter only reads it.
export class Keypad {
  private pressed = new Uint8Array(KEY_COUNT);

  setKey(key: number, down: boolean): void {
    if (!Number.isInteger(key) || key < 0 || key >= KEY_COUNT) throw new RangeError(`Invalid key ${key}`);
    this.pressed[key] = down ? 1 : 0;
  }

  isDown(key: number): boolean {
    return this.pressed[key & 0xF] === 1;
  }

  releaseAll(): void {
    this.pressed.fill(0);
  }

  snapshot(): Uint8Array {
    return this.pressed.slice();
  }

  // Lowest key that is down now but was up in `previous`
  firstNewlyPressed(previous: Uint8Array): number | null {
    for (let k = 0; k < KEY_COUNT; k++) {
      if (this.pressed[k] === 1 && previous[k] !== 1) return k;
    }
    return null;
  }
}
