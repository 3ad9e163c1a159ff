import { describe, it, expect } from 'vitest';
import { Keypad } from '@core/input/keypad';
import { KEYMAP, keyForCode } from '@host/browser/keymap';

describe('Keypad', () => {
  it('tracks key state and rejects keys outside 0..F', () => {
    const pad = new Keypad();
    pad.setKey(0xA, true);
    expect(pad.isDown(0xA)).toBe(true);
    expect(pad.isDown(0x1A)).toBe(true); // low nibble
    pad.setKey(0xA, false);
    expect(pad.isDown(0xA)).toBe(false);
    expect(() => pad.setKey(16, true)).toThrow(RangeError);
    expect(() => pad.setKey(-1, true)).toThrow(RangeError);
  });

  it('finds the lowest newly pressed key', () => {
    const pad = new Keypad();
    pad.setKey(2, true);
    const before = pad.snapshot();
    expect(pad.firstNewlyPressed(before)).toBeNull();
    pad.setKey(9, true);
    pad.setKey(5, true);
    expect(pad.firstNewlyPressed(before)).toBe(5);
    pad.releaseAll();
    expect(pad.snapshot().every((k) => k === 0)).toBe(true);
  });
});

describe('Browser keymap', () => {
  it('maps the QWERTY block onto the hex keypad', () => {
    expect(keyForCode('Digit1')).toBe(0x1);
    expect(keyForCode('Digit4')).toBe(0xC);
    expect(keyForCode('KeyX')).toBe(0x0);
    expect(keyForCode('KeyV')).toBe(0xF);
    expect(keyForCode('Space')).toBeNull();
  });

  it('covers all 16 keys exactly once', () => {
    expect(Object.values(KEYMAP).sort((a, b) => a - b)).toEqual([...Array(16).keys()]);
  });
});
