import { describe, it, expect } from 'vitest';
import { DEFAULT_OPTIONS, readEnvOptions, resolveOptions } from '@core/system/config';

describe('readEnvOptions', () => {
  it('parses CHIP8_SPRITE_EDGE, CHIP8_IPF and CHIP8_TRACE', () => {
    expect(readEnvOptions({ CHIP8_SPRITE_EDGE: ' WRAP ', CHIP8_IPF: '12', CHIP8_TRACE: '1' })).toEqual({
      spriteEdge: 'wrap',
      instructionsPerFrame: 12,
      trace: true,
    });
  });

  it('ignores values it cannot use', () => {
    expect(readEnvOptions({ CHIP8_SPRITE_EDGE: 'bounce', CHIP8_IPF: '0', CHIP8_TRACE: 'yes' })).toEqual({});
    expect(readEnvOptions({ CHIP8_IPF: '-3' })).toEqual({});
    expect(readEnvOptions({ CHIP8_IPF: '1.5' })).toEqual({});
    expect(readEnvOptions({})).toEqual({});
  });
});

describe('resolveOptions', () => {
  it('falls back to defaults', () => {
    const opts = resolveOptions({}, {});
    expect(opts).toEqual(DEFAULT_OPTIONS);
    expect(opts.random).toBe(Math.random);
  });

  it('explicit options win over the environment field by field', () => {
    const opts = resolveOptions({ instructionsPerFrame: 3 }, { CHIP8_IPF: '12', CHIP8_SPRITE_EDGE: 'wrap' });
    expect(opts.instructionsPerFrame).toBe(3);
    expect(opts.spriteEdge).toBe('wrap');
    expect(opts.trace).toBe(false);
  });

  it('rejects an instruction rate that is not a positive integer', () => {
    expect(() => resolveOptions({ instructionsPerFrame: 0 }, {})).toThrow(RangeError);
    expect(() => resolveOptions({ instructionsPerFrame: 2.5 }, {})).toThrow('instructionsPerFrame must be a positive integer, got 2.5');
  });
});
