import type { SpriteEdge } from '@core/display/framebuffer';

export interface Chip8Options {
  spriteEdge: SpriteEdge;
  instructionsPerFrame: number;
  random: () => number;
  trace: boolean;
}

export const DEFAULT_OPTIONS: Chip8Options = {
  spriteEdge: 'clip',
  instructionsPerFrame: 10,
  random: Math.random,
  trace: false,
};

export type EnvLike = Record<string, string | undefined>;

const processEnv = (): EnvLike => (typeof process !== 'undefined' ? process.env : {});

// CHIP8_SPRITE_EDGE=clip|wrap, CHIP8_IPF=<positive int>, CHIP8_TRACE=1; invalid values are ignored
export function readEnvOptions(env: EnvLike = processEnv()): Partial<Chip8Options> {
  const out: Partial<Chip8Options> = {};
  const edge = env.CHIP8_SPRITE_EDGE?.trim().toLowerCase();
  if (edge === 'clip' || edge === 'wrap') out.spriteEdge = edge;
  const ipf = env.CHIP8_IPF?.trim();
  if (ipf && /^\d+$/.test(ipf)) {
    const n = parseInt(ipf, 10);
    if (n > 0) out.instructionsPerFrame = n;
  }
  if (env.CHIP8_TRACE === '1') out.trace = true;
  return out;
}

// Explicit options win over the environment, which wins over defaults
export function resolveOptions(explicit: Partial<Chip8Options> = {}, env: EnvLike = processEnv()): Chip8Options {
  const fromEnv = readEnvOptions(env);
  const opts: Chip8Options = {
    spriteEdge: explicit.spriteEdge ?? fromEnv.spriteEdge ?? DEFAULT_OPTIONS.spriteEdge,
    instructionsPerFrame: explicit.instructionsPerFrame ?? fromEnv.instructionsPerFrame ?? DEFAULT_OPTIONS.instructionsPerFrame,
    random: explicit.random ?? DEFAULT_OPTIONS.random,
    trace: explicit.trace ?? fromEnv.trace ?? DEFAULT_OPTIONS.trace,
  };
  if (!Number.isInteger(opts.instructionsPerFrame) || opts.instructionsPerFrame <= 0) {
    throw new RangeError(`instructionsPerFrame must be a positive integer, got ${opts.instructionsPerFrame}`);
  }
  return opts;
}
