import type { Byte } from '@core/cpu/types';

export const WIDTH = 64;
export const HEIGHT = 32;

// What happens to sprite pixels that run past the right/bottom edge.
// The start coordinate always wraps; 'clip' drops the overhang, 'wrap' draws it on the opposite side.
export type SpriteEdge = 'clip' | 'wrap';

export class Framebuffer {
  // Row-major, one byte per pixel, each 0 or 1
  readonly pixels = new Uint8Array(WIDTH * HEIGHT);

  clear(): void {
    this.pixels.fill(0);
  }

  get(x: number, y: number): number {
    return this.pixels[(y % HEIGHT) * WIDTH + (x % WIDTH)];
  }

  litCount(): number {
    let n = 0;
    for (let i = 0; i < this.pixels.length; i++) n += this.pixels[i];
    return n;
  }

  // XOR-blit 8-pixel-wide rows; returns true when a lit pixel was switched off
  drawSprite(x: number, y: number, rows: ArrayLike<Byte>, edge: SpriteEdge = 'clip'): boolean {
    const x0 = x % WIDTH;
    const y0 = y % HEIGHT;
    let collision = false;
    for (let row = 0; row < rows.length; row++) {
      let py = y0 + row;
      if (py >= HEIGHT) {
        if (edge === 'clip') break;
        py %= HEIGHT;
      }
      const bits = rows[row] & 0xFF;
      for (let col = 0; col < 8; col++) {
        if ((bits & (0x80 >>> col)) === 0) continue;
        let px = x0 + col;
        if (px >= WIDTH) {
          if (edge === 'clip') break;
          px %= WIDTH;
        }
        const idx = py * WIDTH + px;
        if (this.pixels[idx] === 1) collision = true;
        this.pixels[idx] ^= 1;
      }
    }
    return collision;
  }
}
