export type RGB = readonly [number, number, number];

export const PHOSPHOR_ON: RGB = [0x33, 0xFF, 0x66];
export const PHOSPHOR_OFF: RGB = [0x00, 0x00, 0x00];

// Expand a 1-bit-per-byte framebuffer into opaque RGBA, each pixel scaled to a scale x scale block
export function framebufferToRGBA(
  pixels: ArrayLike<number>,
  width: number,
  height: number,
  scale = 1,
  on: RGB = PHOSPHOR_ON,
  off: RGB = PHOSPHOR_OFF,
): Uint8ClampedArray {
  const W = width * scale
  const out = new Uint8ClampedArray(W * height * scale * 4)
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const [r, g, b] = pixels[y * width + x] ? on : off
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + x * scale + dx) << 2
          out[o + 0] = r
          out[o + 1] = g
          out[o + 2] = b
          out[o + 3] = 255
        }
      }
    }
  }
  return out
}
